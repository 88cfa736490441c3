import fs from 'fs';
import path from 'path';
import type { z } from 'zod';

/**
 * Read and parse a JSON file. Returns undefined when the file does not exist;
 * parse errors are thrown to the caller.
 */
export const readJsonFile = (filePath: string): unknown => {
  if (!fs.existsSync(filePath)) {
    return undefined;
  }

  const data = fs.readFileSync(filePath, 'utf8');
  return JSON.parse(data);
};

export const ensureDirectory = (filePath: string): void => {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

/**
 * Write the whole document to a temp file beside the target, then rename over
 * it, so another process never reads a half-written file.
 */
export const writeJsonAtomic = async (filePath: string, data: unknown): Promise<void> => {
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await fs.promises.writeFile(tempPath, JSON.stringify(data, null, 2), 'utf8');
  await fs.promises.rename(tempPath, filePath);
};

/**
 * Queues whole-document writes for one file so that overlapping saves run one
 * after another. Each write serialises the latest state when its turn comes.
 */
export class AtomicJsonWriter {
  private pending: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  write(snapshot: () => unknown): Promise<void> {
    const next = this.pending.then(() => writeJsonAtomic(this.filePath, snapshot()));
    this.pending = next.catch(() => undefined);
    return next;
  }
}

export const formatZodIssues = (issues: readonly z.ZodIssue[], file: string): string[] =>
  issues.map((issue) => {
    const jsonPath = issue.path.length
      ? `$${issue.path
          .map((part) => (typeof part === 'number' ? `[${part}]` : `.${String(part)}`))
          .join('')}`
      : '$';
    return `${file} ${jsonPath}: ${issue.message}`;
  });
