export type Surface = 'home' | 'modal' | 'message';

const BLOCK_LIMITS: Record<Surface, number> = {
  home: 100,
  modal: 100,
  message: 50
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

/**
 * Slack rejects any object whose `text` is an empty string, at any depth
 */
const findEmptyText = (value: unknown, path: string, problems: string[]): void => {
  if (Array.isArray(value)) {
    value.forEach((item, index) => findEmptyText(item, `${path}[${index}]`, problems));
    return;
  }

  if (!isRecord(value)) return;

  for (const [key, child] of Object.entries(value)) {
    if (key === 'text' && child === '') {
      problems.push(`Empty text at ${path}.text`);
    } else {
      findEmptyText(child, `${path}.${key}`, problems);
    }
  }
};

export const findBlockProblems = (blocks: readonly unknown[], surface: Surface): string[] => {
  const problems: string[] = [];
  const limit = BLOCK_LIMITS[surface];

  if (blocks.length > limit) {
    problems.push(`Block list too long ${blocks.length}/${limit}`);
  }

  blocks.forEach((block, index) => findEmptyText(block, `blocks[${index}]`, problems));
  return problems;
};

export const validateBlocks = (blocks: readonly unknown[], surface: Surface): boolean => {
  const problems = findBlockProblems(blocks, surface);
  for (const problem of problems) {
    console.error(`Invalid ${surface} blocks: ${problem}`);
  }
  return problems.length === 0;
};
