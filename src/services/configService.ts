import path from 'path';
import { z } from 'zod';
import { ConfigError } from '../types/errors';
import { formatZodIssues, readJsonFile } from '../utils/jsonFile';

export const DEFAULT_TIDYHQ_API_URL = 'https://api.tidyhq.com/v1';
export const DEFAULT_CACHE_EXPIRY_SECONDS = 3600;

const IdSchema = z.union([z.string().min(1), z.number().int()]).transform(String);

export const ConfigSchema = z.object({
  slack: z
    .object({
      botToken: z.string().min(1),
      appToken: z.string().min(1).optional(),
      signingSecret: z.string().min(1).optional(),
      adminChannel: z.string().min(1).optional()
    })
    .refine((slack) => slack.appToken !== undefined || slack.signingSecret !== undefined, {
      message: 'Either appToken (Socket Mode) or signingSecret (HTTP) is required'
    }),
  tidyhq: z.object({
    token: z.string().min(1),
    apiUrl: z.string().url().default(DEFAULT_TIDYHQ_API_URL),
    slackFieldId: IdSchema,
    adminGroupIds: z.array(IdSchema).min(1)
  }),
  cache: z
    .object({
      expirySeconds: z.number().int().positive().default(DEFAULT_CACHE_EXPIRY_SECONDS),
      file: z.string().min(1).default('cache.json')
    })
    .default({}),
  storage: z
    .object({
      hoursFile: z.string().min(1).default('hours.json'),
      rewardsFile: z.string().min(1).default('rewards.json'),
      claimsFile: z.string().min(1).default('claims.json')
    })
    .default({})
});

export type AppConfig = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Secrets may come from the environment instead of the config file
 */
const applyEnvOverrides = (raw: unknown, env: Env): unknown => {
  if (!isRecord(raw)) return raw;

  const slack = isRecord(raw.slack) ? { ...raw.slack } : {};
  const tidyhq = isRecord(raw.tidyhq) ? { ...raw.tidyhq } : {};

  if (env.SLACK_BOT_TOKEN) slack.botToken = env.SLACK_BOT_TOKEN;
  if (env.SLACK_APP_TOKEN) slack.appToken = env.SLACK_APP_TOKEN;
  if (env.SLACK_SIGNING_SECRET) slack.signingSecret = env.SLACK_SIGNING_SECRET;
  if (env.TIDYHQ_TOKEN) tidyhq.token = env.TIDYHQ_TOKEN;

  return { ...raw, slack, tidyhq };
};

/**
 * Load and validate config.json. Relative file locations resolve from the
 * directory holding the config file.
 */
export const loadConfig = (filePath: string, env: Env = process.env): AppConfig => {
  let raw: unknown;
  try {
    raw = readJsonFile(filePath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not parse ${filePath}: ${reason}`);
  }

  if (raw === undefined) {
    throw new ConfigError(`${filePath} not found. Create it using config.example.json as a template`);
  }

  const parsed = ConfigSchema.safeParse(applyEnvOverrides(raw, env));
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', formatZodIssues(parsed.error.issues, path.basename(filePath)));
  }

  const baseDir = path.dirname(path.resolve(filePath));
  const config = parsed.data;

  return {
    ...config,
    cache: { ...config.cache, file: path.resolve(baseDir, config.cache.file) },
    storage: {
      hoursFile: path.resolve(baseDir, config.storage.hoursFile),
      rewardsFile: path.resolve(baseDir, config.storage.rewardsFile),
      claimsFile: path.resolve(baseDir, config.storage.claimsFile)
    }
  };
};
