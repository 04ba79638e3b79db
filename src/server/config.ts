import { homedir } from 'os';
import { join, resolve } from 'path';
import { z } from 'zod/v4';
import { fromZodError } from 'zod-validation-error';
import { ConfigurationError } from '../utils/errors.js';
import { LOG_LEVELS } from './requestLogger.js';

export const APP_DIRECTORY_NAME = 'budget-tools-mcp';
export const PREFERRED_BUDGET_FILE = 'preferred_budget_id.txt';
export const CATEGORY_CACHE_FILE = 'budget_category_cache.json';

const envSchema = z.object({
  YNAB_API_KEY: z.string().trim().min(1, 'YNAB_API_KEY must be a non-empty string'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  YNAB_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  YNAB_CONFIG_DIR: z.string().trim().min(1).optional(),
  XDG_CONFIG_HOME: z.string().trim().min(1).optional(),
});

type ParsedEnv = z.infer<typeof envSchema>;

export interface AppConfig {
  apiKey: string;
  logLevel: ParsedEnv['LOG_LEVEL'];
  requestTimeoutMs: number;
  configDir: string;
  preferredBudgetFile: string;
  categoryCacheFile: string;
}

/**
 * Resolve the directory holding local state. `~/` is expanded by hand so the
 * setting behaves the same on every platform.
 */
function resolveConfigDir(env: ParsedEnv): string {
  const explicit = env.YNAB_CONFIG_DIR;
  if (explicit) {
    return explicit.startsWith('~/') ? join(homedir(), explicit.slice(2)) : resolve(explicit);
  }
  const base = env.XDG_CONFIG_HOME ?? join(homedir(), '.config');
  return join(base, APP_DIRECTORY_NAME);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const validationError = fromZodError(result.error);
    throw new ConfigurationError(validationError.toString());
  }
  const parsed = result.data;
  const configDir = resolveConfigDir(parsed);
  return {
    apiKey: parsed.YNAB_API_KEY,
    logLevel: parsed.LOG_LEVEL,
    requestTimeoutMs: parsed.YNAB_REQUEST_TIMEOUT_MS,
    configDir,
    preferredBudgetFile: join(configDir, PREFERRED_BUDGET_FILE),
    categoryCacheFile: join(configDir, CATEGORY_CACHE_FILE),
  };
}
