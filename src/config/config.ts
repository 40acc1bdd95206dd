import { z } from 'zod';
import type { LogLevel } from '../logging/logger.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

export const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_BASE_URL: z.string().url().optional(),
  OPENAI_TIMEOUT_MS: positiveInt.default(60000),
  BROWSER_HEADLESS: booleanFlag.default('true'),
  NAV_TIMEOUT_MS: positiveInt.default(30000),
  STEP_TIMEOUT_MS: positiveInt.default(10000),
  CANDIDATE_TIMEOUT_MS: positiveInt.default(3000),
  STEP_PAUSE_MS: nonNegativeInt.default(1000),
  RESULT_SETTLE_MS: nonNegativeInt.default(2000),
  EXTRACT_RESULTS: booleanFlag.default('true'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),
  RUNS_DIR: z.string().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

export interface EngineConfig {
  openai: {
    apiKey?: string;
    model: string;
    baseURL?: string;
    timeoutMs: number;
  };
  browser: {
    headless: boolean;
  };
  timeouts: {
    navigationMs: number;
    stepMs: number;
    candidateMs: number;
  };
  stepPauseMs: number;
  resultSettleMs: number;
  extractResults: boolean;
  logLevel: LogLevel;
  runsDir?: string;
}

export interface ConfigIssue {
  key: string;
  message: string;
}

function toEngineConfig(env: Env): EngineConfig {
  return {
    openai: {
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL,
      baseURL: env.OPENAI_BASE_URL,
      timeoutMs: env.OPENAI_TIMEOUT_MS,
    },
    browser: { headless: env.BROWSER_HEADLESS },
    timeouts: {
      navigationMs: env.NAV_TIMEOUT_MS,
      stepMs: env.STEP_TIMEOUT_MS,
      candidateMs: env.CANDIDATE_TIMEOUT_MS,
    },
    stepPauseMs: env.STEP_PAUSE_MS,
    resultSettleMs: env.RESULT_SETTLE_MS,
    extractResults: env.EXTRACT_RESULTS,
    logLevel: env.LOG_LEVEL,
    runsDir: env.RUNS_DIR,
  };
}

/**
 * Parses the environment. Empty values count as unset; invalid values fall
 * back to their defaults and are reported through `onIssue`.
 */
export function loadConfig(
  source: Record<string, string | undefined> = process.env,
  onIssue: (issue: ConfigIssue) => void = () => undefined,
): EngineConfig {
  const keys = Object.keys(EnvSchema.shape);
  const raw: Record<string, string> = {};
  for (const key of keys) {
    const value = source[key]?.trim();
    if (value) raw[key] = value;
  }

  const parsed = EnvSchema.safeParse(raw);
  if (parsed.success) return toEngineConfig(parsed.data);

  for (const issue of parsed.error.issues) {
    const key = String(issue.path[0]);
    onIssue({ key, message: issue.message });
    delete raw[key];
  }
  return toEngineConfig(EnvSchema.parse(raw));
}
