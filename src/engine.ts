import type { TaskResult } from './types/index.js';
import type { TextCompletion } from './completion/text-completion.js';
import type { SessionFactory } from './engines/browser-session.js';
import { DEFAULT_SESSION_OPTIONS, playwrightSessionFactory } from './engines/browser-session.js';
import { OpenAICompletion } from './completion/openai-completion.js';
import { createPlanGenerator, resolveStartUrl } from './planner/index.js';
import { ResultExtractor } from './extraction/result-extractor.js';
import { TaskOrchestrator, type RunHooks } from './runner/task-orchestrator.js';
import { loadConfig, type EngineConfig } from './config/config.js';

export interface EngineOverrides {
  sessionFactory?: SessionFactory;
  /** null forces the rule-based planner even when a key is configured. */
  completion?: TextCompletion | null;
  sleep?: (ms: number) => Promise<void>;
}

export function createTextCompletion(config: EngineConfig): TextCompletion | null {
  const { apiKey, model, baseURL, timeoutMs } = config.openai;
  if (!apiKey) return null;
  return new OpenAICompletion({ apiKey, model, baseURL, timeoutMs });
}

export function createTaskOrchestrator(config: EngineConfig, overrides: EngineOverrides = {}): TaskOrchestrator {
  const completion = overrides.completion !== undefined ? overrides.completion : createTextCompletion(config);

  return new TaskOrchestrator({
    sessionFactory:
      overrides.sessionFactory ??
      playwrightSessionFactory({ ...DEFAULT_SESSION_OPTIONS, headless: config.browser.headless }),
    planGenerator: createPlanGenerator({
      completion,
      fallback: { stepTimeoutMs: config.timeouts.stepMs },
      delegated: { stepTimeoutMs: config.timeouts.stepMs },
    }),
    extractor: config.extractResults ? new ResultExtractor() : null,
    executor: { candidateTimeoutMs: config.timeouts.candidateMs },
    navigationTimeoutMs: config.timeouts.navigationMs,
    stepPauseMs: config.stepPauseMs,
    resultSettleMs: config.resultSettleMs,
    sleep: overrides.sleep,
  });
}

/**
 * One-shot entry point: configure from the environment and run a single goal.
 * Without a start URL the goal picks one (see resolveStartUrl).
 */
export async function runTask(
  goal: string,
  startUrl?: string,
  config: EngineConfig = loadConfig(),
  hooks: RunHooks = {},
  overrides: EngineOverrides = {},
): Promise<TaskResult> {
  const url = startUrl?.trim() || resolveStartUrl(goal);
  return createTaskOrchestrator(config, overrides).run(goal, url, hooks);
}
