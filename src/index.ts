export * from './types/index.js';
export type { BrowserPage, PageElement, ElementFields, LoadState } from './engines/browser-engine.js';
export {
  launchPlaywrightSession,
  playwrightSessionFactory,
  DEFAULT_SESSION_OPTIONS,
  type BrowserSession,
  type SessionFactory,
  type SessionOptions,
} from './engines/browser-session.js';
export { PlaywrightBrowserPage, PlaywrightElement } from './engines/playwright-page.js';
export { splitSelectorList, toCandidates, formatCandidates } from './engines/selector-candidates.js';
export { ActionExecutor, type ActionExecutorOptions } from './runner/action-executor.js';
export { TaskOrchestrator, failedTask, type TaskOrchestratorOptions, type RunHooks } from './runner/task-orchestrator.js';
export type { TaskState, TaskObserver } from './runner/task-state.js';
export { PageContextAnalyzer, classifyPageType, emptySnapshot } from './analyzer/page-analyzer.js';
export * from './planner/index.js';
export type { TextCompletion, CompletionOptions } from './completion/text-completion.js';
export { CompletionError } from './completion/text-completion.js';
export { OpenAICompletion, type OpenAICompletionOptions } from './completion/openai-completion.js';
export { ResultExtractor, DEFAULT_SCRAPERS, type ResultScraper } from './extraction/result-extractor.js';
export { classifyError } from './exception/classifier.js';
export { loadConfig, type EngineConfig } from './config/config.js';
export { RunLogger } from './logging/run-logger.js';
export { writeSummary, buildSummaryMarkdown } from './logging/summary-writer.js';
export { createLogger, setLogLevel } from './logging/logger.js';
export { createTaskOrchestrator, createTextCompletion, runTask, type EngineOverrides } from './engine.js';
