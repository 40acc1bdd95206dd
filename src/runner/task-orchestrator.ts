import { randomUUID } from 'node:crypto';
import type {
  ActionStep,
  ExtractedResults,
  PageSnapshot,
  Plan,
  StepResult,
  TaskData,
  TaskResult,
} from '../types/index.js';
import type { BrowserPage } from '../engines/browser-engine.js';
import type { BrowserSession, SessionFactory } from '../engines/browser-session.js';
import type { PlanGenerator } from '../planner/plan-generator.js';
import type { RunLogger } from '../logging/run-logger.js';
import { ActionExecutor, sleep, type ActionExecutorOptions } from './action-executor.js';
import { isTerminal, type TaskObserver, type TaskState } from './task-state.js';
import { PageContextAnalyzer, emptySnapshot } from '../analyzer/page-analyzer.js';
import { ResultExtractor } from '../extraction/result-extractor.js';
import { TaskInputSchema, type TaskInput } from '../schemas/task-input.schema.js';
import { createLogger, errorMessage, type ComponentLogger } from '../logging/logger.js';

const baseLog = createLogger('task-orchestrator');

export interface TaskOrchestratorOptions {
  sessionFactory: SessionFactory;
  planGenerator: PlanGenerator;
  analyzer?: PageContextAnalyzer;
  /** null disables result extraction. */
  extractor?: ResultExtractor | null;
  executor?: ActionExecutorOptions;
  navigationTimeoutMs?: number;
  stepPauseMs?: number;
  resultSettleMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface RunHooks {
  taskId?: string;
  observer?: TaskObserver;
  runLogger?: RunLogger;
}

function emptyData(plan?: Plan): TaskData {
  return {
    steps: [],
    expectedOutcome: plan?.expectedOutcome ?? '',
    confidence: plan?.confidence ?? 0,
    reasoning: plan?.reasoning ?? '',
    totalSteps: 0,
    successfulSteps: 0,
  };
}

export function failedTask(message: string, error?: string, plan?: Plan): TaskResult {
  return { success: false, message, data: emptyData(plan), error };
}

function navigateStep(url: string, timeoutMs: number): ActionStep {
  return { action: 'navigate', target: [url], reasoning: 'Open the start page', timeoutMs };
}

/**
 * Reports state transitions and step results to the observer and run log.
 */
class TaskTracker {
  state: TaskState = 'NotStarted';

  constructor(
    private hooks: RunHooks,
    private log: ComponentLogger,
  ) {}

  async stage(state: TaskState, detail: Record<string, unknown> = {}): Promise<void> {
    this.state = state;
    this.log.debug('Task state changed', { state, ...detail });
    await this.notify('onStage', () => this.hooks.observer?.onStage?.(state, detail));
    await this.notify('logStage', () => this.hooks.runLogger?.logStage(state));
  }

  async step(result: StepResult): Promise<void> {
    await this.notify('onStep', () => this.hooks.observer?.onStep?.(result));
    await this.notify('logStep', () => this.hooks.runLogger?.logStep(result));
  }

  async finish(result: TaskResult): Promise<void> {
    if (!isTerminal(this.state)) {
      await this.stage(result.success ? 'Completed' : 'Failed');
    }
    await this.notify('logTask', () => this.hooks.runLogger?.logTask(result));
  }

  private async notify(hook: string, call: () => void | Promise<void> | undefined): Promise<void> {
    try {
      await call();
    } catch (error) {
      this.log.warn('Task hook failed', { hook, error: errorMessage(error) });
    }
  }
}

/**
 * Runs one goal in one exclusive browser session:
 * navigate → analyze → plan → execute (stop at first failure) → extract results.
 * Never rejects; every failure comes back as a TaskResult.
 */
export class TaskOrchestrator {
  private sessionFactory: SessionFactory;
  private planGenerator: PlanGenerator;
  private analyzer: PageContextAnalyzer;
  private extractor: ResultExtractor | null;
  private executorOptions: ActionExecutorOptions;
  private navigationTimeoutMs: number;
  private stepPauseMs: number;
  private resultSettleMs: number;
  private sleep: (ms: number) => Promise<void>;

  constructor(options: TaskOrchestratorOptions) {
    this.sessionFactory = options.sessionFactory;
    this.planGenerator = options.planGenerator;
    this.analyzer = options.analyzer ?? new PageContextAnalyzer();
    this.extractor = options.extractor === undefined ? new ResultExtractor() : options.extractor;
    this.sleep = options.sleep ?? sleep;
    this.executorOptions = { sleep: this.sleep, ...options.executor };
    this.navigationTimeoutMs = options.navigationTimeoutMs ?? 30000;
    this.stepPauseMs = options.stepPauseMs ?? 1000;
    this.resultSettleMs = options.resultSettleMs ?? 2000;
  }

  async run(goal: string, startUrl: string, hooks: RunHooks = {}): Promise<TaskResult> {
    const taskId = hooks.taskId ?? randomUUID();
    const log = baseLog.child({ taskId });
    const tracker = new TaskTracker(hooks, log);

    let result: TaskResult;
    try {
      result = await this.runTask(goal, startUrl, tracker, log);
    } catch (error) {
      log.error('Task failed unexpectedly', { error: errorMessage(error) });
      result = failedTask('Automation task failed', errorMessage(error));
    }

    await tracker.finish(result);
    log.info('Task finished', { success: result.success, message: result.message });
    return result;
  }

  private async runTask(
    goal: string,
    startUrl: string,
    tracker: TaskTracker,
    log: ComponentLogger,
  ): Promise<TaskResult> {
    const input = TaskInputSchema.safeParse({ goal, startUrl });
    if (!input.success) {
      return failedTask('Invalid task input', input.error.issues.map((issue) => issue.message).join('; '));
    }

    let session: BrowserSession;
    try {
      session = await this.sessionFactory();
    } catch (error) {
      log.error('Failed to start browser session', { error: errorMessage(error) });
      return failedTask('Failed to start browser session', errorMessage(error));
    }

    try {
      await tracker.stage('SessionOpen');
      return await this.runInSession(session.page, input.data, tracker, log);
    } finally {
      await closeSession(session, log);
    }
  }

  private async runInSession(
    page: BrowserPage,
    input: TaskInput,
    tracker: TaskTracker,
    log: ComponentLogger,
  ): Promise<TaskResult> {
    const executor = new ActionExecutor(page, this.executorOptions);

    const navigation = await executor.execute(navigateStep(input.startUrl, this.navigationTimeoutMs), 0);
    if (!navigation.success) {
      return failedTask(`Failed to navigate to ${input.startUrl}`, navigation.error);
    }
    await tracker.stage('Navigated', { url: input.startUrl });

    let snapshot: PageSnapshot;
    try {
      snapshot = await this.analyzer.analyze(page);
    } catch (error) {
      log.warn('Page analysis failed; planning without page context', { error: errorMessage(error) });
      snapshot = emptySnapshot(input.startUrl);
    }
    await tracker.stage('Analyzed', {
      pageType: snapshot.structuralFacts.pageType,
      elements: snapshot.elements.length,
    });

    let plan: Plan;
    try {
      plan = await this.planGenerator.generate(input.goal, snapshot);
    } catch (error) {
      return failedTask('Could not generate automation plan', errorMessage(error));
    }
    if (plan.steps.length === 0) {
      return failedTask('No steps in automation plan', 'Empty plan', plan);
    }
    await tracker.stage('Planned', { steps: plan.steps.length, confidence: plan.confidence, source: plan.source });

    await tracker.stage('Executing');
    const steps = await this.executePlan(executor, plan, tracker);

    const successfulSteps = steps.filter((step) => step.success).length;
    const failed = steps.find((step) => !step.success);
    const success = steps.length > 0 && !failed;
    await tracker.stage(success ? 'Completed' : 'Failed', { successfulSteps, totalSteps: plan.steps.length });

    const data: TaskData = {
      steps,
      expectedOutcome: plan.expectedOutcome,
      confidence: plan.confidence,
      reasoning: plan.reasoning,
      totalSteps: plan.steps.length,
      successfulSteps,
    };
    const results = await this.extractResults(page, log);
    if (results) data.results = results;

    if (failed) {
      return {
        success: false,
        message: `Automation plan failed at step ${failed.step}: ${failed.message}`,
        data,
        error: failed.error,
      };
    }
    return { success, message: 'Automation plan completed successfully', data };
  }

  private async executePlan(executor: ActionExecutor, plan: Plan, tracker: TaskTracker): Promise<StepResult[]> {
    const results: StepResult[] = [];

    for (const [i, step] of plan.steps.entries()) {
      if (i > 0 && this.stepPauseMs > 0) {
        await this.sleep(this.stepPauseMs);
      }

      const result = await executor.execute(step, i + 1);
      results.push(result);
      await tracker.step(result);

      if (!result.success) break;
    }

    return results;
  }

  private async extractResults(page: BrowserPage, log: ComponentLogger): Promise<ExtractedResults | undefined> {
    if (!this.extractor) return undefined;

    try {
      if (this.resultSettleMs > 0) await this.sleep(this.resultSettleMs);
      if (page.isClosed()) {
        log.warn('Page closed before result extraction');
        return undefined;
      }
      return await this.extractor.extract(page);
    } catch (error) {
      log.warn('Result extraction failed', { error: errorMessage(error) });
      return undefined;
    }
  }
}

async function closeSession(session: BrowserSession, log: ComponentLogger): Promise<void> {
  try {
    await session.close();
  } catch (error) {
    log.warn('Failed to close browser session', { error: errorMessage(error) });
  }
}
