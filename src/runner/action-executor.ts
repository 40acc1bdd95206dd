import type { ActionStep, ErrorType, SelectorCandidate, StepResult } from '../types/index.js';
import type { BrowserPage, LoadState, PageElement } from '../engines/browser-engine.js';
import { formatCandidates } from '../engines/selector-candidates.js';
import { classifyError } from '../exception/classifier.js';
import { isHttpUrl } from '../schemas/task-input.schema.js';
import { createLogger, errorMessage } from '../logging/logger.js';

const log = createLogger('action-executor');

export interface ActionExecutorOptions {
  /** Per-candidate wait when a target lists several selectors. */
  candidateTimeoutMs?: number;
  /** Extra load state awaited after navigation; null skips it. */
  idleState?: LoadState | null;
  /** Sleep used by `wait` steps without target or data. */
  defaultWaitSeconds?: number;
  maxSleepMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

type ActionOutcome = Omit<StepResult, 'step' | 'action' | 'durationMs'>;

interface ResolvedTarget {
  element: PageElement;
  selector: SelectorCandidate;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class ActionExecutor {
  private candidateTimeoutMs: number;
  private idleState: LoadState | null;
  private defaultWaitSeconds: number;
  private maxSleepMs: number;
  private sleep: (ms: number) => Promise<void>;

  constructor(
    private page: BrowserPage,
    options: ActionExecutorOptions = {},
  ) {
    this.candidateTimeoutMs = options.candidateTimeoutMs ?? 3000;
    this.idleState = options.idleState === undefined ? 'networkidle' : options.idleState;
    this.defaultWaitSeconds = options.defaultWaitSeconds ?? 2;
    this.maxSleepMs = options.maxSleepMs ?? 30000;
    this.sleep = options.sleep ?? sleep;
  }

  async execute(step: ActionStep, index: number): Promise<StepResult> {
    const start = Date.now();

    try {
      const outcome = await this.executeAction(step);
      return { step: index, action: step.action, ...outcome, durationMs: Date.now() - start };
    } catch (error) {
      const message = errorMessage(error);
      log.warn('Step failed', { step: index, action: step.action, error: message });
      return {
        step: index,
        action: step.action,
        success: false,
        message: failureMessage(step),
        error: message,
        errorType: classifyError(error, { action: step.action, selector: step.target[0] }),
        durationMs: Date.now() - start,
      };
    }
  }

  private async executeAction(step: ActionStep): Promise<ActionOutcome> {
    switch (step.action) {
      case 'navigate':
        return this.executeNavigate(step);
      case 'click':
        return this.executeClick(step);
      case 'type':
        return this.executeType(step);
      case 'wait':
        return this.executeWait(step);
      case 'get_text':
        return this.executeGetText(step);
      case 'scroll':
        return this.executeScroll();
      default: {
        const unknown: never = step.action;
        return invalid(`Unknown action: ${String(unknown)}`);
      }
    }
  }

  private async executeNavigate(step: ActionStep): Promise<ActionOutcome> {
    const url = navigationUrl(step);
    if (!url) {
      return invalid(`navigate requires an absolute http(s) URL, got "${step.target[0] ?? step.data ?? ''}"`);
    }

    await this.page.goto(url, { timeoutMs: step.timeoutMs, waitUntil: 'domcontentloaded' });
    if (this.idleState) {
      await this.page.waitForLoadState(this.idleState, step.timeoutMs);
    }

    const title = await this.page.title();
    return { success: true, message: `Navigated to ${url}`, data: { url, title } };
  }

  private async executeClick(step: ActionStep): Promise<ActionOutcome> {
    if (step.target.length === 0) {
      return invalid('click requires a target selector');
    }

    const resolved = await this.resolveFirst(step.target, step.timeoutMs);
    if (resolved) {
      await resolved.element.click();
      return { success: true, message: `Clicked element: ${resolved.selector}`, data: { selector: resolved.selector } };
    }

    // No alternative resolved: submit whatever has focus
    if (step.target.length > 1) {
      await this.page.pressKey('Enter');
      return { success: true, message: 'No selector resolved; pressed Enter', data: { fallback: 'keypress' } };
    }

    return notFound(step.target);
  }

  private async executeType(step: ActionStep): Promise<ActionOutcome> {
    const text = step.data ?? '';
    if (!text) {
      return invalid('type requires text in data');
    }

    const resolved = step.target.length > 0 ? await this.resolveFirst(step.target, step.timeoutMs) : null;
    if (resolved) {
      await resolved.element.click();
      await resolved.element.fill('');
      await resolved.element.fill(text);
      return { success: true, message: `Typed text into: ${resolved.selector}`, data: { selector: resolved.selector } };
    }

    await this.page.typeText(text);
    return { success: true, message: 'Typed text into focused element', data: { fallback: 'keyboard' } };
  }

  private async executeWait(step: ActionStep): Promise<ActionOutcome> {
    if (step.target.length > 0) {
      const resolved = await this.resolveFirst(step.target, step.timeoutMs);
      if (!resolved) return notFound(step.target);
      return { success: true, message: `Element found: ${resolved.selector}`, data: { selector: resolved.selector } };
    }

    const seconds = parseWaitSeconds(step.data, this.defaultWaitSeconds);
    if (seconds === null) {
      return invalid(`wait requires a target or a duration in seconds, got "${step.data ?? ''}"`);
    }

    const ms = Math.min(seconds * 1000, this.maxSleepMs);
    await this.sleep(ms);
    return { success: true, message: `Waited ${ms / 1000}s`, data: { waitedMs: ms } };
  }

  private async executeGetText(step: ActionStep): Promise<ActionOutcome> {
    if (step.target.length === 0) {
      return invalid('get_text requires a target selector');
    }

    const resolved = await this.resolveFirst(step.target, step.timeoutMs);
    if (!resolved) return notFound(step.target);

    const text = ((await resolved.element.textContent()) ?? '').trim();
    return {
      success: true,
      message: `Retrieved text from: ${resolved.selector}`,
      data: { selector: resolved.selector, text },
    };
  }

  private async executeScroll(): Promise<ActionOutcome> {
    if (this.page.isClosed()) {
      return { success: false, message: 'Failed to scroll page', error: 'Page is closed', errorType: 'PageClosed' };
    }

    await this.page.scrollToBottom();
    return { success: true, message: 'Scrolled to bottom of page' };
  }

  /**
   * Tries candidates in order. A lone candidate gets the full step timeout;
   * alternatives each get the shorter per-candidate timeout.
   */
  private async resolveFirst(
    candidates: readonly SelectorCandidate[],
    timeoutMs: number,
  ): Promise<ResolvedTarget | null> {
    const perCandidateMs = candidates.length > 1 ? Math.min(this.candidateTimeoutMs, timeoutMs) : timeoutMs;

    for (const selector of candidates) {
      try {
        const element = await this.page.waitForSelector(selector, perCandidateMs);
        return { element, selector };
      } catch (error) {
        log.debug('Selector candidate did not resolve', { selector, error: errorMessage(error) });
      }
    }
    return null;
  }
}

/** First target candidate or data value that is an absolute http(s) URL. */
function navigationUrl(step: ActionStep): string | undefined {
  const values = step.data === undefined ? step.target : [...step.target, step.data];
  return values.map((value) => value.trim()).find((value) => isHttpUrl(value));
}

function parseWaitSeconds(data: string | undefined, defaultSeconds: number): number | null {
  const raw = data?.trim() ?? '';
  if (!raw) return defaultSeconds;
  const seconds = Number(raw);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : null;
}

function invalid(message: string): ActionOutcome {
  return failure(message, message, 'InvalidStep');
}

function notFound(candidates: readonly SelectorCandidate[]): ActionOutcome {
  const list = formatCandidates(candidates);
  return failure(`Element not found: ${list}`, `No selector resolved: ${list}`, 'TargetNotFound');
}

function failure(message: string, error: string, errorType: ErrorType): ActionOutcome {
  return { success: false, message, error, errorType };
}

function failureMessage(step: ActionStep): string {
  const target = formatCandidates(step.target);
  switch (step.action) {
    case 'navigate':
      return `Failed to navigate to ${navigationUrl(step) ?? step.target[0] ?? step.data ?? ''}`;
    case 'click':
      return `Failed to click element: ${target}`;
    case 'type':
      return `Failed to type text into: ${target}`;
    case 'wait':
      return target ? `Wait for element failed: ${target}` : 'Wait failed';
    case 'get_text':
      return `Failed to get text from: ${target}`;
    case 'scroll':
      return 'Failed to scroll page';
    default:
      return `Step failed: ${String(step.action)}`;
  }
}
