export type ActionKind = 'navigate' | 'click' | 'type' | 'wait' | 'get_text' | 'scroll';

export const ACTION_KINDS: readonly ActionKind[] = ['navigate', 'click', 'type', 'wait', 'get_text', 'scroll'];

/** One CSS/Playwright selector, possibly one of several alternatives tried in order. */
export type SelectorCandidate = string;

export interface ActionStep {
  action: ActionKind;
  target: readonly SelectorCandidate[];
  data?: string;
  reasoning: string;
  timeoutMs: number;
}

export const DEFAULT_STEP_TIMEOUT_MS = 10000;
/** Ceiling for any single step, whatever the plan asks for. */
export const MAX_STEP_TIMEOUT_MS = 60000;
