import type { StepResult } from '../types/index.js';

export type TaskState =
  | 'NotStarted'
  | 'SessionOpen'
  | 'Navigated'
  | 'Analyzed'
  | 'Planned'
  | 'Executing'
  | 'Completed'
  | 'Failed';

export const TERMINAL_STATES: readonly TaskState[] = ['Completed', 'Failed'];

export function isTerminal(state: TaskState): boolean {
  return TERMINAL_STATES.includes(state);
}

/** Progress hooks. A throwing observer is logged and ignored. */
export interface TaskObserver {
  onStage?(state: TaskState, detail: Record<string, unknown>): void | Promise<void>;
  onStep?(result: StepResult): void | Promise<void>;
}
