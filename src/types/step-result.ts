import type { ActionKind } from './action.js';
import type { ExtractedResults } from './extraction.js';

export type ErrorType =
  | 'NavigationFailed'
  | 'TargetNotFound'
  | 'NotActionable'
  | 'Timeout'
  | 'InvalidStep'
  | 'PageClosed'
  | 'Unknown';

export interface StepResult {
  /** 1-based position of the step in the plan. */
  step: number;
  action: ActionKind;
  success: boolean;
  message: string;
  data?: Record<string, unknown>;
  error?: string;
  errorType?: ErrorType;
  durationMs: number;
}

export interface TaskData {
  steps: StepResult[];
  expectedOutcome: string;
  confidence: number;
  reasoning: string;
  totalSteps: number;
  successfulSteps: number;
  results?: ExtractedResults;
}

export interface TaskResult {
  success: boolean;
  message: string;
  data: TaskData;
  error?: string;
}
