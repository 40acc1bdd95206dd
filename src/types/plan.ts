import type { ActionStep } from './action.js';

export type PlanSource = 'delegated' | 'fallback';

export interface Plan {
  readonly steps: readonly ActionStep[];
  readonly confidence: number;
  readonly reasoning: string;
  readonly expectedOutcome: string;
  readonly source: PlanSource;
}
