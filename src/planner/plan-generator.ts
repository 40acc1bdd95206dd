import type { PageSnapshot, Plan } from '../types/index.js';

/**
 * Maps a goal and the current page to an ordered plan. Implementations never
 * reject: a strategy that cannot produce a plan hands over to the fallback.
 */
export interface PlanGenerator {
  generate(goal: string, context: PageSnapshot): Promise<Plan>;
}
