import type { TextCompletion } from '../completion/text-completion.js';
import type { PlanGenerator } from './plan-generator.js';
import { FallbackPlanGenerator, type FallbackPlannerOptions } from './fallback-planner.js';
import { DelegatedPlanGenerator, type DelegatedPlannerOptions } from './delegated-planner.js';

export interface PlanGeneratorOptions {
  /** Absent when no completion credential is configured. */
  completion?: TextCompletion | null;
  fallback?: FallbackPlannerOptions;
  delegated?: DelegatedPlannerOptions;
}

export function createPlanGenerator(options: PlanGeneratorOptions = {}): PlanGenerator {
  const fallback = new FallbackPlanGenerator(options.fallback);
  if (!options.completion) return fallback;
  return new DelegatedPlanGenerator(options.completion, fallback, options.delegated);
}

export type { PlanGenerator } from './plan-generator.js';
export * from './fallback-planner.js';
export * from './delegated-planner.js';
export * from './prompt.js';
export * from './plan-parser.js';
export * from './start-site.js';
