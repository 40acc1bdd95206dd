import type { PageSnapshot, Plan } from '../types/index.js';
import { DEFAULT_STEP_TIMEOUT_MS } from '../types/index.js';
import type { TextCompletion } from '../completion/text-completion.js';
import type { PlanGenerator } from './plan-generator.js';
import type { FallbackPlanGenerator } from './fallback-planner.js';
import { buildPlanPrompt, DEFAULT_PROMPT_LIMITS, type PromptLimits } from './prompt.js';
import { parsePlanResponse } from './plan-parser.js';
import { createLogger, errorMessage } from '../logging/logger.js';

const log = createLogger('delegated-planner');

export interface DelegatedPlannerOptions {
  temperature?: number;
  maxTokens?: number;
  promptLimits?: PromptLimits;
  stepTimeoutMs?: number;
}

export class DelegatedPlanGenerator implements PlanGenerator {
  private temperature: number;
  private maxTokens?: number;
  private promptLimits: PromptLimits;
  private stepTimeoutMs: number;

  constructor(
    private completion: TextCompletion,
    private fallback: FallbackPlanGenerator,
    options: DelegatedPlannerOptions = {},
  ) {
    this.temperature = options.temperature ?? 0.1;
    this.maxTokens = options.maxTokens;
    this.promptLimits = options.promptLimits ?? DEFAULT_PROMPT_LIMITS;
    this.stepTimeoutMs = options.stepTimeoutMs ?? DEFAULT_STEP_TIMEOUT_MS;
  }

  async generate(goal: string, context: PageSnapshot): Promise<Plan> {
    try {
      const prompt = buildPlanPrompt(goal, context, this.promptLimits);
      const text = await this.completion.complete(prompt, {
        temperature: this.temperature,
        maxTokens: this.maxTokens,
      });
      const plan = parsePlanResponse(text, goal, this.stepTimeoutMs);
      log.info('Generated plan', { steps: plan.steps.length, confidence: plan.confidence });
      return plan;
    } catch (error) {
      log.warn('Plan generation failed, using fallback plan', { error: errorMessage(error) });
      return this.fallback.buildPlan(goal);
    }
  }
}
