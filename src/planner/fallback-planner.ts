import type { ActionStep, PageSnapshot, Plan, SelectorCandidate } from '../types/index.js';
import { DEFAULT_STEP_TIMEOUT_MS } from '../types/index.js';
import type { PlanGenerator } from './plan-generator.js';

export const FALLBACK_REASONING = 'Universal fallback plan generated for any type of query';
export const FALLBACK_CONFIDENCE = 0.8;

export const SEARCH_INPUT_CANDIDATES: readonly SelectorCandidate[] = [
  "input[name='q']",
  "textarea[name='q']",
  "input[type='search']",
  "input[aria-label*='Search']",
  "input[placeholder*='search' i]",
  "input[type='text']",
];

export const SUBMIT_CANDIDATES: readonly SelectorCandidate[] = [
  "input[type='submit']",
  "button[type='submit']",
  "input[value*='Search']",
  "button:has-text('Search')",
  "[aria-label*='Search']",
  'button',
];

type RuleStep = Omit<ActionStep, 'timeoutMs'>;

export interface FallbackRule {
  name: string;
  /** Matched as substrings of the lower-cased goal. */
  keywords: readonly string[];
  step: RuleStep;
}

export const FALLBACK_RULES: readonly FallbackRule[] = [
  {
    name: 'purchase',
    keywords: ['buy', 'purchase', 'add to cart'],
    step: {
      action: 'click',
      target: [
        "button:has-text('Add to Cart')",
        "button:has-text('Buy')",
        "[data-testid*='add-to-cart']",
        "a:has-text('Buy')",
      ],
      reasoning: 'Click on purchase or add to cart button if found',
    },
  },
  {
    name: 'media',
    keywords: ['watch', 'video', 'play'],
    step: {
      action: 'click',
      target: ["button:has-text('Play')", "[data-testid*='play']", '.play-button', 'video'],
      reasoning: 'Click play button for video content',
    },
  },
];

export interface FallbackPlannerOptions {
  confidence?: number;
  stepTimeoutMs?: number;
  resultWaitSeconds?: number;
  rules?: readonly FallbackRule[];
}

/**
 * Deterministic plan: search for the goal text, submit, wait, then at most one
 * goal-specific step from the rule table (first match wins).
 */
export class FallbackPlanGenerator implements PlanGenerator {
  private confidence: number;
  private stepTimeoutMs: number;
  private resultWaitSeconds: number;
  private rules: readonly FallbackRule[];

  constructor(options: FallbackPlannerOptions = {}) {
    this.confidence = options.confidence ?? FALLBACK_CONFIDENCE;
    this.stepTimeoutMs = options.stepTimeoutMs ?? DEFAULT_STEP_TIMEOUT_MS;
    this.resultWaitSeconds = options.resultWaitSeconds ?? 5;
    this.rules = options.rules ?? FALLBACK_RULES;
  }

  async generate(goal: string, _context?: PageSnapshot): Promise<Plan> {
    return this.buildPlan(goal);
  }

  buildPlan(goal: string): Plan {
    const query = goal.trim();
    const steps: ActionStep[] = [
      {
        action: 'type',
        target: SEARCH_INPUT_CANDIDATES,
        data: query,
        reasoning: 'Type the search query into the search input',
        timeoutMs: this.stepTimeoutMs,
      },
      {
        action: 'click',
        target: SUBMIT_CANDIDATES,
        reasoning: 'Submit the search',
        timeoutMs: this.stepTimeoutMs,
      },
      {
        action: 'wait',
        target: [],
        data: String(this.resultWaitSeconds),
        reasoning: 'Wait for results to load',
        timeoutMs: this.stepTimeoutMs,
      },
    ];

    const rule = this.matchRule(query);
    if (rule) {
      steps.push({ ...rule.step, timeoutMs: this.stepTimeoutMs });
    }

    return {
      steps,
      confidence: this.confidence,
      reasoning: FALLBACK_REASONING,
      expectedOutcome: `Search and find results for: ${query}`,
      source: 'fallback',
    };
  }

  matchRule(goal: string): FallbackRule | undefined {
    const lowered = goal.toLowerCase();
    return this.rules.find((rule) => rule.keywords.some((keyword) => lowered.includes(keyword)));
  }
}
