import type { ActionStep, Plan, SelectorCandidate } from '../types/index.js';
import { DEFAULT_STEP_TIMEOUT_MS, MAX_STEP_TIMEOUT_MS } from '../types/index.js';
import { PlanResponseSchema, type PlanStepResponse } from '../schemas/plan.schema.js';
import { toCandidates } from '../engines/selector-candidates.js';

export const DEFAULT_DELEGATED_CONFIDENCE = 0.8;
export const DEFAULT_DELEGATED_REASONING = 'AI-generated plan';

export class PlanParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PlanParseError';
  }
}

/** Removes markdown fences and any prose around the outermost JSON object. */
export function extractJson(text: string): string {
  let body = text.trim();
  const fenced = body.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (fenced) body = fenced[1].trim();

  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start === -1 || end < start) {
    throw new PlanParseError('Response contains no JSON object');
  }
  return body.slice(start, end + 1);
}

function navigateTarget(target: PlanStepResponse['target']): SelectorCandidate[] {
  if (target == null) return [];
  const entries = typeof target === 'string' ? [target] : target;
  return entries.map((entry) => entry.trim()).filter((entry) => entry.length > 0);
}

export function toActionStep(raw: PlanStepResponse, defaultTimeoutMs: number = DEFAULT_STEP_TIMEOUT_MS): ActionStep {
  const target = raw.target ?? raw.selector;
  const data = raw.data ?? raw.value;
  const timeoutMs = raw.timeout_ms ?? raw.timeoutMs ?? raw.timeout ?? defaultTimeoutMs;

  return {
    action: raw.action,
    // URLs may legitimately contain commas
    target: raw.action === 'navigate' ? navigateTarget(target) : toCandidates(target),
    data: data == null ? undefined : String(data),
    reasoning: raw.reasoning ?? raw.description ?? '',
    timeoutMs: Math.min(timeoutMs, MAX_STEP_TIMEOUT_MS),
  };
}

export function parsePlanResponse(
  text: string,
  goal: string,
  defaultTimeoutMs: number = DEFAULT_STEP_TIMEOUT_MS,
): Plan {
  let json: unknown;
  try {
    json = JSON.parse(extractJson(text));
  } catch (error) {
    if (error instanceof PlanParseError) throw error;
    throw new PlanParseError(`Invalid JSON in plan response: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = PlanResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new PlanParseError(`Invalid plan response: ${parsed.error.message}`);
  }

  const response = parsed.data;
  const confidence = response.confidence ?? DEFAULT_DELEGATED_CONFIDENCE;

  return {
    steps: response.steps.map((step) => toActionStep(step, defaultTimeoutMs)),
    confidence: Math.min(1, Math.max(0, confidence)),
    reasoning: response.reasoning || DEFAULT_DELEGATED_REASONING,
    expectedOutcome: response.expected_outcome || response.expectedOutcome || `Complete: ${goal.trim()}`,
    source: 'delegated',
  };
}
