import { z } from 'zod';

const TextOrNumberSchema = z.union([z.string(), z.number()]);

export const ActionKindSchema = z.enum(['navigate', 'click', 'type', 'wait', 'get_text', 'scroll']);

export const PlanStepSchema = z.object({
  action: ActionKindSchema,
  target: z.union([z.string(), z.array(z.string())]).nullish(),
  selector: z.string().nullish(),
  data: TextOrNumberSchema.nullish(),
  value: TextOrNumberSchema.nullish(),
  reasoning: z.string().nullish(),
  description: z.string().nullish(),
  timeout: z.number().int().positive().nullish(),
  timeout_ms: z.number().int().positive().nullish(),
  timeoutMs: z.number().int().positive().nullish(),
});

export const PlanResponseSchema = z.object({
  steps: z.array(PlanStepSchema).min(1),
  confidence: z.number().nullish(),
  reasoning: z.string().nullish(),
  expected_outcome: z.string().nullish(),
  expectedOutcome: z.string().nullish(),
});

export type PlanStepResponse = z.infer<typeof PlanStepSchema>;
export type PlanResponse = z.infer<typeof PlanResponseSchema>;
