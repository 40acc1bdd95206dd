import { z } from 'zod';

function hasHttpProtocol(value: string): boolean {
  try {
    return /^https?:$/.test(new URL(value).protocol);
  } catch {
    // Reported by .url()
    return true;
  }
}

export const HttpUrlSchema = z
  .string()
  .trim()
  .url()
  .refine(hasHttpProtocol, { message: 'URL must use http or https' });

export const TaskInputSchema = z.object({
  goal: z.string().trim().min(1, 'goal must not be empty'),
  startUrl: HttpUrlSchema,
});

export type TaskInput = z.infer<typeof TaskInputSchema>;

export function isHttpUrl(value: string): boolean {
  return HttpUrlSchema.safeParse(value).success;
}
