import { z } from 'zod';

export const USAGE =
  'Usage: run-task "<goal>" <startUrl>, or pipe {"goal", "startUrl"?, "options"?} JSON on stdin';

export const CliInputSchema = z.object({
  goal: z.string(),
  startUrl: z.string().optional(),
  options: z
    .object({
      headless: z.boolean().optional(),
      extractResults: z.boolean().optional(),
    })
    .optional(),
});

export type CliInput = z.infer<typeof CliInputSchema>;

/** Input from positional arguments, or null when it should come from stdin. */
export function parseArgs(argv: readonly string[]): CliInput | null {
  if (argv.length === 0) return null;
  if (argv.length === 1) {
    throw new Error(`Missing start URL. ${USAGE}`);
  }
  return { goal: argv[0] ?? '', startUrl: argv[1] ?? '' };
}

export function parseJsonInput(raw: string): CliInput {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new Error('Invalid JSON on stdin');
  }
  const parsed = CliInputSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`Invalid input: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
  }
  return parsed.data;
}
