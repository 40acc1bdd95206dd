export interface CompletionOptions {
  temperature: number;
  maxTokens?: number;
}

/** Opaque prompt → text service. May be slow, wrong or down. */
export interface TextCompletion {
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

export class CompletionError extends Error {
  constructor(
    message: string,
    public provider: string,
    public status?: number,
  ) {
    super(message);
    this.name = 'CompletionError';
  }
}
