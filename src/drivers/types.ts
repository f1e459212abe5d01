export interface GenerationOptions {
  maxTokens: number;
  /** Sampling temperature (0.0–2.0) */
  temperature: number;
}

export interface Generation {
  /** Generated text, trimmed. Empty when the model produced nothing. */
  text: string;
  /** completion_tokens as reported by the backend (0 when absent). */
  tokens: number;
}

/**
 * Stateless text-continuation backend. Every call is a complete
 * request/response; the loop never has two in flight.
 */
export interface GenerationDriver {
  generate(prompt: string, opts: GenerationOptions): Promise<Generation>;
  /** Ask the backend which model is loaded; null when none or unreachable. */
  discoverModel(): Promise<string | null>;
  /** Model name sent with requests, once discovered. */
  readonly model: string | null;
}

/** Sampling profiles used by the loop. */
export const PROFILES = {
  thought: { maxTokens: 256, temperature: 0.85 },
  continuation: { maxTokens: 256, temperature: 0.85 },
  reply: { maxTokens: 512, temperature: 0.7 },
  compression: { maxTokens: 300, temperature: 0.5 },
} as const satisfies Record<string, GenerationOptions>;
