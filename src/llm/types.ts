// ============================================
// GENERATION REQUEST
// ============================================
export type ChatRole = "user" | "assistant";

export interface LLMMessage {
  readonly role: ChatRole;
  readonly content: string;
}

export interface SamplingParameters {
  readonly temperature: number;
  readonly maxTokens: number;
}

/**
 * Everything one generation call needs. Built fresh per turn and frozen.
 */
export interface GenerationRequestPayload {
  readonly systemInstructions: string;
  readonly messages: readonly LLMMessage[];
  readonly sampling: SamplingParameters;
}

export interface GenerateOptions {
  timeoutMs?: number;
}

// ============================================
// CLIENT CONTRACT
// ============================================

/**
 * A text generation backend. Resolves with non-empty reply text or rejects
 * with a `GenerationError` subclass; one attempt per call.
 */
export interface GenerationClient {
  readonly provider: string;
  generate(payload: GenerationRequestPayload, options?: GenerateOptions): Promise<string>;
}
