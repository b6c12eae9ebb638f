// ============================================
// GENERATION ERRORS
// ============================================

export type GenerationErrorKind = "connectivity" | "protocol" | "timeout";

export abstract class GenerationError extends Error {
  abstract readonly kind: GenerationErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The request never reached the service (refused, DNS failure, reset). */
export class ConnectivityError extends GenerationError {
  readonly kind = "connectivity";
}

/** The service answered, but not with a usable reply. */
export class ProtocolError extends GenerationError {
  readonly kind = "protocol";
  readonly status: number | undefined;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

export class TimeoutError extends GenerationError {
  readonly kind = "timeout";
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.timeoutMs = timeoutMs;
  }
}

export function isGenerationError(error: unknown): error is GenerationError {
  return error instanceof GenerationError;
}
