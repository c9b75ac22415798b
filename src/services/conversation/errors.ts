/**
 * Errors raised while rendering a conversation. `statusCode` is what the HTTP
 * layer answers with; nothing here is retried.
 */

export class RenderError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RenderError';
    this.statusCode = statusCode;
  }
}

/** The request itself is unusable (e.g. no segments). */
export class InvalidRenderRequestError extends RenderError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'InvalidRenderRequestError';
  }
}

/** Every segment was empty after trimming, so nothing was synthesized. */
export class NoAudioGeneratedError extends RenderError {
  constructor() {
    super('No audio generated from segments', 500);
    this.name = 'NoAudioGeneratedError';
  }
}

/** The speech provider failed on one segment; the whole render is aborted. */
export class SynthesisError extends RenderError {
  readonly segmentIndex: number;

  constructor(segmentIndex: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Speech synthesis failed for segment ${segmentIndex}: ${reason}`, 500, { cause });
    this.name = 'SynthesisError';
    this.segmentIndex = segmentIndex;
  }
}
