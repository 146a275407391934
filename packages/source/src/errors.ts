/* =============================================================================
 * SOURCE ERRORS
 * ============================================================================= */

/** Error codes */
export const SourceErrorCode = {
  /** The span (or a merged span) reaches past the end of the source. */
  OUT_OF_BOUNDS: "OutOfBounds",
  /** Offset or length is not a non-negative safe integer. */
  INVALID_SPAN: "InvalidSpan",
} as const;

export type SourceErrorCodeType = (typeof SourceErrorCode)[keyof typeof SourceErrorCode];

/**
 * Error raised while reading spans out of a source.
 */
export class SourceError extends Error {
  constructor(
    message: string,
    public readonly code: SourceErrorCodeType,
    public readonly span: { readonly offset: number; readonly length: number },
  ) {
    super(message);
    this.name = "SourceError";
  }
}

export function isOutOfBounds(error: unknown): error is SourceError {
  return error instanceof SourceError && error.code === SourceErrorCode.OUT_OF_BOUNDS;
}
