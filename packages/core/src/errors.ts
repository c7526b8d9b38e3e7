/* =============================================================================
 * BREADLOG ERRORS
 * ============================================================================= */

/** Error codes */
export const BreadlogErrorCode = {
  CONFIG_READ: "BREADLOG_CONFIG_READ",
  CONFIG_INVALID: "BREADLOG_CONFIG_INVALID",
  SOURCE_DIR_UNREADABLE: "BREADLOG_SOURCE_DIR_UNREADABLE",
  SOURCE_DIR_NOT_DIRECTORY: "BREADLOG_SOURCE_DIR_NOT_DIRECTORY",
  CACHE_INVALID: "BREADLOG_CACHE_INVALID",
  REFERENCE_SPACE_EXHAUSTED: "BREADLOG_REFERENCE_SPACE_EXHAUSTED",
} as const;

export type BreadlogErrorCodeType = (typeof BreadlogErrorCode)[keyof typeof BreadlogErrorCode];

/**
 * Error raised for setup problems and broken invariants.
 *
 * Per-file problems during a run are logged and folded into results instead.
 */
export class BreadlogError extends Error {
  constructor(
    message: string,
    public readonly code: BreadlogErrorCodeType,
    public readonly file?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "BreadlogError";
  }
}

export function isBreadlogError(error: unknown): error is BreadlogError {
  return error instanceof BreadlogError;
}

/** Human-readable message for any thrown value. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
