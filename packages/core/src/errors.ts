/**
 * packages/core/src/errors.ts — Error type for flow layout configuration.
 *
 * Layout passes never throw on their own; only construction with invalid
 * props does. Errors thrown by host callbacks propagate unchanged.
 */

/** Deterministic error codes surfaced as FlowLayoutError instances. */
export type FlowLayoutErrorCode = "FLOW_INVALID_PROPS";

export class FlowLayoutError extends Error {
  override readonly name = "FlowLayoutError";
  readonly code: FlowLayoutErrorCode;

  constructor(code: FlowLayoutErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FlowLayoutError);
    }
  }
}
