/**
 * Describes canonical error categories used at adapter boundaries.
 */
export type AppBoundaryErrorCode =
  | "timeout"
  | "rate_limited"
  | "auth_invalid"
  | "config_invalid"
  | "provider_error"
  | "transport_error"
  | "malformed_response"
  | "invalid_json"
  | "conflict"
  | "io_error";

/**
 * Describes a normalized boundary failure while preserving adapter provenance.
 */
export type AppBoundaryError = {
  source: "catalog" | "content" | "classifier" | "pattern_store";
  code: AppBoundaryErrorCode;
  provider: string;
  message: string;
  retryable: boolean;
  httpStatus?: number;
  cause?: unknown;
};

/**
 * Failure kinds of the segmentation and correlation core.
 * All of them are recovered per document/filing and surfaced in batch outcomes.
 */
export type SegmentationErrorCode =
  | "not_found"
  | "invalid_pattern"
  | "ordering_violation"
  | "malformed_input";

export type SegmentationError = {
  code: SegmentationErrorCode;
  message: string;
  details?: Record<string, unknown>;
};

export const segmentationError = (
  code: SegmentationErrorCode,
  message: string,
  details?: Record<string, unknown>,
): SegmentationError =>
  details === undefined ? { code, message } : { code, message, details };

/**
 * Folds adapter failures into the core taxonomy when a batch has to report one shape.
 */
export type PipelineFailure =
  | ({ kind: "segmentation" } & SegmentationError)
  | ({ kind: "boundary" } & AppBoundaryError);

export const fromSegmentation = (
  error: SegmentationError,
): PipelineFailure => ({ kind: "segmentation", ...error });

export const fromBoundary = (error: AppBoundaryError): PipelineFailure => ({
  kind: "boundary",
  ...error,
});

export const failureCode = (failure: PipelineFailure): string =>
  failure.kind === "segmentation"
    ? failure.code
    : `${failure.source}:${failure.code}`;
