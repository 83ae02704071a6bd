/**
 * Describes canonical error categories used at clean-architecture boundaries.
 */
export type AppBoundaryErrorCode =
  | "source_unavailable"
  | "source_quota_exceeded"
  | "malformed_response"
  | "rate_limit_timeout"
  | "empty_input"
  | "embedding_backend_unavailable"
  | "duplicate_name"
  | "unknown_plugin"
  | "persistence_failed"
  | "config_invalid"
  | "invalid_input"
  | "timeout"
  | "cancelled";

export type AppBoundaryErrorSource =
  | "plugin"
  | "limiter"
  | "embedding"
  | "filter"
  | "registry"
  | "persistence"
  | "pipeline";

/**
 * Describes a normalized boundary failure while preserving adapter/provider provenance.
 */
export type AppBoundaryError = {
  source: AppBoundaryErrorSource;
  code: AppBoundaryErrorCode;
  provider: string;
  message: string;
  retryable: boolean;
  httpStatus?: number;
  cause?: unknown;
};

export const boundaryError = (
  source: AppBoundaryErrorSource,
  code: AppBoundaryErrorCode,
  provider: string,
  message: string,
  extra: Partial<Pick<AppBoundaryError, "retryable" | "httpStatus" | "cause">> = {},
): AppBoundaryError => ({
  source,
  code,
  provider,
  message,
  retryable: extra.retryable ?? false,
  ...(extra.httpStatus === undefined ? {} : { httpStatus: extra.httpStatus }),
  ...(extra.cause === undefined ? {} : { cause: extra.cause }),
});

export const toErrorDetails = (error: unknown) => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};
