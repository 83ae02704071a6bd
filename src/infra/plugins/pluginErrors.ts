import {
  boundaryError,
  type AppBoundaryError,
} from "../../core/entities/appError";
import type { HttpClientError } from "../http/httpClient";

/**
 * Folds transport failures into the plugin taxonomy: 429 is a provider quota signal,
 * unparseable bodies are malformed, everything else means the source is unavailable.
 */
export const toPluginError = (
  plugin: string,
  failure: HttpClientError,
  context: string,
): AppBoundaryError => {
  if (failure.httpStatus === 429) {
    return boundaryError(
      "plugin",
      "source_quota_exceeded",
      plugin,
      `${context}: provider quota exceeded.`,
      {
        retryable: true,
        httpStatus: 429,
        cause: { retryAfterMs: failure.retryAfterMs },
      },
    );
  }

  if (failure.code === "aborted") {
    return aborted(plugin, context);
  }

  if (failure.code === "invalid_json") {
    return boundaryError(
      "plugin",
      "malformed_response",
      plugin,
      `${context}: ${failure.message}`,
      { cause: failure.cause },
    );
  }

  return boundaryError(
    "plugin",
    "source_unavailable",
    plugin,
    `${context}: ${failure.message}`,
    {
      retryable: true,
      httpStatus: failure.httpStatus,
      cause: failure.cause,
    },
  );
};

export const malformed = (plugin: string, message: string): AppBoundaryError =>
  boundaryError("plugin", "malformed_response", plugin, message);

export const aborted = (plugin: string, context: string): AppBoundaryError =>
  boundaryError("plugin", "cancelled", plugin, `${context}: request was aborted.`);
