import { err, ok, type Result } from "neverthrow";

type HttpMethod = "GET" | "POST";

export type HttpRequest = {
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  query?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
  // Caller-owned cancellation, joined with the per-request timeout.
  signal?: AbortSignal;
};

export type HttpClientError = {
  code:
    | "timeout"
    | "aborted"
    | "transport_error"
    | "non_success_status"
    | "invalid_json";
  message: string;
  httpStatus?: number;
  retryAfterMs?: number;
  retryable: boolean;
  cause?: unknown;
};

type BodyReader<T> = (response: Response) => Promise<Result<T, HttpClientError>>;

const readJson = async <T>(
  response: Response,
): Promise<Result<T, HttpClientError>> => {
  try {
    return ok((await response.json()) as T);
  } catch (jsonError) {
    return err({
      code: "invalid_json",
      message: "HTTP response body was not valid JSON.",
      retryable: false,
      cause: jsonError,
    });
  }
};

const readText = async (
  response: Response,
): Promise<Result<string, HttpClientError>> => ok(await response.text());

const abortedError = (cause?: unknown): HttpClientError => ({
  code: "aborted",
  message: "HTTP request was aborted by the caller.",
  retryable: false,
  ...(cause === undefined ? {} : { cause }),
});

const parseRetryAfter = (value: string | null): number | undefined => {
  if (!value) {
    return undefined;
  }
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1_000 : undefined;
};

/**
 * Centralizes HTTP IO so plugins and embedding adapters share one timeout/retry/status policy.
 */
export class HttpClient {
  async requestJson<T>(
    request: HttpRequest,
  ): Promise<Result<T, HttpClientError>> {
    return this.withRetries(request, (response) => readJson<T>(response));
  }

  async requestText(
    request: HttpRequest,
  ): Promise<Result<string, HttpClientError>> {
    return this.withRetries(request, readText);
  }

  private async withRetries<T>(
    request: HttpRequest,
    readBody: BodyReader<T>,
  ): Promise<Result<T, HttpClientError>> {
    const maxAttempts = request.retries + 1;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const response = await this.performRequest(request, readBody);
      if (response.isOk()) {
        return response;
      }

      const failure = response.error;
      const hasAttemptsLeft = attempt < maxAttempts;
      // 429s go back to the caller so quota backoff stays a caller decision.
      if (!failure.retryable || !hasAttemptsLeft || failure.httpStatus === 429) {
        return response;
      }

      await this.delay(request.retryDelayMs * attempt);
    }

    return err({
      code: "transport_error",
      message: "HTTP request exhausted retry attempts.",
      retryable: false,
    });
  }

  private buildUrl(request: HttpRequest): string {
    if (!request.query) {
      return request.url;
    }

    const url = new URL(request.url);
    Object.entries(request.query).forEach(([key, value]) => {
      url.searchParams.set(key, value);
    });
    return url.toString();
  }

  private async performRequest<T>(
    request: HttpRequest,
    readBody: BodyReader<T>,
  ): Promise<Result<T, HttpClientError>> {
    if (request.signal?.aborted) {
      return err(abortedError());
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);
    const onCallerAbort = () => controller.abort();
    request.signal?.addEventListener("abort", onCallerAbort, { once: true });

    try {
      const response = await fetch(this.buildUrl(request), {
        method: request.method,
        headers: request.headers,
        body:
          request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;
        const retryAfterMs = parseRetryAfter(response.headers.get("retry-after"));

        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryable,
          ...(retryAfterMs === undefined ? {} : { retryAfterMs }),
        });
      }

      return await readBody(response);
    } catch (error) {
      if (request.signal?.aborted) {
        return err(abortedError(error));
      }

      const isTimeoutError =
        error instanceof DOMException && error.name === "AbortError";

      if (isTimeoutError) {
        return err({
          code: "timeout",
          message: "HTTP request timed out.",
          retryable: true,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
      request.signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  private async delay(ms: number): Promise<void> {
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
