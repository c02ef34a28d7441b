import { err, ok, type Result } from "neverthrow";
import type { z } from "zod";

type HttpMethod = "GET" | "POST";

export type HttpJsonRequest<T> = {
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: unknown;
  /** Shape the response body must have; bodies that do not match fail as `unexpected_shape`. */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
};

export type HttpClientError = {
  code:
    | "timeout"
    | "transport_error"
    | "non_success_status"
    | "invalid_json"
    | "unexpected_shape";
  message: string;
  httpStatus?: number;
  retryable: boolean;
  cause?: unknown;
};

/**
 * Centralizes HTTP JSON IO so adapters share one timeout/retry/status parsing policy.
 */
export class HttpJsonClient {
  /**
   * Executes JSON requests with bounded retries to avoid duplicated fetch policy across adapters.
   */
  async requestJson<T>(
    request: HttpJsonRequest<T>,
  ): Promise<Result<T, HttpClientError>> {
    const maxAttempts = request.retries + 1;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const response = await this.performRequest(request);
      if (response.isOk()) {
        return response;
      }

      const failure = response.error;
      const hasAttemptsLeft = attempt < maxAttempts;
      if (!failure.retryable || !hasAttemptsLeft) {
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

  private async performRequest<T>(
    request: HttpJsonRequest<T>,
  ): Promise<Result<T, HttpClientError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body:
          request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;

        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryable,
        });
      }

      let payload: unknown;
      try {
        payload = await response.json();
      } catch (jsonError) {
        return err({
          code: "invalid_json",
          message: "HTTP response body was not valid JSON.",
          retryable: false,
          cause: jsonError,
        });
      }

      const parsed = request.schema.safeParse(payload);
      if (!parsed.success) {
        return err({
          code: "unexpected_shape",
          message: `HTTP response body did not match the expected shape: ${parsed.error.issues[0]?.message ?? "unknown issue"}.`,
          retryable: false,
          cause: parsed.error,
        });
      }

      return ok(parsed.data);
    } catch (error) {
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
    }
  }

  private async delay(ms: number): Promise<void> {
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
