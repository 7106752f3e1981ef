import { err, ok, type Result } from "neverthrow";
import type { Logger } from "pino";
import { logger as rootLogger } from "../../shared/logger/logger";

export type HttpJsonRequest = {
  url: string;
  method: "GET" | "POST";
  body?: unknown;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
};

export type HttpClientErrorCode =
  | "timeout"
  | "transport_error"
  | "non_success_status"
  | "invalid_json";

export type HttpClientError = {
  code: HttpClientErrorCode;
  message: string;
  httpStatus?: number;
  retryable: boolean;
  /** Server-requested wait from a `Retry-After` header. */
  retryAfterMs?: number;
  cause?: unknown;
};

type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export type HttpJsonClientDeps = {
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
  log?: Logger;
};

const BODY_EXCERPT_LENGTH = 200;

export const backoffDelayMs = (baseDelayMs: number, attempt: number): number =>
  baseDelayMs * 2 ** (attempt - 1);

/**
 * Seconds form only; an HTTP-date `Retry-After` is ignored and normal backoff applies.
 */
export const parseRetryAfter = (header: string | null): number | undefined => {
  if (header === null || !/^\d+$/.test(header.trim())) {
    return undefined;
  }
  return Number(header.trim()) * 1_000;
};

const isRetryableStatus = (status: number): boolean =>
  status === 408 || status === 429 || status >= 500;

const isAbortError = (error: unknown): boolean =>
  error instanceof Error && error.name === "AbortError";

const sleepFor = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * JSON over HTTP for the model adapters: one timeout per attempt, bounded exponential backoff between attempts.
 * Bodies come back as `unknown`; adapters validate them with zod.
 */
export class HttpJsonClient {
  private readonly fetchFn: FetchFn;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log: Logger;

  constructor(deps: HttpJsonClientDeps = {}) {
    this.fetchFn = deps.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = deps.sleep ?? sleepFor;
    this.log = deps.log ?? rootLogger.child({ component: "http" });
  }

  async requestJson(
    request: HttpJsonRequest,
  ): Promise<Result<unknown, HttpClientError>> {
    const maxAttempts = request.retries + 1;
    let attempt = 1;

    for (;;) {
      const response = await this.send(request);
      if (response.isOk()) {
        return response;
      }

      const failure = response.error;
      if (!failure.retryable || attempt >= maxAttempts) {
        return response;
      }

      const delayMs = Math.max(
        backoffDelayMs(request.retryDelayMs, attempt),
        failure.retryAfterMs ?? 0,
      );
      this.log.debug(
        { url: request.url, attempt, code: failure.code, delayMs },
        "retrying request",
      );
      await this.sleep(delayMs);
      attempt += 1;
    }
  }

  private async send(
    request: HttpJsonRequest,
  ): Promise<Result<unknown, HttpClientError>> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), request.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchFn(request.url, {
        method: request.method,
        headers:
          request.body === undefined ? undefined : { "content-type": "application/json" },
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });
    } catch (error) {
      clearTimeout(timer);
      return err(
        isAbortError(error)
          ? {
              code: "timeout",
              message: `No response from ${request.url} within ${request.timeoutMs}ms.`,
              retryable: true,
              cause: error,
            }
          : {
              code: "transport_error",
              message: error instanceof Error ? error.message : String(error),
              retryable: true,
              cause: error,
            },
      );
    }

    try {
      const text = await response.text();

      if (!response.ok) {
        const excerpt = text.trim().slice(0, BODY_EXCERPT_LENGTH);
        const retryAfterMs = parseRetryAfter(response.headers.get("retry-after"));
        return err({
          code: "non_success_status",
          message: `HTTP ${response.status}${excerpt ? `: ${excerpt}` : ""}`,
          httpStatus: response.status,
          retryable: isRetryableStatus(response.status),
          ...(retryAfterMs !== undefined ? { retryAfterMs } : {}),
        });
      }

      try {
        const payload: unknown = JSON.parse(text);
        return ok(payload);
      } catch (error) {
        return err({
          code: "invalid_json",
          message: "Response body was not valid JSON.",
          retryable: false,
          cause: error,
        });
      }
    } catch (error) {
      return err(
        isAbortError(error)
          ? {
              code: "timeout",
              message: `Response body from ${request.url} did not arrive within ${request.timeoutMs}ms.`,
              retryable: true,
              cause: error,
            }
          : {
              code: "transport_error",
              message: error instanceof Error ? error.message : String(error),
              retryable: true,
              cause: error,
            },
      );
    } finally {
      clearTimeout(timer);
    }
  }
}
