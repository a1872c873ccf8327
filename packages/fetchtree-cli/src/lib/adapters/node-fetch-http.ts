import fetch, { AbortError, FetchError, type Response } from "node-fetch";
import type { HttpClient, ResourceMetadata, StreamedResponse } from "../ports/http.js";
import type { DelayFn, TimerService } from "../ports/timer.js";
import { createNoopLogger, type Logger } from "../logger.js";
import {
  DEFAULT_RETRY_POLICY,
  backoffDelayMs,
  isRetriableStatus,
  type RetryPolicy,
} from "../retry-policy.js";
import { networkOffline, networkTimeout } from "../errors/catalog.js";
import { realDelay, realTimerService } from "./real-timers.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Some media hosts reject requests without a browser User-Agent */
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_11_6) AppleWebKit/602.4.8 (KHTML, like Gecko)" +
  " Version/10.0.3 Safari/602.4.8";

/** Body chunks are buffered and written in units of this size */
export const CHUNK_SIZE_BYTES = 1024 * 1024;

export const DEFAULT_GET_TIMEOUT_MS = 15_000;
export const DEFAULT_HEAD_TIMEOUT_MS = 15_000;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface NodeFetchHttpClientOptions {
  retry?: RetryPolicy;
  /** Merged over the default User-Agent header */
  headers?: Record<string, string>;
  /** Bounds the wait for GET response headers, then each gap between body chunks */
  getTimeoutMs?: number;
  headTimeoutMs?: number;
  fetchImpl?: typeof fetch;
  timers?: TimerService;
  delay?: DelayFn;
  logger?: Logger;
}

interface Watchdog {
  signal: AbortSignal;
  reset(): void;
  clear(): void;
  timedOut(): boolean;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Parse a Content-Length header value. Anything but a plain non-negative
 * integer counts as "no length".
 */
export function parseContentLength(value: string | null): number | undefined {
  if (value === null || !/^\d+$/.test(value.trim())) {
    return undefined;
  }
  return Number(value.trim());
}

function createWatchdog(timeoutMs: number, timers: TimerService): Watchdog {
  const controller = new AbortController();
  let expired = false;
  let handle: NodeJS.Timeout | undefined;

  const arm = () => {
    handle = timers.setTimeout(() => {
      expired = true;
      controller.abort();
    }, timeoutMs);
  };

  const clear = () => {
    if (handle !== undefined) {
      timers.clearTimeout(handle);
      handle = undefined;
    }
  };

  arm();

  return {
    signal: controller.signal,
    reset() {
      clear();
      if (!expired) arm();
    },
    clear,
    timedOut: () => expired,
  };
}

function isTransient(error: unknown): boolean {
  return error instanceof FetchError || error instanceof AbortError;
}

async function* readWithWatchdog(
  url: string,
  body: NodeJS.ReadableStream,
  watchdog: Watchdog,
  timeoutMs: number
): AsyncGenerator<Uint8Array> {
  try {
    for await (const chunk of body) {
      watchdog.reset();
      yield typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    }
  } catch (error) {
    if (watchdog.timedOut()) {
      throw networkTimeout(url, timeoutMs);
    }
    throw error;
  } finally {
    watchdog.clear();
  }
}

async function* emptyBody(): AsyncGenerator<Uint8Array> {
  // yields nothing
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create an HttpClient backed by node-fetch.
 * Retriable statuses and connection-level failures are retried with
 * exponential backoff until the policy's attempt budget is spent.
 */
export function createNodeFetchHttpClient({
  retry = DEFAULT_RETRY_POLICY,
  headers = {},
  getTimeoutMs = DEFAULT_GET_TIMEOUT_MS,
  headTimeoutMs = DEFAULT_HEAD_TIMEOUT_MS,
  fetchImpl = fetch,
  timers = realTimerService,
  delay = realDelay,
  logger = createNoopLogger(),
}: NodeFetchHttpClientOptions = {}): HttpClient {
  const requestHeaders = { "User-Agent": DEFAULT_USER_AGENT, ...headers };
  const log = logger.child({ component: "http" });

  async function send(
    method: "HEAD" | "GET",
    url: string,
    timeoutMs: number
  ): Promise<{ response: Response; watchdog: Watchdog }> {
    for (let attempt = 1; ; attempt++) {
      const watchdog = createWatchdog(timeoutMs, timers);
      const startedAt = Date.now();

      try {
        const response = await fetchImpl(url, {
          method,
          headers: requestHeaders,
          signal: watchdog.signal,
          highWaterMark: CHUNK_SIZE_BYTES,
        });

        log.debug("HTTP response", {
          method,
          url,
          attempt,
          statusCode: response.status,
          durationMs: Date.now() - startedAt,
        });

        if (isRetriableStatus(retry, response.status) && attempt < retry.maxAttempts) {
          watchdog.clear();
          response.body?.resume();
          const waitMs = backoffDelayMs(retry, attempt);
          log.warn("Retriable status, retrying", {
            method,
            url,
            statusCode: response.status,
            attempt,
            maxAttempts: retry.maxAttempts,
            retryDelayMs: waitMs,
          });
          await delay(waitMs);
          continue;
        }

        return { response, watchdog };
      } catch (error) {
        watchdog.clear();
        if (!isTransient(error)) {
          throw error;
        }

        const failure = watchdog.timedOut()
          ? networkTimeout(url, timeoutMs)
          : networkOffline(new URL(url).host, error);

        if (attempt >= retry.maxAttempts) {
          log.error("Request failed, no attempts left", {
            method,
            url,
            attempt,
            error: failure.message,
          });
          throw failure;
        }

        const waitMs = backoffDelayMs(retry, attempt);
        log.warn("Request failed, retrying", {
          method,
          url,
          attempt,
          maxAttempts: retry.maxAttempts,
          retryDelayMs: waitMs,
          error: failure.message,
        });
        await delay(waitMs);
      }
    }
  }

  async function head(url: string): Promise<ResourceMetadata> {
    const { response, watchdog } = await send("HEAD", url, headTimeoutMs);
    watchdog.clear();
    response.body?.resume();

    return {
      status: response.status,
      ok: response.ok,
      contentLength: parseContentLength(response.headers.get("content-length")),
    };
  }

  async function get(url: string): Promise<StreamedResponse> {
    const { response, watchdog } = await send("GET", url, getTimeoutMs);
    const contentLength = parseContentLength(response.headers.get("content-length"));

    let body: AsyncIterable<Uint8Array>;
    if (!response.ok || response.body === null) {
      watchdog.clear();
      response.body?.resume();
      body = emptyBody();
    } else {
      // From here on the watchdog measures idle time between chunks
      watchdog.reset();
      body = readWithWatchdog(url, response.body, watchdog, getTimeoutMs);
    }

    return {
      status: response.status,
      statusText: response.statusText,
      ok: response.ok,
      contentLength,
      body,
    };
  }

  return { head, get };
}
