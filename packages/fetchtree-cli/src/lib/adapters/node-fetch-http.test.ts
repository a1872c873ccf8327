import { describe, it, expect, vi, afterEach } from "vitest";
import { AbortError, FetchError, Response, type RequestInfo, type RequestInit } from "node-fetch";
import {
  createNodeFetchHttpClient,
  parseContentLength,
  DEFAULT_USER_AGENT,
} from "./node-fetch-http.js";
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from "../retry-policy.js";

const URL_UNDER_TEST = "http://example.com/a/b.ts";

const createFetch = () =>
  vi.fn(
    async (_url: URL | RequestInfo, _init?: RequestInit): Promise<Response> =>
      new Response("", { status: 200 })
  );

const noDelay = () => vi.fn(async (_ms: number) => {});

async function readAll(body: AsyncIterable<Uint8Array>): Promise<string> {
  const parts: Buffer[] = [];
  for await (const chunk of body) {
    parts.push(Buffer.from(chunk));
  }
  return Buffer.concat(parts).toString("utf-8");
}

describe("node-fetch-http", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe("parseContentLength", () => {
    it("parses a plain integer", () => {
      expect(parseContentLength("1048576")).toBe(1048576);
      expect(parseContentLength("0")).toBe(0);
    });

    it("treats missing or malformed values as unknown", () => {
      expect(parseContentLength(null)).toBeUndefined();
      expect(parseContentLength("")).toBeUndefined();
      expect(parseContentLength("-1")).toBeUndefined();
      expect(parseContentLength("12abc")).toBeUndefined();
    });
  });

  describe("head", () => {
    it("reads Content-Length and sends the browser User-Agent", async () => {
      const fetchImpl = createFetch().mockResolvedValueOnce(
        new Response(null, { status: 200, headers: { "Content-Length": "1234" } })
      );
      const client = createNodeFetchHttpClient({ fetchImpl });

      const metadata = await client.head(URL_UNDER_TEST);

      expect(metadata).toEqual({ status: 200, ok: true, contentLength: 1234 });
      expect(fetchImpl).toHaveBeenCalledWith(
        URL_UNDER_TEST,
        expect.objectContaining({
          method: "HEAD",
          headers: expect.objectContaining({ "User-Agent": DEFAULT_USER_AGENT }),
        })
      );
    });

    it("reports no length when the header is absent", async () => {
      const fetchImpl = createFetch().mockResolvedValueOnce(
        new Response(null, { status: 200 })
      );
      const client = createNodeFetchHttpClient({ fetchImpl });

      const metadata = await client.head(URL_UNDER_TEST);

      expect(metadata.contentLength).toBeUndefined();
    });

    it("merges custom headers over the defaults", async () => {
      const fetchImpl = createFetch();
      const client = createNodeFetchHttpClient({
        fetchImpl,
        headers: { "User-Agent": "test-agent", Referer: "http://example.com/" },
      });

      await client.head(URL_UNDER_TEST);

      expect(fetchImpl).toHaveBeenCalledWith(
        URL_UNDER_TEST,
        expect.objectContaining({
          headers: { "User-Agent": "test-agent", Referer: "http://example.com/" },
        })
      );
    });
  });

  describe("get", () => {
    it("streams the response body", async () => {
      const fetchImpl = createFetch().mockResolvedValueOnce(
        new Response("segment payload", {
          status: 200,
          headers: { "Content-Length": "15" },
        })
      );
      const client = createNodeFetchHttpClient({ fetchImpl });

      const response = await client.get(URL_UNDER_TEST);

      expect(response.ok).toBe(true);
      expect(response.contentLength).toBe(15);
      expect(await readAll(response.body)).toBe("segment payload");
    });

    it("returns an empty body for an error status", async () => {
      const fetchImpl = createFetch().mockResolvedValueOnce(
        new Response("not here", { status: 404, statusText: "Not Found" })
      );
      const client = createNodeFetchHttpClient({ fetchImpl });

      const response = await client.get(URL_UNDER_TEST);

      expect(response.status).toBe(404);
      expect(response.statusText).toBe("Not Found");
      expect(response.ok).toBe(false);
      expect(await readAll(response.body)).toBe("");
    });
  });

  describe("retry policy", () => {
    it("retries a retriable status with backoff", async () => {
      const fetchImpl = createFetch()
        .mockResolvedValueOnce(new Response("", { status: 502 }))
        .mockResolvedValueOnce(new Response("ok", { status: 200 }));
      const delay = noDelay();
      const client = createNodeFetchHttpClient({ fetchImpl, delay });

      const response = await client.get(URL_UNDER_TEST);

      expect(response.status).toBe(200);
      expect(await readAll(response.body)).toBe("ok");
      expect(fetchImpl).toHaveBeenCalledTimes(2);
      expect(delay).toHaveBeenCalledWith(300);
    });

    it("returns the last response once attempts are exhausted", async () => {
      const fetchImpl = createFetch().mockImplementation(
        async () => new Response("", { status: 500 })
      );
      const delay = noDelay();
      const retry: RetryPolicy = { ...DEFAULT_RETRY_POLICY, maxAttempts: 3 };
      const client = createNodeFetchHttpClient({ fetchImpl, delay, retry });

      const response = await client.get(URL_UNDER_TEST);

      expect(response.status).toBe(500);
      expect(fetchImpl).toHaveBeenCalledTimes(3);
      expect(delay.mock.calls).toEqual([[300], [600]]);
    });

    it("does not retry a status outside the retriable set", async () => {
      const fetchImpl = createFetch().mockResolvedValueOnce(
        new Response("", { status: 404 })
      );
      const delay = noDelay();
      const client = createNodeFetchHttpClient({ fetchImpl, delay });

      const response = await client.get(URL_UNDER_TEST);

      expect(response.status).toBe(404);
      expect(fetchImpl).toHaveBeenCalledTimes(1);
      expect(delay).not.toHaveBeenCalled();
    });

    it("retries connection errors", async () => {
      const fetchImpl = createFetch()
        .mockRejectedValueOnce(new FetchError("connect ECONNREFUSED", "system"))
        .mockResolvedValueOnce(new Response(null, { status: 200, headers: { "Content-Length": "7" } }));
      const delay = noDelay();
      const client = createNodeFetchHttpClient({ fetchImpl, delay });

      const metadata = await client.head(URL_UNDER_TEST);

      expect(metadata.contentLength).toBe(7);
      expect(fetchImpl).toHaveBeenCalledTimes(2);
    });

    it("fails with NETWORK_OFFLINE when connection errors persist", async () => {
      const fetchImpl = createFetch().mockRejectedValue(
        new FetchError("connect ECONNREFUSED", "system")
      );
      const retry: RetryPolicy = { ...DEFAULT_RETRY_POLICY, maxAttempts: 2 };
      const client = createNodeFetchHttpClient({ fetchImpl, delay: noDelay(), retry });

      await expect(client.get(URL_UNDER_TEST)).rejects.toMatchObject({
        code: "NETWORK_OFFLINE",
        message: "Can't connect to example.com",
        details: "connect ECONNREFUSED",
      });
      expect(fetchImpl).toHaveBeenCalledTimes(2);
    });

    it("does not retry errors that are not network failures", async () => {
      const fetchImpl = createFetch().mockRejectedValue(new TypeError("Invalid URL"));
      const client = createNodeFetchHttpClient({ fetchImpl, delay: noDelay() });

      await expect(client.get(URL_UNDER_TEST)).rejects.toThrow("Invalid URL");
      expect(fetchImpl).toHaveBeenCalledTimes(1);
    });
  });

  describe("timeouts", () => {
    it("aborts a request that exceeds the timeout", async () => {
      vi.useFakeTimers();
      const fetchImpl = createFetch().mockImplementation(
        (_url, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () =>
              reject(new AbortError("The operation was aborted."))
            );
          })
      );
      const client = createNodeFetchHttpClient({
        fetchImpl,
        getTimeoutMs: 1000,
        retry: { ...DEFAULT_RETRY_POLICY, maxAttempts: 1 },
      });

      const assertion = expect(client.get(URL_UNDER_TEST)).rejects.toMatchObject({
        code: "NETWORK_TIMEOUT",
        message: "Request timed out after 1000ms",
      });
      await vi.advanceTimersByTimeAsync(1000);
      await assertion;
    });
  });
});
