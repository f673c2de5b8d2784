import { describe, expect, test, vi } from "vitest";
import { fetchBytesWithTimeout } from "../lib/http.js";
import { NetworkError } from "../pipeline/errors.js";
import {
  buildFetchTargets,
  buildProxyUrl,
  fetchFuelData,
  FUEL_FINDER_HEADERS,
  FUEL_FINDER_URL,
  queryEscape,
} from "../steps/fetch.js";

const PROXY_TEMPLATE = "https://proxy.test/fetch?url={url}";
const PROXIED_URL =
  "https://proxy.test/fetch?url=https%3A%2F%2Fwww.fuel-finder.service.gov.uk%2Finternal%2Fv1.0.2%2Fcsv%2Fget-latest-fuel-prices-csv";

function csvResponse(body: string): Response {
  return new Response(body, { status: 200, headers: { "content-type": "text/csv" } });
}

describe("proxy targets", () => {
  test("percent-encodes the canonical URL into a {url} placeholder", () => {
    expect(buildProxyUrl(PROXY_TEMPLATE, FUEL_FINDER_URL)).toBe(PROXIED_URL);
  });

  test("replaces every placeholder", () => {
    expect(buildProxyUrl("{url}|{url}", "a b")).toBe("a+b|a+b");
  });

  test("prefixes the raw URL when the template has no placeholder", () => {
    expect(buildProxyUrl("https://proxy.test/raw/", FUEL_FINDER_URL)).toBe(
      `https://proxy.test/raw/${FUEL_FINDER_URL}`
    );
  });

  test("query escaping leaves only unreserved characters literal", () => {
    expect(queryEscape("a b!'()*~-_.")).toBe("a+b%21%27%28%29%2A~-_.");
  });

  test("builds one target without a template and two with one", () => {
    expect(buildFetchTargets(FUEL_FINDER_URL)).toEqual([FUEL_FINDER_URL]);
    expect(buildFetchTargets(FUEL_FINDER_URL, "   ")).toEqual([FUEL_FINDER_URL]);
    expect(buildFetchTargets(FUEL_FINDER_URL, ` ${PROXY_TEMPLATE} `)).toEqual([
      FUEL_FINDER_URL,
      PROXIED_URL,
    ]);
  });
});

describe("fetchFuelData", () => {
  test("falls back to the proxy when the primary answers with an error status", async () => {
    const fetchImpl = vi.fn(async (url: string, _init: RequestInit) =>
      url === FUEL_FINDER_URL
        ? new Response("blocked", { status: 503, statusText: "Service Unavailable" })
        : csvResponse("a,b\n1,2\n")
    );

    const payload = await fetchFuelData([FUEL_FINDER_URL, PROXIED_URL], { fetchImpl });

    expect(payload.url).toBe(PROXIED_URL);
    expect(new TextDecoder().decode(payload.body)).toBe("a,b\n1,2\n");
    expect(fetchImpl.mock.calls.map(([url]) => url)).toEqual([FUEL_FINDER_URL, PROXIED_URL]);
  });

  test("returns the primary body without touching the fallback", async () => {
    const fetchImpl = vi.fn(async (_url: string, _init: RequestInit) => csvResponse("a\n"));

    const payload = await fetchFuelData([FUEL_FINDER_URL, PROXIED_URL], { fetchImpl });

    expect(payload.url).toBe(FUEL_FINDER_URL);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  test("sends the browser-like header set with a GET", async () => {
    const fetchImpl = vi.fn(async (_url: string, _init: RequestInit) => csvResponse("a\n"));

    await fetchFuelData([FUEL_FINDER_URL], { fetchImpl });

    const init = fetchImpl.mock.calls[0][1];
    expect(init.method).toBe("GET");
    expect(init.headers).toEqual(FUEL_FINDER_HEADERS);
    expect(init.signal).toBeInstanceOf(AbortSignal);
  });

  test("fails at once when there is no fallback", async () => {
    const fetchImpl = vi.fn(
      async (_url: string, _init: RequestInit) =>
        new Response("", { status: 503, statusText: "Service Unavailable" })
    );

    await expect(fetchFuelData([FUEL_FINDER_URL], { fetchImpl })).rejects.toThrow(
      `HTTP 503 Service Unavailable for ${FUEL_FINDER_URL}`
    );
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  test("cancels the body of a rejected response", async () => {
    const cancel = vi.fn();
    const fetchImpl = vi.fn(
      async (_url: string, _init: RequestInit) =>
        new Response(new ReadableStream<Uint8Array>({ cancel }), {
          status: 503,
          statusText: "Service Unavailable",
        })
    );

    await expect(fetchFuelData([FUEL_FINDER_URL], { fetchImpl })).rejects.toThrow(
      `HTTP 503 Service Unavailable for ${FUEL_FINDER_URL}`
    );
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  test("treats an empty 200 body as a failure", async () => {
    const fetchImpl = vi.fn(async (_url: string, _init: RequestInit) => csvResponse(""));

    await expect(fetchFuelData([FUEL_FINDER_URL], { fetchImpl })).rejects.toThrow(
      `Received empty response from ${FUEL_FINDER_URL}`
    );
  });

  test("surfaces the most recent failure once every target is exhausted", async () => {
    const fetchImpl = vi.fn(async (url: string, _init: RequestInit) => {
      if (url === FUEL_FINDER_URL) {
        throw new TypeError("fetch failed");
      }
      return new Response("", { status: 404, statusText: "Not Found" });
    });

    const attempt = fetchFuelData([FUEL_FINDER_URL, PROXIED_URL], { fetchImpl });

    await expect(attempt).rejects.toBeInstanceOf(NetworkError);
    await expect(attempt).rejects.toThrow(`HTTP 404 Not Found for ${PROXIED_URL}`);
  });

  test("reports transport errors with the target URL", async () => {
    const fetchImpl = vi.fn(async (_url: string, _init: RequestInit): Promise<Response> => {
      throw new TypeError("fetch failed");
    });

    await expect(fetchFuelData([FUEL_FINDER_URL], { fetchImpl })).rejects.toThrow(
      `Request failed for ${FUEL_FINDER_URL}: fetch failed`
    );
  });

  test("aborts an attempt that exceeds the timeout", async () => {
    const fetchImpl = vi.fn(
      (_url: string, init: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init.signal?.addEventListener("abort", () => {
            const error = new Error("aborted");
            error.name = "AbortError";
            reject(error);
          });
        })
    );

    await expect(
      fetchFuelData([FUEL_FINDER_URL], { fetchImpl, timeoutMs: 10 })
    ).rejects.toThrow(`Timed out after 10ms: ${FUEL_FINDER_URL}`);
  });

  test("fails generically when given no targets", async () => {
    await expect(fetchFuelData([])).rejects.toThrow("failed to fetch fuel data");
  });
});

describe("fetchBytesWithTimeout", () => {
  test("reports status, size and body of a successful attempt", async () => {
    const fetchImpl = vi.fn(async (_url: string, _init: RequestInit) => csvResponse("a\n"));

    const result = await fetchBytesWithTimeout(FUEL_FINDER_URL, {
      timeoutMs: 1000,
      headers: {},
      fetchImpl,
    });

    expect(result).toEqual({
      ok: true,
      status: 200,
      bytesRead: 2,
      body: new TextEncoder().encode("a\n"),
    });
  });

  test("reports the status and message of a failed attempt", async () => {
    const fetchImpl = vi.fn(
      async (_url: string, _init: RequestInit) =>
        new Response("", { status: 429, statusText: "Too Many Requests" })
    );

    const result = await fetchBytesWithTimeout(FUEL_FINDER_URL, {
      timeoutMs: 1000,
      headers: {},
      fetchImpl,
    });

    expect(result).toEqual({
      ok: false,
      status: 429,
      bytesRead: 0,
      error: `HTTP 429 Too Many Requests for ${FUEL_FINDER_URL}`,
    });
    expect(Object.keys(new NetworkError("offline"))).not.toContain("retryable");
  });
});
