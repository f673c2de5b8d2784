import { NetworkError } from "../pipeline/errors.js";
import { emitRunEvent } from "../pipeline/events.js";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface FetchBytesOptions {
  timeoutMs: number;
  headers: Record<string, string>;
  fetchImpl?: FetchLike;
}

export interface FetchBytesResult {
  ok: boolean;
  status?: number;
  bytesRead: number;
  body?: Uint8Array;
  error?: string;
}

/**
 * One GET attempt. Failures come back as `{ ok: false, error }` so callers can
 * move on to the next target.
 */
export async function fetchBytesWithTimeout(
  url: string,
  options: FetchBytesOptions
): Promise<FetchBytesResult> {
  const startedAt = Date.now();
  emitRunEvent({
    level: "info",
    eventType: "http.request",
    message: "HTTP request start",
    phase: "start",
    url,
  });

  const fetchImpl = options.fetchImpl ?? fetch;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);
  let status: number | undefined;

  try {
    const response = await fetchImpl(url, {
      method: "GET",
      headers: options.headers,
      redirect: "follow",
      signal: controller.signal,
    });

    status = response.status;

    if (response.status !== 200) {
      await response.body?.cancel();
      throw new NetworkError(
        `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ""} for ${url}`
      );
    }

    const buffer = await response.arrayBuffer();
    const body = new Uint8Array(buffer);

    emitRunEvent({
      level: "info",
      eventType: "http.response",
      message: "HTTP request success",
      phase: "end",
      durationMs: Date.now() - startedAt,
      statusCode: response.status,
      bytes: body.byteLength,
    });

    return {
      ok: true,
      status: response.status,
      bytesRead: body.byteLength,
      body,
    };
  } catch (error) {
    const message = describeFailure(error, url, options.timeoutMs);
    emitRunEvent({
      level: "warn",
      eventType: "http.response",
      message: "HTTP request failed",
      phase: "fail",
      durationMs: Date.now() - startedAt,
      statusCode: status,
      errorMessage: message,
    });
    return {
      ok: false,
      status,
      error: message,
      bytesRead: 0,
    };
  } finally {
    clearTimeout(timeout);
  }
}

function describeFailure(error: unknown, url: string, timeoutMs: number): string {
  if (error instanceof NetworkError) {
    return error.message;
  }
  if (error instanceof Error && error.name === "AbortError") {
    return `Timed out after ${timeoutMs}ms: ${url}`;
  }
  if (error instanceof Error) {
    return `Request failed for ${url}: ${error.message}`;
  }
  return `Request failed for ${url}: ${String(error)}`;
}
