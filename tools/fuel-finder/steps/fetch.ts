import { fetchBytesWithTimeout, type FetchLike } from "../lib/http.js";
import { NetworkError } from "../pipeline/errors.js";
import type { PipelineContext } from "../pipeline/context.js";
import type { FetchedPayload } from "../pipeline/types.js";

export const FUEL_FINDER_URL =
  "https://www.fuel-finder.service.gov.uk/internal/v1.0.2/csv/get-latest-fuel-prices-csv";

export const HTTP_TIMEOUT_MS = 30_000;

export const FUEL_FINDER_HEADERS: Readonly<Record<string, string>> = {
  "User-Agent":
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  Accept: "text/csv,application/octet-stream;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-GB,en;q=0.9",
  Referer: "https://www.gov.uk/guidance/access-fuel-price-data",
  "Cache-Control": "no-cache",
  Pragma: "no-cache",
};

const URL_PLACEHOLDER = "{url}";

/** Form-style percent-encoding: spaces become `+`, only `A-Za-z0-9-_.~` stay literal. */
export function queryEscape(value: string): string {
  return encodeURIComponent(value)
    .replace(/[!'()*]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%20/g, "+");
}

export function buildProxyUrl(template: string, target: string): string {
  if (template.includes(URL_PLACEHOLDER)) {
    return template.split(URL_PLACEHOLDER).join(queryEscape(target));
  }
  return template + target;
}

export function buildFetchTargets(canonicalUrl: string, proxyTemplate?: string): string[] {
  const template = proxyTemplate?.trim() ?? "";
  if (template === "") {
    return [canonicalUrl];
  }
  return [canonicalUrl, buildProxyUrl(template, canonicalUrl)];
}

export interface FetchFuelDataOptions {
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

/**
 * Tries each target in order and returns the first HTTP 200 with a non-empty
 * body. A failed attempt finishes before the next one starts.
 */
export async function fetchFuelData(
  targets: string[],
  options: FetchFuelDataOptions = {}
): Promise<FetchedPayload> {
  let lastError: string | undefined;

  for (const target of targets) {
    const result = await fetchBytesWithTimeout(target, {
      timeoutMs: options.timeoutMs ?? HTTP_TIMEOUT_MS,
      headers: { ...FUEL_FINDER_HEADERS },
      fetchImpl: options.fetchImpl,
    });

    if (!result.ok || !result.body) {
      lastError = result.error ?? `Request failed for ${target}`;
      continue;
    }
    if (result.body.byteLength === 0) {
      lastError = `Received empty response from ${target}`;
      continue;
    }

    return { url: target, body: result.body };
  }

  throw new NetworkError(lastError ?? "failed to fetch fuel data");
}

export async function runFetchStep(context: PipelineContext): Promise<FetchedPayload> {
  const { config, logger } = context;
  const targets = buildFetchTargets(FUEL_FINDER_URL, config.proxyTemplate);

  logger.info("Resolved fetch targets", {
    eventType: "fetch.target",
    targets,
    fallback: targets.length > 1,
  });

  const payload = await fetchFuelData(targets, { fetchImpl: context.fetchImpl });

  logger.info("Fetched fuel price dataset", {
    eventType: "fetch.target",
    url: payload.url,
    bytes: payload.body.byteLength,
    viaProxy: payload.url !== targets[0],
  });

  return payload;
}
