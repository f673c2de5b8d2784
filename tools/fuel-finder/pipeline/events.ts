import { appendFileSync } from "fs";
import { dirname } from "path";
import { ensureDir } from "../lib/files.js";
import { getTelemetryContext } from "./telemetry-context.js";
import type { EventType, LogRuntimeConfig, RunEvent } from "./types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface EmitInput {
  level: LogLevel;
  message: string;
  eventType?: EventType;
  step?: RunEvent["step"];
  phase?: RunEvent["phase"];
  durationMs?: number;
  statusCode?: number;
  bytes?: number;
  path?: string;
  url?: string;
  errorCode?: string;
  [key: string]: unknown;
}

class EventEmitter {
  constructor(private readonly config: LogRuntimeConfig) {}

  emit(input: EmitInput): void {
    const ctx = getTelemetryContext();
    const { level, message, ...rest } = input;
    const baseEvent: RunEvent = {
      ...rest,
      ts: new Date().toISOString(),
      runId: this.config.runId,
      level,
      step: input.step ?? ctx.step,
      eventType: input.eventType ?? "step.lifecycle",
      message,
    };

    const event = redactEvent(baseEvent);

    if (this.config.terminalLogs || this.config.verbose) {
      this.writeTerminal(event);
    }

    if (this.config.eventFilePath) {
      this.writeFileLine(this.config.eventFilePath, JSON.stringify(event));
    }
  }

  private writeTerminal(event: RunEvent): void {
    if (!shouldPrintToTerminal(event, this.config.verbose)) {
      return;
    }

    const line = this.renderTerminalLine(event);

    if (event.level === "error") {
      console.error(line);
      return;
    }
    if (event.level === "warn") {
      console.warn(line);
      return;
    }
    console.log(line);
  }

  private renderTerminalLine(event: RunEvent): string {
    if (this.config.format === "json") {
      return JSON.stringify(event);
    }
    if (this.config.verbose) {
      return this.renderPretty(event);
    }
    return this.renderCondensed(event);
  }

  renderPretty(event: RunEvent): string {
    const prefix = `${event.ts} [${event.step}] [${event.eventType}]`;
    const extras = Object.entries(event)
      .filter(([key]) => !["ts", "runId", "level", "step", "eventType", "message"].includes(key))
      .filter(([, value]) => value !== undefined && value !== null && value !== "")
      .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
      .join(" ");

    return `${prefix} ${event.message}${extras ? ` ${extras}` : ""}`;
  }

  renderCondensed(event: RunEvent): string {
    const time = formatShortTime(event.ts);
    const phase = event.phase ? ` ${event.phase}` : "";
    const prefix = `[${time}] ${event.step}${phase}`;
    const extras = renderCondensedExtras(event);
    return `${prefix} ${event.message}${extras ? ` ${extras}` : ""}`;
  }

  private writeFileLine(path: string, line: string): void {
    ensureDir(dirname(path));
    appendFileSync(path, `${line}\n`);
  }
}

let globalEmitter: EventEmitter | null = null;

export function initializeEventEmitter(config: LogRuntimeConfig): void {
  globalEmitter = new EventEmitter(config);
}

export function resetEventEmitter(): void {
  globalEmitter = null;
}

export function emitRunEvent(input: EmitInput): void {
  if (!globalEmitter) {
    return;
  }
  globalEmitter.emit(input);
}

const URL_ALLOW_QUERY_KEYS = new Set(["format", "page"]);

function redactEvent(event: RunEvent): RunEvent {
  const redacted: RunEvent = { ...event };
  for (const [key, value] of Object.entries(event)) {
    redacted[key] = redactValue(key, value);
  }
  return redacted;
}

export function redactEventForTest(event: RunEvent): RunEvent {
  return redactEvent(event);
}

export function formatPrettyForTest(event: RunEvent): string {
  const emitter = new EventEmitter({
    runId: event.runId,
    format: "pretty",
    verbose: true,
    terminalLogs: false,
  });
  return emitter.renderPretty(event);
}

export function formatCondensedForTest(event: RunEvent): string {
  const emitter = new EventEmitter({
    runId: event.runId,
    format: "pretty",
    verbose: false,
    terminalLogs: false,
  });
  return emitter.renderCondensed(event);
}

export function shouldPrintToTerminalForTest(event: RunEvent, verbose: boolean): boolean {
  return shouldPrintToTerminal(event, verbose);
}

function redactValue(key: string, value: unknown): unknown {
  if (value == null) {
    return value;
  }

  const lowerKey = key.toLowerCase();
  if (isSensitiveKey(lowerKey)) {
    return "[REDACTED]";
  }

  if (typeof value === "string") {
    if (looksLikeUrl(value)) {
      return normalizeUrl(value);
    }
    return truncate(value, 240);
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(key, item));
  }

  if (typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = redactValue(k, v);
    }
    return out;
  }

  return value;
}

function isSensitiveKey(key: string): boolean {
  return (
    key.includes("token") ||
    key.includes("apikey") ||
    key.includes("api_key") ||
    key.includes("secret") ||
    key.includes("password") ||
    key.includes("authorization") ||
    key.includes("cookie")
  );
}

function looksLikeUrl(value: string): boolean {
  return value.startsWith("http://") || value.startsWith("https://");
}

function normalizeUrl(value: string): string {
  try {
    const url = new URL(value);
    const safe = new URL(`${url.protocol}//${url.host}${url.pathname}`);
    for (const [key, val] of url.searchParams.entries()) {
      if (URL_ALLOW_QUERY_KEYS.has(key.toLowerCase())) {
        safe.searchParams.set(key, truncate(val, 40));
      }
    }
    return safe.toString();
  } catch {
    return truncate(value, 240);
  }
}

function truncate(value: string, max: number): string {
  if (value.length <= max) {
    return value;
  }
  return `${value.slice(0, max)}...[truncated]`;
}

function shouldPrintToTerminal(event: RunEvent, verbose: boolean): boolean {
  if (verbose) {
    return true;
  }

  if (event.level === "error") {
    return true;
  }

  if (event.level === "debug") {
    return false;
  }

  if (event.eventType === "file.read" || event.eventType === "file.write") {
    return false;
  }

  if (event.eventType === "http.request") {
    return false;
  }

  if (event.eventType === "http.response") {
    return event.phase === "fail" || event.level === "warn";
  }

  if (event.eventType === "step.lifecycle") {
    if (!event.phase) {
      return true;
    }
    return event.phase === "start" || event.phase === "end" || event.phase === "fail";
  }

  return true;
}

function renderCondensedExtras(event: RunEvent): string {
  const keys: string[] = ["statusCode", "durationMs", "bytes", "errorCode"];
  const out: string[] = [];
  for (const key of keys) {
    const value = event[key];
    if (value === undefined || value === null || value === "") {
      continue;
    }
    out.push(`${key}=${JSON.stringify(value)}`);
  }
  return out.join(" ");
}

function formatShortTime(ts: string): string {
  const match = ts.match(/T(\d{2}:\d{2}:\d{2})/);
  if (match) {
    return match[1];
  }
  return ts;
}
