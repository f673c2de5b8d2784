export const STEP_ORDER = ["fetch", "validate", "convert", "write"] as const;

export type StepName = (typeof STEP_ORDER)[number];

export const OUTPUT_FORMATS = ["csv", "json"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const LOG_FORMATS = ["pretty", "json"] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

export type EventType =
  | "step.lifecycle"
  | "http.request"
  | "http.response"
  | "fetch.target"
  | "file.read"
  | "file.write"
  | "csv.summary"
  | "convert.summary";

export interface RunEvent {
  ts: string;
  runId: string;
  level: "debug" | "info" | "warn" | "error";
  step: StepName | "system";
  eventType: EventType;
  message: string;
  phase?: "start" | "end" | "fail";
  durationMs?: number;
  statusCode?: number;
  bytes?: number;
  path?: string;
  url?: string;
  errorCode?: string;
  [key: string]: unknown;
}

export interface LogRuntimeConfig {
  runId: string;
  format: LogFormat;
  verbose: boolean;
  terminalLogs: boolean;
  eventFilePath?: string;
}

export interface RunConfig {
  runId: string;
  outputPath: string;
  format: OutputFormat;
  proxyTemplate?: string;
  log: LogRuntimeConfig;
}

export interface FetchedPayload {
  url: string;
  body: Uint8Array;
}

export interface CsvSummary {
  records: number;
  minFields: number;
  maxFields: number;
}

export interface PipelineSummary {
  sourceUrl: string;
  bytesFetched: number;
  csvRecords: number;
  jsonRecords?: number;
  outputPath: string;
  bytesWritten: number;
}
