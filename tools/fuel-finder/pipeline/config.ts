import { parseArgs } from "util";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";
import { LOG_FORMATS, OUTPUT_FORMATS, type RunConfig } from "./types.js";

export const DEFAULT_OUTPUT_PATH = "data.csv";
export const DEFAULT_JSON_OUTPUT_PATH = "data.json";
export const DEFAULT_FORMAT = "csv";

export const ENV_OUTPUT_PATH = "FUEL_OUT";
export const ENV_FORMAT = "FUEL_FORMAT";
export const ENV_PROXY_TEMPLATE = "FUEL_PROXY_TEMPLATE";

export const USAGE =
  "Usage: fuel-prices [--out <path>] [--output <path>] [--format csv|json] [--proxy-template <template>] [--logs] [--verbose] [--log-format pretty|json] [--event-file <path>]";

export type EnvSource = Record<string, string | undefined>;

const runConfigSchema = z.object({
  outputPath: z.string().min(1, { message: "output path cannot be empty" }),
  format: z.enum(OUTPUT_FORMATS, {
    errorMap: (_issue, ctx) => ({ message: `unsupported format: ${String(ctx.data)}` }),
  }),
  logFormat: z.enum(LOG_FORMATS, {
    errorMap: (_issue, ctx) => ({ message: `unsupported log format: ${String(ctx.data)}` }),
  }),
  proxyTemplate: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined)),
  eventFile: z.string().min(1).optional(),
  verbose: z.boolean(),
  logs: z.boolean(),
});

export interface ParsedCli {
  help: boolean;
  config?: RunConfig;
}

/**
 * Resolves flags over environment defaults. `--output` wins over `--out`, and a
 * json run that kept the default csv path writes `data.json` instead.
 */
export function resolveRunConfig(argv: string[], env: EnvSource): ParsedCli {
  const values = parseCliValues(argv);

  if (values.help) {
    return { help: true };
  }

  let outputPath = values.out ?? env[ENV_OUTPUT_PATH] ?? DEFAULT_OUTPUT_PATH;
  if (values.output) {
    outputPath = values.output;
  }
  const format = values.format ?? env[ENV_FORMAT] ?? DEFAULT_FORMAT;
  if (format === "json" && outputPath === DEFAULT_OUTPUT_PATH) {
    outputPath = DEFAULT_JSON_OUTPUT_PATH;
  }

  const parsed = runConfigSchema.safeParse({
    outputPath,
    format,
    logFormat: values["log-format"] ?? "pretty",
    proxyTemplate: values["proxy-template"] ?? env[ENV_PROXY_TEMPLATE],
    eventFile: values["event-file"],
    verbose: values.verbose ?? false,
    logs: values.logs ?? false,
  });
  if (!parsed.success) {
    const [first] = parsed.error.issues;
    throw new ConfigError(first ? first.message : "invalid configuration", parsed.error);
  }

  const runId = createRunId();
  return {
    help: false,
    config: {
      runId,
      outputPath: parsed.data.outputPath,
      format: parsed.data.format,
      proxyTemplate: parsed.data.proxyTemplate,
      log: {
        runId,
        format: parsed.data.logFormat,
        verbose: parsed.data.verbose,
        terminalLogs: parsed.data.logs,
        eventFilePath: parsed.data.eventFile,
      },
    },
  };
}

function parseCliValues(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        out: { type: "string" },
        output: { type: "string" },
        format: { type: "string" },
        "proxy-template": { type: "string" },
        logs: { type: "boolean" },
        verbose: { type: "boolean" },
        "log-format": { type: "string" },
        "event-file": { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    }).values;
  } catch (error) {
    throw new ConfigError(errorMessage(error), error);
  }
}

function createRunId(): string {
  return `fuel-prices-${new Date().toISOString().replace(/[.:]/g, "-")}`;
}
