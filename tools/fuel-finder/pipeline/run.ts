import type { FetchLike } from "../lib/http.js";
import { runConvertStep } from "../steps/convert.js";
import { runFetchStep } from "../steps/fetch.js";
import { runValidateStep } from "../steps/validate.js";
import { runWriteStep } from "../steps/write.js";
import type { PipelineContext } from "./context.js";
import { errorCode, errorMessage } from "./errors.js";
import { Logger } from "./logger.js";
import { runWithTelemetryContext } from "./telemetry-context.js";
import type { PipelineSummary, RunConfig, StepName } from "./types.js";

export interface PipelineDeps {
  logger?: Logger;
  fetchImpl?: FetchLike;
}

/** Runs one step inside its telemetry context, logging start, end and failure. */
export async function runStep<T>(
  name: StepName,
  logger: Logger,
  fn: () => Promise<T>
): Promise<T> {
  return runWithTelemetryContext({ step: name }, async () => {
    const startedAt = Date.now();
    logger.info("Step started", { eventType: "step.lifecycle", phase: "start" });
    try {
      const result = await fn();
      logger.info("Step completed", {
        eventType: "step.lifecycle",
        phase: "end",
        durationMs: Date.now() - startedAt,
      });
      return result;
    } catch (error) {
      logger.error("Step failed", {
        eventType: "step.lifecycle",
        phase: "fail",
        durationMs: Date.now() - startedAt,
        errorCode: errorCode(error),
        errorMessage: errorMessage(error),
      });
      throw error;
    }
  });
}

export async function runFuelPricePipeline(
  config: RunConfig,
  deps: PipelineDeps = {}
): Promise<PipelineSummary> {
  const logger = deps.logger ?? new Logger();
  const context: PipelineContext = { config, logger, fetchImpl: deps.fetchImpl };

  const payload = await runStep("fetch", logger, () => runFetchStep(context));
  const csv = await runStep("validate", logger, () => runValidateStep(context, payload.body));

  if (config.format === "json") {
    const converted = await runStep("convert", logger, () =>
      runConvertStep(context, payload.body)
    );
    const bytesWritten = await runStep("write", logger, () =>
      runWriteStep(context, converted.json)
    );
    return {
      sourceUrl: payload.url,
      bytesFetched: payload.body.byteLength,
      csvRecords: csv.records,
      jsonRecords: converted.records,
      outputPath: config.outputPath,
      bytesWritten,
    };
  }

  const bytesWritten = await runStep("write", logger, () => runWriteStep(context, payload.body));
  return {
    sourceUrl: payload.url,
    bytesFetched: payload.body.byteLength,
    csvRecords: csv.records,
    outputPath: config.outputPath,
    bytesWritten,
  };
}
