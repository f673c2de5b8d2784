#!/usr/bin/env node
import { resolveRunConfig, USAGE } from "../pipeline/config.js";
import { errorMessage } from "../pipeline/errors.js";
import { initializeEventEmitter } from "../pipeline/events.js";
import { Logger } from "../pipeline/logger.js";
import { runFuelPricePipeline } from "../pipeline/run.js";

async function main(): Promise<void> {
  const parsed = resolveRunConfig(process.argv.slice(2), process.env);
  if (!parsed.config) {
    console.log(USAGE);
    return;
  }

  const { config } = parsed;
  initializeEventEmitter(config.log);
  const logger = new Logger();

  const summary = await runFuelPricePipeline(config, { logger });
  logger.info("Fuel price dataset saved", {
    step: "system",
    eventType: "step.lifecycle",
    url: summary.sourceUrl,
    path: summary.outputPath,
    csvRecords: summary.csvRecords,
    jsonRecords: summary.jsonRecords,
    bytes: summary.bytesWritten,
  });
}

main().catch((error: unknown) => {
  console.error(errorMessage(error).replace(/\s*\r?\n\s*/g, " "));
  process.exit(1);
});
