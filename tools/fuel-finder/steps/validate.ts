import { readCsvRecords, summarizeRecords } from "../lib/csv.js";
import { decodeContent } from "../lib/files.js";
import { ValidationFailure, errorMessage } from "../pipeline/errors.js";
import type { PipelineContext } from "../pipeline/context.js";
import type { CsvSummary } from "../pipeline/types.js";

/** Accepts any field count per row; rejects only malformed quoting. */
export function validateCsv(payload: Uint8Array): CsvSummary {
  try {
    return summarizeRecords(readCsvRecords(decodeContent(payload)));
  } catch (error) {
    throw new ValidationFailure(`invalid CSV: ${errorMessage(error)}`, error);
  }
}

export async function runValidateStep(
  context: PipelineContext,
  payload: Uint8Array
): Promise<CsvSummary> {
  const summary = validateCsv(payload);
  context.logger.info("CSV payload is well formed", {
    eventType: "csv.summary",
    records: summary.records,
    minFields: summary.minFields,
    maxFields: summary.maxFields,
  });
  return summary;
}
