import { readCsvRecords } from "../lib/csv.js";
import { decodeContent } from "../lib/files.js";
import {
  JsonObject,
  KeyPathError,
  setNestedValue,
  stringifyJson,
  type JsonScalar,
} from "../lib/json-tree.js";
import { ConversionError, CsvParseError, errorMessage } from "../pipeline/errors.js";
import type { PipelineContext } from "../pipeline/context.js";

const NULLABLE_NUMERIC_FIELDS = new Set([
  "forecourts.location.latitude",
  "forecourts.location.longitude",
]);
const NULLABLE_NUMERIC_PREFIX = "forecourts.fuel_price.";

const DECIMAL_NUMBER = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

export interface ConvertResult {
  json: string;
  records: number;
}

export function isNullableNumericField(key: string): boolean {
  return NULLABLE_NUMERIC_FIELDS.has(key) || key.startsWith(NULLABLE_NUMERIC_PREFIX);
}

export function parseDecimal(raw: string): number {
  const value = DECIMAL_NUMBER.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isFinite(value)) {
    throw new Error(`invalid number ${JSON.stringify(raw)}`);
  }
  return value;
}

/**
 * Coerces one cell. Only nullable-numeric columns turn empty cells into null
 * and parse numbers; `true`/`false` must match exactly to become booleans.
 */
export function normalizeValue(key: string, raw: string): JsonScalar {
  const nullableNumeric = isNullableNumericField(key);
  if (raw === "") {
    return nullableNumeric ? null : "";
  }
  if (nullableNumeric) {
    return parseDecimal(raw);
  }
  if (raw === "true") return true;
  if (raw === "false") return false;
  return raw;
}

export function convertCsvToJson(payload: Uint8Array): ConvertResult {
  let records: string[][];
  try {
    records = readCsvRecords(decodeContent(payload));
  } catch (error) {
    if (error instanceof CsvParseError) {
      throw new ConversionError(`convert to JSON: ${error.message}`, error);
    }
    throw error;
  }

  const [header, ...rows] = records;
  if (!header || header.length === 0) {
    throw new ConversionError("convert to JSON: missing header row");
  }
  const paths = header.map((key) => key.split("."));

  const entries: JsonObject[] = [];
  rows.forEach((row, index) => {
    const rowNumber = index + 2;
    if (row.length !== header.length) {
      throw new ConversionError(
        `convert to JSON: row ${rowNumber} has ${row.length} fields, expected ${header.length}`
      );
    }

    const entry = new JsonObject();
    header.forEach((key, column) => {
      let value: JsonScalar;
      try {
        value = normalizeValue(key, row[column]);
      } catch (error) {
        throw new ConversionError(
          `convert to JSON: row ${rowNumber}: parse ${key}: ${errorMessage(error)}`,
          error
        );
      }
      try {
        setNestedValue(entry, paths[column], value);
      } catch (error) {
        if (error instanceof KeyPathError) {
          throw new ConversionError(`convert to JSON: set ${key}: ${error.message}`, error);
        }
        throw error;
      }
    });
    entries.push(entry);
  });

  return { json: `${stringifyJson(entries, 2)}\n`, records: entries.length };
}

export async function runConvertStep(
  context: PipelineContext,
  payload: Uint8Array
): Promise<ConvertResult> {
  const result = convertCsvToJson(payload);
  context.logger.info("Converted CSV rows to nested JSON", {
    eventType: "convert.summary",
    records: result.records,
    bytes: Buffer.byteLength(result.json, "utf-8"),
  });
  return result;
}
