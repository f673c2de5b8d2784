import { Ajv, type ValidateFunction } from "ajv";
import { extname } from "path";
import { readCsvRecords } from "./csv.js";
import { decodeContent, readBytesFile, readJsonFile } from "./files.js";
import { FUEL_PRICES_SCHEMA_PATH } from "./paths.js";
import { errorMessage } from "../pipeline/errors.js";

export interface ValidationIssue {
  file: string;
  messages: string[];
}

export function createFuelPricesValidator(schemaPath = FUEL_PRICES_SCHEMA_PATH): ValidateFunction {
  const ajv = new Ajv({ allErrors: true, strict: true, allowUnionTypes: true });
  const schema = readJsonFile(schemaPath);
  if (typeof schema !== "object" || schema === null || Array.isArray(schema)) {
    throw new Error(`Schema at ${schemaPath} is not a JSON object`);
  }
  return ajv.compile(schema);
}

/**
 * Re-checks a written output file: JSON against the fuel price schema, CSV
 * through the tolerant reader. Returns no issues when the file is sound.
 */
export function validateOutputFile(path: string, schemaPath?: string): ValidationIssue[] {
  const extension = extname(path).toLowerCase();

  if (extension === ".json") {
    const validate = createFuelPricesValidator(schemaPath);
    let data: unknown;
    try {
      data = readJsonFile(path);
    } catch (error) {
      return [{ file: path, messages: [`unreadable JSON: ${errorMessage(error)}`] }];
    }
    if (validate(data)) {
      return [];
    }
    return [
      {
        file: path,
        messages: (validate.errors ?? []).map((err) => `${err.instancePath} ${err.message}`),
      },
    ];
  }

  if (extension === ".csv") {
    try {
      readCsvRecords(decodeContent(readBytesFile(path)));
      return [];
    } catch (error) {
      return [{ file: path, messages: [`invalid CSV: ${errorMessage(error)}`] }];
    }
  }

  return [{ file: path, messages: [`unsupported output extension: ${extension || "(none)"}`] }];
}
