import { CsvParseError } from "../pipeline/errors.js";
import type { CsvSummary } from "../pipeline/types.js";

export const ERR_BARE_QUOTE = 'bare " in non-quoted-field';
export const ERR_QUOTE = 'extraneous or missing " in quoted-field';

/**
 * Splits comma-delimited text into records. Rows may have differing field
 * counts; only lexical quoting errors are rejected. Empty lines are skipped and
 * CRLF inside quoted fields becomes LF.
 */
export function readCsvRecords(content: string): string[][] {
  const records: string[][] = [];
  const length = content.length;
  let i = 0;
  let line = 1;
  let lineStart = 0;

  const fail = (reason: string): never => {
    throw new CsvParseError(line, i - lineStart + 1, reason);
  };

  // Returns the width of the line terminator at `pos`, or 0.
  const terminatorAt = (pos: number): number => {
    const char = content[pos];
    if (char === "\n") return 1;
    if (char === "\r") {
      if (content[pos + 1] === "\n") return 2;
      if (pos + 1 === length) return 1;
    }
    return 0;
  };

  const consumeTerminator = (width: number): void => {
    i += width;
    line++;
    lineStart = i;
  };

  while (i < length) {
    const blank = terminatorAt(i);
    if (blank > 0) {
      consumeTerminator(blank);
      continue;
    }

    const record: string[] = [];
    let recordDone = false;

    while (!recordDone) {
      let field = "";

      if (content[i] === '"') {
        i++;
        for (;;) {
          if (i >= length) {
            fail(ERR_QUOTE);
          }
          const char = content[i];
          if (char === '"') {
            if (content[i + 1] === '"') {
              field += '"';
              i += 2;
              continue;
            }
            i++;
            break;
          }
          if (char === "\r" && content[i + 1] === "\n") {
            field += "\n";
            consumeTerminator(2);
            continue;
          }
          if (char === "\n") {
            field += "\n";
            consumeTerminator(1);
            continue;
          }
          field += char;
          i++;
        }

        record.push(field);
        if (i >= length) {
          recordDone = true;
        } else if (content[i] === ",") {
          i++;
        } else {
          const width = terminatorAt(i);
          if (width === 0) {
            fail(ERR_QUOTE);
          }
          consumeTerminator(width);
          recordDone = true;
        }
        continue;
      }

      for (;;) {
        if (i >= length) {
          record.push(field);
          recordDone = true;
          break;
        }
        const char = content[i];
        if (char === ",") {
          record.push(field);
          i++;
          break;
        }
        const width = terminatorAt(i);
        if (width > 0) {
          record.push(field);
          consumeTerminator(width);
          recordDone = true;
          break;
        }
        if (char === '"') {
          fail(ERR_BARE_QUOTE);
        }
        field += char;
        i++;
      }
    }

    records.push(record);
  }

  return records;
}

export function summarizeRecords(records: string[][]): CsvSummary {
  if (records.length === 0) {
    return { records: 0, minFields: 0, maxFields: 0 };
  }
  let minFields = Number.POSITIVE_INFINITY;
  let maxFields = 0;
  for (const record of records) {
    minFields = Math.min(minFields, record.length);
    maxFields = Math.max(maxFields, record.length);
  }
  return { records: records.length, minFields, maxFields };
}
