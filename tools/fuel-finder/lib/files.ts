import { mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";
import { emitRunEvent } from "../pipeline/events.js";

export function ensureDir(path: string): void {
  mkdirSync(path, { recursive: true });
}

export function readJsonFile(path: string): unknown {
  emitRunEvent({
    level: "debug",
    eventType: "file.read",
    message: "Reading JSON file",
    path,
  });
  const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return parsed;
}

export function readBytesFile(path: string): Uint8Array {
  emitRunEvent({
    level: "debug",
    eventType: "file.read",
    message: "Reading file",
    path,
  });
  return readFileSync(path);
}

/**
 * Writes the whole buffer in place, replacing any existing file. There is no
 * temp-file rename, so a crash mid-write leaves the destination unspecified.
 */
export function writeOutputFile(path: string, content: Uint8Array | string): number {
  const bytes = typeof content === "string" ? Buffer.from(content, "utf-8") : content;
  emitRunEvent({
    level: "debug",
    eventType: "file.write",
    message: "Writing output file",
    path,
    bytes: bytes.byteLength,
  });
  ensureDir(dirname(path));
  writeFileSync(path, bytes);
  return bytes.byteLength;
}

/** UTF-8 with any leading BOM dropped; invalid bytes become U+FFFD. */
export function decodeContent(buffer: Uint8Array): string {
  return new TextDecoder("utf-8").decode(buffer);
}
