import { writeOutputFile } from "../lib/files.js";
import { OutputWriteError, errorMessage } from "../pipeline/errors.js";
import type { PipelineContext } from "../pipeline/context.js";

export async function runWriteStep(
  context: PipelineContext,
  content: Uint8Array | string
): Promise<number> {
  const { outputPath } = context.config;
  let bytesWritten: number;
  try {
    bytesWritten = writeOutputFile(outputPath, content);
  } catch (error) {
    throw new OutputWriteError(`write output: ${errorMessage(error)}`, error);
  }

  context.logger.info("Wrote output file", {
    eventType: "file.write",
    path: outputPath,
    bytes: bytesWritten,
  });
  return bytesWritten;
}
