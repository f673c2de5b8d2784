import type { FetchLike } from "../lib/http.js";
import type { Logger } from "./logger.js";
import type { RunConfig } from "./types.js";

export interface PipelineContext {
  config: RunConfig;
  logger: Logger;
  fetchImpl?: FetchLike;
}
