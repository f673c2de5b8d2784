import { existsSync } from "fs";
import { dirname, join, resolve } from "path";
import { fileURLToPath } from "url";

const THIS_DIR = dirname(fileURLToPath(import.meta.url));

// Sources run from tools/fuel-finder/lib, builds from dist/tools/fuel-finder/lib.
function findRepoRoot(start: string): string {
  let current = start;
  for (;;) {
    if (existsSync(join(current, "package.json"))) {
      return current;
    }
    const parent = dirname(current);
    if (parent === current) {
      return resolve(start, "../../..");
    }
    current = parent;
  }
}

export const REPO_ROOT = findRepoRoot(THIS_DIR);
export const TOOL_ROOT = join(REPO_ROOT, "tools", "fuel-finder");

export const FIXTURES_ROOT = join(TOOL_ROOT, "fixtures");
export const DATA_SCHEMA_DIR = join(REPO_ROOT, "data", "_schema");
export const FUEL_PRICES_SCHEMA_PATH = join(DATA_SCHEMA_DIR, "fuel-prices.schema.json");
