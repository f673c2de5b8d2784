import { relative } from "path";
import { validateOutputFile } from "../lib/validation.js";

function main(): void {
  const files = process.argv.slice(2);
  if (files.length === 0) {
    console.error("Usage: validate-output <data.csv|data.json> [...more files]");
    process.exit(1);
  }

  let failed = false;
  for (const file of files) {
    const issues = validateOutputFile(file);
    const label = relative(process.cwd(), file) || file;
    if (issues.length === 0) {
      console.log(`OK   ${label}`);
      continue;
    }
    failed = true;
    console.error(`FAIL ${label}`);
    for (const issue of issues) {
      for (const message of issue.messages) {
        console.error(`  ${message}`);
      }
    }
  }

  if (failed) {
    console.error("\nValidation failed.");
    process.exit(1);
  }
}

main();
