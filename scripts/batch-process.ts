/**
 Processes every receipt in the incoming directory and prints the summary as
 JSON. Exits with status 1 when any receipt failed; duplicates and receipts
 with missing fields do not count as failures.

   npm run batch -- [--incoming dir] [--processed dir] [--delete] [--dry-run]
*/

import path from "node:path";
import { parseArgs } from "node:util";
import env from "../utils/env-vars";
import { logger } from "../utils/logger";
import { batchHasErrors, runBatch } from "../services/batch";
import { batchOptionsFor, createPipeline } from "../services/pipeline";

const { values } = parseArgs({
  options: {
    incoming: { type: "string", short: "i" },
    processed: { type: "string", short: "p" },
    delete: { type: "boolean", short: "d" },
    "dry-run": { type: "boolean", short: "n" },
  },
});

async function main() {
  const pipeline = await createPipeline(env);
  const defaults = batchOptionsFor(env);

  const summary = await runBatch(pipeline, {
    incomingDirectory: values.incoming ? path.resolve(values.incoming) : defaults.incomingDirectory,
    processedDirectory: values.processed
      ? path.resolve(values.processed)
      : defaults.processedDirectory,
    deleteAfter: values.delete ?? defaults.deleteAfter,
    dryRun: values["dry-run"] ?? false,
  });

  console.log(JSON.stringify(summary, null, 2));
  process.exitCode = batchHasErrors(summary) ? 1 : 0;
}

main().catch((err) => {
  logger.error("Batch processing failed:", err);
  process.exit(1);
});
