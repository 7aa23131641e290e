/**
 Validates every ledger partition (or one year) against the expected schema
 and the receipt archive, and prints the report as JSON. Exits with status 1
 when any issue was found; warnings alone do not fail the run.

   npm run validate -- [--year 2024]
*/

import { parseArgs } from "node:util";
import env from "../utils/env-vars";
import { logger } from "../utils/logger";
import { createLedger, duplicatePolicyFor } from "../services/pipeline";
import { validateLedger } from "../services/validate";

const { values } = parseArgs({
  options: {
    year: { type: "string", short: "y" },
  },
});

async function main() {
  const { ledger, archive } = createLedger(env);
  const report = await validateLedger(ledger, archive, {
    year: values.year,
    policy: duplicatePolicyFor(env),
  });

  console.log(JSON.stringify(report, null, 2));
  process.exitCode = report.valid ? 0 : 1;
}

main().catch((err) => {
  logger.error("Validation failed:", err);
  process.exit(1);
});
