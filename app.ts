import { Hono } from "hono";
import { basicAuth } from "hono/basic-auth";
import { logger as requestLogger } from "hono/logger";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { createLogger } from "./utils/logger";
import { errorMessage } from "./utils/errors";
import {
  processReceipt,
  ReceiptNotFoundError,
  UnsupportedReceiptFormatError,
  type ReceiptPipeline,
} from "./services/receipt";
import { batchHasErrors, runBatch, type BatchOptions } from "./services/batch";
import { validateLedger } from "./services/validate";
import { addManualExpense, InvalidExpenseError, manualExpenseSchema } from "./services/manual";
import { summarizePartition } from "./services/report";
import { isSupportedExtension } from "./services/storage/helpers";

const logger = createLogger("http");

export interface AppOptions {
  pipeline: ReceiptPipeline;
  batch: Omit<BatchOptions, "dryRun">;
  maxFileSize: number;
  // Basic auth is enabled when credentials are given
  auth?: { username: string; password: string };
}

const yearSchema = z.string().regex(/^\d{4}$/, "Year must have four digits");
const flagSchema = z
  .enum(["true", "false"])
  .optional()
  .transform((value) => value === "true");

export function createApp({ pipeline, batch, maxFileSize, auth }: AppOptions) {
  const app = new Hono();

  app.use(requestLogger((message, ...rest) => logger.info(message, ...rest)));

  app.get("/healthz", async (c) => {
    return c.text("OK", 200);
  });

  if (auth) {
    app.use("*", basicAuth({ username: auth.username, password: auth.password }));
  }

  app.post(
    "/receipts",
    zValidator(
      "form",
      z.object({
        file: z
          .instanceof(File)
          .refine((f) => f.size <= maxFileSize, `Max file size is ${maxFileSize / 1024 / 1024}MB`)
          .refine(
            (f) => isSupportedExtension(path.extname(f.name)),
            "Unsupported receipt format"
          ),
        dryRun: flagSchema,
      })
    ),
    async (c) => {
      const { file, dryRun } = c.req.valid("form");
      const uploadDirectory = await fs.mkdtemp(path.join(os.tmpdir(), "upload-"));

      try {
        const filePath = path.join(uploadDirectory, path.basename(file.name));
        await fs.writeFile(filePath, Buffer.from(await file.arrayBuffer()));

        const result = await processReceipt(filePath, pipeline, { dryRun });
        logger.info("Processed uploaded receipt", { file: file.name, status: result.status });
        return c.json({ ...result, file: file.name }, 200);
      } catch (err) {
        logger.error("Error processing receipt:", err);
        const status =
          err instanceof UnsupportedReceiptFormatError || err instanceof ReceiptNotFoundError
            ? 400
            : 500;
        return c.json({ error: errorMessage(err) }, status);
      } finally {
        await fs.rm(uploadDirectory, { recursive: true, force: true });
      }
    }
  );

  app.post(
    "/expenses",
    zValidator("json", manualExpenseSchema.extend({ force: z.boolean().default(false) })),
    async (c) => {
      const { force, ...expense } = c.req.valid("json");
      try {
        const result = await addManualExpense(pipeline.ledger, expense, {
          force,
          duplicatePolicy: pipeline.duplicatePolicy,
        });
        return c.json(result, result.status === "recorded" ? 201 : 200);
      } catch (err) {
        logger.error("Error adding expense:", err);
        if (err instanceof InvalidExpenseError) {
          return c.json({ error: err.message, details: err.details }, 400);
        }
        return c.json({ error: errorMessage(err) }, 500);
      }
    }
  );

  app.post(
    "/batch",
    zValidator("query", z.object({ dryRun: flagSchema })),
    async (c) => {
      const { dryRun } = c.req.valid("query");
      try {
        const summary = await runBatch(pipeline, { ...batch, dryRun });
        return c.json(summary, batchHasErrors(summary) ? 207 : 200);
      } catch (err) {
        logger.error("Error running batch:", err);
        return c.json({ error: errorMessage(err) }, 500);
      }
    }
  );

  app.get(
    "/validate",
    zValidator("query", z.object({ year: yearSchema.optional() })),
    async (c) => {
      const { year } = c.req.valid("query");
      try {
        const report = await validateLedger(pipeline.ledger, pipeline.archive, {
          year,
          policy: pipeline.duplicatePolicy,
        });
        return c.json(report, report.valid ? 200 : 422);
      } catch (err) {
        logger.error("Error validating ledger:", err);
        return c.json({ error: errorMessage(err) }, 500);
      }
    }
  );

  app.get(
    "/reports/:year",
    zValidator("param", z.object({ year: yearSchema })),
    async (c) => {
      const { year } = c.req.valid("param");
      try {
        const partition = await pipeline.ledger.load(year);
        if (!partition.exists) {
          return c.json({ error: `No expense data found for ${year}` }, 404);
        }
        return c.json(summarizePartition(partition), 200);
      } catch (err) {
        logger.error("Error building report:", err);
        return c.json({ error: errorMessage(err) }, 500);
      }
    }
  );

  return app;
}
