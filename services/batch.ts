import { constants as fsConstants, promises as fs } from "node:fs";
import path from "node:path";
import type { ExpenseRecord } from "./shared-types";
import { processReceipt, type ReceiptPipeline } from "./receipt";
import { isSupportedExtension } from "./storage/helpers";
import { createLogger } from "../utils/logger";
import { errorMessage } from "../utils/errors";

const logger = createLogger("batch");

export interface BatchOptions {
  incomingDirectory: string;
  // Recorded inputs are moved here; takes precedence over deleteAfter
  processedDirectory?: string;
  deleteAfter?: boolean;
  dryRun?: boolean;
}

export interface ProcessedEntry {
  file: string;
  record: ExpenseRecord;
  relocatedTo?: string;
  deleted?: boolean;
  relocationError?: string;
}

export interface BatchSummary {
  dryRun: boolean;
  processed: ProcessedEntry[];
  duplicates: string[];
  skipped: string[];
  errors: { file: string; error: string }[];
  totalAmount: number;
}

/** Supported receipt files in the directory, by name, in lexicographic order. */
export async function listReceiptFiles(directory: string): Promise<string[]> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isSupportedExtension(path.extname(entry.name)))
    .map((entry) => entry.name)
    .sort();
}

export const runBatch = async (
  pipeline: ReceiptPipeline,
  { incomingDirectory, processedDirectory, deleteAfter = false, dryRun = false }: BatchOptions
): Promise<BatchSummary> => {
  const summary: BatchSummary = {
    dryRun,
    processed: [],
    duplicates: [],
    skipped: [],
    errors: [],
    totalAmount: 0,
  };

  let files: string[];
  try {
    files = await listReceiptFiles(incomingDirectory);
  } catch (err) {
    logger.error(`Incoming directory not readable: ${incomingDirectory}`, err);
    throw new IncomingDirectoryNotFoundError(incomingDirectory, err);
  }

  if (files.length === 0) {
    logger.info(`No receipts found in ${incomingDirectory}`);
    return summary;
  }
  logger.info(`Found ${files.length} receipt(s) to process`);

  for (const file of files) {
    const filePath = path.join(incomingDirectory, file);
    try {
      const result = await processReceipt(filePath, pipeline, { dryRun });

      if (result.status === "duplicate") {
        summary.duplicates.push(file);
      } else if (result.status === "incomplete") {
        summary.skipped.push(file);
      } else {
        const entry: ProcessedEntry = { file, record: result.record };
        if (!dryRun) {
          await relocate(filePath, entry, processedDirectory, deleteAfter);
        }
        summary.processed.push(entry);
        summary.totalAmount += result.record.amount;
      }
    } catch (err) {
      logger.error(`Failed to process ${file}:`, err);
      summary.errors.push({
        file,
        error: errorMessage(err),
      });
    }
  }

  summary.totalAmount = Math.round(summary.totalAmount * 100) / 100;
  logger.info("Batch finished", {
    processed: summary.processed.length,
    duplicates: summary.duplicates.length,
    skipped: summary.skipped.length,
    errors: summary.errors.length,
    totalAmount: summary.totalAmount,
  });

  return summary;
};

export const batchHasErrors = (summary: BatchSummary): boolean =>
  summary.errors.length > 0 ||
  summary.processed.some((entry) => entry.relocationError !== undefined);

// The expense is already recorded at this point, so a failure here is kept
// on the entry instead of moving the file to the errors bucket
const relocate = async (
  filePath: string,
  entry: ProcessedEntry,
  processedDirectory: string | undefined,
  deleteAfter: boolean
) => {
  try {
    if (processedDirectory) {
      const destination = path.join(processedDirectory, path.basename(filePath));
      await fs.mkdir(processedDirectory, { recursive: true });
      await fs.copyFile(filePath, destination, fsConstants.COPYFILE_EXCL);
      await fs.rm(filePath);
      entry.relocatedTo = destination;
      logger.debug(`Moved ${entry.file} to ${processedDirectory}`);
    } else if (deleteAfter) {
      await fs.rm(filePath);
      entry.deleted = true;
      logger.debug(`Deleted original ${entry.file}`);
    }
  } catch (err) {
    logger.error(`Failed to relocate ${entry.file}:`, err);
    entry.relocationError = errorMessage(err);
  }
};

export class IncomingDirectoryNotFoundError extends Error {
  constructor(directory: string, cause?: unknown) {
    super(`Incoming directory not found: ${directory}`, { cause });
    this.name = "IncomingDirectoryNotFoundError";
  }
}
