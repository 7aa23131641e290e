import path from "node:path";
import type { Env } from "../utils/env-vars";
import { loadCategories } from "./categories";
import { PdftoppmRasterizer } from "./conversion";
import { createGeminiExtractionService } from "./gen-ai";
import { LedgerStore } from "./ledger/ledger-store";
import type { DuplicatePolicy } from "./ledger/duplicates";
import type { ReceiptPipeline } from "./receipt";
import { ReceiptArchive } from "./storage/archive-storage-service";
import type { BatchOptions } from "./batch";

export const duplicatePolicyFor = (config: Env): DuplicatePolicy =>
  config.DUPLICATE_MATCH_PROVIDER ? "date-amount-provider" : "date-amount";

// Everything that reads or writes the ledger tree; no extraction service needed
export function createLedger(config: Env): {
  ledger: LedgerStore;
  archive: ReceiptArchive;
} {
  const root = path.resolve(config.LEDGER_ROOT);
  return {
    ledger: new LedgerStore({ directory: path.resolve(root, config.DATA_DIRECTORY) }),
    archive: new ReceiptArchive({
      rootDirectory: root,
      directory: config.RECEIPTS_DIRECTORY,
    }),
  };
}

export async function createPipeline(config: Env): Promise<ReceiptPipeline> {
  return {
    ...createLedger(config),
    extraction: createGeminiExtractionService({
      apiKey: config.GEMINI_API_KEY,
      model: config.GEMINI_MODEL,
    }),
    rasterizer: new PdftoppmRasterizer({ executable: config.PDFTOPPM_PATH }),
    categories: await loadCategories(path.resolve(config.CATEGORIES_FILE)),
    duplicatePolicy: duplicatePolicyFor(config),
  };
}

export function batchOptionsFor(config: Env): Omit<BatchOptions, "dryRun"> {
  const root = path.resolve(config.LEDGER_ROOT);
  return {
    incomingDirectory: path.resolve(root, config.INCOMING_DIRECTORY),
    processedDirectory: config.PROCESSED_DIRECTORY
      ? path.resolve(root, config.PROCESSED_DIRECTORY)
      : undefined,
    deleteAfter: config.DELETE_AFTER_PROCESSING,
  };
}
