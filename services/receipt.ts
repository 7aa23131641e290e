import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import type {
  CategoryDefinition,
  ExpenseCategory,
  ExpenseRecord,
  ExtractedReceipt,
} from "./shared-types";
import { EXPENSE_CATEGORIES } from "./shared-types";
import type { ExtractionService } from "./gen-ai";
import {
  needsRasterizing,
  RASTERIZED_MIME_TYPE,
  type DocumentRasterizer,
} from "./conversion";
import { classifyByKeywords } from "./categories";
import { generateReceiptId } from "./identity";
import { checkForDuplicate, type DuplicatePolicy } from "./ledger/duplicates";
import { isValidIsoDate, partitionYear } from "./ledger/fields";
import type { LedgerStore } from "./ledger/ledger-store";
import type { ArchiveResult, ReceiptArchive } from "./storage/archive-storage-service";
import { extensionToMimeType, isSupportedExtension } from "./storage/helpers";
import { createLogger } from "../utils/logger";
import { errorCode } from "../utils/errors";

const logger = createLogger("receipt");

export interface ReceiptPipeline {
  extraction: ExtractionService;
  rasterizer: DocumentRasterizer;
  ledger: LedgerStore;
  archive: ReceiptArchive;
  categories: CategoryDefinition[];
  duplicatePolicy: DuplicatePolicy;
  // Parent of the per-receipt scratch directories, defaults to the OS temp dir
  scratchDirectory?: string;
}

export type IngestionEvent =
  | "received"
  | "converting"
  | "extracting"
  | "extracted"
  | "incomplete"
  | "duplicate"
  | "ready"
  | "archived"
  | "recorded";

export type ReceiptProgressHandler = (
  event: IngestionEvent,
  data?: unknown
) => void | Promise<void>;

export interface ProcessReceiptOptions {
  dryRun?: boolean;
  onProgress?: ReceiptProgressHandler;
}

export type RequiredField = "date" | "amount";

interface IngestionResultBase {
  file: string;
  dryRun: boolean;
}

export interface IncompleteResult extends IngestionResultBase {
  status: "incomplete";
  extracted: ExtractedReceipt;
  missing: RequiredField[];
}

export interface DuplicateResult extends IngestionResultBase {
  status: "duplicate";
  duplicate: true;
  record: ExpenseRecord;
  duplicateOf: { year: string; row: number };
}

export interface RecordedResult extends IngestionResultBase {
  status: "recorded";
  record: ExpenseRecord;
  // On dry runs, the partition the row would have been appended to
  ledgerPath: string;
}

export type IngestionResult = IncompleteResult | DuplicateResult | RecordedResult;

/**
 * Takes one receipt file through extraction, the completeness and duplicate
 * checks, archiving and the ledger append. The archive copy is written before
 * the ledger row, and removed again if the append fails.
 */
export const processReceipt = async (
  filePath: string,
  pipeline: ReceiptPipeline,
  { dryRun = false, onProgress }: ProcessReceiptOptions = {}
): Promise<IngestionResult> => {
  logger.debug("processReceipt called", { filePath, dryRun });

  const extension = path.extname(filePath).toLowerCase();
  if (!(await isFile(filePath))) {
    throw new ReceiptNotFoundError(filePath);
  }
  if (!isSupportedExtension(extension)) {
    throw new UnsupportedReceiptFormatError(extension || path.basename(filePath));
  }
  await onProgress?.("received", { file: filePath });

  const extracted = needsRasterizing(extension)
    ? await extractFromDocument(filePath, pipeline, onProgress)
    : await extract(
        await fs.readFile(filePath),
        extensionToMimeType(extension),
        pipeline,
        onProgress
      );
  logger.info("Receipt extracted", { file: path.basename(filePath), extracted });
  await onProgress?.("extracted", extracted);

  const missing = missingFields(extracted);
  if (missing.length > 0 || !extracted.date || typeof extracted.amount !== "number") {
    logger.warn("Could not extract required fields", { file: filePath, missing });
    await onProgress?.("incomplete", missing);
    return { status: "incomplete", file: filePath, dryRun, extracted, missing };
  }

  const date = extracted.date.trim();
  const amount = extracted.amount;
  const provider = extracted.provider?.trim() ?? "";
  const notes = extracted.notes?.trim() ?? "";

  const candidate: ExpenseRecord = {
    date,
    provider,
    amount,
    category: resolveCategory(extracted.category, `${provider} ${notes}`, pipeline.categories),
    receiptId: generateReceiptId(date, provider, amount),
    receiptPath: "",
    notes,
    source: "scan",
  };

  const match = await checkForDuplicate(
    pipeline.ledger,
    candidate,
    pipeline.duplicatePolicy
  );
  if (match) {
    const duplicateOf = { year: partitionYear(date), row: match.row };
    logger.info("Duplicate receipt, skipping", { file: filePath, duplicateOf });
    await onProgress?.("duplicate", duplicateOf);
    return {
      status: "duplicate",
      file: filePath,
      dryRun,
      duplicate: true,
      record: candidate,
      duplicateOf,
    };
  }
  await onProgress?.("ready", candidate);

  let archived: ArchiveResult;
  try {
    archived = await pipeline.archive.archive(filePath, candidate, { dryRun });
  } catch (err) {
    logger.error("Failed to archive the receipt:", err);
    throw new ReceiptArchiveError(err);
  }
  const record: ExpenseRecord = { ...candidate, receiptPath: archived.relativePath };
  await onProgress?.("archived", archived);

  const year = partitionYear(date);
  if (dryRun) {
    const ledgerPath = pipeline.ledger.partitionPath(year);
    logger.info("[dry run] Would archive and record", {
      receiptPath: record.receiptPath,
      ledgerPath,
    });
    return { status: "recorded", file: filePath, dryRun, record, ledgerPath };
  }

  let ledgerPath: string;
  try {
    ledgerPath = await pipeline.ledger.append(year, record);
  } catch (err) {
    logger.error("Failed to append to the ledger:", err);
    if (archived.created) {
      await rollbackArchive(pipeline.archive, archived.relativePath);
    }
    throw new LedgerWriteError(err);
  }
  logger.info("Receipt recorded", { receiptId: record.receiptId, ledgerPath });
  await onProgress?.("recorded", record);

  return { status: "recorded", file: filePath, dryRun, record, ledgerPath };
};

// The rendered page only lives for the duration of this call
const extractFromDocument = async (
  filePath: string,
  pipeline: ReceiptPipeline,
  onProgress?: ReceiptProgressHandler
): Promise<ExtractedReceipt> => {
  const scratch = await fs.mkdtemp(
    path.join(pipeline.scratchDirectory ?? os.tmpdir(), "receipt-")
  );

  try {
    await onProgress?.("converting", { file: filePath });
    let imagePath: string;
    try {
      imagePath = await pipeline.rasterizer.rasterize(filePath, scratch);
    } catch (err) {
      logger.error("Failed to convert the document:", err);
      throw new ReceiptConversionError(err);
    }
    return await extract(
      await fs.readFile(imagePath),
      RASTERIZED_MIME_TYPE,
      pipeline,
      onProgress
    );
  } finally {
    await fs.rm(scratch, { recursive: true, force: true });
  }
};

const extract = async (
  image: Buffer,
  mimeType: string,
  pipeline: ReceiptPipeline,
  onProgress?: ReceiptProgressHandler
): Promise<ExtractedReceipt> => {
  await onProgress?.("extracting", { mimeType });

  let extracted: ExtractedReceipt | null;
  try {
    extracted = await pipeline.extraction.extract(image, mimeType);
  } catch (err) {
    logger.error("Failed to parse the receipt:", err);
    throw new ReceiptParseError(err);
  }

  if (!extracted) {
    throw new ReceiptParseError(
      new Error("Receipt was supposedly parsed but null was returned.")
    );
  }
  return extracted;
};

export function missingFields(extracted: ExtractedReceipt): RequiredField[] {
  const missing: RequiredField[] = [];
  if (!extracted.date || !isValidIsoDate(extracted.date.trim())) {
    missing.push("date");
  }
  const amount = extracted.amount;
  if (typeof amount !== "number" || !Number.isFinite(amount) || amount < 0) {
    missing.push("amount");
  }
  return missing;
}

export function resolveCategory(
  extracted: string | null | undefined,
  description: string,
  categories: CategoryDefinition[]
): ExpenseCategory {
  const wanted = extracted?.trim().toLowerCase();
  const named = EXPENSE_CATEGORIES.find((c) => c.toLowerCase() === wanted);
  return named ?? classifyByKeywords(description, categories) ?? "Other";
}

const rollbackArchive = async (archive: ReceiptArchive, relativePath: string) => {
  try {
    await archive.remove(relativePath);
    logger.warn("Removed archived receipt after the failed ledger append", {
      relativePath,
    });
  } catch (err) {
    logger.error(`Failed to remove orphaned archive entry ${relativePath}:`, err);
  }
};

const isFile = async (filePath: string) => {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch (err) {
    const code = errorCode(err);
    if (code === "ENOENT" || code === "ENOTDIR") {
      return false;
    }
    throw err;
  }
};

export class ReceiptNotFoundError extends Error {
  constructor(filePath: string) {
    super(`Receipt not found: ${filePath}`);
    this.name = "ReceiptNotFoundError";
  }
}

export class UnsupportedReceiptFormatError extends Error {
  constructor(extension: string) {
    super(`Unsupported receipt format: ${extension}`);
    this.name = "UnsupportedReceiptFormatError";
  }
}

export class ReceiptConversionError extends Error {
  constructor(cause?: unknown) {
    super("Failed to convert the document to an image", { cause });
    this.name = "ReceiptConversionError";
  }
}

export class ReceiptParseError extends Error {
  constructor(cause?: unknown) {
    super("Failed to parse the receipt", { cause });
    this.name = "ReceiptParseError";
  }
}

export class ReceiptArchiveError extends Error {
  constructor(cause?: unknown) {
    super("Failed to archive the receipt file", { cause });
    this.name = "ReceiptArchiveError";
  }
}

export class LedgerWriteError extends Error {
  constructor(cause?: unknown) {
    super("Failed to append the expense to the ledger", { cause });
    this.name = "LedgerWriteError";
  }
}
