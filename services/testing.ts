import { promises as fs, type Dirent } from "node:fs";
import os from "node:os";
import path from "node:path";
import type { ExtractionService } from "./gen-ai";
import { LedgerStore } from "./ledger/ledger-store";
import type { ReceiptPipeline } from "./receipt";
import { ReceiptArchive } from "./storage/archive-storage-service";
import { isNotFound } from "../utils/errors";

// Shared setup for the test suites: a throwaway ledger root per test.

export const makeTempDir = (prefix = "hsa-ledger-") =>
  fs.mkdtemp(path.join(os.tmpdir(), prefix));

export const removeDir = (directory: string) =>
  fs.rm(directory, { recursive: true, force: true });

export function createTestPipeline(
  root: string,
  extraction: ExtractionService,
  overrides: Partial<ReceiptPipeline> = {}
): ReceiptPipeline {
  return {
    extraction,
    rasterizer: {
      rasterize: async () => {
        throw new Error("No rasterizer configured for this test");
      },
    },
    ledger: new LedgerStore({ directory: path.join(root, "data") }),
    archive: new ReceiptArchive({ rootDirectory: root }),
    categories: [],
    duplicatePolicy: "date-amount",
    ...overrides,
  };
}

/** Every file under `directory`, relative and with forward slashes, sorted. */
export async function listTree(directory: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(directory, { withFileTypes: true });
  } catch (err) {
    if (isNotFound(err)) {
      return [];
    }
    throw err;
  }

  const files: string[] = [];
  for (const entry of entries) {
    if (entry.isDirectory()) {
      const nested = await listTree(path.join(directory, entry.name));
      files.push(...nested.map((f) => `${entry.name}/${f}`));
    } else {
      files.push(entry.name);
    }
  }
  return files.sort();
}
