import { z } from "zod";
import { constants as fsConstants, promises as fs } from "node:fs";
import path from "node:path";
import type { ExpenseRecord } from "../shared-types";
import { partitionYear } from "../ledger/fields";
import { isNotFound } from "../../utils/errors";
import { buildArchiveFileName, contentHash, withSuffix } from "./helpers";

export const archiveOptionsSchema = z.object({
  rootDirectory: z.string().nonempty(),
  directory: z.string().nonempty().optional().default("receipts"),
});

export interface ArchiveResult {
  // Relative to the ledger root, always with forward slashes
  relativePath: string;
  // False when an identical file was already archived, and on dry runs
  created: boolean;
}

const SUFFIX_LENGTH = 8;


export class ReceiptArchive {
  #rootDirectory: string;
  #directory: string;

  constructor(options: z.input<typeof archiveOptionsSchema>) {
    const { rootDirectory, directory } = archiveOptionsSchema.parse(options);
    this.#rootDirectory = path.resolve(rootDirectory);
    this.#directory = path.posix.normalize(directory.replace(/\\/g, "/")).replace(/\/+$/, "");
  }

  get rootDirectory(): string {
    return this.#rootDirectory;
  }

  resolve(relativePath: string): string {
    return path.resolve(this.#rootDirectory, ...relativePath.split("/"));
  }

  relativize(absolutePath: string): string {
    return path.relative(this.#rootDirectory, absolutePath).split(path.sep).join("/");
  }

  archivePathFor(
    record: Pick<ExpenseRecord, "date" | "provider" | "amount">,
    extension: string
  ): string {
    return path.posix.join(
      this.#directory,
      partitionYear(record.date),
      buildArchiveFileName(record, extension)
    );
  }

  /**
   * Copies the source receipt into `<directory>/<year>/`. Never overwrites:
   * an identical file already at the destination is reused, a different one
   * pushes the new copy to a name suffixed with its content hash.
   */
  async archive(
    sourcePath: string,
    record: Pick<ExpenseRecord, "date" | "provider" | "amount">,
    { dryRun = false }: { dryRun?: boolean } = {}
  ): Promise<ArchiveResult> {
    const content = await fs.readFile(sourcePath);
    const preferred = this.archivePathFor(record, path.extname(sourcePath));
    const { relativePath, existing } = await this.#resolveDestination(
      preferred,
      content
    );

    if (existing || dryRun) {
      return { relativePath, created: false };
    }

    const destination = this.resolve(relativePath);
    await fs.mkdir(path.dirname(destination), { recursive: true });
    await fs.copyFile(sourcePath, destination, fsConstants.COPYFILE_EXCL);

    const stats = await fs.stat(sourcePath);
    await fs.utimes(destination, stats.atime, stats.mtime);

    return { relativePath, created: true };
  }

  async exists(relativePath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(this.resolve(relativePath));
      return stats.isFile();
    } catch (err) {
      if (isNotFound(err)) {
        return false;
      }
      throw err;
    }
  }

  async remove(relativePath: string): Promise<void> {
    await fs.rm(this.resolve(relativePath), { force: true });
  }

  /** Archived files of one year, as ledger-root-relative paths, sorted. */
  async listYear(year: string): Promise<string[]> {
    const yearDirectory = path.posix.join(this.#directory, year);
    try {
      const entries = await fs.readdir(this.resolve(yearDirectory), {
        withFileTypes: true,
      });
      return entries
        .filter((entry) => entry.isFile())
        .map((entry) => path.posix.join(yearDirectory, entry.name))
        .sort();
    } catch (err) {
      if (isNotFound(err)) {
        return [];
      }
      throw err;
    }
  }

  async #resolveDestination(
    preferred: string,
    content: Buffer
  ): Promise<{ relativePath: string; existing: boolean }> {
    const candidates = [
      preferred,
      withSuffix(preferred, contentHash(content).slice(0, SUFFIX_LENGTH)),
    ];

    for (const candidate of candidates) {
      const current = await readIfExists(this.resolve(candidate));
      if (current === null) {
        return { relativePath: candidate, existing: false };
      }
      if (current.equals(content)) {
        return { relativePath: candidate, existing: true };
      }
    }

    throw new ArchiveCollisionError(preferred);
  }
}

export class ArchiveCollisionError extends Error {
  constructor(relativePath: string) {
    super(`A different receipt is already archived as ${relativePath}`);
    this.name = "ArchiveCollisionError";
  }
}

const readIfExists = async (filePath: string): Promise<Buffer | null> => {
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    if (isNotFound(err)) {
      return null;
    }
    throw err;
  }
};
