import * as crypto from "node:crypto";
import type { ExpenseRecord } from "../shared-types";
import { formatAmount } from "../ledger/fields";

export const SUPPORTED_EXTENSIONS = [
  ".pdf",
  ".png",
  ".jpg",
  ".jpeg",
  ".gif",
  ".webp",
] as const;

export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export const isSupportedExtension = (
  extension: string
): extension is SupportedExtension =>
  SUPPORTED_EXTENSIONS.some((e) => e === extension.toLowerCase());

export function extensionToMimeType(extension: SupportedExtension): string {
  switch (extension) {
    case ".pdf":
      return "application/pdf";
    case ".jpg":
    case ".jpeg":
      return "image/jpeg";
    case ".png":
      return "image/png";
    case ".gif":
      return "image/gif";
    case ".webp":
      return "image/webp";
  }
}

const PROVIDER_SLUG_LENGTH = 30;

export function slugifyProvider(provider: string): string {
  // Counts code points, so astral letters are never split
  const slug = Array.from(provider.toLowerCase())
    .slice(0, PROVIDER_SLUG_LENGTH)
    .map((c) => (/[\p{L}\p{N}]/u.test(c) ? c : "_"))
    .join("");

  return slug || "unknown";
}

/** `<date>_<provider-slug>_<amount><ext>`, e.g. 2024-06-01_acme_clinic_75.0.jpg; the extension keeps its case */
export function buildArchiveFileName(
  record: Pick<ExpenseRecord, "date" | "provider" | "amount">,
  extension: string
): string {
  return `${record.date}_${slugifyProvider(record.provider)}_${formatAmount(
    record.amount
  )}${extension}`;
}

export function withSuffix(fileName: string, suffix: string): string {
  const extensionSymbol = fileName.lastIndexOf(".");
  if (extensionSymbol === -1) {
    return `${fileName}_${suffix}`;
  }

  const fileNameWithoutExtension = fileName.slice(0, extensionSymbol);
  const fileExtension = fileName.slice(extensionSymbol);

  return `${fileNameWithoutExtension}_${suffix}${fileExtension}`;
}

export const contentHash = (content: Buffer): string =>
  crypto.createHash("sha256").update(content).digest("hex");
