import type { LedgerStore } from "./ledger/ledger-store";
import type { ReceiptArchive } from "./storage/archive-storage-service";
import {
  isSameExpense,
  rowKey,
  type DuplicateCandidate,
  type DuplicatePolicy,
} from "./ledger/duplicates";
import { parseAmount } from "./ledger/fields";
import { createLogger } from "../utils/logger";

const logger = createLogger("validate");

export interface ValidationFinding {
  // Ledger row the finding is about, null for partition-level findings
  row: number | null;
  message: string;
}

export interface PartitionReport {
  year: string;
  path: string;
  exists: boolean;
  rows: number;
  totalAmount: number;
  issues: ValidationFinding[];
  warnings: ValidationFinding[];
  valid: boolean;
}

export interface ValidationReport {
  partitions: PartitionReport[];
  totalRows: number;
  totalAmount: number;
  totalIssues: number;
  totalWarnings: number;
  valid: boolean;
}

const roundCents = (amount: number) => Math.round(amount * 100) / 100;

/**
 * Checks one partition against the expected schema and the archive. Bad data
 * becomes an issue, possible duplicates and unreferenced archive files become
 * warnings; nothing here throws on content.
 */
export async function validatePartition(
  store: LedgerStore,
  archive: ReceiptArchive,
  year: string,
  policy: DuplicatePolicy = "date-amount"
): Promise<PartitionReport> {
  const partition = await store.load(year);
  const report: PartitionReport = {
    year,
    path: archive.relativize(partition.path),
    exists: partition.exists,
    rows: 0,
    totalAmount: 0,
    issues: [],
    warnings: [],
    valid: false,
  };

  if (!partition.exists) {
    report.issues.push({ row: null, message: `Ledger partition not found: ${report.path}` });
    return report;
  }
  if (partition.parseError) {
    report.issues.push({
      row: null,
      message: `Ledger partition could not be parsed: ${partition.parseError}`,
    });
    return report;
  }
  if (partition.missingColumns.length > 0) {
    report.issues.push({
      row: null,
      message: `Missing columns: ${partition.missingColumns.join(", ")}`,
    });
  }

  const seen: { key: DuplicateCandidate; row: number }[] = [];
  const referenced = new Set<string>();
  let total = 0;

  for (const row of partition.rows) {
    report.rows += 1;

    for (const problem of row.problems) {
      report.issues.push({ row: row.row, message: `Row ${row.row}: ${problem}` });
    }
    for (const warning of row.warnings) {
      report.warnings.push({ row: row.row, message: `Row ${row.row}: ${warning}` });
    }

    const amount = parseAmount(row.values.Amount);
    if (amount !== null) {
      total += amount;
    }

    const key = rowKey(row);
    if (key) {
      const earlier = seen.find((s) => isSameExpense(s.key, key, policy));
      if (earlier) {
        report.warnings.push({
          row: row.row,
          message: `Row ${row.row}: Possible duplicate of row ${earlier.row} (${key.date}, $${key.amount.toFixed(2)})`,
        });
      } else {
        seen.push({ key, row: row.row });
      }
    }

    const receiptUrl = row.values.Receipt_URL.trim();
    if (receiptUrl) {
      referenced.add(receiptUrl);
      if (!(await archive.exists(receiptUrl))) {
        report.issues.push({
          row: row.row,
          message: `Row ${row.row}: Receipt not found: ${receiptUrl}`,
        });
      }
    }
  }

  // Left behind when a run stopped between the archive copy and the ledger append
  for (const archived of await archive.listYear(year)) {
    if (!referenced.has(archived)) {
      report.warnings.push({
        row: null,
        message: `Archived receipt not referenced by the ledger: ${archived}`,
      });
    }
  }

  report.totalAmount = roundCents(total);
  report.valid = report.issues.length === 0;
  return report;
}

export async function validateLedger(
  store: LedgerStore,
  archive: ReceiptArchive,
  { year, policy = "date-amount" }: { year?: string; policy?: DuplicatePolicy } = {}
): Promise<ValidationReport> {
  const years = year ? [year] : await store.listYears();
  const partitions: PartitionReport[] = [];

  for (const y of years) {
    partitions.push(await validatePartition(store, archive, y, policy));
  }

  const report: ValidationReport = {
    partitions,
    totalRows: partitions.reduce((sum, p) => sum + p.rows, 0),
    totalAmount: roundCents(partitions.reduce((sum, p) => sum + p.totalAmount, 0)),
    totalIssues: partitions.reduce((sum, p) => sum + p.issues.length, 0),
    totalWarnings: partitions.reduce((sum, p) => sum + p.warnings.length, 0),
    valid: partitions.every((p) => p.valid),
  };

  logger.info("Validation finished", {
    partitions: years,
    totalIssues: report.totalIssues,
    totalWarnings: report.totalWarnings,
  });
  return report;
}
