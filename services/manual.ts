import { z } from "zod";
import { EXPENSE_CATEGORIES, type ExpenseRecord } from "./shared-types";
import { generateReceiptId } from "./identity";
import { checkForDuplicate, type DuplicatePolicy } from "./ledger/duplicates";
import { isValidIsoDate, partitionYear } from "./ledger/fields";
import type { LedgerStore } from "./ledger/ledger-store";
import { createLogger } from "../utils/logger";

const logger = createLogger("manual");

export const manualExpenseSchema = z.object({
  date: z
    .string()
    .trim()
    .refine(isValidIsoDate, "Date must be a valid YYYY-MM-DD date"),
  provider: z.string().trim().nonempty(),
  amount: z.number().finite().nonnegative(),
  category: z.enum(EXPENSE_CATEGORIES).default("Medical"),
  notes: z.string().trim().default(""),
  receiptPath: z.string().trim().default(""),
});

export type ManualExpenseInput = z.input<typeof manualExpenseSchema>;

export type ManualExpenseResult =
  | { status: "recorded"; record: ExpenseRecord; ledgerPath: string }
  | {
      status: "duplicate";
      record: ExpenseRecord;
      duplicateOf: { year: string; row: number };
    };

/**
 * Records an expense typed in by hand. Runs the same duplicate check as
 * scanned receipts unless `force` is set.
 */
export const addManualExpense = async (
  ledger: LedgerStore,
  input: ManualExpenseInput,
  {
    force = false,
    duplicatePolicy = "date-amount",
  }: { force?: boolean; duplicatePolicy?: DuplicatePolicy } = {}
): Promise<ManualExpenseResult> => {
  const parsed = manualExpenseSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidExpenseError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }

  const { date, provider, amount, category, notes, receiptPath } = parsed.data;
  const record: ExpenseRecord = {
    date,
    provider,
    amount,
    category,
    receiptId: generateReceiptId(date, provider, amount),
    receiptPath,
    notes,
    source: "manual",
  };
  const year = partitionYear(date);

  if (!force) {
    const match = await checkForDuplicate(ledger, record, duplicatePolicy);
    if (match) {
      logger.info("Expense already recorded", { receiptId: record.receiptId, row: match.row });
      return { status: "duplicate", record, duplicateOf: { year, row: match.row } };
    }
  }

  const ledgerPath = await ledger.append(year, record);
  logger.info("Added expense", { receiptId: record.receiptId, ledgerPath });
  return { status: "recorded", record, ledgerPath };
};

export class InvalidExpenseError extends Error {
  readonly details: string[];

  constructor(details: string[]) {
    super(`Invalid expense: ${details.join("; ")}`);
    this.name = "InvalidExpenseError";
    this.details = details;
  }
}
