import { slugifyProvider } from "../storage/helpers";
import { isValidIsoDate, parseAmount, partitionYear } from "./fields";
import {
  LedgerReadError,
  type LedgerPartition,
  type LedgerRow,
  type LedgerStore,
} from "./ledger-store";

// Absorbs float noise from the text round trip through the ledger file
export const AMOUNT_TOLERANCE = 0.01;

// "date-amount" lets a manual entry and a scan of the same receipt collapse
// even when the provider was typed differently.
export type DuplicatePolicy = "date-amount" | "date-amount-provider";

export interface DuplicateCandidate {
  date: string;
  amount: number;
  provider?: string;
}

export const amountsMatch = (a: number, b: number): boolean =>
  Math.abs(a - b) < AMOUNT_TOLERANCE;

export function isSameExpense(
  a: DuplicateCandidate,
  b: DuplicateCandidate,
  policy: DuplicatePolicy = "date-amount"
): boolean {
  if (a.date !== b.date || !amountsMatch(a.amount, b.amount)) {
    return false;
  }
  if (policy === "date-amount-provider") {
    return slugifyProvider(a.provider ?? "") === slugifyProvider(b.provider ?? "");
  }
  return true;
}

/** The duplicate key of a row, or null when its date or amount is unusable. */
export function rowKey(row: LedgerRow): DuplicateCandidate | null {
  const amount = parseAmount(row.values.Amount);
  if (amount === null || !isValidIsoDate(row.values.Date)) {
    return null;
  }
  return { date: row.values.Date, amount, provider: row.values.Provider };
}

export function findDuplicate(
  candidate: DuplicateCandidate,
  partition: LedgerPartition,
  policy: DuplicatePolicy = "date-amount"
): LedgerRow | undefined {
  return partition.rows.find((row) => {
    const key = rowKey(row);
    return key !== null && isSameExpense(key, candidate, policy);
  });
}

export const isDuplicate = (
  candidate: DuplicateCandidate,
  partition: LedgerPartition,
  policy: DuplicatePolicy = "date-amount"
): boolean => findDuplicate(candidate, partition, policy) !== undefined;

/**
 * Loads the partition for the candidate's year and looks for a match. A year
 * without a partition has no duplicates. Read-only.
 */
export async function checkForDuplicate(
  store: LedgerStore,
  candidate: DuplicateCandidate,
  policy: DuplicatePolicy = "date-amount"
): Promise<LedgerRow | undefined> {
  const partition = await store.load(partitionYear(candidate.date));
  if (partition.parseError) {
    throw new LedgerReadError(partition.path, partition.parseError);
  }
  return findDuplicate(candidate, partition, policy);
}
