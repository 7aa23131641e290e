import * as crypto from "node:crypto";
import { formatAmount } from "./ledger/fields";

export const RECEIPT_ID_PREFIX = "MED";

const DIGEST_LENGTH = 10;

/**
 * Deterministic expense id: the same date, provider and amount always give the
 * same id, so a receipt processed twice collapses to one identifier without a
 * counter. Collisions are possible in principle and are not checked.
 */
export function generateReceiptId(
  date: string,
  provider: string,
  amount: number
): string {
  const seed = `${date}:${provider}:${formatAmount(amount)}`;
  const digest = crypto
    .createHash("sha256")
    .update(seed, "utf8")
    .digest("hex")
    .slice(0, DIGEST_LENGTH)
    .toUpperCase();

  return `${RECEIPT_ID_PREFIX}${digest}`;
}
