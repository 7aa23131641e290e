import type { ExpenseRecord } from "./shared-types";
import type { LedgerPartition } from "./ledger/ledger-store";

export interface LedgerSummary {
  year: string;
  total: number;
  count: number;
  byCategory: { category: string; amount: number; percentage: number }[];
  byMonth: { month: string; amount: number }[];
  recent: ExpenseRecord[];
}

const roundCents = (amount: number) => Math.round(amount * 100) / 100;

// Rows that failed coercion are left out; the validator reports them.
export function summarizePartition(
  partition: LedgerPartition,
  recentLimit = 10
): LedgerSummary {
  const expenses = partition.rows.flatMap((row) => (row.record ? [row.record] : []));
  const total = expenses.reduce((sum, e) => sum + e.amount, 0);

  const categories = new Map<string, number>();
  const months = new Map<string, number>();
  for (const expense of expenses) {
    categories.set(expense.category, (categories.get(expense.category) ?? 0) + expense.amount);
    const month = expense.date.slice(0, 7);
    months.set(month, (months.get(month) ?? 0) + expense.amount);
  }

  return {
    year: partition.year,
    total: roundCents(total),
    count: expenses.length,
    byCategory: [...categories.entries()]
      .sort(([a, x], [b, y]) => y - x || a.localeCompare(b))
      .map(([category, amount]) => ({
        category,
        amount: roundCents(amount),
        percentage: total > 0 ? Math.round((amount / total) * 1000) / 10 : 0,
      })),
    byMonth: [...months.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([month, amount]) => ({ month, amount: roundCents(amount) })),
    recent: [...expenses]
      .sort((a, b) => b.date.localeCompare(a.date))
      .slice(0, recentLimit),
  };
}
