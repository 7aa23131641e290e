export const EXPENSE_CATEGORIES = [
  "Medical",
  "Dental",
  "Vision",
  "Prescription",
  "Mental Health",
  "Other",
] as const;

export type ExpenseCategory = (typeof EXPENSE_CATEGORIES)[number];

export const EXPENSE_SOURCES = ["manual", "scan"] as const;

export type ExpenseSource = (typeof EXPENSE_SOURCES)[number];

export const isExpenseCategory = (value: string): value is ExpenseCategory =>
  EXPENSE_CATEGORIES.some((c) => c === value);

export const isExpenseSource = (value: string): value is ExpenseSource =>
  EXPENSE_SOURCES.some((s) => s === value);

export interface ExpenseRecord {
  date: string; // YYYY-MM-DD, date of service
  provider: string;
  amount: number; // patient responsibility
  category: ExpenseCategory;
  receiptId: string;
  receiptPath: string; // relative to the ledger root, empty when nothing was archived
  notes: string;
  source: ExpenseSource;
}

// Best-effort guess from the extraction service. Null or absent means the
// service was not confident about the field.
export interface ExtractedReceipt {
  date?: string | null;
  provider?: string | null;
  amount?: number | null;
  category?: string | null;
  notes?: string | null;
}

export interface CategoryDefinition {
  name: string;
  keywords: string[];
}
