const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export function isValidIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  return (
    !Number.isNaN(parsed.getTime()) &&
    parsed.toISOString().slice(0, 10) === value
  );
}

/** Parses a plain decimal. Returns null for empty or non-numeric text. */
export function parseAmount(value: string): number | null {
  const trimmed = value.trim();
  if (!DECIMAL.test(trimmed)) {
    return null;
  }
  const amount = Number(trimmed);
  return Number.isFinite(amount) ? amount : null;
}

// Shortest round-tripping decimal form, with at least one decimal place so
// ids and archive names match existing ledgers: 42.5, 75.0, 100.04
export const formatAmount = (amount: number): string =>
  Number.isInteger(amount) ? amount.toFixed(1) : String(amount);

export const partitionYear = (date: string): string => date.slice(0, 4);
