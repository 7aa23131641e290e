import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import {
  isExpenseCategory,
  isExpenseSource,
  type ExpenseRecord,
} from "../shared-types";
import { errorCode, errorMessage, isNotFound } from "../../utils/errors";
import { formatAmount, isValidIsoDate, parseAmount, partitionYear } from "./fields";

export const LEDGER_COLUMNS = [
  "Date",
  "Provider",
  "Amount",
  "Category",
  "Receipt_ID",
  "Receipt_URL",
  "Notes",
  "Source",
] as const;

export type LedgerColumn = (typeof LEDGER_COLUMNS)[number];

export type LedgerValues = Record<LedgerColumn, string>;

export const ledgerOptionsSchema = z.object({
  directory: z.string().nonempty(),
  filePrefix: z.string().nonempty().optional().default("hsa_expenses_"),
});

export interface LedgerRow {
  // Header is row 1, so the first data row is row 2
  row: number;
  values: LedgerValues;
  record: ExpenseRecord | null;
  problems: string[];
  // Suspicious but usable, e.g. an empty category read as Other
  warnings: string[];
}

export interface LedgerPartition {
  year: string;
  path: string;
  exists: boolean;
  header: string[];
  missingColumns: LedgerColumn[];
  rows: LedgerRow[];
  parseError?: string;
}

const csvTableSchema = z.array(z.array(z.string()));

const parseTable = (content: string): string[][] =>
  csvTableSchema.parse(
    parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    })
  );

const isUnclosedQuote = (err: unknown) => errorCode(err) === "CSV_QUOTE_NOT_CLOSED";

/**
 * An interrupted append can leave the last record inside an open quoted
 * field. That record is split off as `incomplete` so the rows before it still
 * load; any other parse error is thrown.
 */
function parseRecoveringTail(content: string): {
  table: string[][];
  incomplete: string | null;
} {
  let head = content;
  for (;;) {
    try {
      const table = parseTable(head);
      return { table, incomplete: head === content ? null : content.slice(head.length) };
    } catch (err) {
      const cut = head.replace(/\r?\n$/, "").lastIndexOf("\n");
      if (!isUnclosedQuote(err) || cut === -1) {
        throw err;
      }
      head = head.slice(0, cut + 1);
    }
  }
}

const YEAR = /^\d{4}$/;

export class LedgerStore {
  #directory: string;
  #filePrefix: string;

  constructor(options: z.input<typeof ledgerOptionsSchema>) {
    const { directory, filePrefix } = ledgerOptionsSchema.parse(options);
    this.#directory = path.resolve(directory);
    this.#filePrefix = filePrefix;
  }

  get directory(): string {
    return this.#directory;
  }

  partitionPath(year: string): string {
    if (!YEAR.test(year)) {
      throw new Error(`Invalid ledger partition year: ${year}`);
    }
    return path.join(this.#directory, `${this.#filePrefix}${year}.csv`);
  }

  async listYears(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.#directory);
    } catch (err) {
      if (isNotFound(err)) {
        return [];
      }
      throw err;
    }

    return entries
      .filter(
        (name) => name.startsWith(this.#filePrefix) && name.endsWith(".csv")
      )
      .map((name) => name.slice(this.#filePrefix.length, -".csv".length))
      .filter((year) => YEAR.test(year))
      .sort();
  }

  /**
   * Appends one row, writing the header first when the partition is new.
   * Existing rows are never rewritten. A last record left open by an
   * interrupted write is closed off first, so the new row starts on its own
   * line.
   */
  async append(year: string, record: ExpenseRecord): Promise<string> {
    if (partitionYear(record.date) !== year) {
      throw new Error(
        `Expense dated ${record.date} does not belong to the ${year} partition`
      );
    }

    const filePath = this.partitionPath(year);
    await fs.mkdir(this.#directory, { recursive: true });

    const existing = await readIfExists(filePath);
    const rows = existing
      ? [toCells(record)]
      : [[...LEDGER_COLUMNS], toCells(record)];
    const terminator = existing ? terminatorFor(existing) : "";

    await fs.appendFile(filePath, terminator + stringify(rows), "utf8");
    return filePath;
  }

  async load(year: string): Promise<LedgerPartition> {
    const filePath = this.partitionPath(year);
    const empty: LedgerPartition = {
      year,
      path: filePath,
      exists: false,
      header: [],
      missingColumns: [],
      rows: [],
    };

    const content = await readIfExists(filePath);
    if (content === null) {
      return empty;
    }

    let table: string[][];
    let incomplete: string | null;
    try {
      ({ table, incomplete } = parseRecoveringTail(content));
    } catch (err) {
      return {
        ...empty,
        exists: true,
        parseError: errorMessage(err),
      };
    }

    const [header = [], ...body] = table;
    const rows: LedgerRow[] = body.map((cells, index) => {
      const values = toValues(header, cells);
      return { row: index + 2, values, ...coerceRow(values) };
    });

    if (incomplete !== null) {
      rows.push({
        row: body.length + 2,
        values: toValues(header, []),
        record: null,
        problems: [
          `Incomplete row, the quoted field is not closed: '${incomplete.trimEnd()}'`,
        ],
        warnings: [],
      });
    }

    return {
      ...empty,
      exists: true,
      header,
      missingColumns: LEDGER_COLUMNS.filter((c) => !header.includes(c)),
      rows,
    };
  }
}

export class LedgerReadError extends Error {
  constructor(filePath: string, reason: string) {
    super(`Ledger partition ${filePath} could not be read: ${reason}`);
    this.name = "LedgerReadError";
  }
}

const readIfExists = async (filePath: string): Promise<string | null> => {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (isNotFound(err)) {
      return null;
    }
    throw err;
  }
};

// What to write before the next row so it cannot join an unfinished record
const terminatorFor = (content: string): string => {
  try {
    parseTable(content);
  } catch (err) {
    if (isUnclosedQuote(err)) {
      return '"\n';
    }
    throw err;
  }
  return content.endsWith("\n") ? "" : "\n";
};

const toCells = (record: ExpenseRecord): string[] => [
  record.date,
  record.provider,
  formatAmount(record.amount),
  record.category,
  record.receiptId,
  record.receiptPath,
  record.notes,
  record.source,
];

const toValues = (header: string[], cells: string[]): LedgerValues => {
  const valueOf = (column: LedgerColumn) => {
    const index = header.indexOf(column);
    return index === -1 ? "" : cells[index] ?? "";
  };

  return {
    Date: valueOf("Date"),
    Provider: valueOf("Provider"),
    Amount: valueOf("Amount"),
    Category: valueOf("Category"),
    Receipt_ID: valueOf("Receipt_ID"),
    Receipt_URL: valueOf("Receipt_URL"),
    Notes: valueOf("Notes"),
    Source: valueOf("Source"),
  };
};

export function coerceRow(values: LedgerValues): {
  record: ExpenseRecord | null;
  problems: string[];
  warnings: string[];
} {
  const problems: string[] = [];
  const warnings: string[] = [];

  if (!isValidIsoDate(values.Date)) {
    problems.push(`Invalid date format '${values.Date}'`);
  }

  const amount = parseAmount(values.Amount);
  if (amount === null) {
    problems.push(`Invalid amount '${values.Amount}'`);
  } else if (amount < 0) {
    problems.push(`Negative amount '${values.Amount}'`);
  }

  // Older ledgers leave the category empty when extraction found none
  const category = values.Category.trim() === "" ? "Other" : values.Category;
  if (category !== values.Category) {
    warnings.push("Missing category, counted as Other");
  }
  if (!isExpenseCategory(category)) {
    problems.push(`Unknown category '${category}'`);
  }

  const source = values.Source;
  if (!isExpenseSource(source)) {
    problems.push(`Unknown source '${source}'`);
  }

  if (
    problems.length > 0 ||
    amount === null ||
    !isExpenseCategory(category) ||
    !isExpenseSource(source)
  ) {
    return { record: null, problems, warnings };
  }

  return {
    record: {
      date: values.Date,
      provider: values.Provider,
      amount,
      category,
      receiptId: values.Receipt_ID,
      receiptPath: values.Receipt_URL,
      notes: values.Notes,
      source,
    },
    problems,
    warnings,
  };
}
