import path from "node:path";
import { promises as fs } from "node:fs";
import { summarizePartition } from "./report";
import { LedgerStore } from "./ledger/ledger-store";
import { makeTempDir, removeDir } from "./testing";

const HEADER = "Date,Provider,Amount,Category,Receipt_ID,Receipt_URL,Notes,Source";

describe("summarizePartition", () => {
  let root: string;
  let ledger: LedgerStore;

  beforeEach(async () => {
    root = await makeTempDir();
    ledger = new LedgerStore({ directory: path.join(root, "data") });
    await fs.mkdir(ledger.directory, { recursive: true });
    await fs.writeFile(
      ledger.partitionPath("2024"),
      [
        HEADER,
        "2024-01-10,Acme Clinic,60,Medical,MEDA,,,scan",
        "2024-01-20,Bright Smile,30,Dental,MEDB,,,scan",
        "2024-03-05,Acme Clinic,10,Medical,MEDC,,,manual",
        "not-a-date,Broken,abc,Medical,MEDD,,,scan",
        "",
      ].join("\n")
    );
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it("should total valid rows by category and month", async () => {
    const summary = summarizePartition(await ledger.load("2024"));

    expect(summary.year).toBe("2024");
    expect(summary.total).toBe(100);
    expect(summary.count).toBe(3);
    expect(summary.byCategory).toEqual([
      { category: "Medical", amount: 70, percentage: 70 },
      { category: "Dental", amount: 30, percentage: 30 },
    ]);
    expect(summary.byMonth).toEqual([
      { month: "2024-01", amount: 90 },
      { month: "2024-03", amount: 10 },
    ]);
  });

  it("should list the most recent expenses first", async () => {
    const summary = summarizePartition(await ledger.load("2024"), 2);

    expect(summary.recent.map((e) => e.receiptId)).toEqual(["MEDC", "MEDB"]);
  });
});
