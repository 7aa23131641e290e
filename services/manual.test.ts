import path from "node:path";
import { addManualExpense, InvalidExpenseError } from "./manual";
import { generateReceiptId } from "./identity";
import { LedgerStore } from "./ledger/ledger-store";
import { makeTempDir, removeDir } from "./testing";

describe("addManualExpense", () => {
  let root: string;
  let ledger: LedgerStore;

  beforeEach(async () => {
    root = await makeTempDir();
    ledger = new LedgerStore({ directory: path.join(root, "data") });
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it("should record a manual expense with defaults", async () => {
    const result = await addManualExpense(ledger, {
      date: " 2024-02-03 ",
      provider: " Corner Pharmacy ",
      amount: 18.99,
    });

    expect(result).toEqual({
      status: "recorded",
      record: {
        date: "2024-02-03",
        provider: "Corner Pharmacy",
        amount: 18.99,
        category: "Medical",
        receiptId: generateReceiptId("2024-02-03", "Corner Pharmacy", 18.99),
        receiptPath: "",
        notes: "",
        source: "manual",
      },
      ledgerPath: ledger.partitionPath("2024"),
    });
    const partition = await ledger.load("2024");
    expect(partition.rows[0].record).toEqual(result.record);
  });

  it("should not record the same expense twice unless forced", async () => {
    const input = { date: "2024-02-03", provider: "Corner Pharmacy", amount: 18.99 };
    await addManualExpense(ledger, input);

    const duplicate = await addManualExpense(ledger, { ...input, provider: "Someone Else" });
    expect(duplicate.status).toBe("duplicate");
    if (duplicate.status === "duplicate") {
      expect(duplicate.duplicateOf).toEqual({ year: "2024", row: 2 });
    }

    const forced = await addManualExpense(ledger, input, { force: true });
    expect(forced.status).toBe("recorded");
    expect((await ledger.load("2024")).rows).toHaveLength(2);
  });

  it("should let a different provider through under the provider policy", async () => {
    await addManualExpense(ledger, { date: "2024-02-03", provider: "Corner Pharmacy", amount: 5 });

    const result = await addManualExpense(
      ledger,
      { date: "2024-02-03", provider: "Main St Clinic", amount: 5 },
      { duplicatePolicy: "date-amount-provider" }
    );

    expect(result.status).toBe("recorded");
  });

  it("should reject invalid input with field details", async () => {
    const attempt = addManualExpense(ledger, {
      date: "2024-02-30",
      provider: "",
      amount: -3,
    });

    await expect(attempt).rejects.toBeInstanceOf(InvalidExpenseError);
    await expect(attempt).rejects.toMatchObject({
      details: [
        "date: Date must be a valid YYYY-MM-DD date",
        expect.stringMatching(/^provider: /),
        expect.stringMatching(/^amount: /),
      ],
    });
    expect(await ledger.listYears()).toEqual([]);
  });
});
