import { promises as fs } from "node:fs";
import path from "node:path";
import {
  LedgerWriteError,
  missingFields,
  processReceipt,
  ReceiptConversionError,
  ReceiptNotFoundError,
  ReceiptParseError,
  resolveCategory,
  UnsupportedReceiptFormatError,
  type IngestionEvent,
  type ReceiptPipeline,
} from "./receipt";
import type { ExpenseRecord, ExtractedReceipt } from "./shared-types";
import { generateReceiptId } from "./identity";
import { LedgerStore } from "./ledger/ledger-store";
import { createTestPipeline, listTree, makeTempDir, removeDir } from "./testing";

const HEADER = "Date,Provider,Amount,Category,Receipt_ID,Receipt_URL,Notes,Source";

class FailingLedgerStore extends LedgerStore {
  async append(_year: string, _record: ExpenseRecord): Promise<string> {
    throw new Error("disk full");
  }
}

describe("processReceipt", () => {
  let root: string;
  let extract: jest.Mock<Promise<ExtractedReceipt | null>, [Buffer, string]>;
  let pipeline: ReceiptPipeline;

  const writeIncoming = async (name: string, content = "receipt bytes") => {
    const filePath = path.join(root, "incoming", name);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
    return filePath;
  };

  const ledgerFiles = () => listTree(path.join(root, "data"));
  const archiveFiles = () => listTree(path.join(root, "receipts"));

  beforeEach(async () => {
    root = await makeTempDir();
    await fs.mkdir(path.join(root, "scratch"));
    extract = jest.fn<Promise<ExtractedReceipt | null>, [Buffer, string]>();
    extract.mockResolvedValue({
      date: "2024-06-01",
      provider: "Acme Clinic",
      amount: 75,
      category: "Medical",
      notes: null,
    });
    pipeline = createTestPipeline(root, { extract }, {
      scratchDirectory: path.join(root, "scratch"),
    });
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it("should archive the receipt and append one ledger row", async () => {
    const filePath = await writeIncoming("scan.jpg");

    const result = await processReceipt(filePath, pipeline);

    const receiptId = generateReceiptId("2024-06-01", "Acme Clinic", 75);
    expect(result).toEqual({
      status: "recorded",
      file: filePath,
      dryRun: false,
      record: {
        date: "2024-06-01",
        provider: "Acme Clinic",
        amount: 75,
        category: "Medical",
        receiptId,
        receiptPath: "receipts/2024/2024-06-01_acme_clinic_75.0.jpg",
        notes: "",
        source: "scan",
      },
      ledgerPath: path.join(root, "data", "hsa_expenses_2024.csv"),
    });
    expect(extract).toHaveBeenCalledWith(Buffer.from("receipt bytes"), "image/jpeg");
    expect(await archiveFiles()).toEqual(["2024/2024-06-01_acme_clinic_75.0.jpg"]);
    expect(
      await fs.readFile(path.join(root, "data", "hsa_expenses_2024.csv"), "utf8")
    ).toBe(
      `${HEADER}\n2024-06-01,Acme Clinic,75.0,Medical,${receiptId},receipts/2024/2024-06-01_acme_clinic_75.0.jpg,,scan\n`
    );
  });

  it("should report a second ingestion of the same receipt as a duplicate", async () => {
    const filePath = await writeIncoming("scan.jpg");
    await processReceipt(filePath, pipeline);
    const ledgerBefore = await fs.readFile(pipeline.ledger.partitionPath("2024"), "utf8");

    const again = await processReceipt(filePath, pipeline);

    expect(again.status).toBe("duplicate");
    if (again.status === "duplicate") {
      expect(again.duplicate).toBe(true);
      expect(again.duplicateOf).toEqual({ year: "2024", row: 2 });
    }
    expect(await fs.readFile(pipeline.ledger.partitionPath("2024"), "utf8")).toBe(ledgerBefore);
    expect(await archiveFiles()).toEqual(["2024/2024-06-01_acme_clinic_75.0.jpg"]);
  });

  it("should stop without side effects when the amount is missing", async () => {
    extract.mockResolvedValue({ date: "2024-06-01", provider: "Acme Clinic", amount: null });
    const filePath = await writeIncoming("scan.png");

    const result = await processReceipt(filePath, pipeline);

    expect(result.status).toBe("incomplete");
    if (result.status === "incomplete") {
      expect(result.missing).toEqual(["amount"]);
    }
    expect(await ledgerFiles()).toEqual([]);
    expect(await archiveFiles()).toEqual([]);
  });

  it("should treat an unreadable date as missing", async () => {
    extract.mockResolvedValue({ date: "06/01/2024", provider: "Acme Clinic", amount: 75 });
    const filePath = await writeIncoming("scan.png");

    const result = await processReceipt(filePath, pipeline);

    expect(result.status).toBe("incomplete");
    if (result.status === "incomplete") {
      expect(result.missing).toEqual(["date"]);
    }
  });

  it("should change nothing on a dry run", async () => {
    const filePath = await writeIncoming("scan.jpg");

    const result = await processReceipt(filePath, pipeline, { dryRun: true });

    expect(result.status).toBe("recorded");
    if (result.status === "recorded") {
      expect(result.dryRun).toBe(true);
      expect(result.record.receiptPath).toBe("receipts/2024/2024-06-01_acme_clinic_75.0.jpg");
      expect(result.ledgerPath).toBe(path.join(root, "data", "hsa_expenses_2024.csv"));
    }
    expect(await ledgerFiles()).toEqual([]);
    expect(await archiveFiles()).toEqual([]);
  });

  it("should classify by keywords when the extracted category is unknown", async () => {
    extract.mockResolvedValue({
      date: "2024-06-01",
      provider: "Bright Smile Dental",
      amount: 120,
      category: "Teeth stuff",
    });
    pipeline.categories = [{ name: "Dental", keywords: ["dental"] }];
    const filePath = await writeIncoming("scan.jpg");

    const result = await processReceipt(filePath, pipeline);

    expect(result.status === "recorded" && result.record.category).toBe("Dental");
  });

  it("should rasterize documents into scratch space and archive the original", async () => {
    const rasterize = jest.fn(async (_documentPath: string, outputDirectory: string) => {
      const imagePath = path.join(outputDirectory, "page.png");
      await fs.writeFile(imagePath, "rendered page");
      return imagePath;
    });
    pipeline.rasterizer = { rasterize };
    const filePath = await writeIncoming("statement.PDF", "%PDF-1.4");

    const result = await processReceipt(filePath, pipeline);

    expect(rasterize).toHaveBeenCalledTimes(1);
    expect(extract).toHaveBeenCalledWith(Buffer.from("rendered page"), "image/png");
    expect(result.status === "recorded" && result.record.receiptPath).toBe(
      "receipts/2024/2024-06-01_acme_clinic_75.0.PDF"
    );
    expect(await listTree(path.join(root, "scratch"))).toEqual([]);
  });

  it("should fail with a conversion error and clean up scratch space", async () => {
    const filePath = await writeIncoming("statement.pdf", "%PDF-1.4");

    await expect(processReceipt(filePath, pipeline)).rejects.toBeInstanceOf(
      ReceiptConversionError
    );
    expect(extract).not.toHaveBeenCalled();
    expect(await fs.readdir(path.join(root, "scratch"))).toEqual([]);
  });

  it("should fail with a parse error when extraction throws or returns nothing", async () => {
    const filePath = await writeIncoming("scan.jpg");

    extract.mockRejectedValueOnce(new Error("quota exceeded"));
    await expect(processReceipt(filePath, pipeline)).rejects.toBeInstanceOf(ReceiptParseError);

    extract.mockResolvedValueOnce(null);
    await expect(processReceipt(filePath, pipeline)).rejects.toBeInstanceOf(ReceiptParseError);

    expect(await ledgerFiles()).toEqual([]);
  });

  it("should reject missing files and unsupported formats before extracting", async () => {
    const textFile = await writeIncoming("notes.txt");

    await expect(
      processReceipt(path.join(root, "incoming", "missing.jpg"), pipeline)
    ).rejects.toBeInstanceOf(ReceiptNotFoundError);
    await expect(processReceipt(textFile, pipeline)).rejects.toThrow(
      new UnsupportedReceiptFormatError(".txt")
    );
    expect(extract).not.toHaveBeenCalled();
  });

  it("should remove the archived copy when the ledger append fails", async () => {
    pipeline.ledger = new FailingLedgerStore({ directory: path.join(root, "data") });
    const filePath = await writeIncoming("scan.jpg");

    await expect(processReceipt(filePath, pipeline)).rejects.toBeInstanceOf(LedgerWriteError);
    expect(await archiveFiles()).toEqual([]);
    expect(await fs.readFile(filePath, "utf8")).toBe("receipt bytes");
  });

  it("should report progress in order", async () => {
    const events: IngestionEvent[] = [];
    const filePath = await writeIncoming("scan.jpg");

    await processReceipt(filePath, pipeline, {
      onProgress: (event) => {
        events.push(event);
      },
    });

    expect(events).toEqual([
      "received",
      "extracting",
      "extracted",
      "ready",
      "archived",
      "recorded",
    ]);
  });
});

describe("missingFields", () => {
  it("should accept a complete extraction", () => {
    expect(missingFields({ date: "2024-06-01", amount: 0 })).toEqual([]);
  });

  it("should list both fields when neither is usable", () => {
    expect(missingFields({ date: "2024-13-01", amount: -1 })).toEqual(["date", "amount"]);
  });
});

describe("resolveCategory", () => {
  it("should match category names case-insensitively", () => {
    expect(resolveCategory(" mental health ", "", [])).toBe("Mental Health");
  });

  it("should fall back to Other", () => {
    expect(resolveCategory(null, "Corner Store", [])).toBe("Other");
  });
});
