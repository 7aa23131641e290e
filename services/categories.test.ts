import path from "node:path";
import { classifyByKeywords, loadCategories } from "./categories";

const CONFIG_FILE = path.join(__dirname, "..", "config", "categories.json");

describe("categories", () => {
  it("should load the shipped configuration", async () => {
    const categories = await loadCategories(CONFIG_FILE);

    expect(categories.map((c) => c.name)).toEqual([
      "Dental",
      "Vision",
      "Prescription",
      "Mental Health",
      "Medical",
    ]);
  });

  it("should classify providers by keyword", async () => {
    const categories = await loadCategories(CONFIG_FILE);

    expect(classifyByKeywords("Bright Smile Dental", categories)).toBe("Dental");
    expect(classifyByKeywords("CVS Pharmacy", categories)).toBe("Prescription");
    expect(classifyByKeywords("Corner Bakery", categories)).toBeNull();
  });

  it("should take the first matching category in file order", () => {
    expect(
      classifyByKeywords("Eye Clinic", [
        { name: "Vision", keywords: ["eye"] },
        { name: "Medical", keywords: ["clinic"] },
      ])
    ).toBe("Vision");
  });

  it("should skip names the ledger does not know", () => {
    expect(
      classifyByKeywords("Spa Day", [
        { name: "Wellness", keywords: ["spa"] },
        { name: "Other", keywords: ["spa"] },
      ])
    ).toBe("Other");
  });
});
