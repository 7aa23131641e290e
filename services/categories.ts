import { promises as fs } from "node:fs";
import { z } from "zod";
import {
  isExpenseCategory,
  type CategoryDefinition,
  type ExpenseCategory,
} from "./shared-types";

export const categoriesFileSchema = z.object({
  categories: z.array(
    z.object({
      name: z.string().nonempty(),
      keywords: z.array(z.string()),
    })
  ),
});

export async function loadCategories(filePath: string): Promise<CategoryDefinition[]> {
  const raw = await fs.readFile(filePath, "utf8");
  return categoriesFileSchema.parse(JSON.parse(raw)).categories;
}

/**
 * First configured category, in file order, with a keyword contained in the
 * text. Names outside the ledger's categories are ignored.
 */
export function classifyByKeywords(
  text: string,
  categories: CategoryDefinition[]
): ExpenseCategory | null {
  const haystack = text.toLowerCase();

  for (const { name, keywords } of categories) {
    if (!isExpenseCategory(name)) {
      continue;
    }
    const hit = keywords
      .map((k) => k.trim().toLowerCase())
      .some((k) => k.length > 0 && haystack.includes(k));
    if (hit) {
      return name;
    }
  }

  return null;
}
