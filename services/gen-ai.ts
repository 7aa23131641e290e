import {
  GoogleGenerativeAI,
  SchemaType,
  type GenerationConfig,
  type GenerativeModel,
} from "@google/generative-ai";
import { z } from "zod";
import { EXPENSE_CATEGORIES, type ExtractedReceipt } from "./shared-types";
import { parseAmount } from "./ledger/fields";
import { createLogger } from "../utils/logger";

const logger = createLogger("gen-ai");

export interface ExtractionService {
  /** One best-effort read of a receipt image. Null when the answer was unusable. */
  extract(image: Buffer, mimeType: string): Promise<ExtractedReceipt | null>;
}

const SYSTEM_INSTRUCTION = `Please process this medical receipt or explanation of benefits. Extract the date of service (not the billing or statement date) in the format 'YYYY-MM-DD', the healthcare provider's name, and the amount the patient paid or owes. Use the patient responsibility amount, never the billed amount or the amount paid by insurance. Pick a category from: ${EXPENSE_CATEGORIES.join(
  ", "
)}. Provide a very short note describing the service if one is visible. If you cannot determine a field with confidence, return null for that field.`;

const generationConfig: GenerationConfig = {
  temperature: 0.1,
  maxOutputTokens: 1024,
  responseMimeType: "application/json",
  responseSchema: {
    type: SchemaType.OBJECT,
    properties: {
      date: {
        type: SchemaType.STRING,
        description: "Date of service, YYYY-MM-DD",
        nullable: true,
      },
      provider: {
        type: SchemaType.STRING,
        nullable: true,
      },
      amount: {
        type: SchemaType.NUMBER,
        description: "Patient responsibility amount",
        nullable: true,
      },
      category: {
        type: SchemaType.STRING,
        description: `One of: ${EXPENSE_CATEGORIES.join(", ")}`,
        nullable: true,
      },
      notes: {
        type: SchemaType.STRING,
        nullable: true,
      },
    },
    required: ["date", "provider", "amount", "category", "notes"],
  },
};

export const extractedReceiptSchema = z.object({
  date: z.string().nullish(),
  provider: z.string().nullish(),
  amount: z
    .union([z.number(), z.string().transform((s) => parseAmount(s))])
    .nullish(),
  category: z.string().nullish(),
  notes: z.string().nullish(),
});

/** Accepts bare JSON or JSON wrapped in a markdown code block. */
export function parseExtractionResponse(text: string): ExtractedReceipt | null {
  let jsonContent = text.trim();
  const fenced = jsonContent.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
  if (fenced && fenced[1] !== undefined) {
    jsonContent = fenced[1].trim();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonContent);
  } catch (err) {
    logger.error("Failed to parse extraction response:", err, {
      rawContent: text.substring(0, 500),
    });
    return null;
  }

  const result = extractedReceiptSchema.safeParse(parsed);
  if (!result.success) {
    logger.error("Extraction response has an unexpected shape:", result.error.issues);
    return null;
  }
  return result.data;
}

export class GeminiExtractionService implements ExtractionService {
  #model: GenerativeModel;

  constructor(options: { apiKey: string; model: string }) {
    const genAI = new GoogleGenerativeAI(options.apiKey);
    this.#model = genAI.getGenerativeModel({
      model: options.model,
      systemInstruction: SYSTEM_INSTRUCTION,
    });
  }

  async extract(image: Buffer, mimeType: string): Promise<ExtractedReceipt | null> {
    const chatSession = this.#model.startChat({
      generationConfig,
      history: [],
    });

    const result = await chatSession.sendMessage([
      {
        text: "Process this receipt. Only use a category from the listed values.",
      },
      {
        inlineData: {
          data: image.toString("base64"),
          mimeType,
        },
      },
    ]);

    return parseExtractionResponse(result.response.text());
  }
}

export function createGeminiExtractionService(options: {
  apiKey?: string;
  model: string;
}): GeminiExtractionService {
  if (!options.apiKey) {
    throw new Error("GEMINI_API_KEY is not set");
  }
  return new GeminiExtractionService({ apiKey: options.apiKey, model: options.model });
}
