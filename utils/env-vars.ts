import { z } from "zod";

const booleanFlag = z.preprocess(
  (val) => `${val}`.toLowerCase() === "true",
  z.boolean()
);

const envScheme = z.object({
  NODE_ENV: z.string().optional(),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).optional(),
  // Checked when the Gemini extractor is built, so tools that never call it
  // (validation, reports) run without a key
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().nonempty().default("gemini-2.0-flash"),
  APP_PORT: z
    .string()
    .optional()
    .transform((str) => (str && parseInt(str)) || 3000),
  APP_API_KEY: z.string().optional(),
  APP_API_SECRET: z.string().optional(),
  MAX_FILE_SIZE: z
    .string()
    .optional()
    // Default file size is 5MB
    .transform((str) => (str && parseInt(str)) || 5242880),
  LEDGER_ROOT: z.string().nonempty().default(process.cwd()),
  DATA_DIRECTORY: z.string().nonempty().default("data"),
  RECEIPTS_DIRECTORY: z.string().nonempty().default("receipts"),
  INCOMING_DIRECTORY: z.string().nonempty().default("incoming"),
  PROCESSED_DIRECTORY: z.string().optional(),
  DELETE_AFTER_PROCESSING: booleanFlag,
  DUPLICATE_MATCH_PROVIDER: booleanFlag,
  CATEGORIES_FILE: z.string().nonempty().default("config/categories.json"),
  PDFTOPPM_PATH: z.string().nonempty().default("pdftoppm"),
});

export type Env = z.infer<typeof envScheme>;

const env = envScheme.parse(process.env);

export default env;
