import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== "" ? v.trim() : undefined));

const envSchema = z.object({
  DB_PATH: z.string().default("storage/search.db"),
  SEARCH_INDEX_NAME: z.string().default("invoices"),
  INVOICES_DIR: z.string().default("invoices"),
  EXTRACTION_OUTPUT: z.string().default("invoices/extraction_invoices.jsonl"),
  BATCH_LIMIT: z.coerce.number().int().min(0).default(5),
  EXTRACT_CONCURRENCY: z.coerce.number().int().min(1).default(2),
  CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.5),
  TOP_K: z.coerce.number().int().default(3),
  CONTEXT_CHAR_BUDGET: z.coerce.number().int().positive().default(2000),

  GENERATION_PROVIDER: z.enum(["openai", "azure", "gemini"]).default("azure"),
  OPENAI_ENDPOINT: optionalString,
  OPENAI_KEY: optionalString,
  OPENAI_DEPLOYMENT: optionalString,
  OPENAI_API_VERSION: z.string().default("2024-08-01-preview"),
  OPENAI_TOKEN_PARAMETER: z.enum(["max_tokens", "max_completion_tokens"]).default("max_completion_tokens"),
  GEMINI_API_KEY: optionalString,
  GEMINI_MODEL: z.string().default("gemini-2.5-flash"),
  MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(800),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  GROUNDING_POLICY: z.enum(["reject", "strip"]).default("reject"),

  DOC_INTEL_ENDPOINT: optionalString,
  DOC_INTEL_KEY: optionalString,
});

export type AppConfig = z.infer<typeof envSchema>;

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}

export function loadConfig(): AppConfig {
  dotenv.config();
  return parseConfig(process.env);
}

export function requireSetting(value: string | undefined, name: string): string {
  if (!value) throw new ConfigError(`${name} is not set`);
  return value;
}
