import * as dotenv from "dotenv";
import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "./logger";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120 Safari/537.36";

export const SEARCH_PROVIDERS = ["auto", "browser", "serper", "google"] as const;
export type SearchProviderName = (typeof SEARCH_PROVIDERS)[number];

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join("\n  - ")}`);
    this.name = "ConfigError";
  }
}

const emptyToUndefined = (v: unknown) => (v === "" ? undefined : v);

const optionalString = z.preprocess(emptyToUndefined, z.string().optional());

const int = (min: number, max: number, fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().min(min).max(max).default(fallback));

const bool = (fallback: boolean) =>
  z.preprocess(
    emptyToUndefined,
    z
      .enum(["1", "0", "true", "false", "yes", "no"])
      .default(fallback ? "true" : "false")
      .transform((v) => v === "1" || v === "true" || v === "yes")
  );

const EnvSchema = z.object({
  SEARCH_PROVIDER: z.preprocess(emptyToUndefined, z.enum(SEARCH_PROVIDERS).default("auto")),
  SERPER_API_KEY: optionalString,
  GOOGLE_API_KEY: optionalString,
  GOOGLE_CX: optionalString,
  Google_CX: optionalString,
  SEARCH_RESULT_LIMIT: int(1, 100, 20),
  SEARCH_PAGE_DELAY_MS: int(0, 60_000, 1000),
  EXTRACTION_DELAY_MS: int(0, 60_000, 2000),
  PAGE_TIMEOUT_MS: int(1000, 300_000, 10_000),
  MAX_CONTENT_LENGTH: int(1, 10_000_000, 100_000),
  PREVIEW_LENGTH: int(1, 100_000, 500),
  REPORT_TOP_N: int(1, 100, 5),
  OUTPUT_DIR: z.preprocess(emptyToUndefined, z.string().default(".")),
  HEADLESS: bool(true),
  USER_AGENT: z.preprocess(emptyToUndefined, z.string().default(DEFAULT_USER_AGENT)),
  LOG_LEVEL: z.preprocess(emptyToUndefined, z.enum(LOG_LEVELS).default("info")),
  PORT: int(0, 65_535, 3333),
});

export type Config = {
  searchProvider: SearchProviderName;
  serperApiKey?: string;
  googleApiKey?: string;
  googleCx?: string;
  searchResultLimit: number;
  searchPageDelayMs: number;
  extractionDelayMs: number;
  pageTimeoutMs: number;
  maxContentLength: number;
  previewLength: number;
  reportTopN: number;
  outputDir: string;
  headless: boolean;
  userAgent: string;
  logLevel: LogLevel;
  port: number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }

  const e = parsed.data;
  return {
    searchProvider: e.SEARCH_PROVIDER,
    serperApiKey: e.SERPER_API_KEY,
    googleApiKey: e.GOOGLE_API_KEY,
    googleCx: e.GOOGLE_CX ?? e.Google_CX, // tolerate both
    searchResultLimit: e.SEARCH_RESULT_LIMIT,
    searchPageDelayMs: e.SEARCH_PAGE_DELAY_MS,
    extractionDelayMs: e.EXTRACTION_DELAY_MS,
    pageTimeoutMs: e.PAGE_TIMEOUT_MS,
    maxContentLength: e.MAX_CONTENT_LENGTH,
    previewLength: e.PREVIEW_LENGTH,
    reportTopN: e.REPORT_TOP_N,
    outputDir: e.OUTPUT_DIR,
    headless: e.HEADLESS,
    userAgent: e.USER_AGENT,
    logLevel: e.LOG_LEVEL,
    port: e.PORT,
  };
}

/** Loads `.env` into `process.env` first, then validates it. */
export function loadConfigFromEnv(): Config {
  dotenv.config();
  return loadConfig(process.env);
}
