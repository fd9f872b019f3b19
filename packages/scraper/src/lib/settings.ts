import { dirname, resolve } from "path";
import { fileURLToPath } from "url";
import { CRAWL_DELAY_MS, DEFAULT_SOURCES_DIR } from "../config/sources";

const coercePositiveInt = (value: string | undefined) => {
  if (!value) {
    return null;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return null;
  }
  return Math.floor(parsed);
};

const coerceNonNegativeInt = (value: string | undefined) => {
  if (value === "0") {
    return 0;
  }
  return coercePositiveInt(value);
};

export const getIngestBaseUrl = (): string =>
  (process.env.INGEST_BASE_URL ?? "http://localhost:8080").replace(/\/+$/, "");

export const getIngestApiKey = (): string | null => process.env.INGEST_API_KEY || null;

export const isDryRun = (): boolean => process.env.SCRAPE_DRY_RUN === "1";

export const getScrapeLimit = (): number => coercePositiveInt(process.env.SCRAPE_LIMIT) ?? 0;

const getDefaultSourcesDir = () => {
  const currentDir = dirname(fileURLToPath(import.meta.url));
  return resolve(currentDir, "..", "..", DEFAULT_SOURCES_DIR);
};

export const getSourcesDir = (): string => process.env.SCRAPE_SOURCES_DIR || getDefaultSourcesDir();

export const getCrawlDelayMs = (): number =>
  coerceNonNegativeInt(process.env.SCRAPE_RATE_LIMIT_MS) ?? CRAWL_DELAY_MS;

export const getReportPath = (): string | null => process.env.SCRAPE_REPORT_PATH || null;

export const getDatabaseUrl = (): string | null => process.env.DATABASE_URL || null;

export const parseLimit = (value: string | undefined): number => coercePositiveInt(value) ?? 0;
