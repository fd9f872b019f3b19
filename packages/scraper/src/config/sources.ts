import type { Schedule } from "../lib/types";

export const USER_AGENT =
  "EventHarvest-Scraper/0.1 (+https://github.com/event-harvest/event-harvest; scraper@event-harvest.dev)";

export const DEFAULT_SOURCES_DIR = "configs/sources";
export const SOURCE_FILE_EXTENSION = ".yaml";

export const DEFAULT_TIER = 0;
export const DEFAULT_TRUST_LEVEL = 5;
export const DEFAULT_MAX_PAGES = 10;
export const DEFAULT_SCHEDULE: Schedule = "manual";
export const SCHEDULES: readonly Schedule[] = ["daily", "weekly", "manual"];

export const PAGE_FETCH_TIMEOUT_MS = 30_000;
export const ROBOTS_FETCH_TIMEOUT_MS = 10_000;
export const MAX_BODY_BYTES = 10 * 1024 * 1024;

export const CRAWL_DELAY_MS = 1_000;

export const INGEST_BATCH_PATH = "/api/v1/events:batch";
export const INGEST_CHUNK_SIZE = 100;
export const INGEST_TIMEOUT_MS = 30_000;
export const DRY_RUN_BATCH_ID = "dry-run";

export const SCHEMA_ORG_PREFIXES = ["https://schema.org/", "http://schema.org/"];
export const EVENT_TYPES = new Set(["Event", "EventSeries"]);
