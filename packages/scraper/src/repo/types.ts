import type { SourceConfig } from "../lib/types";

export type RunCounts = {
  eventsFound: number;
  eventsCreated: number;
  eventsDuplicate: number;
  eventsFailed: number;
};

export type RunRecord = RunCounts & {
  id: string;
  sourceName: string;
  sourceUrl: string;
  tier: number;
  status: "running" | "completed" | "failed";
  errorMessage: string | null;
  startedAt: Date;
  completedAt: Date | null;
};

export type UpsertSourceResult = {
  name: string;
  created: boolean;
};

/**
 * Bookkeeping for scrape runs. `start` returns null when the backend chose not
 * to record the run; `complete` and `fail` then become no-ops for that run.
 */
export interface RunTracker {
  start(source: SourceConfig): Promise<string | null>;
  complete(runId: string | null, counts: RunCounts): Promise<void>;
  fail(runId: string | null, counts: RunCounts, message: string): Promise<void>;
}

/** Persistent catalogue of sources, preferred over YAML files when present. */
export interface SourceRegistry {
  listEnabled(): Promise<SourceConfig[]>;
  upsert(source: SourceConfig): Promise<UpsertSourceResult>;
  markLastScraped(name: string, at: Date): Promise<void>;
}
