import { randomUUID } from "crypto";
import type { SourceConfig } from "../lib/types";
import type { RunCounts, RunRecord, RunTracker, SourceRegistry, UpsertSourceResult } from "./types";

export class MemoryRunTracker implements RunTracker {
  runs: RunRecord[] = [];

  async start(source: SourceConfig): Promise<string | null> {
    const record: RunRecord = {
      id: randomUUID(),
      sourceName: source.name,
      sourceUrl: source.url,
      tier: source.tier,
      status: "running",
      eventsFound: 0,
      eventsCreated: 0,
      eventsDuplicate: 0,
      eventsFailed: 0,
      errorMessage: null,
      startedAt: new Date(),
      completedAt: null,
    };
    this.runs.push(record);
    return record.id;
  }

  async complete(runId: string | null, counts: RunCounts): Promise<void> {
    this.finish(runId, "completed", counts, null);
  }

  async fail(runId: string | null, counts: RunCounts, message: string): Promise<void> {
    this.finish(runId, "failed", counts, message);
  }

  private finish(
    runId: string | null,
    status: RunRecord["status"],
    counts: RunCounts,
    errorMessage: string | null,
  ) {
    const existing = this.runs.find((run) => run.id === runId);
    if (!existing) {
      return;
    }
    Object.assign(existing, counts, { status, errorMessage, completedAt: new Date() });
  }
}

export type MemorySource = {
  config: SourceConfig;
  lastScrapedAt: Date | null;
  updatedAt: Date;
};

export class MemorySourceRegistry implements SourceRegistry {
  sources: MemorySource[] = [];

  constructor(initial: SourceConfig[] = []) {
    const now = new Date();
    this.sources = initial.map((config) => ({ config, lastScrapedAt: null, updatedAt: now }));
  }

  async listEnabled(): Promise<SourceConfig[]> {
    return this.sources
      .filter((source) => source.config.enabled)
      .map((source) => source.config)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async upsert(config: SourceConfig): Promise<UpsertSourceResult> {
    const existing = this.sources.find((source) => source.config.name === config.name);
    if (existing) {
      existing.config = config;
      existing.updatedAt = new Date();
      return { name: config.name, created: false };
    }
    this.sources.push({ config, lastScrapedAt: null, updatedAt: new Date() });
    return { name: config.name, created: true };
  }

  async markLastScraped(name: string, at: Date): Promise<void> {
    const existing = this.sources.find((source) => source.config.name === name);
    if (existing) {
      existing.lastScrapedAt = at;
    }
  }
}
