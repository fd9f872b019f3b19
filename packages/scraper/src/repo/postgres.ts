import { getDb } from "@event-harvest/db";
import type { DbClient } from "@event-harvest/db";
import { errorMessage } from "../lib/errors";
import { asRecord } from "../lib/jsonld-values";
import { sourceConfigFromRecord, sourceConfigToRecord } from "../lib/source-config";
import type { SourceConfig } from "../lib/types";
import type { RunCounts, RunTracker, SourceRegistry, UpsertSourceResult } from "./types";

const firstRow = (rows: unknown[]) => asRecord(rows[0]);

const countParams = (counts: RunCounts) => [
  counts.eventsFound,
  counts.eventsCreated,
  counts.eventsDuplicate,
  counts.eventsFailed,
];

export class PgRunTracker implements RunTracker {
  constructor(private readonly db: DbClient = getDb()) {}

  async start(source: SourceConfig): Promise<string | null> {
    const result = await this.db.query(
      `INSERT INTO scraper_runs (source_name, source_url, tier, status)
       VALUES ($1, $2, $3, 'running')
       RETURNING id`,
      [source.name, source.url, source.tier],
    );
    const id = firstRow(result.rows)?.id;
    return typeof id === "string" ? id : null;
  }

  async complete(runId: string | null, counts: RunCounts): Promise<void> {
    if (!runId) {
      return;
    }
    await this.db.query(
      `UPDATE scraper_runs
       SET status = 'completed', events_found = $2, events_new = $3, events_dup = $4,
           events_failed = $5, completed_at = NOW()
       WHERE id = $1`,
      [runId, ...countParams(counts)],
    );
  }

  async fail(runId: string | null, counts: RunCounts, message: string): Promise<void> {
    if (!runId) {
      return;
    }
    await this.db.query(
      `UPDATE scraper_runs
       SET status = 'failed', events_found = $2, events_new = $3, events_dup = $4,
           events_failed = $5, error_message = $6, completed_at = NOW()
       WHERE id = $1`,
      [runId, ...countParams(counts), message],
    );
  }
}

export class PgSourceRegistry implements SourceRegistry {
  constructor(private readonly db: DbClient = getDb()) {}

  async listEnabled(): Promise<SourceConfig[]> {
    const result = await this.db.query(
      `SELECT id, name, url, tier, schedule, trust_level, license, enabled, max_pages,
              event_url_pattern, selectors, notes, last_scraped_at, created_at, updated_at
       FROM scraper_sources
       WHERE enabled = TRUE
       ORDER BY name`,
    );

    const sources: SourceConfig[] = [];
    for (const row of result.rows) {
      try {
        sources.push(sourceConfigFromRecord(row));
      } catch (error) {
        console.warn("[registry] skipping source:", errorMessage(error));
      }
    }
    return sources;
  }

  async upsert(source: SourceConfig): Promise<UpsertSourceResult> {
    const record = sourceConfigToRecord(source);
    const result = await this.db.query(
      `INSERT INTO scraper_sources
         (name, url, tier, schedule, trust_level, license, enabled, max_pages, event_url_pattern, selectors, notes)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
       ON CONFLICT (name) DO UPDATE SET
         url = EXCLUDED.url,
         tier = EXCLUDED.tier,
         schedule = EXCLUDED.schedule,
         trust_level = EXCLUDED.trust_level,
         license = EXCLUDED.license,
         enabled = EXCLUDED.enabled,
         max_pages = EXCLUDED.max_pages,
         event_url_pattern = EXCLUDED.event_url_pattern,
         selectors = EXCLUDED.selectors,
         notes = EXCLUDED.notes,
         updated_at = NOW()
       RETURNING (xmax = 0) AS created`,
      [
        record.name,
        record.url,
        record.tier,
        record.schedule,
        record.trust_level,
        record.license,
        record.enabled,
        record.max_pages,
        record.event_url_pattern,
        record.selectors ? JSON.stringify(record.selectors) : null,
        record.notes,
      ],
    );
    return { name: source.name, created: firstRow(result.rows)?.created === true };
  }

  async markLastScraped(name: string, at: Date): Promise<void> {
    await this.db.query(
      "UPDATE scraper_sources SET last_scraped_at = $2, updated_at = NOW() WHERE name = $1",
      [name, at],
    );
  }
}
