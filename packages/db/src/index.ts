import pg from "pg";
import type { Pool } from "pg";

/**
 * The slice of a pg pool the repositories use. Rows come back untyped and are
 * validated by whoever reads them.
 */
export interface DbClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export type ScraperSourceRow = {
  id: string;
  name: string;
  url: string;
  tier: number;
  schedule: string;
  trust_level: number;
  license: string;
  enabled: boolean;
  max_pages: number;
  event_url_pattern: string | null;
  selectors: unknown;
  notes: string;
  last_scraped_at: Date | null;
  created_at: Date;
  updated_at: Date;
};

let pool: Pool | null = null;

export const getPool = (): Pool => {
  if (pool) {
    return pool;
  }
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error("Missing required env var: DATABASE_URL");
  }
  pool = new pg.Pool({ connectionString, max: 4 });
  return pool;
};

export const getDb = (): DbClient => {
  const current = getPool();
  return { query: (text, values) => current.query(text, values) };
};

export const closePool = async () => {
  if (!pool) {
    return;
  }
  const current = pool;
  pool = null;
  await current.end();
};
