import { DEFAULT_MAX_PAGES, DEFAULT_TRUST_LEVEL } from "../config/sources";
import { NoopRunTracker } from "../repo/noop";
import type { RunCounts, RunTracker, SourceRegistry } from "../repo/types";
import { scrapeWithSelectors } from "./crawler";
import { errorMessage, toError } from "./errors";
import type { IngestClient } from "./ingest";
import { fetchAndExtractJsonLd } from "./jsonld";
import { normalizeJsonLdEvent, normalizeRawEvent } from "./normalize";
import { getSourcesDir } from "./settings";
import { loadSourceConfigs } from "./source-config";
import type { EventInput, ScrapeOptions, ScrapeResult, SourceConfig } from "./types";
import { parseHttpUrl } from "./url";

export type ScraperDeps = {
  tracker?: RunTracker;
  registry?: SourceRegistry | null;
  /** Per-domain politeness delay for Tier 1 crawls. */
  crawlDelayMs?: number;
};

type FetchOutcome = {
  eventsFound: number;
  events: EventInput[];
};

const countsOf = (result: ScrapeResult): RunCounts => ({
  eventsFound: result.eventsFound,
  eventsCreated: result.eventsCreated,
  eventsDuplicate: result.eventsDuplicate,
  eventsFailed: result.eventsFailed,
});

const emptyResult = (source: SourceConfig, dryRun: boolean): ScrapeResult => ({
  sourceName: source.name,
  sourceUrl: source.url,
  tier: source.tier,
  eventsFound: 0,
  eventsSubmitted: 0,
  eventsCreated: 0,
  eventsDuplicate: 0,
  eventsFailed: 0,
  error: null,
  dryRun,
});

/**
 * Normalizes up to `limit` raw records (0 = all). Records that fail are
 * skipped and counted, never fatal.
 */
const normalizeAll = <T>(
  raw: T[],
  limit: number,
  source: SourceConfig,
  normalize: (record: T, source: SourceConfig) => EventInput,
): EventInput[] => {
  const toProcess = limit > 0 ? raw.slice(0, limit) : raw;
  const events: EventInput[] = [];
  let skipped = 0;

  for (const record of toProcess) {
    try {
      events.push(normalize(record, source));
    } catch (error) {
      skipped += 1;
      console.warn(`[scrape] ${source.name}: skipping event:`, errorMessage(error));
    }
  }

  if (skipped > 0) {
    console.warn(`[scrape] ${source.name}: ${skipped} events skipped during normalization`);
  }
  return events;
};

/** Source used for a one-off page scrape: named after its host, Tier 0. */
export const adHocSource = (url: URL, rawUrl: string): SourceConfig => ({
  name: url.hostname,
  url: rawUrl,
  tier: 0,
  schedule: "manual",
  trustLevel: DEFAULT_TRUST_LEVEL,
  license: "",
  enabled: true,
  maxPages: DEFAULT_MAX_PAGES,
});

export class Scraper {
  private readonly tracker: RunTracker;
  private readonly registry: SourceRegistry | null;
  private readonly crawlDelayMs: number | undefined;

  constructor(
    private readonly ingest: IngestClient,
    deps: ScraperDeps = {},
  ) {
    this.tracker = deps.tracker ?? new NoopRunTracker();
    this.registry = deps.registry ?? null;
    this.crawlDelayMs = deps.crawlDelayMs;
  }

  /** Scrapes one page as Tier 0. An unparsable URL comes back as a failed result. */
  async scrapeUrl(rawUrl: string, options: ScrapeOptions = {}): Promise<ScrapeResult> {
    const parsed = parseHttpUrl(rawUrl);
    if (!parsed) {
      return {
        sourceName: "",
        sourceUrl: rawUrl,
        tier: 0,
        eventsFound: 0,
        eventsSubmitted: 0,
        eventsCreated: 0,
        eventsDuplicate: 0,
        eventsFailed: 0,
        error: new Error(`invalid URL "${rawUrl}": missing scheme or host`),
        dryRun: options.dryRun ?? false,
      };
    }
    return this.runSource(adHocSource(parsed, rawUrl), options);
  }

  /**
   * Scrapes the source whose name matches case-insensitively. An unknown or
   * disabled source rejects instead of producing a result.
   */
  async scrapeSource(name: string, options: ScrapeOptions = {}): Promise<ScrapeResult> {
    const sources = await this.loadSources(options);
    const wanted = name.toLowerCase();
    const source = sources.find((item) => item.name.toLowerCase() === wanted);
    if (!source) {
      throw new Error(`source not found: ${name}`);
    }
    if (!source.enabled) {
      throw new Error(`source is disabled: ${name}`);
    }
    return this.runSource(source, options);
  }

  /**
   * Scrapes every enabled source one after another. A failing source only
   * sets the error on its own result; an aborted signal stops before the next
   * source starts.
   */
  async scrapeAll(options: ScrapeOptions = {}): Promise<ScrapeResult[]> {
    const sources = await this.loadSources(options);
    const results: ScrapeResult[] = [];

    for (const source of sources) {
      if (options.signal?.aborted) {
        console.warn("[scrape] run cancelled; skipping remaining sources");
        break;
      }
      if (!source.enabled) {
        continue;
      }
      results.push(await this.runSource(source, options));
    }

    return results;
  }

  listSources(options: ScrapeOptions = {}): Promise<SourceConfig[]> {
    return this.loadSources(options);
  }

  /** Registry first; YAML files when it is absent, fails, or has nothing usable. */
  private async loadSources(options: ScrapeOptions): Promise<SourceConfig[]> {
    if (this.registry) {
      try {
        const sources = await this.registry.listEnabled();
        if (sources.length) {
          return sources;
        }
        console.warn("[scrape] source registry returned no sources; falling back to YAML");
      } catch (error) {
        console.warn("[scrape] source registry failed; falling back to YAML:", errorMessage(error));
      }
    }

    const { sources, error } = loadSourceConfigs(options.sourcesDir ?? getSourcesDir());
    if (error) {
      throw error;
    }
    return sources;
  }

  private runSource(source: SourceConfig, options: ScrapeOptions): Promise<ScrapeResult> {
    const limit = options.limit ?? 0;
    const fetchEvents =
      source.tier === 1
        ? async (): Promise<FetchOutcome> => {
            const raw = await scrapeWithSelectors(source, {
              signal: options.signal,
              delayMs: this.crawlDelayMs,
            });
            return { eventsFound: raw.length, events: normalizeAll(raw, limit, source, normalizeRawEvent) };
          }
        : async (): Promise<FetchOutcome> => {
            const raw = await fetchAndExtractJsonLd(source.url, { signal: options.signal });
            return { eventsFound: raw.length, events: normalizeAll(raw, limit, source, normalizeJsonLdEvent) };
          };

    return this.runWithTracking(source, options, fetchEvents);
  }

  /** fetch, normalize, submit, record. Bookkeeping failures never change the result. */
  private async runWithTracking(
    source: SourceConfig,
    options: ScrapeOptions,
    fetchEvents: () => Promise<FetchOutcome>,
  ): Promise<ScrapeResult> {
    const dryRun = options.dryRun ?? false;
    const result = emptyResult(source, dryRun);
    console.log(`[scrape] ${source.name}: starting tier ${source.tier} scrape of ${source.url}${dryRun ? " (dry run)" : ""}`);

    const runId = await this.track("start run", () => this.tracker.start(source));

    let outcome: FetchOutcome;
    try {
      outcome = await fetchEvents();
    } catch (error) {
      return this.fail(result, runId ?? null, error);
    }

    result.eventsFound = outcome.eventsFound;
    result.eventsSubmitted = outcome.events.length;

    if (outcome.events.length) {
      try {
        const ingest = await this.ingest.submit(outcome.events, dryRun, options.signal);
        result.eventsCreated = ingest.eventsCreated;
        result.eventsDuplicate = ingest.eventsDuplicate;
        result.eventsFailed = ingest.eventsFailed;
      } catch (error) {
        return this.fail(result, runId ?? null, error);
      }
    }

    await this.track("complete run", () => this.tracker.complete(runId ?? null, countsOf(result)));
    if (!dryRun && this.registry) {
      const registry = this.registry;
      await this.track("mark last scraped", () => registry.markLastScraped(source.name, new Date()));
    }

    console.log(
      `[scrape] ${source.name}: found=${result.eventsFound} submitted=${result.eventsSubmitted} created=${result.eventsCreated} duplicate=${result.eventsDuplicate} failed=${result.eventsFailed}`,
    );
    return result;
  }

  private async fail(result: ScrapeResult, runId: string | null, error: unknown): Promise<ScrapeResult> {
    result.error = toError(error);
    console.warn(`[scrape] ${result.sourceName}: failed:`, result.error.message);
    await this.track("fail run", () => this.tracker.fail(runId, countsOf(result), result.error?.message ?? ""));
    return result;
  }

  private async track<T>(action: string, fn: () => Promise<T>): Promise<T | undefined> {
    try {
      return await fn();
    } catch (error) {
      console.warn(`[tracker] failed to ${action}:`, errorMessage(error));
      return undefined;
    }
  }
}
