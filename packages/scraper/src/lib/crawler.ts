import * as cheerio from "cheerio";
import { setTimeout as delay } from "node:timers/promises";
import { CRAWL_DELAY_MS, DEFAULT_MAX_PAGES } from "../config/sources";
import { RobotsDisallowedError, SourceConfigError, errorMessage } from "./errors";
import { fetchHtml } from "./fetcher";
import { Mutex } from "./mutex";
import { normalizeWhitespace } from "./normalize";
import { loadRobotsPolicy } from "./robots";
import type { RobotsPolicy } from "./robots";
import type { RawEvent, SelectorConfig, SourceConfig } from "./types";
import { getHostname, parseHttpUrl, resolveUrl, stripFragment } from "./url";

export type CrawlOptions = {
  signal?: AbortSignal;
  /** Minimum gap between two page fetches on the crawled domain. */
  delayMs?: number;
};

type ParsedPage = {
  events: RawEvent[];
  nextUrl: string | null;
};

/** Pulls listing items and the pagination target out of one fetched page. */
export const parseListingPage = (html: string, pageUrl: string, selectors: SelectorConfig): ParsedPage => {
  const $ = cheerio.load(html);
  const events: RawEvent[] = [];

  if (selectors.eventList) {
    $(selectors.eventList).each((_, element) => {
      const item = $(element);
      const childText = (selector?: string) =>
        selector ? normalizeWhitespace(item.find(selector).text()) : "";
      const childAttr = (selector: string | undefined, attr: string) =>
        selector ? (item.find(selector).first().attr(attr) ?? "").trim() : "";
      const childDate = (selector?: string) => childAttr(selector, "datetime") || childText(selector);

      events.push({
        name: childText(selectors.name),
        startDate: childDate(selectors.startDate),
        endDate: childDate(selectors.endDate),
        location: childText(selectors.location),
        description: childText(selectors.description),
        url: resolveUrl(childAttr(selectors.url, "href"), pageUrl) ?? "",
        image: resolveUrl(childAttr(selectors.image, "src"), pageUrl) ?? "",
      });
    });
  }

  let nextUrl: string | null = null;
  if (selectors.pagination) {
    const link = $(selectors.pagination).first();
    const href = (link.attr("href") || link.find("a").first().attr("href"))?.trim();
    // Fragment-only links point back at the current page.
    const resolved = href && !href.startsWith("#") ? resolveUrl(href, pageUrl) : null;
    nextUrl = resolved ? stripFragment(resolved) : null;
  }

  return { events, nextUrl };
};

/**
 * State for one Tier 1 crawl. Owns its accumulator, visited set and page
 * counter behind a single mutex; a new session is built for every crawl and
 * dropped when it finishes.
 */
export class CrawlSession {
  private readonly results: RawEvent[] = [];
  private readonly visited = new Set<string>();
  private readonly pending = new Set<Promise<void>>();
  private readonly mutex = new Mutex();
  private readonly signal: AbortSignal | undefined;
  private readonly delayMs: number;
  private readonly maxPages: number;
  private readonly selectors: SelectorConfig;
  private allowedDomain = "";
  private robots: RobotsPolicy | null = null;
  private pagesSeen = 0;
  private nextFetchAt = 0;

  constructor(
    private readonly source: SourceConfig,
    options: CrawlOptions = {},
  ) {
    if (!source.selectors?.eventList?.trim()) {
      throw new SourceConfigError(`source ${source.name}: selectors.event_list is required for tier 1`);
    }
    this.selectors = source.selectors;
    this.signal = options.signal;
    this.delayMs = options.delayMs ?? CRAWL_DELAY_MS;
    this.maxPages = source.maxPages > 0 ? source.maxPages : DEFAULT_MAX_PAGES;
  }

  get pageCount() {
    return this.pagesSeen;
  }

  private get cancelled() {
    return this.signal?.aborted ?? false;
  }

  async run(): Promise<RawEvent[]> {
    if (this.cancelled) {
      return [];
    }

    const seed = parseHttpUrl(this.source.url);
    if (!seed) {
      throw new SourceConfigError(`source ${this.source.name}: invalid URL "${this.source.url}"`);
    }
    this.allowedDomain = seed.hostname.toLowerCase();

    try {
      // Unlike a single-page fetch, a crawl does not proceed without a readable policy.
      this.robots = await loadRobotsPolicy(seed, { signal: this.signal });
      await this.visit(stripFragment(seed.toString()), true);
    } catch (error) {
      if (this.cancelled) {
        return this.snapshot();
      }
      throw error;
    }

    await this.drain();
    return this.snapshot();
  }

  private snapshot() {
    return [...this.results];
  }

  private async drain() {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private schedule(url: string) {
    const task = this.visit(url, false).catch((error: unknown) => {
      if (!this.cancelled) {
        console.warn(`[crawl] ${this.source.name}: request error for ${url}:`, errorMessage(error));
      }
    });
    this.pending.add(task);
    void task.finally(() => this.pending.delete(task));
  }

  private async visit(url: string, isSeed: boolean) {
    if (getHostname(url) !== this.allowedDomain) {
      return;
    }
    if (this.robots && !this.robots.isAllowed(url)) {
      if (isSeed) {
        throw new RobotsDisallowedError(url);
      }
      console.warn(`[crawl] ${this.source.name}: robots.txt disallows ${url}`);
      return;
    }

    const page = await this.mutex.runExclusive(() => {
      if (this.visited.has(url)) {
        return null;
      }
      this.visited.add(url);
      this.pagesSeen += 1;
      if (this.pagesSeen > this.maxPages) {
        return null;
      }
      const now = Date.now();
      const startAt = Math.max(now, this.nextFetchAt);
      this.nextFetchAt = startAt + this.delayMs;
      return { number: this.pagesSeen, wait: startAt - now };
    });
    if (!page || this.cancelled) {
      return;
    }

    if (page.wait > 0) {
      await delay(page.wait, undefined, { signal: this.signal });
    }
    console.log(`[crawl] ${this.source.name}: visiting page ${page.number}: ${url}`);
    const html = await fetchHtml(url, { signal: this.signal });
    await this.onPage(html, url);
  }

  private async onPage(html: string, url: string) {
    const { events, nextUrl } = parseListingPage(html, url, this.selectors);

    await Promise.all(events.map((event) => this.collect(event)));

    if (!nextUrl || this.cancelled) {
      return;
    }
    const canQueue = await this.mutex.runExclusive(
      () => this.pagesSeen < this.maxPages && !this.visited.has(nextUrl),
    );
    if (canQueue) {
      this.schedule(nextUrl);
    }
  }

  private async collect(event: RawEvent) {
    if (this.cancelled || !event.name) {
      return;
    }
    await this.mutex.runExclusive(() => {
      this.results.push(event);
    });
  }
}

/**
 * Crawls `source.url` and its pagination successors on the same host, applying
 * the source's selectors to every page. Blocks until every queued page has
 * been handled. A cancelled signal ends the crawl quietly with whatever was
 * collected.
 */
export const scrapeWithSelectors = (source: SourceConfig, options: CrawlOptions = {}) =>
  new CrawlSession(source, options).run();
