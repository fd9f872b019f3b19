import * as cheerio from "cheerio";
import { FetchError } from "./errors";
import { fetchPage } from "./fetcher";
import { parseHttpUrl } from "./url";

const TOP_CLASSES = 30;
const PRINTED_CLASSES = 20;
const TOP_DATA_ATTRS = 15;
const MAX_EVENT_LINKS = 20;
const MAX_SAMPLE_CARDS = 8;
const SAMPLE_HTML_LENGTH = 300;

const CARD_TAGS = ["article", "li", "div", "section"];
const CARD_WORDS = ["event", "film", "show", "program", "card", "item", "listing", "performance"];

export type NameCount = {
  name: string;
  count: number;
};

export type SampleCard = {
  selector: string;
  html: string;
};

/** DOM summary used to pick Tier 1 selectors for a new source. */
export type InspectResult = {
  url: string;
  status: number;
  bodyBytes: number;
  topClasses: NameCount[];
  dataAttrs: NameCount[];
  eventLinks: string[];
  sampleCards: SampleCard[];
};

const topN = (counts: Map<string, number>, n: number): NameCount[] =>
  [...counts.entries()]
    .map(([name, count]) => ({ name, count }))
    .sort((a, b) => b.count - a.count || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .slice(0, n);

const increment = (counts: Map<string, number>, key: string) => {
  counts.set(key, (counts.get(key) ?? 0) + 1);
};

const classesOf = (value: string | undefined) => (value ?? "").split(/\s+/).filter(Boolean);

export const inspectHtml = (html: string, url: string, status = 200): InspectResult => {
  const $ = cheerio.load(html);

  const classCounts = new Map<string, number>();
  $("[class]").each((_, element) => {
    for (const name of classesOf($(element).attr("class"))) {
      increment(classCounts, name);
    }
  });

  const dataCounts = new Map<string, number>();
  $("*").each((_, element) => {
    for (const name of Object.keys($(element).attr() ?? {})) {
      if (name.startsWith("data-")) {
        increment(dataCounts, name);
      }
    }
  });

  const eventLinks: string[] = [];
  $("a[href]").each((_, element) => {
    const href = $(element).attr("href") ?? "";
    const lower = href.toLowerCase();
    if ((lower.includes("/event") || lower.includes("/program")) && !eventLinks.includes(href)) {
      eventLinks.push(href);
    }
  });

  const sampleCards: SampleCard[] = [];
  const seenSelectors = new Set<string>();
  for (const tag of CARD_TAGS) {
    $(`${tag}[class]`).each((_, element) => {
      if (sampleCards.length >= MAX_SAMPLE_CARDS) {
        return false;
      }
      const classes = classesOf($(element).attr("class"));
      const lower = classes.join(" ").toLowerCase();
      if (!classes.length || !CARD_WORDS.some((word) => lower.includes(word))) {
        return undefined;
      }
      const selector = `${tag}.${classes[0]}`;
      if (seenSelectors.has(selector)) {
        return undefined;
      }
      seenSelectors.add(selector);
      const outer = $.html(element);
      sampleCards.push({
        selector,
        html: outer.length > SAMPLE_HTML_LENGTH ? `${outer.slice(0, SAMPLE_HTML_LENGTH)}…` : outer,
      });
      return undefined;
    });
    if (sampleCards.length >= MAX_SAMPLE_CARDS) {
      break;
    }
  }

  return {
    url,
    status,
    bodyBytes: Buffer.byteLength(html),
    topClasses: topN(classCounts, TOP_CLASSES),
    dataAttrs: topN(dataCounts, TOP_DATA_ATTRS),
    eventLinks: eventLinks.slice(0, MAX_EVENT_LINKS),
    sampleCards,
  };
};

/** Fetches the page whatever its status and summarizes its markup. */
export const inspectUrl = async (rawUrl: string, options: { signal?: AbortSignal } = {}) => {
  if (!parseHttpUrl(rawUrl)) {
    throw new FetchError(`invalid URL "${rawUrl}": missing scheme or host`, rawUrl);
  }
  const page = await fetchPage(rawUrl, { signal: options.signal });
  return inspectHtml(page.body, rawUrl, page.status);
};

const RULE_WIDTH = 56;
const heading = (title: string) => `── ${title} ${"─".repeat(Math.max(3, RULE_WIDTH - title.length - 4))}`;

const countLine = (entry: NameCount) => `  ${entry.name.padEnd(40)} ${entry.count}`;

export const formatInspectResult = (result: InspectResult): string => {
  const lines = [
    `URL:    ${result.url}`,
    `Status: ${result.status}`,
    `Size:   ${result.bodyBytes} bytes`,
    "",
    heading("Top CSS Classes"),
    ...result.topClasses.slice(0, PRINTED_CLASSES).map(countLine),
  ];

  if (result.dataAttrs.length) {
    lines.push("", heading("data-* Attributes"), ...result.dataAttrs.map(countLine));
  }

  if (result.eventLinks.length) {
    lines.push("", heading("Event/Program hrefs (sample)"), ...result.eventLinks.map((link) => `  ${link}`));
  }

  if (result.sampleCards.length) {
    lines.push("", heading("Candidate Event Containers"));
    for (const card of result.sampleCards) {
      lines.push("", `  selector: ${card.selector}`, `  html:     ${card.html}`);
    }
  }

  return `${lines.join("\n")}\n`;
};
