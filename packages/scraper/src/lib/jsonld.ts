import * as cheerio from "cheerio";
import { EVENT_TYPES, SCHEMA_ORG_PREFIXES } from "../config/sources";
import { FetchError, RobotsDisallowedError, errorMessage } from "./errors";
import { fetchHtml } from "./fetcher";
import { asRecord } from "./jsonld-values";
import { checkRobots } from "./robots";
import type { JsonLdNode } from "./types";
import { parseHttpUrl } from "./url";

export const stripSchemaPrefix = (value: string) => {
  for (const prefix of SCHEMA_ORG_PREFIXES) {
    if (value.startsWith(prefix)) {
      return value.slice(prefix.length);
    }
  }
  return value;
};

/** Reads `@type` as a single string; arrays contribute their first element. */
export const jsonLdTypeString = (value: unknown): string => {
  const raw = Array.isArray(value) ? value[0] : value;
  return typeof raw === "string" ? stripSchemaPrefix(raw) : "";
};

export const isEventType = (type: string) => EVENT_TYPES.has(type);

/**
 * Collects every Event / EventSeries node reachable from one parsed block.
 * Arrays are walked element by element, a non-empty `@graph` replaces its
 * owner, and an ItemList contributes the `item` of each list element.
 */
export const extractEvents = (node: unknown): JsonLdNode[] => {
  if (Array.isArray(node)) {
    return node.flatMap((item) => extractEvents(item));
  }

  const record = asRecord(node);
  if (!record) {
    return [];
  }

  const graph = record["@graph"];
  if (Array.isArray(graph) && graph.length > 0) {
    return extractEvents(graph);
  }

  const type = jsonLdTypeString(record["@type"]);
  const elements = record.itemListElement;
  if (type === "ItemList" && Array.isArray(elements) && elements.length > 0) {
    return elements.flatMap((element) => {
      const item = asRecord(element)?.item;
      return item === undefined || item === null ? [] : extractEvents(item);
    });
  }

  if (isEventType(type)) {
    return [record];
  }

  return [];
};

export type JsonLdExtraction = {
  events: JsonLdNode[];
  blocks: number;
  malformed: number;
};

/** Parses each `application/ld+json` block separately; a bad block is counted and skipped. */
export const extractJsonLdFromHtml = (html: string, pageUrl = "page"): JsonLdExtraction => {
  const $ = cheerio.load(html);
  const result: JsonLdExtraction = { events: [], blocks: 0, malformed: 0 };

  $('script[type="application/ld+json"]').each((index, element) => {
    const raw = $(element).text().trim();
    if (!raw) {
      return;
    }
    result.blocks += 1;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      result.malformed += 1;
      console.warn(`[jsonld] skipping malformed block ${index + 1} on ${pageUrl}:`, errorMessage(error));
      return;
    }
    result.events.push(...extractEvents(parsed));
  });

  return result;
};

export const fetchAndExtractJsonLd = async (
  rawUrl: string,
  options: { signal?: AbortSignal } = {},
): Promise<JsonLdNode[]> => {
  if (!parseHttpUrl(rawUrl)) {
    throw new FetchError(`invalid URL "${rawUrl}": missing scheme or host`, rawUrl);
  }

  let allowed = true;
  try {
    allowed = await checkRobots(rawUrl, { signal: options.signal });
  } catch (error) {
    console.warn(`[robots] check failed for ${rawUrl}, proceeding as allowed:`, errorMessage(error));
  }
  if (!allowed) {
    throw new RobotsDisallowedError(rawUrl);
  }

  const html = await fetchHtml(rawUrl, { signal: options.signal });
  const { events, blocks, malformed } = extractJsonLdFromHtml(html, rawUrl);
  console.log(`[jsonld] ${rawUrl}: ${events.length} events from ${blocks} blocks (${malformed} malformed)`);
  return events;
};
