export type Tier = 0 | 1;

export type Schedule = "daily" | "weekly" | "manual";

export type SelectorConfig = {
  eventList?: string;
  name?: string;
  startDate?: string;
  endDate?: string;
  location?: string;
  description?: string;
  url?: string;
  image?: string;
  pagination?: string;
};

export type SourceConfig = {
  name: string;
  url: string;
  tier: Tier;
  schedule: Schedule;
  trustLevel: number;
  license: string;
  enabled: boolean;
  eventUrlPattern?: string;
  maxPages: number;
  notes?: string;
  selectors?: SelectorConfig;
};

/** Plain-text fields pulled from one matched listing item by the Tier 1 crawler. */
export type RawEvent = {
  name: string;
  startDate: string;
  endDate: string;
  location: string;
  description: string;
  url: string;
  image: string;
};

/**
 * One event-typed structured-data node. Kept as the parsed JSON value it was
 * found as; every node is an independent copy of its block.
 */
export type JsonLdNode = unknown;

export type PlaceInput = {
  id?: string;
  name?: string;
  streetAddress?: string;
  addressLocality?: string;
  addressRegion?: string;
  postalCode?: string;
  addressCountry?: string;
  latitude?: number;
  longitude?: number;
};

export type OrganizationInput = {
  id?: string;
  name?: string;
  url?: string;
  email?: string;
  telephone?: string;
};

export type OfferInput = {
  price?: string;
  priceCurrency?: string;
  url?: string;
};

export type SourceInput = {
  url: string;
  eventId: string;
  name: string;
  license: string;
};

export type EventInput = {
  type: string;
  name: string;
  description?: string;
  startDate: string;
  endDate?: string;
  doorTime?: string;
  location?: PlaceInput;
  organizer?: OrganizationInput;
  image?: string;
  url?: string;
  offers?: OfferInput;
  keywords?: string[];
  inLanguage?: string[];
  isAccessibleForFree?: boolean;
  sameAs?: string[];
  license: string;
  source: SourceInput;
};

export type IngestError = {
  index: number;
  message: string;
};

export type IngestResult = {
  batchId: string;
  eventsCreated: number;
  eventsDuplicate: number;
  eventsFailed: number;
  errors?: IngestError[];
};

export type ScrapeResult = {
  sourceName: string;
  sourceUrl: string;
  tier: Tier;
  eventsFound: number;
  eventsSubmitted: number;
  eventsCreated: number;
  eventsDuplicate: number;
  eventsFailed: number;
  error: Error | null;
  dryRun: boolean;
};

export type ScrapeOptions = {
  dryRun?: boolean;
  /** Maximum raw records normalized per source; 0 or absent means no limit. */
  limit?: number;
  sourcesDir?: string;
  signal?: AbortSignal;
};
