import { createHash } from "crypto";
import { NormalizeError } from "./errors";
import { asRecord, booleanOf, decodeList, firstElement, numberOf, textOf } from "./jsonld-values";
import type { JsonRecord } from "./jsonld-values";
import type {
  EventInput,
  JsonLdNode,
  OfferInput,
  OrganizationInput,
  PlaceInput,
  RawEvent,
  SourceConfig,
} from "./types";

const DEFAULT_EVENT_TYPE = "Event";

const ADDRESS_FIELDS = [
  "streetAddress",
  "addressLocality",
  "addressRegion",
  "postalCode",
  "addressCountry",
] as const;

export const normalizeWhitespace = (value: string) => value.replace(/\s+/g, " ").trim();

const nonEmpty = (value: string) => {
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
};

const idOf = (record: JsonRecord) => {
  const id = record["@id"];
  return typeof id === "string" && id.trim() ? id.trim() : undefined;
};

const eventTypeOf = (record: JsonRecord) => {
  const raw = firstElement(record["@type"]);
  return typeof raw === "string" && raw.trim() ? raw.trim() : DEFAULT_EVENT_TYPE;
};

const parseLocation = (value: unknown): PlaceInput | undefined => {
  const first = firstElement(value);
  if (typeof first === "string") {
    const name = nonEmpty(first);
    return name ? { name } : undefined;
  }

  const place = asRecord(first);
  if (!place) {
    return undefined;
  }
  if (!("@type" in place) && "@value" in place) {
    const name = textOf(place);
    return name ? { name } : undefined;
  }

  const rawAddress = firstElement(place.address);
  const address = asRecord(rawAddress);
  const fromAddress = (field: (typeof ADDRESS_FIELDS)[number]) =>
    address ? textOf(address[field]) : undefined;

  const result: PlaceInput = {
    id: idOf(place),
    name: textOf(place.name),
  };
  for (const field of ADDRESS_FIELDS) {
    result[field] = fromAddress(field) ?? textOf(place[field]);
  }
  if (!result.streetAddress && !address) {
    // some publishers put the whole postal address in one string
    result.streetAddress = textOf(rawAddress);
  }

  const geo = asRecord(firstElement(place.geo));
  if (geo) {
    const latitude = numberOf(geo.latitude);
    const longitude = numberOf(geo.longitude);
    if (latitude !== undefined && longitude !== undefined) {
      result.latitude = latitude;
      result.longitude = longitude;
    }
  }

  if (!result.name && !result.streetAddress && !result.addressLocality && !result.id) {
    return undefined;
  }
  return result;
};

const parseOrganizer = (value: unknown): OrganizationInput | undefined => {
  const first = firstElement(value);
  if (typeof first === "string") {
    const name = nonEmpty(first);
    return name ? { name } : undefined;
  }

  const organizer = asRecord(first);
  if (!organizer) {
    return undefined;
  }

  const result: OrganizationInput = {
    id: idOf(organizer),
    name: textOf(organizer.name),
    url: textOf(organizer.url),
    email: textOf(organizer.email),
    telephone: textOf(organizer.telephone),
  };
  if (!result.name && !result.url && !result.id) {
    return undefined;
  }
  return result;
};

const parseOffer = (value: unknown): OfferInput | undefined => {
  const offer = asRecord(firstElement(value));
  if (!offer) {
    return undefined;
  }

  const result: OfferInput = {
    price: textOf(offer.price),
    priceCurrency: textOf(offer.priceCurrency),
    url: textOf(offer.url),
  };
  if (!result.price && !result.priceCurrency && !result.url) {
    return undefined;
  }
  return result;
};

const parseImage = (value: unknown): string | undefined => {
  const first = firstElement(value);
  if (typeof first === "string") {
    return nonEmpty(first);
  }
  const image = asRecord(first);
  if (!image) {
    return undefined;
  }
  return textOf(image.url) ?? textOf(image.contentUrl);
};

/** Stable external identifier: `@id`, then `identifier`, then the event URL. */
export const extractEventId = (record: JsonRecord): string => {
  const id = idOf(record);
  if (id) {
    return id;
  }

  const identifier = firstElement(record.identifier);
  const propertyValue = asRecord(identifier);
  const fromIdentifier =
    textOf(identifier) ?? (propertyValue ? textOf(propertyValue.value) : undefined);
  if (fromIdentifier) {
    return fromIdentifier;
  }

  return textOf(record.url) ?? "";
};

/**
 * Converts one schema.org Event node into an EventInput. Values are passed
 * through as found; date validation belongs to the ingest API.
 */
export const normalizeJsonLdEvent = (raw: JsonLdNode, source: SourceConfig): EventInput => {
  const record = asRecord(raw);
  if (!record) {
    throw new NormalizeError("event is not a JSON object");
  }

  const name = textOf(record.name);
  if (!name) {
    throw new NormalizeError("event has no name");
  }

  const startDate = textOf(record.startDate);
  if (!startDate) {
    throw new NormalizeError("event has no startDate");
  }

  return {
    type: eventTypeOf(record),
    name,
    description: textOf(record.description),
    startDate,
    endDate: textOf(record.endDate),
    doorTime: textOf(record.doorTime),
    location: parseLocation(record.location),
    organizer: parseOrganizer(record.organizer),
    image: parseImage(record.image),
    url: textOf(record.url),
    offers: parseOffer(record.offers),
    keywords: decodeList(record.keywords),
    inLanguage: decodeList(record.inLanguage),
    isAccessibleForFree: booleanOf(record.isAccessibleForFree),
    sameAs: decodeList(record.sameAs),
    license: source.license,
    source: {
      url: source.url,
      eventId: extractEventId(record),
      name: source.name,
      license: source.license,
    },
  };
};

/**
 * Dedup key for a Tier 1 listing: its own URL when it links out, otherwise a
 * hash of name, start date and source so re-scrapes land on the same key.
 */
export const eventIdFromRaw = (raw: RawEvent, source: SourceConfig) => {
  const url = raw.url.trim();
  if (url) {
    return url;
  }
  const digest = createHash("sha256")
    .update(`${normalizeWhitespace(raw.name)}|${raw.startDate.trim()}|${source.name}`)
    .digest("hex")
    .slice(0, 16);
  return `scraped:${source.name}:${digest}`;
};

export const normalizeRawEvent = (raw: RawEvent, source: SourceConfig): EventInput => {
  const name = normalizeWhitespace(raw.name);
  if (!name) {
    throw new NormalizeError("raw event has no name");
  }

  const startDate = raw.startDate.trim();
  if (!startDate) {
    throw new NormalizeError("raw event has no startDate");
  }

  const location = nonEmpty(raw.location);

  return {
    type: DEFAULT_EVENT_TYPE,
    name,
    description: nonEmpty(raw.description),
    startDate,
    endDate: nonEmpty(raw.endDate),
    location: location ? { name: location } : undefined,
    image: nonEmpty(raw.image),
    url: nonEmpty(raw.url),
    license: source.license,
    source: {
      url: source.url,
      eventId: eventIdFromRaw(raw, source),
      name: source.name,
      license: source.license,
    },
  };
};
