import { describe, expect, it } from "vitest";
import { NormalizeError } from "../src/lib/errors";
import { decodeBoolean, decodeList, decodeText } from "../src/lib/jsonld-values";
import { eventIdFromRaw, normalizeJsonLdEvent, normalizeRawEvent } from "../src/lib/normalize";
import type { RawEvent } from "../src/lib/types";
import { buildSource } from "./helpers";

const source = buildSource({ name: "riverside", url: "https://riverside.test/whats-on", license: "CC-BY-4.0" });

const rawEvent = (overrides: Partial<RawEvent> = {}): RawEvent => ({
  name: "Open Mic",
  startDate: "2026-03-14",
  endDate: "",
  location: "",
  description: "",
  url: "",
  image: "",
  ...overrides,
});

describe("shared decoders", () => {
  it("decodes text as absent, scalar or list", () => {
    expect(decodeText(undefined)).toEqual({ kind: "absent" });
    expect(decodeText("   ")).toEqual({ kind: "absent" });
    expect(decodeText(" Jazz ")).toEqual({ kind: "scalar", value: "Jazz" });
    expect(decodeText({ "@value": "Jazz" })).toEqual({ kind: "scalar", value: "Jazz" });
    expect(decodeText({ "@type": "DateTime", "@value": "2026-05-01T19:00" })).toEqual({
      kind: "scalar",
      value: "2026-05-01T19:00",
    });
    expect(decodeText(25)).toEqual({ kind: "scalar", value: "25" });
    expect(decodeText(["a", { "@value": "b" }, ""])).toEqual({ kind: "list", values: ["a", "b"] });
    expect(decodeText({ name: "not text" })).toEqual({ kind: "absent" });
  });

  it("decodes lists without producing empty lists", () => {
    expect(decodeList("music")).toEqual(["music"]);
    expect(decodeList(["music", "jazz"])).toEqual(["music", "jazz"]);
    expect(decodeList([])).toBeUndefined();
    expect(decodeList(null)).toBeUndefined();
  });

  it("decodes booleans and their string forms", () => {
    expect(decodeBoolean(true)).toEqual({ kind: "scalar", value: true });
    expect(decodeBoolean("TRUE")).toEqual({ kind: "scalar", value: true });
    expect(decodeBoolean("False")).toEqual({ kind: "scalar", value: false });
    expect(decodeBoolean("yes")).toEqual({ kind: "absent" });
    expect(decodeBoolean(1)).toEqual({ kind: "absent" });
  });
});

describe("normalizeJsonLdEvent", () => {
  it("gives the same result for plain and @value-wrapped text", () => {
    const plain = normalizeJsonLdEvent(
      {
        "@type": "Event",
        name: "Harbour Jazz Night",
        description: "Late set",
        startDate: "2026-05-01T19:30",
        endDate: "2026-05-01T23:00",
        url: "https://riverside.test/e/1",
      },
      source,
    );
    const wrapped = normalizeJsonLdEvent(
      {
        "@type": "Event",
        name: { "@value": "Harbour Jazz Night" },
        description: { "@value": "Late set" },
        startDate: { "@type": "DateTime", "@value": "2026-05-01T19:30" },
        endDate: { "@type": "DateTime", "@value": "2026-05-01T23:00" },
        url: { "@value": "https://riverside.test/e/1" },
      },
      source,
    );
    expect(wrapped).toEqual(plain);
  });

  it("rejects events without a name or start date", () => {
    expect(() => normalizeJsonLdEvent({ "@type": "Event", startDate: "2026-01-01" }, source)).toThrow(
      new NormalizeError("event has no name"),
    );
    expect(() =>
      normalizeJsonLdEvent({ "@type": "Event", name: "Untimed", location: "Somewhere" }, source),
    ).toThrow(new NormalizeError("event has no startDate"));
    expect(() => normalizeJsonLdEvent({ name: { "@value": " " }, startDate: "2026-01-01" }, source)).toThrow(
      NormalizeError,
    );
    expect(() => normalizeJsonLdEvent("Event", source)).toThrow("event is not a JSON object");
  });

  it("maps the full set of fields and attaches the source", () => {
    const event = normalizeJsonLdEvent(
      {
        "@id": "https://riverside.test/e/42#event",
        "@type": "MusicEvent",
        name: "Quartet",
        startDate: "2026-04-02T20:00",
        doorTime: "19:30",
        location: {
          "@type": "Place",
          "@id": "https://riverside.test/venues/hall",
          name: "Main Hall",
          address: {
            "@type": "PostalAddress",
            streetAddress: "1 River Road",
            addressLocality: "Riverton",
            postalCode: "RV1 2AB",
          },
          addressLocality: "Flat Town",
          addressCountry: "GB",
          geo: { "@type": "GeoCoordinates", latitude: "51.5", longitude: -0.12 },
        },
        organizer: [{ "@type": "Organization", name: "Riverside Trust", url: "https://riverside.test" }],
        offers: [{ "@type": "Offer", price: 12, priceCurrency: "GBP" }, { price: 99 }],
        image: { "@type": "ImageObject", contentUrl: "https://riverside.test/q.jpg" },
        keywords: "chamber",
        inLanguage: ["en", "cy"],
        isAccessibleForFree: "false",
        sameAs: "https://tickets.test/quartet",
      },
      source,
    );

    expect(event).toEqual({
      type: "MusicEvent",
      name: "Quartet",
      startDate: "2026-04-02T20:00",
      doorTime: "19:30",
      location: {
        id: "https://riverside.test/venues/hall",
        name: "Main Hall",
        streetAddress: "1 River Road",
        addressLocality: "Riverton",
        postalCode: "RV1 2AB",
        addressCountry: "GB",
        latitude: 51.5,
        longitude: -0.12,
      },
      organizer: { name: "Riverside Trust", url: "https://riverside.test" },
      offers: { price: "12", priceCurrency: "GBP" },
      image: "https://riverside.test/q.jpg",
      keywords: ["chamber"],
      inLanguage: ["en", "cy"],
      isAccessibleForFree: false,
      sameAs: ["https://tickets.test/quartet"],
      license: "CC-BY-4.0",
      source: {
        url: "https://riverside.test/whats-on",
        eventId: "https://riverside.test/e/42#event",
        name: "riverside",
        license: "CC-BY-4.0",
      },
    });
  });

  it("accepts a bare string location and flat address fields", () => {
    const named = normalizeJsonLdEvent({ name: "A", startDate: "2026-01-01", location: "The Yard" }, source);
    expect(named.location).toEqual({ name: "The Yard" });
    expect(named.type).toBe("Event");

    const flat = normalizeJsonLdEvent(
      {
        name: "B",
        startDate: "2026-01-01",
        location: { "@type": "Place", name: "Dock 5", addressLocality: "Port City", addressRegion: "PC" },
      },
      source,
    );
    expect(flat.location).toEqual({ name: "Dock 5", addressLocality: "Port City", addressRegion: "PC" });
  });

  it("keeps coordinates only when both parse", () => {
    const event = normalizeJsonLdEvent(
      {
        name: "C",
        startDate: "2026-01-01",
        location: { name: "Field", geo: { latitude: "north", longitude: 3 } },
      },
      source,
    );
    expect(event.location).toEqual({ name: "Field" });
  });

  it("reads an image from a plain string or an ImageObject url", () => {
    const plain = normalizeJsonLdEvent({ name: "D", startDate: "2026-01-01", image: "https://x.test/a.png" }, source);
    const object = normalizeJsonLdEvent(
      { name: "D", startDate: "2026-01-01", image: [{ url: "https://x.test/b.png", contentUrl: "https://x.test/c.png" }] },
      source,
    );
    expect(plain.image).toBe("https://x.test/a.png");
    expect(object.image).toBe("https://x.test/b.png");
  });

  it("derives the event id from @id, then identifier, then url", () => {
    const base = { name: "E", startDate: "2026-01-01", url: "https://riverside.test/e/7" };
    expect(normalizeJsonLdEvent({ ...base, identifier: "evt-7" }, source).source.eventId).toBe("evt-7");
    expect(
      normalizeJsonLdEvent({ ...base, identifier: { "@type": "PropertyValue", value: "pv-7" } }, source).source
        .eventId,
    ).toBe("pv-7");
    expect(normalizeJsonLdEvent({ ...base, identifier: { "@value": "wrapped-7" } }, source).source.eventId).toBe(
      "wrapped-7",
    );
    expect(normalizeJsonLdEvent(base, source).source.eventId).toBe("https://riverside.test/e/7");
    expect(normalizeJsonLdEvent({ name: "E", startDate: "2026-01-01" }, source).source.eventId).toBe("");
  });
});

describe("normalizeRawEvent", () => {
  it("builds a name-only location and uses the listing URL as id", () => {
    const event = normalizeRawEvent(
      rawEvent({
        name: "  Open   Mic ",
        location: "Back Room",
        url: "https://riverside.test/e/open-mic",
        image: "https://riverside.test/open-mic.jpg",
      }),
      source,
    );

    expect(event).toEqual({
      type: "Event",
      name: "Open Mic",
      startDate: "2026-03-14",
      location: { name: "Back Room" },
      image: "https://riverside.test/open-mic.jpg",
      url: "https://riverside.test/e/open-mic",
      license: "CC-BY-4.0",
      source: {
        url: "https://riverside.test/whats-on",
        eventId: "https://riverside.test/e/open-mic",
        name: "riverside",
        license: "CC-BY-4.0",
      },
    });
  });

  it("derives a stable id for listings without a link", () => {
    const first = eventIdFromRaw(rawEvent(), source);
    const second = eventIdFromRaw(rawEvent({ description: "changed" }), source);
    const other = eventIdFromRaw(rawEvent({ startDate: "2026-03-15" }), source);

    expect(first).toMatch(/^scraped:riverside:[0-9a-f]{16}$/);
    expect(second).toBe(first);
    expect(other).not.toBe(first);
  });

  it("rejects listings without a name or start date", () => {
    expect(() => normalizeRawEvent(rawEvent({ name: "   " }), source)).toThrow("raw event has no name");
    expect(() => normalizeRawEvent(rawEvent({ startDate: "" }), source)).toThrow("raw event has no startDate");
  });
});
