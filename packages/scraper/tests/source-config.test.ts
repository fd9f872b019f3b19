import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { ScraperSourceRow } from "@event-harvest/db";
import { SourceConfigError } from "../src/lib/errors";
import {
  defaultSourceConfig,
  loadSourceConfig,
  loadSourceConfigs,
  sourceConfigFromRecord,
  sourceConfigToRecord,
  validateSourceConfig,
} from "../src/lib/source-config";

const TIER0 = `name: riverside
url: https://riverside.test/whats-on
license: CC0-1.0
`;

const TIER1 = `name: harbour-cinema
url: https://cinema.test/programme
tier: 1
schedule: weekly
trust_level: 7
max_pages: 3
event_url_pattern: /films/
selectors:
  event_list: article.film
  name: h3
  start_date: time
  pagination: a.next
`;

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "sources-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

const write = (name: string, contents: string) => {
  const path = join(dir, name);
  writeFileSync(path, contents, "utf-8");
  return path;
};

describe("validateSourceConfig", () => {
  it("accepts the defaults once name and url are set", () => {
    expect(validateSourceConfig({ ...defaultSourceConfig(), name: "a", url: "https://a.test" })).toEqual([]);
  });

  it("collects every problem", () => {
    const problems = validateSourceConfig({
      ...defaultSourceConfig(),
      url: "ftp://a.test",
      tier: 1,
      trustLevel: 11,
      schedule: "hourly",
      maxPages: -1,
    });

    expect(problems).toEqual([
      "name: required",
      'url: must be a valid http/https URL, got "ftp://a.test"',
      "trust_level: must be 1-10, got 11",
      "selectors.event_list: required for tier 1",
      'schedule: must be daily, weekly, or manual, got "hourly"',
      "max_pages: must be > 0, got -1",
    ]);
  });

  it("rejects unknown tiers", () => {
    expect(validateSourceConfig({ ...defaultSourceConfig(), name: "a", url: "https://a.test", tier: 2 })).toEqual([
      "tier: must be 0 or 1, got 2",
    ]);
  });
});

describe("loadSourceConfig", () => {
  it("applies defaults to a minimal file", () => {
    expect(loadSourceConfig(write("riverside.yaml", TIER0))).toEqual({
      name: "riverside",
      url: "https://riverside.test/whats-on",
      tier: 0,
      schedule: "manual",
      trustLevel: 5,
      license: "CC0-1.0",
      enabled: true,
      maxPages: 10,
    });
  });

  it("maps snake_case fields and selectors", () => {
    expect(loadSourceConfig(write("cinema.yaml", TIER1))).toEqual({
      name: "harbour-cinema",
      url: "https://cinema.test/programme",
      tier: 1,
      schedule: "weekly",
      trustLevel: 7,
      license: "",
      enabled: true,
      eventUrlPattern: "/films/",
      maxPages: 3,
      selectors: { eventList: "article.film", name: "h3", startDate: "time", pagination: "a.next" },
    });
  });

  it("treats zero trust level and max pages as unset", () => {
    const config = loadSourceConfig(write("zero.yaml", `${TIER0}trust_level: 0\nmax_pages: 0\n`));
    expect(config.trustLevel).toBe(5);
    expect(config.maxPages).toBe(10);
  });

  it("fails closed on an invalid file", () => {
    const path = write("bad.yaml", "name: bad\nurl: https://bad.test\ntier: 1\n");
    expect(() => loadSourceConfig(path)).toThrow(
      new SourceConfigError(`${path}: selectors.event_list: required for tier 1`),
    );
  });

  it("reports wrongly typed fields", () => {
    const path = write("typed.yaml", `${TIER0}tier: one\n`);
    expect(() => loadSourceConfig(path)).toThrow(`${path}: tier: Expected number, received string`);
  });
});

describe("loadSourceConfigs", () => {
  it("returns nothing for a missing directory", () => {
    expect(loadSourceConfigs(join(dir, "absent"))).toEqual({ sources: [], error: null });
  });

  it("skips templates, other extensions and subdirectories", () => {
    write("riverside.yaml", TIER0);
    write("_template.yaml", "name: template\nurl: https://template.test\n");
    write("notes.yml", "name: yml\nurl: https://yml.test\n");
    write("README.md", "# sources");
    mkdirSync(join(dir, "nested"));
    writeFileSync(join(dir, "nested", "deep.yaml"), "name: deep\nurl: https://deep.test\n");

    const { sources, error } = loadSourceConfigs(dir);
    expect(error).toBeNull();
    expect(sources.map((source) => source.name)).toEqual(["riverside"]);
  });

  it("returns valid sources alongside one combined error", () => {
    write("a.yaml", TIER0);
    const badPath = write("b.yaml", "name: b\nurl: notaurl\n");
    write("c.yaml", TIER1);

    const { sources, error } = loadSourceConfigs(dir);

    expect(sources.map((source) => source.name)).toEqual(["riverside", "harbour-cinema"]);
    expect(error).toBeInstanceOf(SourceConfigError);
    expect(error?.problems).toEqual([`${badPath}: url: must be a valid http/https URL, got "notaurl"`]);
    expect(error?.message).toBe(
      `invalid source configs:\n  ${badPath}: url: must be a valid http/https URL, got "notaurl"`,
    );
  });

  it("names duplicate sources", () => {
    const first = write("a.yaml", TIER0);
    const second = write("b.yaml", TIER0.replace("riverside.test", "mirror.test"));

    const { sources, error } = loadSourceConfigs(dir);

    expect(sources).toHaveLength(1);
    expect(error?.problems).toEqual([`${second}: duplicate source name "riverside" (already defined in ${first})`]);
  });

  it("aborts on broken YAML", () => {
    write("a.yaml", TIER0);
    write("broken.yaml", "name: [unclosed\n");
    expect(() => loadSourceConfigs(dir)).toThrow(SourceConfigError);
  });
});

describe("registry records", () => {
  const row = (overrides: Partial<ScraperSourceRow> = {}): ScraperSourceRow => ({
    id: "1",
    name: "harbour-cinema",
    url: "https://cinema.test/programme",
    tier: 1,
    schedule: "weekly",
    trust_level: 7,
    license: "CC-BY-4.0",
    enabled: true,
    max_pages: 3,
    event_url_pattern: null,
    selectors: { event_list: "article.film", name: "h3" },
    notes: "",
    last_scraped_at: null,
    created_at: new Date("2026-01-01T00:00:00Z"),
    updated_at: new Date("2026-01-01T00:00:00Z"),
    ...overrides,
  });

  it("round-trips a config through its record form", () => {
    const config = sourceConfigFromRecord(row());
    expect(config.selectors).toEqual({ eventList: "article.film", name: "h3" });

    const record = sourceConfigToRecord(config);
    expect(record).toMatchObject({
      name: "harbour-cinema",
      tier: 1,
      trust_level: 7,
      max_pages: 3,
      selectors: { event_list: "article.film", name: "h3" },
      notes: "",
    });
  });

  it("keeps the event URL pattern through the registry", () => {
    const config = sourceConfigFromRecord(row({ event_url_pattern: "/films/" }));

    expect(config.eventUrlPattern).toBe("/films/");
    expect(sourceConfigToRecord(config).event_url_pattern).toBe("/films/");
  });

  it("rejects a record that fails validation", () => {
    expect(() => sourceConfigFromRecord(row({ selectors: null }))).toThrow(
      "source harbour-cinema: selectors.event_list: required for tier 1",
    );
  });
});
