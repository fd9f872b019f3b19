import { existsSync, mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  buildRunReport,
  formatRawEvents,
  formatResultLine,
  formatResultsTable,
  formatSourcesTable,
  writeRunReport,
  writeRunSummary,
} from "../src/lib/report";
import type { RawEvent, ScrapeResult } from "../src/lib/types";
import { buildSource } from "./helpers";

const result = (overrides: Partial<ScrapeResult> = {}): ScrapeResult => ({
  sourceName: "lido",
  sourceUrl: "https://lido.test/whats-on",
  tier: 0,
  eventsFound: 3,
  eventsSubmitted: 3,
  eventsCreated: 2,
  eventsDuplicate: 1,
  eventsFailed: 0,
  error: null,
  dryRun: false,
  ...overrides,
});

const broken = () =>
  result({
    sourceName: "broken",
    sourceUrl: "https://broken.test/",
    tier: 1,
    eventsFound: 0,
    eventsSubmitted: 0,
    eventsCreated: 0,
    eventsDuplicate: 0,
    error: new Error("down"),
  });

describe("formatResultLine", () => {
  it("prints counts for a submitted run", () => {
    expect(formatResultLine(result())).toBe(
      `Source: ${"lido".padEnd(30)}  Found: 3  New: 2  Duplicate: 1  Failed: 0`,
    );
  });

  it("prints what would be submitted on a dry run", () => {
    expect(formatResultLine(result({ dryRun: true, eventsSubmitted: 2 }))).toBe(
      `[dry-run] source=${"lido".padEnd(28)}  found=3     would-submit=2`,
    );
    expect(formatResultLine(result({ dryRun: true, eventsFound: 0 }))).toBe("No events found");
  });

  it("prints the error when the run failed", () => {
    expect(formatResultLine(broken())).toBe("Error: down");
  });
});

describe("formatResultsTable", () => {
  it("lists each source with a totals row", () => {
    expect(formatResultsTable([result(), broken()]).split("\n")).toEqual([
      "SOURCE                         FOUND  NEW  DUP  FAILED  STATUS",
      "lido                           3      2    1    0       ok",
      "broken                         0      0    0    0       error: down",
      "---",
      "TOTAL                          3      2    1    0",
    ]);
  });

  it("says so when nothing ran", () => {
    expect(formatResultsTable([])).toBe("No sources scraped.");
  });
});

describe("formatSourcesTable", () => {
  it("truncates long URLs", () => {
    const table = formatSourcesTable([
      buildSource({
        name: "lido",
        url: "https://example-venue.test/whats-on/programme/2026",
        tier: 1,
        schedule: "weekly",
      }),
      buildSource({ name: "pool", url: "https://pool.test/", enabled: false }),
    ]);

    expect(table.split("\n")).toEqual([
      "NAME                           URL                                          TIER ENABLED SCHEDULE",
      "lido                           https://example-venue.test/whats-on/progr... 1    true    weekly",
      "pool                           https://pool.test/                           0    false   manual",
    ]);
  });
});

describe("formatRawEvents", () => {
  const raw: RawEvent = {
    name: "Heat",
    startDate: "2026-10-01",
    endDate: "",
    location: "Screen 1",
    description: "d".repeat(130),
    url: "https://cinema.test/films/heat",
    image: "",
  };

  it("numbers each listing and shortens long descriptions", () => {
    expect(formatRawEvents([raw]).split("\n")).toEqual([
      "Extracted 1 event(s):",
      "",
      "[1] Name:        Heat",
      "    StartDate:   2026-10-01",
      "    EndDate:     ",
      "    Location:    Screen 1",
      "    URL:         https://cinema.test/films/heat",
      "    Image:       ",
      `    Description: ${"d".repeat(120)}…`,
      "",
    ]);
  });

  it("omits an empty description", () => {
    const lines = formatRawEvents([{ ...raw, description: "" }]).split("\n");
    expect(lines.some((line) => line.startsWith("    Description:"))).toBe(false);
  });

  it("reports an empty crawl", () => {
    expect(formatRawEvents([])).toBe("No events extracted.");
  });
});

describe("run reports", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "report-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("totals results and flattens errors to messages", () => {
    const report = buildRunReport([result(), broken()], false);

    expect(report.dryRun).toBe(false);
    expect(report.totals).toEqual({
      sources: 2,
      failed: 1,
      eventsFound: 3,
      eventsSubmitted: 3,
      eventsCreated: 2,
      eventsDuplicate: 1,
      eventsFailed: 0,
    });
    expect(report.sources.map((entry) => entry.error)).toEqual([null, "down"]);
  });

  it("writes the report as JSON, creating parent directories", () => {
    const path = join(dir, "nested", "run.json");
    const report = buildRunReport([result()], true);

    writeRunReport(report, path);

    expect(JSON.parse(readFileSync(path, "utf-8"))).toEqual(report);
  });

  it("appends a markdown summary when running in CI", () => {
    const path = join(dir, "summary.md");
    vi.stubEnv("GITHUB_STEP_SUMMARY", path);

    writeRunSummary(buildRunReport([result(), broken()], true));

    expect(readFileSync(path, "utf-8").split("\n")).toEqual([
      "## Scrape Report",
      "",
      "Mode: **dry run**",
      "Sources: **2** (failed 1)",
      "Events: found **3** | submitted **3** | created **2** | duplicate **1** | failed **0**",
      "",
      "| Source | Tier | Found | Submitted | Created | Duplicate | Failed | Status |",
      "| --- | --- | --- | --- | --- | --- | --- | --- |",
      "| lido | 0 | 3 | 3 | 2 | 1 | 0 | ok |",
      "| broken | 1 | 0 | 0 | 0 | 0 | 0 | error: down |",
      "",
    ]);
  });

  it("skips the summary outside CI", () => {
    vi.stubEnv("GITHUB_STEP_SUMMARY", "");
    writeRunSummary(buildRunReport([result()], false));
    expect(existsSync(join(dir, "summary.md"))).toBe(false);
  });
});
