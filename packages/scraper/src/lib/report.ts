import { appendFileSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import type { RawEvent, ScrapeResult, SourceConfig } from "./types";

const LIST_URL_WIDTH = 44;
const DESCRIPTION_PREVIEW = 120;

export type RunReportEntry = Omit<ScrapeResult, "error"> & {
  error: string | null;
};

export type RunReport = {
  generatedAt: string;
  dryRun: boolean;
  totals: {
    sources: number;
    failed: number;
    eventsFound: number;
    eventsSubmitted: number;
    eventsCreated: number;
    eventsDuplicate: number;
    eventsFailed: number;
  };
  sources: RunReportEntry[];
};

const sum = (results: ScrapeResult[], pick: (result: ScrapeResult) => number) =>
  results.reduce((total, result) => total + pick(result), 0);

const row = (cells: Array<[string | number, number]>) =>
  cells.map(([value, width]) => String(value).padEnd(width)).join(" ");

export const formatResultLine = (result: ScrapeResult): string => {
  if (result.error) {
    return `Error: ${result.error.message}`;
  }
  if (result.dryRun) {
    if (result.eventsFound === 0) {
      return "No events found";
    }
    return `[dry-run] source=${result.sourceName.padEnd(28)}  found=${String(result.eventsFound).padEnd(4)}  would-submit=${result.eventsSubmitted}`;
  }
  return `Source: ${result.sourceName.padEnd(30)}  Found: ${result.eventsFound}  New: ${result.eventsCreated}  Duplicate: ${result.eventsDuplicate}  Failed: ${result.eventsFailed}`;
};

/** Per-source table plus a totals row, for multi-source runs. */
export const formatResultsTable = (results: ScrapeResult[]): string => {
  if (!results.length) {
    return "No sources scraped.";
  }

  const lines = [`${row([["SOURCE", 30], ["FOUND", 6], ["NEW", 4], ["DUP", 4], ["FAILED", 6]])}  STATUS`];
  for (const result of results) {
    const status = result.error ? `error: ${result.error.message}` : "ok";
    lines.push(
      `${row([
        [result.sourceName, 30],
        [result.eventsFound, 6],
        [result.eventsCreated, 4],
        [result.eventsDuplicate, 4],
        [result.eventsFailed, 6],
      ])}  ${status}`,
    );
  }
  lines.push("---");
  lines.push(
    row([
      ["TOTAL", 30],
      [sum(results, (result) => result.eventsFound), 6],
      [sum(results, (result) => result.eventsCreated), 4],
      [sum(results, (result) => result.eventsDuplicate), 4],
      [sum(results, (result) => result.eventsFailed), 6],
    ]).trimEnd(),
  );
  return lines.join("\n");
};

export const formatSourcesTable = (sources: SourceConfig[]): string => {
  const lines = [`${row([["NAME", 30], ["URL", LIST_URL_WIDTH], ["TIER", 4], ["ENABLED", 7]])} SCHEDULE`];
  for (const source of sources) {
    const url = source.url.length > LIST_URL_WIDTH ? `${source.url.slice(0, LIST_URL_WIDTH - 3)}...` : source.url;
    lines.push(
      `${row([
        [source.name, 30],
        [url, LIST_URL_WIDTH],
        [source.tier, 4],
        [String(source.enabled), 7],
      ])} ${source.schedule}`,
    );
  }
  return lines.join("\n");
};

/** Human-readable dump of crawled listings, used when trying out selectors. */
export const formatRawEvents = (events: RawEvent[]): string => {
  if (!events.length) {
    return "No events extracted.";
  }

  const lines = [`Extracted ${events.length} event(s):`, ""];
  events.forEach((event, index) => {
    lines.push(`[${index + 1}] Name:        ${event.name}`);
    lines.push(`    StartDate:   ${event.startDate}`);
    lines.push(`    EndDate:     ${event.endDate}`);
    lines.push(`    Location:    ${event.location}`);
    lines.push(`    URL:         ${event.url}`);
    lines.push(`    Image:       ${event.image}`);
    if (event.description) {
      const description =
        event.description.length > DESCRIPTION_PREVIEW
          ? `${event.description.slice(0, DESCRIPTION_PREVIEW)}…`
          : event.description;
      lines.push(`    Description: ${description}`);
    }
    lines.push("");
  });
  return lines.join("\n");
};

export const buildRunReport = (results: ScrapeResult[], dryRun: boolean): RunReport => ({
  generatedAt: new Date().toISOString(),
  dryRun,
  totals: {
    sources: results.length,
    failed: results.filter((result) => result.error).length,
    eventsFound: sum(results, (result) => result.eventsFound),
    eventsSubmitted: sum(results, (result) => result.eventsSubmitted),
    eventsCreated: sum(results, (result) => result.eventsCreated),
    eventsDuplicate: sum(results, (result) => result.eventsDuplicate),
    eventsFailed: sum(results, (result) => result.eventsFailed),
  },
  sources: results.map((result) => ({ ...result, error: result.error?.message ?? null })),
});

export const writeRunReport = (report: RunReport, filePath: string) => {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, `${JSON.stringify(report, null, 2)}\n`, "utf-8");
};

export const writeRunSummary = (report: RunReport) => {
  const summaryPath = process.env.GITHUB_STEP_SUMMARY;
  if (!summaryPath) {
    return;
  }

  const lines: string[] = [];
  lines.push("## Scrape Report");
  lines.push("");
  lines.push(`Mode: **${report.dryRun ? "dry run" : "submit"}**`);
  lines.push(`Sources: **${report.totals.sources}** (failed ${report.totals.failed})`);
  lines.push(
    `Events: found **${report.totals.eventsFound}** | submitted **${report.totals.eventsSubmitted}** | created **${report.totals.eventsCreated}** | duplicate **${report.totals.eventsDuplicate}** | failed **${report.totals.eventsFailed}**`,
  );
  lines.push("");
  lines.push("| Source | Tier | Found | Submitted | Created | Duplicate | Failed | Status |");
  lines.push("| --- | --- | --- | --- | --- | --- | --- | --- |");
  for (const entry of report.sources) {
    lines.push(
      `| ${entry.sourceName} | ${entry.tier} | ${entry.eventsFound} | ${entry.eventsSubmitted} | ${entry.eventsCreated} | ${entry.eventsDuplicate} | ${entry.eventsFailed} | ${entry.error ? `error: ${entry.error}` : "ok"} |`,
    );
  }

  appendFileSync(summaryPath, `${lines.join("\n")}\n`, "utf-8");
};
