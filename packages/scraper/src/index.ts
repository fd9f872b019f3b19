import { existsSync, readFileSync } from "fs";
import { dirname, resolve } from "path";
import { parseArgs } from "node:util";
import { closePool } from "@event-harvest/db";
import { scrapeWithSelectors } from "./lib/crawler";
import { errorMessage } from "./lib/errors";
import { IngestClient } from "./lib/ingest";
import { formatInspectResult, inspectUrl } from "./lib/inspect";
import {
  buildRunReport,
  formatRawEvents,
  formatResultLine,
  formatResultsTable,
  formatSourcesTable,
  writeRunReport,
  writeRunSummary,
} from "./lib/report";
import { Scraper, adHocSource } from "./lib/scraper";
import {
  getCrawlDelayMs,
  getDatabaseUrl,
  getIngestApiKey,
  getIngestBaseUrl,
  getReportPath,
  getScrapeLimit,
  getSourcesDir,
  isDryRun,
  parseLimit,
} from "./lib/settings";
import { loadSourceConfig, loadSourceConfigs } from "./lib/source-config";
import type { ScrapeOptions, ScrapeResult, SelectorConfig, SourceConfig } from "./lib/types";
import { parseHttpUrl } from "./lib/url";
import { NoopRunTracker } from "./repo/noop";
import { PgRunTracker, PgSourceRegistry } from "./repo/postgres";

const USAGE = `Usage: scrape <command> [options]

Commands:
  url <URL>          Scrape JSON-LD events from one page (tier 0)
  source <name>      Scrape one configured source
  all                Scrape every enabled source
  list               List configured sources
  inspect <URL>      Summarize a page's DOM to help write tier 1 selectors
  test <URL>         Try tier 1 selectors against a page without submitting
  sync               Upsert YAML source definitions into the database

Options:
  --dry-run          Normalize but do not submit (also SCRAPE_DRY_RUN=1)
  --limit <n>        Process at most n events per source (also SCRAPE_LIMIT)
  --sources <dir>    Source definition directory (also SCRAPE_SOURCES_DIR)
  --report <path>    Write a JSON run report (also SCRAPE_REPORT_PATH)

Options for test:
  --config <file>    Source definition whose selectors to start from
  --event-list, --name, --start-date, --end-date, --location,
  --description, --url, --image, --pagination <selector>
  --max-pages <n>`;

const loadDotEnv = () => {
  let currentDir = process.cwd();
  for (let i = 0; i < 6; i += 1) {
    const envPath = resolve(currentDir, ".env");
    if (existsSync(envPath)) {
      const contents = readFileSync(envPath, "utf-8");
      for (const line of contents.split("\n")) {
        const trimmed = line.trim();
        if (!trimmed || trimmed.startsWith("#")) {
          continue;
        }
        const eqIdx = trimmed.indexOf("=");
        if (eqIdx === -1) {
          continue;
        }
        const key = trimmed.slice(0, eqIdx).trim();
        const value = trimmed.slice(eqIdx + 1).trim().replace(/^['"]|['"]$/g, "");
        if (!process.env[key]) {
          process.env[key] = value;
        }
      }
      return envPath;
    }
    const parent = dirname(currentDir);
    if (parent === currentDir) {
      break;
    }
    currentDir = parent;
  }
  return null;
};

const parseCli = () =>
  parseArgs({
    allowPositionals: true,
    options: {
      "dry-run": { type: "boolean" },
      limit: { type: "string" },
      sources: { type: "string" },
      report: { type: "string" },
      config: { type: "string" },
      "event-list": { type: "string" },
      name: { type: "string" },
      "start-date": { type: "string" },
      "end-date": { type: "string" },
      location: { type: "string" },
      description: { type: "string" },
      url: { type: "string" },
      image: { type: "string" },
      pagination: { type: "string" },
      "max-pages": { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

type CliValues = ReturnType<typeof parseCli>["values"];

const requireArg = (value: string | undefined, what: string) => {
  if (!value) {
    throw new Error(`missing ${what}\n\n${USAGE}`);
  }
  return value;
};

const buildScraper = (dryRun: boolean) => {
  const apiKey = getIngestApiKey();
  if (!dryRun && !apiKey) {
    throw new Error("Missing required env var: INGEST_API_KEY (or use --dry-run)");
  }
  const useDatabase = getDatabaseUrl() !== null;
  if (!useDatabase) {
    console.log("[scrape] DATABASE_URL not set; run tracking disabled, using YAML sources");
  }
  return new Scraper(new IngestClient(getIngestBaseUrl(), apiKey ?? ""), {
    tracker: useDatabase ? new PgRunTracker() : new NoopRunTracker(),
    registry: useDatabase ? new PgSourceRegistry() : null,
    crawlDelayMs: getCrawlDelayMs(),
  });
};

const finishRun = (results: ScrapeResult[], options: ScrapeOptions, reportPath: string | null) => {
  const report = buildRunReport(results, options.dryRun ?? false);
  if (reportPath) {
    writeRunReport(report, reportPath);
    console.log(`[scrape] report written to ${reportPath}`);
  }
  writeRunSummary(report);
};

const printSingle = (result: ScrapeResult) => {
  if (result.error) {
    console.error(formatResultLine(result));
    process.exitCode = 1;
    return;
  }
  console.log(formatResultLine(result));
};

const selectorsFromFlags = (values: CliValues, base: SelectorConfig = {}): SelectorConfig => ({
  ...base,
  ...(values["event-list"] ? { eventList: values["event-list"] } : {}),
  ...(values.name ? { name: values.name } : {}),
  ...(values["start-date"] ? { startDate: values["start-date"] } : {}),
  ...(values["end-date"] ? { endDate: values["end-date"] } : {}),
  ...(values.location ? { location: values.location } : {}),
  ...(values.description ? { description: values.description } : {}),
  ...(values.url ? { url: values.url } : {}),
  ...(values.image ? { image: values.image } : {}),
  ...(values.pagination ? { pagination: values.pagination } : {}),
});

const testSelectors = async (rawUrl: string, values: CliValues, signal: AbortSignal) => {
  const parsed = parseHttpUrl(rawUrl);
  if (!parsed) {
    throw new Error(`invalid URL "${rawUrl}": missing scheme or host`);
  }

  const base: SourceConfig = values.config ? loadSourceConfig(values.config) : adHocSource(parsed, rawUrl);
  const maxPages = parseLimit(values["max-pages"]);
  const source: SourceConfig = {
    ...base,
    url: rawUrl,
    tier: 1,
    maxPages: maxPages || base.maxPages,
    selectors: selectorsFromFlags(values, base.selectors),
  };
  if (!source.selectors?.eventList) {
    throw new Error("--event-list (or --config with selectors.event_list) is required");
  }

  const events = await scrapeWithSelectors(source, { signal, delayMs: getCrawlDelayMs() });
  console.log(formatRawEvents(events));
};

const syncSources = async (sourcesDir: string) => {
  if (!getDatabaseUrl()) {
    throw new Error("Missing required env var: DATABASE_URL");
  }
  const { sources, error } = loadSourceConfigs(sourcesDir);
  if (error) {
    console.warn(`[scrape] ${error.message}`);
  }
  if (!sources.length) {
    console.log(`No source configs found in ${sourcesDir}`);
    return;
  }

  const registry = new PgSourceRegistry();
  let created = 0;
  let updated = 0;
  for (const source of sources) {
    try {
      const result = await registry.upsert(source);
      if (result.created) {
        created += 1;
      } else {
        updated += 1;
      }
    } catch (upsertError) {
      console.warn(`[scrape] upsert ${source.name} failed:`, errorMessage(upsertError));
    }
  }
  console.log(`Sync complete: ${created} created, ${updated} updated (total ${sources.length} sources)`);
};

const main = async () => {
  loadDotEnv();
  const { values, positionals } = parseCli();
  const [command, target] = positionals;

  if (values.help || !command) {
    console.log(USAGE);
    return;
  }

  const controller = new AbortController();
  const interrupt = () => controller.abort(new Error("interrupted"));
  process.once("SIGINT", interrupt);
  process.once("SIGTERM", interrupt);

  const options: ScrapeOptions = {
    dryRun: values["dry-run"] || isDryRun(),
    limit: values.limit !== undefined ? parseLimit(values.limit) : getScrapeLimit(),
    sourcesDir: values.sources ?? getSourcesDir(),
    signal: controller.signal,
  };
  const reportPath = values.report ?? getReportPath();

  try {
    switch (command) {
      case "url": {
        const result = await buildScraper(options.dryRun ?? false).scrapeUrl(requireArg(target, "URL"), options);
        finishRun([result], options, reportPath);
        printSingle(result);
        break;
      }
      case "source": {
        const result = await buildScraper(options.dryRun ?? false).scrapeSource(
          requireArg(target, "source name"),
          options,
        );
        finishRun([result], options, reportPath);
        printSingle(result);
        break;
      }
      case "all": {
        const results = await buildScraper(options.dryRun ?? false).scrapeAll(options);
        finishRun(results, options, reportPath);
        console.log(formatResultsTable(results));
        if (results.some((result) => result.error)) {
          console.error("One or more sources failed");
          process.exitCode = 1;
        }
        break;
      }
      case "list": {
        const sources = await buildScraper(true).listSources(options);
        if (!sources.length) {
          console.log(`No source configs found (registry empty and no YAML files in ${options.sourcesDir})`);
          break;
        }
        console.log(formatSourcesTable(sources));
        break;
      }
      case "inspect": {
        const result = await inspectUrl(requireArg(target, "URL"), { signal: controller.signal });
        console.log(formatInspectResult(result));
        break;
      }
      case "test":
        await testSelectors(requireArg(target, "URL"), values, controller.signal);
        break;
      case "sync":
        await syncSources(options.sourcesDir ?? getSourcesDir());
        break;
      default:
        throw new Error(`unknown command "${command}"\n\n${USAGE}`);
    }
  } finally {
    process.off("SIGINT", interrupt);
    process.off("SIGTERM", interrupt);
    await closePool();
  }
};

main().catch((error) => {
  console.error("Scrape failed:", errorMessage(error));
  process.exitCode = 1;
});
