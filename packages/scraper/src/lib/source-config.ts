import { existsSync, readdirSync, readFileSync } from "fs";
import { extname, join } from "path";
import { parse } from "yaml";
import { z } from "zod";
import {
  DEFAULT_MAX_PAGES,
  DEFAULT_SCHEDULE,
  DEFAULT_TIER,
  DEFAULT_TRUST_LEVEL,
  SCHEDULES,
  SOURCE_FILE_EXTENSION,
} from "../config/sources";
import { SourceConfigError, errorMessage } from "./errors";
import { asRecord } from "./jsonld-values";
import type { Schedule, SelectorConfig, SourceConfig, Tier } from "./types";
import { parseHttpUrl } from "./url";

const optionalString = z.string().nullish();
const optionalInt = z.number().int().nullish();

const SelectorFileSchema = z.object({
  event_list: optionalString,
  name: optionalString,
  start_date: optionalString,
  end_date: optionalString,
  location: optionalString,
  description: optionalString,
  url: optionalString,
  image: optionalString,
  pagination: optionalString,
});

/** On-disk (and registry) shape of one source definition. */
export const SourceFileSchema = z.object({
  name: optionalString,
  url: optionalString,
  tier: optionalInt,
  schedule: optionalString,
  trust_level: optionalInt,
  license: optionalString,
  enabled: z.boolean().nullish(),
  event_url_pattern: optionalString,
  max_pages: optionalInt,
  notes: optionalString,
  selectors: SelectorFileSchema.nullish(),
});

export type SourceFile = z.infer<typeof SourceFileSchema>;
export type SelectorFile = z.infer<typeof SelectorFileSchema>;

/** A parsed definition before validation; tier and schedule are not narrowed yet. */
export type SourceDraft = Omit<SourceConfig, "tier" | "schedule"> & {
  tier: number;
  schedule: string;
};

export type SourceConfigLoadResult = {
  sources: SourceConfig[];
  error: SourceConfigError | null;
};

export const defaultSourceConfig = (): SourceDraft => ({
  name: "",
  url: "",
  tier: DEFAULT_TIER,
  schedule: DEFAULT_SCHEDULE,
  trustLevel: DEFAULT_TRUST_LEVEL,
  license: "",
  enabled: true,
  maxPages: DEFAULT_MAX_PAGES,
});

const compactSelectors = (selectors: SelectorFile | null | undefined): SelectorConfig | undefined => {
  if (!selectors) {
    return undefined;
  }
  const mapped: SelectorConfig = {
    eventList: selectors.event_list ?? undefined,
    name: selectors.name ?? undefined,
    startDate: selectors.start_date ?? undefined,
    endDate: selectors.end_date ?? undefined,
    location: selectors.location ?? undefined,
    description: selectors.description ?? undefined,
    url: selectors.url ?? undefined,
    image: selectors.image ?? undefined,
    pagination: selectors.pagination ?? undefined,
  };
  const entries = Object.entries(mapped).filter(([, value]) => value !== undefined && value !== "");
  return entries.length ? Object.fromEntries(entries) : undefined;
};

const draftFromFile = (file: SourceFile): SourceDraft => {
  const defaults = defaultSourceConfig();
  return {
    name: file.name ?? defaults.name,
    url: file.url ?? defaults.url,
    tier: file.tier ?? defaults.tier,
    schedule: file.schedule ?? defaults.schedule,
    // 0 means "not set" for these two, matching an omitted key
    trustLevel: file.trust_level || defaults.trustLevel,
    license: file.license ?? defaults.license,
    enabled: file.enabled ?? defaults.enabled,
    eventUrlPattern: file.event_url_pattern ?? undefined,
    maxPages: file.max_pages || defaults.maxPages,
    notes: file.notes ?? undefined,
    selectors: compactSelectors(file.selectors),
  };
};

const isTier = (value: number): value is Tier => value === 0 || value === 1;

const isSchedule = (value: string): value is Schedule =>
  SCHEDULES.some((schedule) => schedule === value);

/** Returns every problem with the draft; an empty list means it is valid. */
export const validateSourceConfig = (draft: SourceDraft): string[] => {
  const problems: string[] = [];

  if (!draft.name.trim()) {
    problems.push("name: required");
  }

  if (!draft.url.trim()) {
    problems.push("url: required");
  } else if (!parseHttpUrl(draft.url)) {
    problems.push(`url: must be a valid http/https URL, got "${draft.url}"`);
  }

  if (!isTier(draft.tier)) {
    problems.push(`tier: must be 0 or 1, got ${draft.tier}`);
  }

  if (draft.trustLevel < 1 || draft.trustLevel > 10) {
    problems.push(`trust_level: must be 1-10, got ${draft.trustLevel}`);
  }

  if (draft.tier === 1 && !draft.selectors?.eventList?.trim()) {
    problems.push("selectors.event_list: required for tier 1");
  }

  if (draft.schedule && !isSchedule(draft.schedule)) {
    problems.push(`schedule: must be daily, weekly, or manual, got "${draft.schedule}"`);
  }

  if (draft.maxPages < 0) {
    problems.push(`max_pages: must be > 0, got ${draft.maxPages}`);
  }

  return problems;
};

type BuildResult = { config: SourceConfig; problems: [] } | { config: null; problems: string[] };

/** Shape-checks an untyped definition, applies defaults and validates it. */
export const buildSourceConfig = (input: unknown): BuildResult => {
  const parsed = SourceFileSchema.safeParse(input ?? {});
  if (!parsed.success) {
    return {
      config: null,
      problems: parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`),
    };
  }

  const draft = draftFromFile(parsed.data);
  const problems = validateSourceConfig(draft);
  if (problems.length || !isTier(draft.tier)) {
    return { config: null, problems };
  }

  return {
    config: {
      ...draft,
      tier: draft.tier,
      schedule: isSchedule(draft.schedule) ? draft.schedule : DEFAULT_SCHEDULE,
    },
    problems: [],
  };
};

const readYaml = (path: string): unknown => {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (error) {
    throw new SourceConfigError(`loading ${path}: ${errorMessage(error)}`);
  }
  try {
    return parse(text);
  } catch (error) {
    throw new SourceConfigError(`loading ${path}: parsing YAML: ${errorMessage(error)}`);
  }
};

/** Loads and validates one definition file; any problem rejects it. */
export const loadSourceConfig = (path: string): SourceConfig => {
  const { config, problems } = buildSourceConfig(readYaml(path));
  if (!config) {
    throw new SourceConfigError(`${path}: ${problems.join("; ")}`, [`${path}: ${problems.join("; ")}`]);
  }
  return config;
};

/**
 * Loads every `*.yaml` file directly inside `dir`, skipping names that start
 * with an underscore. A missing directory yields no sources. Invalid files are
 * collected into one error while the valid ones are still returned; unreadable
 * or syntactically broken YAML aborts the whole load.
 */
export const loadSourceConfigs = (dir: string): SourceConfigLoadResult => {
  if (!existsSync(dir)) {
    return { sources: [], error: null };
  }

  let entries;
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    throw new SourceConfigError(`reading source config dir ${dir}: ${errorMessage(error)}`);
  }

  const sources: SourceConfig[] = [];
  const problems: string[] = [];
  const seen = new Map<string, string>();

  const files = entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .filter((name) => !name.startsWith("_") && extname(name) === SOURCE_FILE_EXTENSION)
    .sort();

  for (const name of files) {
    const path = join(dir, name);
    const { config, problems: fileProblems } = buildSourceConfig(readYaml(path));
    if (!config) {
      problems.push(`${path}: ${fileProblems.join("; ")}`);
      continue;
    }

    const key = config.name.toLowerCase();
    const firstPath = seen.get(key);
    if (firstPath) {
      problems.push(`${path}: duplicate source name "${config.name}" (already defined in ${firstPath})`);
      continue;
    }
    seen.set(key, path);
    sources.push(config);
  }

  const error = problems.length
    ? new SourceConfigError(`invalid source configs:\n  ${problems.join("\n  ")}`, problems)
    : null;
  return { sources, error };
};

const selectorsToFile = (selectors: SelectorConfig | undefined): SelectorFile | null => {
  if (!selectors) {
    return null;
  }
  return {
    event_list: selectors.eventList,
    name: selectors.name,
    start_date: selectors.startDate,
    end_date: selectors.endDate,
    location: selectors.location,
    description: selectors.description,
    url: selectors.url,
    image: selectors.image,
    pagination: selectors.pagination,
  };
};

export const sourceConfigFromRecord = (row: unknown): SourceConfig => {
  const { config, problems } = buildSourceConfig(row);
  if (!config) {
    const name = asRecord(row)?.name;
    throw new SourceConfigError(`source ${typeof name === "string" ? name : "?"}: ${problems.join("; ")}`, problems);
  }
  return config;
};

export type SourceRecordParams = {
  name: string;
  url: string;
  tier: number;
  schedule: string;
  trust_level: number;
  license: string;
  enabled: boolean;
  max_pages: number;
  event_url_pattern: string | null;
  selectors: SelectorFile | null;
  notes: string;
};

export const sourceConfigToRecord = (config: SourceConfig): SourceRecordParams => ({
  name: config.name,
  url: config.url,
  tier: config.tier,
  schedule: config.schedule,
  trust_level: config.trustLevel,
  license: config.license,
  enabled: config.enabled,
  max_pages: config.maxPages,
  event_url_pattern: config.eventUrlPattern ?? null,
  selectors: selectorsToFile(config.selectors),
  notes: config.notes ?? "",
});
