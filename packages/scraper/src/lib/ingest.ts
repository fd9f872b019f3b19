import { z } from "zod";
import {
  DRY_RUN_BATCH_ID,
  INGEST_BATCH_PATH,
  INGEST_CHUNK_SIZE,
  INGEST_TIMEOUT_MS,
  USER_AGENT,
} from "../config/sources";
import { FetchError, IngestHttpError, RateLimitError, bodySnippet, errorMessage } from "./errors";
import type { EventInput, IngestError, IngestResult, OrganizationInput, PlaceInput } from "./types";

const IngestResponseSchema = z.object({
  batch_id: z.string().nullish(),
  events_created: z.number().int().nullish(),
  events_duplicate: z.number().int().nullish(),
  events_failed: z.number().int().nullish(),
  errors: z
    .array(z.object({ index: z.number().int().nullish(), message: z.string().nullish() }))
    .nullish(),
});

type IngestResponse = z.infer<typeof IngestResponseSchema>;

export type IngestClientOptions = {
  timeoutMs?: number;
  chunkSize?: number;
};

export const emptyIngestResult = (): IngestResult => ({
  batchId: "",
  eventsCreated: 0,
  eventsDuplicate: 0,
  eventsFailed: 0,
});

export const chunk = <T>(items: T[], size: number): T[][] => {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
};

const withJsonLdId = <T extends { id?: string }>(value: T | undefined) => {
  if (!value) {
    return undefined;
  }
  const { id, ...rest } = value;
  return id ? { "@id": id, ...rest } : rest;
};

/** Wire shape expected by the batch endpoint: JSON-LD keywords for type and ids. */
export const toWireEvent = (event: EventInput) => {
  const { type, location, organizer, ...rest } = event;
  return {
    "@type": type,
    ...rest,
    location: withJsonLdId<PlaceInput>(location),
    organizer: withJsonLdId<OrganizationInput>(organizer),
  };
};

const parseIngestResponse = (payload: IngestResponse): IngestResult => {
  const errors: IngestError[] | undefined = payload.errors?.map((error) => ({
    index: error.index ?? -1,
    message: error.message ?? "",
  }));
  return {
    batchId: payload.batch_id ?? "",
    eventsCreated: payload.events_created ?? 0,
    eventsDuplicate: payload.events_duplicate ?? 0,
    eventsFailed: payload.events_failed ?? 0,
    ...(errors?.length ? { errors } : {}),
  };
};

export class IngestClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly chunkSize: number;

  constructor(
    baseUrl: string,
    private readonly apiKey: string,
    options: IngestClientOptions = {},
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? INGEST_TIMEOUT_MS;
    this.chunkSize = options.chunkSize ?? INGEST_CHUNK_SIZE;
  }

  /**
   * POSTs events in chunks of at most `chunkSize`. Counts are summed across
   * chunks and the last batch id wins. Nothing is retried: the first failing
   * chunk rejects the whole call.
   */
  async submitBatch(events: EventInput[], signal?: AbortSignal): Promise<IngestResult> {
    const total = emptyIngestResult();
    if (!events.length) {
      return total;
    }

    const chunks = chunk(events, this.chunkSize);
    let offset = 0;
    for (const [index, part] of chunks.entries()) {
      console.log(`[ingest] submitting chunk ${index + 1}/${chunks.length} (${part.length} events)`);
      const result = await this.postChunk(part, signal);
      total.batchId = result.batchId || total.batchId;
      total.eventsCreated += result.eventsCreated;
      total.eventsDuplicate += result.eventsDuplicate;
      total.eventsFailed += result.eventsFailed;
      if (result.errors?.length) {
        const shifted = result.errors.map((error) => ({ ...error, index: error.index + offset }));
        total.errors = [...(total.errors ?? []), ...shifted];
      }
      offset += part.length;
    }
    return total;
  }

  async submitBatchDryRun(events: EventInput[]): Promise<IngestResult> {
    return {
      batchId: DRY_RUN_BATCH_ID,
      eventsCreated: events.length,
      eventsDuplicate: 0,
      eventsFailed: 0,
    };
  }

  submit(events: EventInput[], dryRun: boolean, signal?: AbortSignal): Promise<IngestResult> {
    if (!events.length) {
      return Promise.resolve(emptyIngestResult());
    }
    return dryRun ? this.submitBatchDryRun(events) : this.submitBatch(events, signal);
  }

  private async postChunk(events: EventInput[], signal?: AbortSignal): Promise<IngestResult> {
    const url = `${this.baseUrl}${INGEST_BATCH_PATH}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(new Error(`timed out after ${this.timeoutMs}ms`)), this.timeoutMs);
    const onAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) {
      controller.abort(signal.reason);
    } else {
      signal?.addEventListener("abort", onAbort, { once: true });
    }

    let status: number;
    let body: string;
    try {
      const response = await fetch(url, {
        method: "POST",
        signal: controller.signal,
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
          "User-Agent": USER_AGENT,
        },
        body: JSON.stringify({ events: events.map(toWireEvent) }),
      });
      status = response.status;
      body = await response.text();
    } catch (error) {
      throw new FetchError(`send request: ${errorMessage(error)}`, url, null, { cause: error });
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onAbort);
    }

    if (status === 429) {
      throw new RateLimitError(body);
    }
    if (status < 200 || status >= 300) {
      throw new IngestHttpError(status, body);
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error) {
      throw new Error(`parse response: ${errorMessage(error)}`);
    }
    if (!json || typeof json !== "object" || Array.isArray(json)) {
      throw new Error(`parse response: expected a JSON object, got ${bodySnippet(body)}`);
    }
    const parsed = IngestResponseSchema.safeParse(json);
    if (!parsed.success) {
      const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      throw new Error(`parse response: ${problems.join("; ")}`);
    }
    return parseIngestResponse(parsed.data);
  }
}
