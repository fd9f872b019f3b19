import { MAX_BODY_BYTES, PAGE_FETCH_TIMEOUT_MS, USER_AGENT } from "../config/sources";
import { FetchError, errorMessage } from "./errors";

export type FetchPageOptions = {
  signal?: AbortSignal;
  timeoutMs?: number;
  maxBytes?: number;
  accept?: string;
};

export type PageResponse = {
  url: string;
  status: number;
  body: string;
};

const readCapped = async (response: Response, maxBytes: number) => {
  if (!response.body) {
    return "";
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let received = 0;
  let text = "";

  try {
    while (received < maxBytes) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      const remaining = maxBytes - received;
      const chunk = value.byteLength > remaining ? value.subarray(0, remaining) : value;
      received += chunk.byteLength;
      text += decoder.decode(chunk, { stream: true });
    }
  } finally {
    if (received >= maxBytes) {
      await reader.cancel();
    }
    reader.releaseLock();
  }

  return text + decoder.decode();
};

/**
 * GETs `url` with the scraper User-Agent. Redirects are never followed: a 3xx
 * comes back as-is so callers cannot be bounced into private address space.
 * The body is truncated at `maxBytes`.
 */
export const fetchPage = async (url: string, options: FetchPageOptions = {}): Promise<PageResponse> => {
  const { signal, timeoutMs = PAGE_FETCH_TIMEOUT_MS, maxBytes = MAX_BODY_BYTES } = options;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(new Error(`timed out after ${timeoutMs}ms`)), timeoutMs);
  const onAbort = () => controller.abort(signal?.reason);

  if (signal?.aborted) {
    controller.abort(signal.reason);
  } else {
    signal?.addEventListener("abort", onAbort, { once: true });
  }

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      redirect: "manual",
      headers: {
        "User-Agent": USER_AGENT,
        Accept: options.accept ?? "text/html,application/xhtml+xml",
      },
    });
    const body = await readCapped(response, maxBytes);
    return { url, status: response.status, body };
  } catch (error) {
    if (error instanceof FetchError) {
      throw error;
    }
    throw new FetchError(`fetching "${url}": ${errorMessage(error)}`, url, null, { cause: error });
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener("abort", onAbort);
  }
};

export const fetchHtml = async (url: string, options: FetchPageOptions = {}) => {
  const page = await fetchPage(url, options);
  if (page.status !== 200) {
    throw new FetchError(`unexpected status ${page.status} fetching "${url}"`, url, page.status);
  }
  return page.body;
};
