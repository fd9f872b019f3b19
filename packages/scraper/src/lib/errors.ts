const SNIPPET_LENGTH = 200;

export const bodySnippet = (body: string) =>
  body.length > SNIPPET_LENGTH ? body.slice(0, SNIPPET_LENGTH) : body;

export class SourceConfigError extends Error {
  readonly problems: string[];

  constructor(message: string, problems: string[] = []) {
    super(message);
    this.name = "SourceConfigError";
    this.problems = problems;
  }
}

export class RobotsDisallowedError extends Error {
  readonly url: string;

  constructor(url: string) {
    super(`scraping disallowed by robots.txt for "${url}"`);
    this.name = "RobotsDisallowedError";
    this.url = url;
  }
}

export class FetchError extends Error {
  readonly url: string;
  readonly status: number | null;

  constructor(message: string, url: string, status: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FetchError";
    this.url = url;
    this.status = status;
  }
}

export class NormalizeError extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = "NormalizeError";
  }
}

export class IngestHttpError extends Error {
  readonly status: number;
  readonly snippet: string;

  constructor(status: number, body: string, message?: string) {
    const snippet = bodySnippet(body);
    super(message ?? `unexpected status ${status}: ${snippet}`);
    this.name = "IngestHttpError";
    this.status = status;
    this.snippet = snippet;
  }
}

export class RateLimitError extends IngestHttpError {
  constructor(body: string) {
    super(429, body, `rate limited (HTTP 429): ${bodySnippet(body)}`);
    this.name = "RateLimitError";
  }
}

export const errorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

export const toError = (error: unknown) =>
  error instanceof Error ? error : new Error(String(error));
