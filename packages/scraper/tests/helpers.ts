import { vi } from "vitest";
import type { SourceConfig } from "../src/lib/types";

export type Route =
  | string
  | { status?: number; body?: string }
  | ((init?: RequestInit) => Response | Promise<Response>);

const urlOf = (input: string | URL | Request) =>
  typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;

/**
 * Replaces global fetch with an in-process router keyed by absolute URL.
 * Unknown URLs answer 404, so robots.txt is permissive unless routed.
 */
export const stubFetch = (routes: Record<string, Route>) => {
  const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const route = routes[urlOf(input)];
    if (route === undefined) {
      return new Response("not found", { status: 404 });
    }
    if (typeof route === "function") {
      return route(init);
    }
    if (typeof route === "string") {
      return new Response(route, { status: 200 });
    }
    return new Response(route.body ?? "", { status: route.status ?? 200 });
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
};

export const requestedUrls = (fetchMock: ReturnType<typeof stubFetch>) =>
  fetchMock.mock.calls.map(([input]) => urlOf(input));

export const buildSource = (overrides: Partial<SourceConfig> = {}): SourceConfig => ({
  name: "test-venue",
  url: "https://venue.test/events",
  tier: 0,
  schedule: "manual",
  trustLevel: 5,
  license: "CC0-1.0",
  enabled: true,
  maxPages: 10,
  ...overrides,
});

export const jsonLdPage = (...blocks: string[]) =>
  `<html><head>${blocks
    .map((block) => `<script type="application/ld+json">${block}</script>`)
    .join("")}</head><body></body></html>`;
