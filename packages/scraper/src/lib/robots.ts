import robotsParser from "robots-parser";
import { ROBOTS_FETCH_TIMEOUT_MS, USER_AGENT } from "../config/sources";
import { FetchError } from "./errors";
import { fetchPage } from "./fetcher";
import { robotsUrlFor } from "./url";

const ABSENT_STATUSES = new Set([404, 410]);
const MAX_ROBOTS_BYTES = 512 * 1024;

export type RobotsPolicy = {
  isAllowed: (url: string) => boolean;
};

const ALLOW_ALL: RobotsPolicy = { isAllowed: () => true };

/**
 * Loads the robots.txt policy for the origin of `pageUrl`. A 404/410 means no
 * policy. Network failures surface as FetchError so each caller decides how
 * strict to be.
 */
export const loadRobotsPolicy = async (
  pageUrl: URL,
  options: { signal?: AbortSignal; userAgent?: string } = {},
): Promise<RobotsPolicy> => {
  const robotsUrl = robotsUrlFor(pageUrl);
  const userAgent = options.userAgent ?? USER_AGENT;

  const response = await fetchPage(robotsUrl, {
    signal: options.signal,
    timeoutMs: ROBOTS_FETCH_TIMEOUT_MS,
    maxBytes: MAX_ROBOTS_BYTES,
    accept: "text/plain",
  });

  if (ABSENT_STATUSES.has(response.status)) {
    return ALLOW_ALL;
  }

  const robots = robotsParser(robotsUrl, response.body);
  return {
    // undefined means the URL is outside this robots.txt's origin
    isAllowed: (url: string) => robots.isAllowed(url, userAgent) !== false,
  };
};

export const checkRobots = async (
  pageUrl: string,
  options: { signal?: AbortSignal; userAgent?: string } = {},
): Promise<boolean> => {
  let parsed: URL;
  try {
    parsed = new URL(pageUrl);
  } catch (error) {
    throw new FetchError(`parsing URL "${pageUrl}"`, pageUrl, null, { cause: error });
  }
  const policy = await loadRobotsPolicy(parsed, options);
  return policy.isAllowed(pageUrl);
};
