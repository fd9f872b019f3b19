const normalizeHostname = (hostname: string) => hostname.toLowerCase();

export const parseHttpUrl = (input: string): URL | null => {
  try {
    const url = new URL(input);
    if ((url.protocol !== "http:" && url.protocol !== "https:") || !url.hostname) {
      return null;
    }
    return url;
  } catch {
    return null;
  }
};

export const getHostname = (input: string): string | null => {
  try {
    const url = new URL(input);
    return url.hostname ? normalizeHostname(url.hostname) : null;
  } catch {
    return null;
  }
};

/** Resolves `href` against `base`, returning null for empty, unparsable or non-http targets. */
export const resolveUrl = (href: string | undefined, base: string): string | null => {
  const trimmed = href?.trim();
  if (!trimmed) {
    return null;
  }
  try {
    const url = new URL(trimmed, base);
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      return null;
    }
    return url.toString();
  } catch {
    return null;
  }
};

export const robotsUrlFor = (input: URL) => `${input.protocol}//${input.host}/robots.txt`;

export const stripFragment = (input: string) => {
  const url = new URL(input);
  url.hash = "";
  return url.toString();
};
