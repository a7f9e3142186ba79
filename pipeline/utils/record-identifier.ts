import type { RecordIdentifier } from "../../packages/shared/src/contracts.js";

/**
 * Reduce a profile URL to its identity: lower-cased scheme and host, no query
 * string, no fragment, no trailing slash. Relative hrefs are resolved against
 * `baseUrl`. Returns null for anything that is not an http(s) URL.
 */
export const canonicalizeRecordUrl = (
  href: string,
  baseUrl?: string
): RecordIdentifier | null => {
  const trimmed = href.trim();
  if (!trimmed) {
    return null;
  }

  let url: URL;
  try {
    url = baseUrl ? new URL(trimmed, baseUrl) : new URL(trimmed);
  } catch {
    return null;
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    return null;
  }

  const pathname = url.pathname.replace(/\/+$/, "") || "/";
  return `${url.protocol}//${url.host}${pathname}`;
};
