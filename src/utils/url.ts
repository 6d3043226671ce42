/**
 * URL helpers for channel locations.
 */

const TOKEN_PATTERN = /\/t\/([\w-]+)(?=\/|$)/;

/**
 * Joins URL segments with exactly one slash between them.
 * Empty segments are skipped.
 */
export function joinUrl(base: string, ...parts: string[]): string {
  const segments = [base.replace(/\/+$/, "")];
  for (const part of parts) {
    const trimmed = part.replace(/^\/+/, "").replace(/\/+$/, "");
    if (trimmed) {
      segments.push(trimmed);
    }
  }
  return segments.join("/");
}

/**
 * Returns the URL without its last path segment (`.../conda-forge/noarch` →
 * `.../conda-forge`).
 */
export function urlDirname(url: string): string {
  const trimmed = url.replace(/\/+$/, "");
  const lastSlash = trimmed.lastIndexOf("/");
  const schemeEnd = trimmed.indexOf("://");
  if (lastSlash === -1 || (schemeEnd !== -1 && lastSlash <= schemeEnd + 2)) {
    return trimmed;
  }
  return trimmed.slice(0, lastSlash);
}

/**
 * Extracts the channel token embedded as `/t/<token>/` in a URL.
 */
export function extractToken(url: string): string | undefined {
  return TOKEN_PATTERN.exec(url)?.[1];
}

/**
 * Removes an embedded `/t/<token>` segment so the URL can be shown to users.
 */
export function stripToken(url: string): string {
  return url.replace(TOKEN_PATTERN, "");
}

/**
 * Host and path of a URL without its scheme or trailing slash, used to test
 * whether another URL lives under it.
 */
export function urlLocation(url: string): string {
  return url.replace(/^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//, "").replace(/\/+$/, "");
}

/**
 * Percent-decodes a URL for display, returning it unchanged when it is not
 * valid percent-encoding.
 */
export function maybeUnquote(url: string): string {
  try {
    return decodeURIComponent(url);
  } catch {
    return url;
  }
}
