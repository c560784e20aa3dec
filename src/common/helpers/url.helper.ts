const TRACKING_PARAM = /^(utm_\w+|gclid|fbclid|mc_cid|mc_eid)$/i;

/**
 * Canonical form used for visited-URL dedup: lowercase scheme and host,
 * no fragment, no tracking parameters, sorted query, no trailing slash.
 */
export function normalizeUrl(rawUrl: string): string {
  const url = new URL(rawUrl.trim());
  url.hash = "";
  url.hostname = url.hostname.toLowerCase();

  const params = [...url.searchParams.entries()]
    .filter(([key]) => !TRACKING_PARAM.test(key))
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  url.search = "";
  for (const [key, value] of params) {
    url.searchParams.append(key, value);
  }

  let normalized = url.toString();
  if (url.pathname !== "/" && normalized.endsWith("/") && !url.search) {
    normalized = normalized.slice(0, -1);
  } else if (url.pathname === "/" && !url.search) {
    normalized = normalized.replace(/\/$/, "");
  }
  return normalized;
}

/**
 * Registrable-looking host of a URL: lowercase, without a leading "www."
 */
export function domainOf(rawUrl: string): string {
  const host = new URL(rawUrl.trim()).hostname.toLowerCase();
  return host.startsWith("www.") ? host.slice(4) : host;
}

export function tryDomainOf(rawUrl: string | null | undefined): string | null {
  if (!rawUrl) {
    return null;
  }
  try {
    return domainOf(rawUrl);
  } catch {
    return null;
  }
}
