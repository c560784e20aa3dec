import * as cheerio from "cheerio";
import * as crypto from "crypto";
import { SourceCategory } from "../../../core/records";
import { domainOf, normalizeUrl } from "../../../common/helpers/url.helper";

/**
 * Query parameters listing sites commonly page with, tried in this order
 */
export const PAGINATION_PARAMS = ["page", "p", "start", "offset"] as const;
export type PaginationParam = (typeof PAGINATION_PARAMS)[number];

export const PAGINATED_CATEGORIES: readonly SourceCategory[] = [
  "directory",
  "freelance",
];

const NEXT_LINK_TEXT = /^(next|suivant|page suivante)\b|^[›»→]$/i;

export interface ListingCandidate {
  url: string;
  /** query parameter the URL was built with, null for a followed link */
  param: PaginationParam | null;
}

export function paginatedUrl(
  url: string,
  param: PaginationParam,
  pageNumber: number,
): string {
  const target = new URL(url);
  target.searchParams.set(param, String(pageNumber));
  return normalizeUrl(target.toString());
}

/**
 * Same-site "next page" link of a listing: rel=next first, then an anchor
 * labelled next/suivant.
 */
export function findNextPageLink(html: string, baseUrl: string): string | null {
  const $ = cheerio.load(html);
  const baseDomain = domainOf(baseUrl);
  const baseKey = normalizeUrl(baseUrl);

  const hrefs = [
    ...$('link[rel~="next"][href], a[rel~="next"][href]')
      .toArray()
      .map((element) => $(element).attr("href")),
    ...$("a[href]")
      .toArray()
      .filter((element) => {
        const label =
          $(element).attr("aria-label") ?? $(element).text().trim();
        return NEXT_LINK_TEXT.test(label.trim());
      })
      .map((element) => $(element).attr("href")),
  ];

  for (const href of hrefs) {
    const trimmed = (href ?? "").trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }
    let absolute: URL;
    try {
      absolute = new URL(trimmed, baseUrl);
    } catch {
      continue;
    }
    if (absolute.protocol !== "http:" && absolute.protocol !== "https:") {
      continue;
    }
    const key = normalizeUrl(absolute.toString());
    if (key !== baseKey && domainOf(key) === baseDomain) {
      return key;
    }
  }
  return null;
}

/**
 * URLs to try for listing page `pageNumber`: the next link of the current
 * page, then the entry URL with each pagination parameter. Once a
 * parameter has worked only that one is tried.
 */
export function listingCandidates(
  currentHtml: string,
  currentUrl: string,
  entryUrl: string,
  pageNumber: number,
  knownParam: PaginationParam | null,
): ListingCandidate[] {
  const candidates: ListingCandidate[] = [];
  const next = findNextPageLink(currentHtml, currentUrl);
  if (next) {
    candidates.push({ url: next, param: null });
  }

  const params = knownParam ? [knownParam] : PAGINATION_PARAMS;
  for (const param of params) {
    const url = paginatedUrl(entryUrl, param, pageNumber);
    if (!candidates.some((candidate) => candidate.url === url)) {
      candidates.push({ url, param });
    }
  }
  return candidates;
}

/**
 * Hash of the visible text, null for a page without any. Two listing pages
 * with the same signature are the same page served under another URL.
 */
export function contentSignature(html: string): string | null {
  const $ = cheerio.load(html);
  $("script, style, noscript, template, svg").remove();
  const text = $("body").text().replace(/\s+/g, " ").trim();
  if (!text) {
    return null;
  }
  return crypto.createHash("sha256").update(text).digest("hex").slice(0, 16);
}
