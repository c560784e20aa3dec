import * as cheerio from "cheerio";
import { domainOf, normalizeUrl } from "../../../common/helpers/url.helper";

const SECTION_PATH_KEYWORDS = [
  "about",
  "a-propos",
  "apropos",
  "qui-sommes-nous",
  "presentation",
  "services",
  "solutions",
  "offres",
  "prestations",
  "expertise",
  "contact",
  "team",
  "equipe",
  "clients",
  "references",
  "portfolio",
  "careers",
  "jobs",
  "recrutement",
  "carriere",
  "technologies",
  "stack",
];

const EXCLUDED_LINK =
  /facebook|linkedin|instagram|twitter|youtube|privacy|confidentialite|terms|mentions-legales|cgu|login|signin|sign-in|cart|panier/i;

const NON_HTML_RESOURCE =
  /\.(pdf|jpe?g|png|gif|svg|webp|zip|docx?|xlsx?|pptx?|mp4|mp3)$/i;

/**
 * Same-domain links whose path names a profile section, in document order
 */
export function discoverSectionLinks(
  html: string,
  baseUrl: string,
  limit: number,
): string[] {
  if (limit <= 0) {
    return [];
  }

  const $ = cheerio.load(html);
  const baseDomain = domainOf(baseUrl);
  const baseKey = normalizeUrl(baseUrl);
  const found: string[] = [];
  const seen = new Set<string>([baseKey]);

  $("a[href]").each((_, element) => {
    if (found.length >= limit) {
      return false;
    }

    const href = ($(element).attr("href") ?? "").trim();
    if (
      !href ||
      href.startsWith("#") ||
      /^(mailto|tel|javascript):/i.test(href)
    ) {
      return undefined;
    }

    let absolute: URL;
    try {
      absolute = new URL(href, baseUrl);
    } catch {
      return undefined;
    }
    if (absolute.protocol !== "http:" && absolute.protocol !== "https:") {
      return undefined;
    }

    const path = absolute.pathname.toLowerCase();
    if (
      domainOf(absolute.toString()) !== baseDomain ||
      EXCLUDED_LINK.test(absolute.toString()) ||
      NON_HTML_RESOURCE.test(path) ||
      !SECTION_PATH_KEYWORDS.some((keyword) => path.includes(keyword))
    ) {
      return undefined;
    }

    absolute.search = "";
    const key = normalizeUrl(absolute.toString());
    if (!seen.has(key)) {
      seen.add(key);
      found.push(key);
    }
    return undefined;
  });

  return found;
}
