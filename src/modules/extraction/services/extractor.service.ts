import { Injectable, Logger } from "@nestjs/common";
import * as cheerio from "cheerio";
import nlp from "compromise";
import * as crypto from "crypto";
import validator from "validator";
import {
  ExtractedField,
  ExtractedRecord,
  PageCapture,
  SECTION_LABELS,
  SectionFields,
  SectionLabel,
} from "../../../core/records";
import {
  SectionSynonyms,
  matchSection,
} from "./section-matchers";
import {
  collapseWhitespace,
  termPattern,
  uniqueInOrder,
} from "../../../common/helpers/text.helper";
import {
  errorMessage,
  errorStack,
} from "../../../common/errors/pipeline.errors";
import sectionSynonyms from "../data/section-synonyms.json";
import technologyDictionary from "../data/technologies.json";
import serviceDictionary from "../data/services.json";

interface DictionaryEntry {
  name: string;
  aliases: string[];
}

/**
 * CSS selectors for structured markup (schema.org, common class names)
 */
const SELECTORS = {
  NAME: '[itemtype*="Organization"] [itemprop="name"]',
  WEBSITE: 'a.company-website, a[itemprop="url"]',
  LOCATION: '[itemtype*="Organization"] [itemprop="address"]',
  DESCRIPTION: 'meta[name="description"]',
};

/**
 * Fallback selectors for unstructured pages, tried in order
 */
const FALLBACK_SELECTORS = {
  NAME: [
    'meta[property="og:site_name"]',
    'meta[name="application-name"]',
    ".company-name",
    ".company-title",
    ".business-name",
    "title",
  ],
  WEBSITE: ['link[rel="canonical"]', 'meta[property="og:url"]'],
  LOCATION: [
    '[itemprop="address"]',
    '[itemprop="location"]',
    ".address",
    ".location",
    ".city",
    "address",
    'meta[name="geo.placename"]',
  ],
  DESCRIPTION: [
    'meta[property="og:description"]',
    'meta[name="twitter:description"]',
  ],
};

const NOISE = "script, style, noscript, template, svg, iframe, object";
const BLOCK_TAGS =
  "h1, h2, h3, h4, h5, h6, p, li, dt, dd, td, th, blockquote, address, figcaption, div, section, article, header, footer, nav, aside, main, form, ul, ol, table, tr";

const EMAIL_REGEX = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;
const PHONE_REGEX = /(?:\+|\b0)[\d\s().-]{7,20}\d/g;
const ASSET_SUFFIX = /\.(png|jpe?g|gif|svg|webp|css|js)$/i;

const OFFER_KEYWORDS = [
  "offre",
  "nos offres",
  "solution",
  "formule",
  "abonnement",
  "devis",
  "tarif",
  "tarifs",
  "pricing",
  "pack",
  "forfait",
  "plan",
  "plans",
  "free trial",
  "essai gratuit",
];

const NOVELTY_KEYWORDS = [
  "nouveau",
  "nouveauté",
  "nouveautés",
  "new",
  "news",
  "launch",
  "launched",
  "lancement",
  "release",
  "update",
  "mise à jour",
  "promotion",
  "promo",
  "événement",
  "actualité",
];

const MAX_SNIPPETS = 10;
const MAX_NER_TEXT_LENGTH = 100000;
const MAX_FIELD_LENGTH = 500;

function compile(entries: DictionaryEntry[]) {
  return entries.map((entry) => ({
    name: entry.name,
    patterns: entry.aliases.map((alias) => termPattern(alias)),
  }));
}

const TECHNOLOGIES = compile(technologyDictionary);
const SERVICES = compile(serviceDictionary);
const SYNONYMS: Record<SectionLabel, SectionSynonyms> = sectionSynonyms;
const OFFER_PATTERNS = OFFER_KEYWORDS.map((keyword) => termPattern(keyword));
const NOVELTY_PATTERNS = NOVELTY_KEYWORDS.map((keyword) =>
  termPattern(keyword),
);

function field<T>(value: T, found: boolean): ExtractedField<T> {
  return { value, found };
}

function textField(value: string | null): ExtractedField<string> {
  return value ? field(value, true) : field("", false);
}

function listField(values: string[]): ExtractedField<string[]> {
  return field(values, values.length > 0);
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

function toStrings(value: unknown): string[] {
  return Array.isArray(value)
    ? value.filter((item): item is string => typeof item === "string")
    : [];
}

/**
 * Turns one capture's markup into an ExtractedRecord. Missing data is
 * reported through `found: false`; this never throws.
 */
@Injectable()
export class ExtractorService {
  private readonly logger = new Logger(ExtractorService.name);

  extract(capture: PageCapture): ExtractedRecord {
    const requestId = crypto.randomUUID();

    try {
      const $ = cheerio.load(capture.html);
      $(NOISE).remove();
      $("br").replaceWith("\n");
      $(BLOCK_TAGS).append("\n");

      const bodyText = this.visibleLines($);
      let ner: { organization: string | null; place: string | null } | null =
        null;
      const nerData = () => {
        ner ??= this.extractWithNER(bodyText);
        return ner;
      };

      const title = this.cleanValue(
        $("title").first().text() ||
          $('meta[property="og:title"]').attr("content") ||
          $("h1").first().text(),
      );

      let name =
        this.cleanValue($(SELECTORS.NAME).first().text()) ??
        this.cleanName(this.tryFallbackSelectors($, FALLBACK_SELECTORS.NAME));
      if (!name) {
        name = nerData().organization;
      }

      let location =
        this.cleanValue($(SELECTORS.LOCATION).first().text()) ??
        this.tryFallbackSelectors($, FALLBACK_SELECTORS.LOCATION);
      if (!location) {
        location = nerData().place;
      }

      const website = this.resolveWebsite(
        $(SELECTORS.WEBSITE).first().attr("href") ??
          this.tryFallbackSelectors($, FALLBACK_SELECTORS.WEBSITE),
        capture.url,
      );

      const description =
        this.cleanValue($(SELECTORS.DESCRIPTION).attr("content")) ??
        this.tryFallbackSelectors($, FALLBACK_SELECTORS.DESCRIPTION);

      const sections = this.extractSections($);
      const lines = bodyText.split("\n");

      const record: ExtractedRecord = {
        captureId: capture.id,
        sourceId: capture.sourceId,
        url: capture.url,
        category: capture.category,
        capturedAt: capture.fetchedAt,
        title: textField(title),
        name: textField(name),
        website: textField(website),
        location: textField(location),
        description: textField(description),
        sections,
        emails: listField(this.extractEmails($, bodyText)),
        phones: listField(this.extractPhones($, bodyText)),
        technologies: listField(this.matchDictionary(bodyText, TECHNOLOGIES)),
        services: listField(this.matchDictionary(bodyText, SERVICES)),
        offers: listField(this.snippets(lines, OFFER_PATTERNS)),
        novelties: listField(this.snippets(lines, NOVELTY_PATTERNS)),
        bodyText,
      };

      this.logger.debug("Capture extracted", {
        operation: "extract",
        requestId,
        captureId: capture.id,
        fields: this.getExtractionMethod(record),
        timestamp: new Date().toISOString(),
      });

      return record;
    } catch (error) {
      this.logger.error(
        "Extraction failed, returning empty record",
        {
          operation: "extract",
          requestId,
          captureId: capture.id,
          error: errorMessage(error),
          timestamp: new Date().toISOString(),
        },
        errorStack(error),
      );
      return emptyRecord(capture);
    }
  }

  /**
   * Visible text, one block per line, case-insensitive duplicates removed
   */
  private visibleLines($: cheerio.CheerioAPI): string {
    const lines = $("body")
      .text()
      .split("\n")
      .map((line) => collapseWhitespace(line));
    return uniqueInOrder(lines, (line) => line.toLowerCase()).join("\n");
  }

  /**
   * Try fallback selectors to extract value
   */
  private tryFallbackSelectors(
    $: cheerio.CheerioAPI,
    selectors: string[],
  ): string | null {
    for (const selector of selectors) {
      let value: string | undefined;

      if (selector.startsWith("meta")) {
        value = $(selector).attr("content");
      } else if (selector.startsWith("link")) {
        value = $(selector).attr("href");
      } else {
        value = $(selector).first().text();
      }

      const cleaned = this.cleanValue(value);
      if (cleaned) {
        return cleaned;
      }
    }

    return null;
  }

  private cleanValue(value: string | null | undefined): string | null {
    if (!value) {
      return null;
    }
    const cleaned = collapseWhitespace(value);
    return cleaned.length > 0 && cleaned.length < MAX_FIELD_LENGTH
      ? cleaned
      : null;
  }

  /**
   * Page titles usually carry a tagline: "Acme | Cloud consulting"
   */
  private cleanName(value: string | null): string | null {
    if (!value) {
      return null;
    }
    const [head] = value.split(/\s+[|–—:-]\s+/);
    return this.cleanValue(head);
  }

  private resolveWebsite(
    value: string | null | undefined,
    baseUrl: string,
  ): string | null {
    if (!value) {
      return null;
    }
    try {
      const absolute = new URL(value.trim(), baseUrl).toString();
      return validator.isURL(absolute, {
        protocols: ["http", "https"],
        require_protocol: true,
      })
        ? absolute
        : null;
    } catch {
      return null;
    }
  }

  /**
   * Organisation and place entities from the page text
   */
  private extractWithNER(bodyText: string): {
    organization: string | null;
    place: string | null;
  } {
    const text = bodyText.replace(/\n/g, ". ").slice(0, MAX_NER_TEXT_LENGTH);
    if (text.length < 50) {
      return { organization: null, place: null };
    }

    const doc = nlp(text);
    const organizations = toStrings(doc.organizations().out("array"));
    const places = toStrings(doc.places().out("array"));

    return {
      organization:
        this.cleanValue(organizations.find((o) => o.length > 1 && o.length < 100)) ??
        null,
      place:
        this.cleanValue(places.find((p) => p.length > 1 && p.length < 100)) ??
        null,
    };
  }

  private extractSections($: cheerio.CheerioAPI): SectionFields {
    const section = (label: SectionLabel): ExtractedField<string> => {
      const match = matchSection($, label, SYNONYMS[label]);
      return match ? field(match.text, true) : field("", false);
    };

    return {
      about: section("about"),
      services: section("services"),
      clients: section("clients"),
      technologies: section("technologies"),
      jobs: section("jobs"),
      blog: section("blog"),
      contact: section("contact"),
    };
  }

  private extractEmails($: cheerio.CheerioAPI, bodyText: string): string[] {
    const candidates: string[] = [];
    $('a[href^="mailto:"]').each((_, element) => {
      const href = $(element).attr("href") ?? "";
      candidates.push(safeDecode(href.slice(7).split("?")[0] ?? ""));
    });
    candidates.push(...(bodyText.match(EMAIL_REGEX) ?? []));

    return uniqueInOrder(
      candidates
        .map((email) => email.trim().toLowerCase())
        .filter(
          (email) => validator.isEmail(email) && !ASSET_SUFFIX.test(email),
        ),
    );
  }

  private extractPhones($: cheerio.CheerioAPI, bodyText: string): string[] {
    const candidates: string[] = [];
    $('a[href^="tel:"]').each((_, element) => {
      candidates.push(($(element).attr("href") ?? "").slice(4));
    });
    candidates.push(...(bodyText.match(PHONE_REGEX) ?? []));

    return uniqueInOrder(
      candidates
        .map((phone) => {
          const digits = phone.replace(/\D/g, "");
          return phone.trim().startsWith("+") ? `+${digits}` : digits;
        })
        .filter((phone) => {
          const digits = phone.replace(/\D/g, "").length;
          return digits >= 8 && digits <= 15;
        }),
    );
  }

  private matchDictionary(
    bodyText: string,
    dictionary: { name: string; patterns: RegExp[] }[],
  ): string[] {
    return dictionary
      .filter((entry) => entry.patterns.some((pattern) => pattern.test(bodyText)))
      .map((entry) => entry.name);
  }

  private snippets(lines: string[], patterns: RegExp[]): string[] {
    return lines
      .filter(
        (line) =>
          line.length >= 10 &&
          line.length <= 300 &&
          patterns.some((pattern) => pattern.test(line)),
      )
      .slice(0, MAX_SNIPPETS);
  }

  private getExtractionMethod(record: ExtractedRecord): string {
    const found = [
      ...(["title", "name", "website", "location", "description"] as const)
        .filter((key) => record[key].found),
      ...SECTION_LABELS.filter((label) => record.sections[label].found),
    ];
    return found.length > 0 ? found.join("+") : "none";
  }
}

export function emptyRecord(capture: PageCapture): ExtractedRecord {
  const empty = (): ExtractedField<string> => field("", false);
  const emptyList = (): ExtractedField<string[]> => field<string[]>([], false);

  return {
    captureId: capture.id,
    sourceId: capture.sourceId,
    url: capture.url,
    category: capture.category,
    capturedAt: capture.fetchedAt,
    title: empty(),
    name: empty(),
    website: empty(),
    location: empty(),
    description: empty(),
    sections: {
      about: empty(),
      services: empty(),
      clients: empty(),
      technologies: empty(),
      jobs: empty(),
      blog: empty(),
      contact: empty(),
    },
    emails: emptyList(),
    phones: emptyList(),
    technologies: emptyList(),
    services: emptyList(),
    offers: emptyList(),
    novelties: emptyList(),
    bodyText: "",
  };
}
