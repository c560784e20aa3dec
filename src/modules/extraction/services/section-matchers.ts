import * as cheerio from "cheerio";
import { SectionLabel } from "../../../core/records";
import {
  collapseWhitespace,
  termPattern,
} from "../../../common/helpers/text.helper";

export interface SectionSynonyms {
  headings: string[];
  attributes: string[];
}

export interface SectionMatch {
  text: string;
  matcher: string;
}

interface SectionMatchContext {
  $: cheerio.CheerioAPI;
  label: SectionLabel;
  synonyms: SectionSynonyms;
}

/**
 * One way of locating a section. Matchers are tried in order and the first
 * non-null result wins.
 */
export interface SectionMatcher {
  readonly name: string;
  match(context: SectionMatchContext): string | null;
}

const HEADINGS = "h1, h2, h3, h4, h5, h6";
const CONTAINERS = "section, article, aside, div, footer, header, ul";
export const MAX_SECTION_LENGTH = 2000;
const MIN_SECTION_LENGTH = 20;
const MAX_CONTAINER_LENGTH = 5000;
const MAX_HEADING_LENGTH = 80;
const MIN_PARAGRAPH_LENGTH = 40;

function normalizeHeading(value: string): string {
  return collapseWhitespace(
    value.toLowerCase().replace(/[’‘]/g, "'").replace(/[:|•»›-]+$/g, ""),
  );
}

function usable(text: string, min = MIN_SECTION_LENGTH): boolean {
  return text.length >= min;
}

/**
 * A heading whose text names the section; its content runs until the
 * next heading.
 */
export const headingMatcher: SectionMatcher = {
  name: "heading",
  match({ $, synonyms }) {
    const patterns = synonyms.headings.map((synonym) => termPattern(synonym));
    let found: string | null = null;

    $(HEADINGS).each((_, element) => {
      const heading = $(element);
      const title = normalizeHeading(heading.text());
      if (
        !title ||
        title.length > MAX_HEADING_LENGTH ||
        !patterns.some((pattern) => pattern.test(title))
      ) {
        return undefined;
      }

      let content = collapseWhitespace(
        heading
          .nextUntil(HEADINGS)
          .map((__, sibling) => $(sibling).text())
          .get()
          .join(" "),
      );
      if (!usable(content)) {
        // heading wrapped on its own, e.g. <div><h2/></div><div><p/></div>
        const parentText = collapseWhitespace(heading.parent().text());
        content = collapseWhitespace(
          parentText.slice(collapseWhitespace(heading.text()).length),
        );
      }
      if (usable(content)) {
        found = content;
        return false;
      }
      return undefined;
    });

    return found;
  },
};

/**
 * A container whose id or class names the section
 */
export const attributeMatcher: SectionMatcher = {
  name: "attribute",
  match({ $, synonyms }) {
    let found: string | null = null;

    $(CONTAINERS).each((_, element) => {
      const node = $(element);
      const id = (node.attr("id") ?? "").toLowerCase();
      const className = (node.attr("class") ?? "").toLowerCase();
      const named = synonyms.attributes.some(
        (keyword) => id.includes(keyword) || className.includes(keyword),
      );
      if (!named) {
        return undefined;
      }

      const text = collapseWhitespace(node.text());
      if (usable(text) && text.length <= MAX_CONTAINER_LENGTH) {
        found = text;
        return false;
      }
      return undefined;
    });

    return found;
  },
};

/**
 * First substantial paragraph after the page title
 */
export const proximityMatcher: SectionMatcher = {
  name: "proximity",
  match({ $, label }) {
    if (label !== "about") {
      return null;
    }

    const hasTitle = $("h1").length > 0;
    let afterTitle = !hasTitle;
    let found: string | null = null;

    $("h1, p").each((_, element) => {
      const node = $(element);
      if (node.is("h1")) {
        afterTitle = true;
        return undefined;
      }
      if (!afterTitle) {
        return undefined;
      }
      const text = collapseWhitespace(node.text());
      if (usable(text, MIN_PARAGRAPH_LENGTH)) {
        found = text;
        return false;
      }
      return undefined;
    });

    return found;
  },
};

export const metaDescriptionMatcher: SectionMatcher = {
  name: "meta-description",
  match({ $, label }) {
    if (label !== "about") {
      return null;
    }
    const description = collapseWhitespace(
      $('meta[name="description"]').attr("content") ??
        $('meta[property="og:description"]').attr("content") ??
        "",
    );
    return usable(description) ? description : null;
  },
};

export const SECTION_MATCHERS: readonly SectionMatcher[] = [
  headingMatcher,
  attributeMatcher,
  proximityMatcher,
  metaDescriptionMatcher,
];

export function matchSection(
  $: cheerio.CheerioAPI,
  label: SectionLabel,
  synonyms: SectionSynonyms,
  matchers: readonly SectionMatcher[] = SECTION_MATCHERS,
): SectionMatch | null {
  for (const matcher of matchers) {
    const text = matcher.match({ $, label, synonyms });
    if (text) {
      return { text: text.slice(0, MAX_SECTION_LENGTH), matcher: matcher.name };
    }
  }
  return null;
}
