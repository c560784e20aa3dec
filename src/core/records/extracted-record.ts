import { SourceCategory } from "./source";

export const SECTION_LABELS = [
  "about",
  "services",
  "clients",
  "technologies",
  "jobs",
  "blog",
  "contact",
] as const;

export type SectionLabel = (typeof SECTION_LABELS)[number];

/**
 * `found` is false when the value is a default rather than something
 * actually located in the page.
 */
export interface ExtractedField<T> {
  value: T;
  found: boolean;
}

export type SectionFields = Record<SectionLabel, ExtractedField<string>>;

export interface ExtractedRecord {
  captureId: string;
  sourceId: string;
  url: string;
  category: SourceCategory;
  capturedAt: string;
  title: ExtractedField<string>;
  name: ExtractedField<string>;
  website: ExtractedField<string>;
  location: ExtractedField<string>;
  description: ExtractedField<string>;
  sections: SectionFields;
  emails: ExtractedField<string[]>;
  phones: ExtractedField<string[]>;
  technologies: ExtractedField<string[]>;
  services: ExtractedField<string[]>;
  offers: ExtractedField<string[]>;
  novelties: ExtractedField<string[]>;
  /** visible text blocks, one per line */
  bodyText: string;
}
