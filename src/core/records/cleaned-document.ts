import { SectionLabel } from "./extracted-record";
import { SourceCategory } from "./source";

export const LANGUAGE_TAGS = ["en", "fr", "und"] as const;
export type LanguageTag = (typeof LANGUAGE_TAGS)[number];

export interface CleanedDocument {
  id: string;
  captureId: string;
  sourceId: string;
  url: string;
  domain: string;
  /** domain of the entity described, null when only a name identifies it */
  entityDomain: string | null;
  category: SourceCategory;
  capturedAt: string;
  name: string;
  title: string;
  location: string;
  sections: Record<SectionLabel, string>;
  emails: string[];
  phones: string[];
  technologies: string[];
  services: string[];
  offers: string[];
  novelties: string[];
  text: string;
  fingerprint: string;
  language: LanguageTag;
  live: boolean;
}
