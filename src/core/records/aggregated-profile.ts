import { SourceCategory } from "./source";

export interface FieldProvenance {
  documentId: string;
  captureId: string;
  url: string;
  capturedAt: string;
}

export interface ProfileField {
  value: string;
  provenance: FieldProvenance | null;
}

export const PROFILE_TEXT_FIELDS = [
  "title",
  "location",
  "about",
  "services",
  "clients",
  "technologies",
  "jobs",
  "blog",
  "contact",
] as const;

export type ProfileTextField = (typeof PROFILE_TEXT_FIELDS)[number];

export interface AggregatedProfile {
  identityKey: string;
  entityType: SourceCategory;
  name: ProfileField;
  domain: string | null;
  fields: Record<ProfileTextField, ProfileField>;
  emails: string[];
  phones: string[];
  technologies: string[];
  services: string[];
  keywords: string[];
  theme: string | null;
  clusterIds: number[];
  languages: string[];
  documentIds: string[];
  sourceUrls: string[];
  lastCapturedAt: string;
}
