import { Inject, Injectable, Logger } from "@nestjs/common";
import * as crypto from "crypto";
import {
  CleanedDocument,
  ExtractedRecord,
  SECTION_LABELS,
  SectionLabel,
} from "../../../core/records";
import { CorpusStore } from "./corpus-store";
import { cleanLine, cleanText } from "./text-cleaner";
import { detectLanguage } from "./language-detector";
import {
  PIPELINE_SETTINGS,
  PipelineSettings,
} from "../../../common/config/pipeline-settings";
import { domainOf, tryDomainOf } from "../../../common/helpers/url.helper";
import {
  collapseWhitespace,
  uniqueInOrder,
} from "../../../common/helpers/text.helper";

export type NormalizeOutcome =
  | { status: "admitted"; document: CleanedDocument }
  | { status: "duplicate"; document: CleanedDocument; duplicateOf: string }
  | { status: "empty" };

export function fingerprintOf(text: string): string {
  return crypto
    .createHash("sha256")
    .update(collapseWhitespace(text))
    .digest("hex");
}

/**
 * Cleans extracted records into documents and admits them into the run's
 * corpus, dropping exact duplicates.
 */
@Injectable()
export class NormalizerService {
  private readonly logger = new Logger(NormalizerService.name);

  constructor(
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
  ) {}

  normalize(record: ExtractedRecord, corpus: CorpusStore): NormalizeOutcome {
    const document = this.toDocument(record);
    if (!document) {
      this.logger.warn("No text left after cleaning, document dropped", {
        operation: "normalize",
        captureId: record.captureId,
        url: record.url,
        timestamp: new Date().toISOString(),
      });
      return { status: "empty" };
    }

    const result = corpus.admit(document);
    if (!result.admitted) {
      this.logger.log("Duplicate content dropped", {
        operation: "normalize",
        captureId: record.captureId,
        duplicateOf: result.duplicateOf,
        fingerprint: document.fingerprint,
        timestamp: new Date().toISOString(),
      });
      return { status: "duplicate", document, duplicateOf: result.duplicateOf };
    }

    return { status: "admitted", document };
  }

  /**
   * Pure part of normalisation; null when nothing usable remains
   */
  toDocument(record: ExtractedRecord): CleanedDocument | null {
    const text = cleanText(record.bodyText);
    if (!text) {
      return null;
    }

    const domain = domainOf(record.url);
    const sections = this.cleanSections(record);

    return {
      id: record.captureId,
      captureId: record.captureId,
      sourceId: record.sourceId,
      url: record.url,
      domain,
      entityDomain: this.entityDomain(record, domain),
      category: record.category,
      capturedAt: record.capturedAt,
      name: cleanLine(record.name.value),
      title: cleanLine(record.title.value),
      location: cleanLine(record.location.value),
      sections,
      emails: [...record.emails.value],
      phones: [...record.phones.value],
      technologies: [...record.technologies.value],
      services: [...record.services.value],
      offers: this.cleanList(record.offers.value),
      novelties: this.cleanList(record.novelties.value),
      text,
      fingerprint: fingerprintOf(text),
      language: detectLanguage(text),
      live: text.length >= this.settings.minContentLength,
    };
  }

  /**
   * Listing pages describe someone else: their entity is the linked
   * website, or only a name when there is none.
   */
  private entityDomain(record: ExtractedRecord, domain: string): string | null {
    if (record.category !== "directory") {
      return domain;
    }
    const website = record.website.found
      ? tryDomainOf(record.website.value)
      : null;
    return website && website !== domain ? website : null;
  }

  private cleanSections(record: ExtractedRecord): Record<SectionLabel, string> {
    const sections: Record<SectionLabel, string> = {
      about: "",
      services: "",
      clients: "",
      technologies: "",
      jobs: "",
      blog: "",
      contact: "",
    };
    for (const label of SECTION_LABELS) {
      sections[label] = cleanLine(record.sections[label].value);
    }
    return sections;
  }

  private cleanList(values: string[]): string[] {
    return uniqueInOrder(
      values.map((value) => cleanLine(value)),
      (value) => value.toLowerCase(),
    );
  }
}
