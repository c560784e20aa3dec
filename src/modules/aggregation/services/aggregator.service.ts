import { Inject, Injectable, Logger } from "@nestjs/common";
import * as crypto from "crypto";
import {
  AggregatedProfile,
  AnalysisResult,
  CleanedDocument,
  FieldProvenance,
  ProfileField,
  ProfileTextField,
  SourceCategory,
} from "../../../core/records";
import { resolveIdentities } from "./identity-resolver";
import {
  PIPELINE_SETTINGS,
  PipelineSettings,
} from "../../../common/config/pipeline-settings";
import {
  compareStrings,
  uniqueInOrder,
} from "../../../common/helpers/text.helper";

interface Contribution {
  document: CleanedDocument;
  analysis: AnalysisResult | null;
}

/**
 * Capture time ascending, document id as the tie-break. The last element
 * is "most recent".
 */
function byCaptureOrder(a: Contribution, b: Contribution): number {
  return (
    compareStrings(a.document.capturedAt, b.document.capturedAt) ||
    compareStrings(a.document.id, b.document.id)
  );
}

function provenanceOf(document: CleanedDocument): FieldProvenance {
  return {
    documentId: document.id,
    captureId: document.captureId,
    url: document.url,
    capturedAt: document.capturedAt,
  };
}

function textValue(
  document: CleanedDocument,
  field: ProfileTextField | "name",
): string {
  switch (field) {
    case "name":
      return document.name;
    case "title":
      return document.title;
    case "location":
      return document.location;
    default:
      return document.sections[field];
  }
}

/**
 * Merges documents describing the same entity into one profile. Every
 * decision depends only on capture timestamps and ids, never on the
 * order documents arrive in.
 */
@Injectable()
export class AggregatorService {
  private readonly logger = new Logger(AggregatorService.name);

  constructor(
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
  ) {}

  aggregate(
    documents: readonly CleanedDocument[],
    analyses: readonly AnalysisResult[],
  ): AggregatedProfile[] {
    const requestId = crypto.randomUUID();
    const analysisById = new Map(
      analyses.map((analysis) => [analysis.documentId, analysis]),
    );
    const identities = resolveIdentities(documents, this.settings.nameSimilarity);

    const groups = new Map<string, Contribution[]>();
    for (const document of documents) {
      const key = identities.get(document.id) ?? `document:${document.id}`;
      const group = groups.get(key) ?? [];
      group.push({ document, analysis: analysisById.get(document.id) ?? null });
      groups.set(key, group);
    }

    const profiles = [...groups.entries()]
      .sort(([a], [b]) => compareStrings(a, b))
      .map(([key, group]) => this.mergeGroup(key, group.sort(byCaptureOrder)));

    this.logger.log("Profiles aggregated", {
      operation: "aggregate",
      requestId,
      documentCount: documents.length,
      profileCount: profiles.length,
      timestamp: new Date().toISOString(),
    });

    return profiles;
  }

  private mergeGroup(
    identityKey: string,
    contributions: Contribution[],
  ): AggregatedProfile {
    const documents = contributions.map(({ document }) => document);
    const latest = documents[documents.length - 1];

    const recent = (field: ProfileTextField) =>
      this.mostRecent(documents, field);
    const fields: Record<ProfileTextField, ProfileField> = {
      title: recent("title"),
      location: recent("location"),
      about: recent("about"),
      services: recent("services"),
      clients: recent("clients"),
      technologies: recent("technologies"),
      jobs: recent("jobs"),
      blog: recent("blog"),
      contact: recent("contact"),
    };

    return {
      identityKey,
      entityType: this.entityType(documents),
      name: this.mostRecent(documents, "name"),
      domain:
        documents.find((document) => document.entityDomain)?.entityDomain ??
        null,
      fields,
      emails: uniqueInOrder(documents.flatMap((d) => d.emails)),
      phones: uniqueInOrder(documents.flatMap((d) => d.phones)),
      technologies: uniqueInOrder(
        documents.flatMap((d) => d.technologies),
        (value) => value.toLowerCase(),
      ),
      services: uniqueInOrder(
        documents.flatMap((d) => d.services),
        (value) => value.toLowerCase(),
      ),
      keywords: uniqueInOrder(
        contributions.flatMap(({ analysis }) =>
          (analysis?.keywords ?? []).map((keyword) => keyword.term),
        ),
      ),
      theme: this.majorityTheme(contributions),
      clusterIds: [
        ...new Set(
          contributions.flatMap(({ analysis }) =>
            analysis?.clusterId === null || analysis?.clusterId === undefined
              ? []
              : [analysis.clusterId],
          ),
        ),
      ].sort((a, b) => a - b),
      languages: [...new Set(documents.map((d) => d.language))].sort(
        compareStrings,
      ),
      documentIds: documents.map((d) => d.id),
      sourceUrls: uniqueInOrder(documents.map((d) => d.url)),
      lastCapturedAt: latest?.capturedAt ?? "",
    };
  }

  /**
   * Most recently captured non-empty value
   */
  private mostRecent(
    documents: readonly CleanedDocument[],
    field: ProfileTextField | "name",
  ): ProfileField {
    for (let i = documents.length - 1; i >= 0; i--) {
      const document = documents[i];
      if (!document) {
        continue;
      }
      const value = textValue(document, field);
      if (value) {
        return { value, provenance: provenanceOf(document) };
      }
    }
    return { value: "", provenance: null };
  }

  /**
   * A listing page does not make its subject a directory
   */
  private entityType(documents: readonly CleanedDocument[]): SourceCategory {
    for (let i = documents.length - 1; i >= 0; i--) {
      const category = documents[i]?.category;
      if (category && category !== "directory") {
        return category;
      }
    }
    return "directory";
  }

  /**
   * Majority vote; among tied labels the one carried by the most recent
   * document wins.
   */
  private majorityTheme(contributions: readonly Contribution[]): string | null {
    const votes = new Map<string, number>();
    for (const { analysis } of contributions) {
      if (analysis?.theme) {
        votes.set(analysis.theme, (votes.get(analysis.theme) ?? 0) + 1);
      }
    }
    if (votes.size === 0) {
      return null;
    }

    const top = Math.max(...votes.values());
    const tied = new Set(
      [...votes.entries()]
        .filter(([, count]) => count === top)
        .map(([theme]) => theme),
    );
    for (let i = contributions.length - 1; i >= 0; i--) {
      const theme = contributions[i]?.analysis?.theme;
      if (theme && tied.has(theme)) {
        return theme;
      }
    }
    return null;
  }
}
