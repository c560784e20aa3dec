import { Injectable } from "@nestjs/common";
import { plainToInstance } from "class-transformer";
import { ValidationError, validateSync } from "class-validator";
import { join } from "path";
import { BaseFileRepository } from "./base-file.repository";
import { CleanedDocumentDto } from "./dto/cleaned-document.dto";
import { OUTPUT_FILES } from "../../common/constants/string-const";
import {
  AggregatedProfile,
  AnalysisReport,
  CleanedDocument,
  PageCapture,
} from "../records";

export interface RejectedDocument {
  /** position in the file's array */
  index: number;
  id: string | null;
  reason: string;
}

export interface LoadedDocuments {
  documents: CleanedDocument[];
  rejected: RejectedDocument[];
}

/**
 * Reads and writes the progressively refined record files of a run.
 * Every file is a JSON array keyed by a stable identifier per record.
 */
@Injectable()
export class RecordStoreRepository extends BaseFileRepository {
  /**
   * Persist raw captures (one record per capture)
   */
  async saveCaptures(outputDir: string, captures: PageCapture[]): Promise<string> {
    const filePath = join(outputDir, OUTPUT_FILES.RAW);
    this.logger.log(`Saving ${captures.length} captures to ${filePath}`);

    try {
      await this.writeJson(filePath, captures);
      return filePath;
    } catch (error) {
      const errorStack = error instanceof Error ? error.stack : "";
      this.logger.error(`Failed to save captures to ${filePath}`, errorStack);
      throw error;
    }
  }

  /**
   * Persist the deduplicated corpus (one record per cleaned document)
   */
  async saveDocuments(
    outputDir: string,
    documents: CleanedDocument[],
  ): Promise<string> {
    const filePath = join(outputDir, OUTPUT_FILES.CLEANED);
    this.logger.log(`Saving ${documents.length} cleaned documents to ${filePath}`);

    try {
      await this.writeJson(filePath, documents);
      return filePath;
    } catch (error) {
      const errorStack = error instanceof Error ? error.stack : "";
      this.logger.error(`Failed to save documents to ${filePath}`, errorStack);
      throw error;
    }
  }

  /**
   * Load a cleaned corpus written by a previous run. Records that fail
   * validation are returned as rejected rather than loaded.
   */
  async loadDocuments(filePath: string): Promise<LoadedDocuments> {
    this.logger.log(`Loading cleaned documents from ${filePath}`);

    try {
      const data = await this.readJson(filePath);
      if (!Array.isArray(data)) {
        throw new Error(`Expected a JSON array of documents in ${filePath}`);
      }

      const loaded: LoadedDocuments = { documents: [], rejected: [] };
      data.forEach((value: unknown, index) => {
        const outcome = validateDocument(value);
        if (typeof outcome === "string") {
          loaded.rejected.push({ index, id: recordId(value), reason: outcome });
        } else {
          loaded.documents.push(outcome);
        }
      });

      if (loaded.rejected.length > 0) {
        this.logger.warn(
          `Skipped ${loaded.rejected.length} invalid records in ${filePath}`,
        );
      }
      this.logger.log(
        `Loaded ${loaded.documents.length} documents from ${filePath}`,
      );
      return loaded;
    } catch (error) {
      const errorStack = error instanceof Error ? error.stack : "";
      this.logger.error(`Failed to load documents from ${filePath}`, errorStack);
      throw error;
    }
  }

  async saveAnalysis(outputDir: string, report: AnalysisReport): Promise<string> {
    const filePath = join(outputDir, OUTPUT_FILES.ANALYSIS);
    this.logger.log(
      `Saving analysis of ${report.results.length} documents to ${filePath}`,
    );

    try {
      await this.writeJson(filePath, report);
      return filePath;
    } catch (error) {
      const errorStack = error instanceof Error ? error.stack : "";
      this.logger.error(`Failed to save analysis to ${filePath}`, errorStack);
      throw error;
    }
  }

  /**
   * Persist consolidated profiles, the only file downstream reporting reads
   */
  async saveProfiles(
    outputDir: string,
    profiles: AggregatedProfile[],
  ): Promise<string> {
    const filePath = join(outputDir, OUTPUT_FILES.PROFILES);
    this.logger.log(`Saving ${profiles.length} profiles to ${filePath}`);

    try {
      await this.writeJson(filePath, profiles);
      return filePath;
    } catch (error) {
      const errorStack = error instanceof Error ? error.stack : "";
      this.logger.error(`Failed to save profiles to ${filePath}`, errorStack);
      throw error;
    }
  }
}

/**
 * The validated document, or a description of what is wrong with it
 */
function validateDocument(value: unknown): CleanedDocument | string {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return "record is not an object";
  }
  const dto = plainToInstance(CleanedDocumentDto, value);
  const errors = validateSync(dto);
  return errors.length > 0 ? describeErrors(errors).join("; ") : dto;
}

function describeErrors(errors: ValidationError[], path = ""): string[] {
  return errors.flatMap((error) => {
    const property = `${path}${error.property}`;
    const own = Object.values(error.constraints ?? {}).map((message) =>
      path ? `${path}${message}` : message,
    );
    return [...own, ...describeErrors(error.children ?? [], `${property}.`)];
  });
}

function recordId(value: unknown): string | null {
  return typeof value === "object" &&
    value !== null &&
    "id" in value &&
    typeof value.id === "string"
    ? value.id
    : null;
}
