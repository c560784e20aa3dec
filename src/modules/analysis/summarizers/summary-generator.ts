import { CleanedDocument } from "../../../core/records";

export const SUMMARY_GENERATOR = Symbol("SUMMARY_GENERATOR");

/**
 * Optional generative summariser. Returning null, or throwing, makes the
 * caller keep the extractive summary.
 */
export interface SummaryGenerator {
  readonly enabled: boolean;
  generate(document: CleanedDocument): Promise<string | null>;
}
