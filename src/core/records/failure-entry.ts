import { PipelineStage } from "../../common/constants/string-const";

export type FailureKind =
  | "FetchFailed"
  | "ExtractionFailed"
  | "AnalysisFailed"
  | "InvalidSource"
  | "InvalidDocument"
  | "CorpusEmpty"
  | "RunCancelled";

export interface FailureEntry {
  timestamp: string;
  runId: string;
  sourceId: string;
  url?: string;
  stage: PipelineStage;
  kind: FailureKind;
  message: string;
}
