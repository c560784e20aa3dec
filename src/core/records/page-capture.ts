import { SourceCategory } from "./source";

export type FetchStrategy = "static" | "dynamic";

export interface PageCapture {
  id: string;
  sourceId: string;
  url: string;
  fetchedAt: string;
  strategy: FetchStrategy;
  /** HTTP status for static fetches, main-document status for rendered ones */
  status: number;
  html: string;
  category: SourceCategory;
}
