import { FetchStrategy } from "../../../core/records";

export const STATIC_PAGE_RETRIEVER = Symbol("STATIC_PAGE_RETRIEVER");
export const DYNAMIC_PAGE_RETRIEVER = Symbol("DYNAMIC_PAGE_RETRIEVER");

export interface RetrievedPage {
  /** URL after redirects */
  url: string;
  status: number;
  html: string;
}

/**
 * One way of turning a URL into markup. Implementations throw
 * FetchTransientError for retryable conditions and FetchFailedError otherwise.
 */
export interface PageRetriever {
  readonly strategy: FetchStrategy;
  retrieve(url: string): Promise<RetrievedPage>;
}
