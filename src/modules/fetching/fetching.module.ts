import { Module } from "@nestjs/common";
import { FetcherService } from "./services/fetcher.service";
import { StaticPageRetriever } from "./retrievers/static-page.retriever";
import { DynamicPageRetriever } from "./retrievers/dynamic-page.retriever";
import {
  DYNAMIC_PAGE_RETRIEVER,
  STATIC_PAGE_RETRIEVER,
} from "./retrievers/page-retriever";

/**
 * Page retrieval: static HTTP and browser rendering behind one interface
 */
@Module({
  providers: [
    StaticPageRetriever,
    DynamicPageRetriever,
    { provide: STATIC_PAGE_RETRIEVER, useExisting: StaticPageRetriever },
    { provide: DYNAMIC_PAGE_RETRIEVER, useExisting: DynamicPageRetriever },
    FetcherService,
  ],
  exports: [FetcherService],
})
export class FetchingModule {}
