import { Module } from "@nestjs/common";
import { PipelineService } from "./services/pipeline.service";
import { FetchingModule } from "../fetching/fetching.module";
import { ExtractionModule } from "../extraction/extraction.module";
import { NormalizationModule } from "../normalization/normalization.module";
import { AnalysisModule } from "../analysis/analysis.module";
import { AggregationModule } from "../aggregation/aggregation.module";
import { StorageModule } from "../../core/storage/storage.module";

/**
 * End-to-end run orchestration over the stage modules
 */
@Module({
  imports: [
    StorageModule,
    FetchingModule,
    ExtractionModule,
    NormalizationModule,
    AnalysisModule,
    AggregationModule,
  ],
  providers: [PipelineService],
  exports: [PipelineService],
})
export class PipelineModule {}
