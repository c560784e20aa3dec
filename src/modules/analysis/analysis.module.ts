import { Module } from "@nestjs/common";
import { AnalysisService } from "./services/analysis.service";
import { OllamaSummaryGenerator } from "./summarizers/ollama-summary.generator";
import { SUMMARY_GENERATOR } from "./summarizers/summary-generator";

@Module({
  providers: [
    AnalysisService,
    OllamaSummaryGenerator,
    { provide: SUMMARY_GENERATOR, useExisting: OllamaSummaryGenerator },
  ],
  exports: [AnalysisService],
})
export class AnalysisModule {}
