import { Module } from "@nestjs/common";
import { AggregatorService } from "./services/aggregator.service";

@Module({
  providers: [AggregatorService],
  exports: [AggregatorService],
})
export class AggregationModule {}
