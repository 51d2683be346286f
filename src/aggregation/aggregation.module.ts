import { Module } from "@nestjs/common";
import { AggregationService } from "./aggregation.service";
import { DateFeaturesModule } from "../date-features/date-features.module";

/**
 * Aggregation Module
 *
 * Folds per-day, per-state holiday flags into day/week/month and
 * state/nationwide buckets.
 */
@Module({
  imports: [DateFeaturesModule],
  providers: [AggregationService],
  exports: [AggregationService],
})
export class AggregationModule {}
