import { Module } from "@nestjs/common";
import { DateFeaturesService } from "./date-features.service";

/**
 * Date Features Module
 *
 * Provides the daily date axis and the day/week/month bucketing used by
 * the aggregation.
 */
@Module({
  providers: [DateFeaturesService],
  exports: [DateFeaturesService],
})
export class DateFeaturesModule {}
