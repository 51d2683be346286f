import { Module } from "@nestjs/common";
import { ExportService } from "./export.service";
import { HolidaysModule } from "../holidays/holidays.module";
import { DateFeaturesModule } from "../date-features/date-features.module";
import { AggregationModule } from "../aggregation/aggregation.module";

/**
 * Export Module
 *
 * Orchestrates a holiday export and writes the CSV file.
 */
@Module({
  imports: [HolidaysModule, DateFeaturesModule, AggregationModule],
  providers: [ExportService],
  exports: [ExportService],
})
export class ExportModule {}
