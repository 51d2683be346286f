import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { exportConfig } from "./config/export.config";
import { HolidaysModule } from "./holidays/holidays.module";
import { DateFeaturesModule } from "./date-features/date-features.module";
import { AggregationModule } from "./aggregation/aggregation.module";
import { ExportModule } from "./export/export.module";

@Module({
  imports: [
    // Global config module
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ".env",
      cache: true,
      load: [exportConfig],
    }),

    HolidaysModule,
    DateFeaturesModule,
    AggregationModule,
    ExportModule,
  ],
})
export class AppModule {}
