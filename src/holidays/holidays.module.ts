import { Module } from "@nestjs/common";
import { ConfigType } from "@nestjs/config";
import { HolidaysService } from "./holidays.service";
import { HOLIDAY_SOURCE, HolidaySource } from "./holiday-source.interface";
import { RulesetHolidaySource } from "./sources/ruleset-holiday.source";
import { DateHolidaysSource } from "./sources/date-holidays.source";
import { exportConfig } from "../config/export.config";

/**
 * Holidays Module
 *
 * Provides holiday lookups per year and German state. The calendar
 * behind HOLIDAY_SOURCE is picked by the HOLIDAY_SOURCE setting.
 */
@Module({
  providers: [
    RulesetHolidaySource,
    DateHolidaysSource,
    {
      provide: HOLIDAY_SOURCE,
      useFactory: (
        config: ConfigType<typeof exportConfig>,
        ruleset: RulesetHolidaySource,
        dateHolidays: DateHolidaysSource,
      ): HolidaySource =>
        config.holidaySource === "date-holidays" ? dateHolidays : ruleset,
      inject: [exportConfig.KEY, RulesetHolidaySource, DateHolidaysSource],
    },
    HolidaysService,
  ],
  exports: [HolidaysService],
})
export class HolidaysModule {}
