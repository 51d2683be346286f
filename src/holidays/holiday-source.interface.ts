import { HolidayRegion } from "./constants/german-states.constant";
import { HolidayRecord } from "./types/holiday-record.type";

export const HOLIDAY_SOURCE = "HOLIDAY_SOURCE";

export const HOLIDAY_SOURCE_KINDS = ["ruleset", "date-holidays"] as const;

export type HolidaySourceKind = (typeof HOLIDAY_SOURCE_KINDS)[number];

export interface YearRange {
  from: number;
  to: number;
}

/**
 * Holiday calendar capability.
 *
 * Implementations are pure: the same (year, region, includeSpecial) always
 * yields the same records. Region and year are validated by HolidaysService
 * before a source is called.
 */
export interface HolidaySource {
  readonly name: HolidaySourceKind;
  readonly supportedYears: YearRange;

  listHolidays(
    year: number,
    region: HolidayRegion,
    includeSpecial: boolean,
  ): HolidayRecord[];
}
