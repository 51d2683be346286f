import { Injectable } from "@nestjs/common";
import Holidays from "date-holidays";
import { HolidayRegion, NATIONWIDE } from "../constants/german-states.constant";
import { HolidaySource, YearRange } from "../holiday-source.interface";
import { HolidayRecord } from "../types/holiday-record.type";

const COUNTRY_CODE = "DE";

/**
 * date-holidays Source
 *
 * Reads German holidays from the date-holidays package. Entries typed
 * "public" are public holidays; bank holidays, observances and optional
 * days are reported as special.
 */
@Injectable()
export class DateHolidaysSource implements HolidaySource {
  readonly name = "date-holidays";
  readonly supportedYears: YearRange = { from: 1970, to: 2100 };

  private readonly calendars = new Map<HolidayRegion, Holidays>();

  listHolidays(
    year: number,
    region: HolidayRegion,
    includeSpecial: boolean,
  ): HolidayRecord[] {
    return this.getCalendar(region)
      .getHolidays(year, "de")
      .filter((holiday) => includeSpecial || holiday.type === "public")
      .map((holiday) => ({
        date: holiday.date.slice(0, 10),
        name: holiday.name,
        region,
        isSpecial: holiday.type !== "public",
      }));
  }

  private getCalendar(region: HolidayRegion): Holidays {
    const cached = this.calendars.get(region);
    if (cached) return cached;

    const calendar =
      region === NATIONWIDE
        ? new Holidays(COUNTRY_CODE)
        : new Holidays(COUNTRY_CODE, region);
    this.calendars.set(region, calendar);
    return calendar;
  }
}
