import { Injectable } from "@nestjs/common";
import {
  eachDayOfInterval,
  getDay,
  getISOWeek,
  getISOWeekYear,
  isAfter,
} from "date-fns";
import {
  CalendarDay,
  DateRange,
  TimeAggregation,
} from "./types/calendar-day.type";
import { InvalidRangeError } from "../common/errors/holiday-export.errors";
import { formatIsoDate } from "../common/utils/date.util";

const SUNDAY = 0;

/**
 * Date Features Service
 *
 * Builds the daily date axis of an export and the time features each
 * day is aggregated by:
 * - ISO week and week-numbering year
 * - Calendar month
 * - Sunday detection
 */
@Injectable()
export class DateFeaturesService {
  /**
   * Build the ordered list of calendar days in [start, end]
   *
   * @throws InvalidRangeError if start is after end
   *
   * @example
   * buildAxis({ start: new Date(2023, 0, 1), end: new Date(2023, 0, 8) })
   * // 8 days, 2023-01-01 (Sunday, ISO week 2022-W52) ... 2023-01-08
   */
  buildAxis(range: DateRange): CalendarDay[] {
    if (isAfter(range.start, range.end)) {
      throw new InvalidRangeError(
        formatIsoDate(range.start),
        formatIsoDate(range.end),
      );
    }

    return eachDayOfInterval({ start: range.start, end: range.end }).map(
      (date) => this.toCalendarDay(date),
    );
  }

  toCalendarDay(date: Date): CalendarDay {
    const weekday = getDay(date);
    return {
      date,
      isoDate: formatIsoDate(date),
      year: date.getFullYear(),
      month: date.getMonth() + 1,
      isoWeek: getISOWeek(date),
      isoWeekYear: getISOWeekYear(date),
      weekday,
      isSunday: weekday === SUNDAY,
    };
  }

  /**
   * Key of the time bucket a day falls into.
   * Keys sort lexicographically in chronological order.
   *
   * @example
   * // 2023-01-01 is a Sunday in ISO week 52 of 2022
   * timeBucketOf(day, "day")   // "2023-01-01"
   * timeBucketOf(day, "week")  // "2022-W52"
   * timeBucketOf(day, "month") // "2023-01"
   */
  timeBucketOf(day: CalendarDay, timeAgg: TimeAggregation): string {
    switch (timeAgg) {
      case "day":
        return day.isoDate;
      case "week":
        return `${day.isoWeekYear}-W${String(day.isoWeek).padStart(2, "0")}`;
      case "month":
        return `${day.year}-${String(day.month).padStart(2, "0")}`;
    }
  }

  /** Distinct calendar years covered by an axis, ascending */
  yearsOf(axis: CalendarDay[]): number[] {
    return Array.from(new Set(axis.map((day) => day.year))).sort((a, b) => a - b);
  }
}
