import { Injectable, Logger } from "@nestjs/common";
import { DateFeaturesService } from "../date-features/date-features.service";
import { CalendarDay } from "../date-features/types/calendar-day.type";
import {
  SORTED_STATE_CODES,
  StateCode,
  getPopulationShare,
} from "../holidays/constants/german-states.constant";
import { HolidayRecord } from "../holidays/types/holiday-record.type";
import { EmptyRangeError } from "../common/errors/holiday-export.errors";
import {
  AggregatedRow,
  AggregationOptions,
  ExportTable,
  GeoBucket,
  NATIONWIDE_BUCKET,
} from "./types/aggregation.type";

/** Public and special holiday dates (YYYY-MM-DD) of one state */
interface StateCalendar {
  publicDates: Set<string>;
  specialDates: Set<string>;
}

interface DayContribution {
  holidayCount: number;
  isSunday: boolean;
  isSpecial: boolean;
  openDay: number;
}

interface BucketAccumulator {
  timeBucket: string;
  geoBucket: GeoBucket;
  holidayCount: number;
  includesSunday: boolean;
  includesSpecial: boolean;
  openDays: number;
}

const EMPTY_CALENDAR: StateCalendar = {
  publicDates: new Set(),
  specialDates: new Set(),
};

const DECIMAL_PLACES = 6;

function roundCount(value: number): number {
  const factor = 10 ** DECIMAL_PLACES;
  return Math.round(value * factor) / factor;
}

function compareRows(a: AggregatedRow, b: AggregatedRow): number {
  if (a.timeBucket !== b.timeBucket) return a.timeBucket < b.timeBucket ? -1 : 1;
  if (a.geoBucket !== b.geoBucket) return a.geoBucket < b.geoBucket ? -1 : 1;
  return 0;
}

/**
 * Aggregation Service
 *
 * Joins the date axis with each state's holidays and folds the per-day,
 * per-state holiday counts into time buckets (day/week/month) and geo
 * buckets (state or nationwide).
 *
 * Per day and state the holiday count is 0 or 1: a public holiday counts
 * once no matter how many names fall on the date, and Sundays or special
 * observances only count on days that are not already counted.
 */
@Injectable()
export class AggregationService {
  private readonly logger = new Logger(AggregationService.name);

  constructor(private readonly dateFeaturesService: DateFeaturesService) {}

  /**
   * Aggregate holiday counts over an axis
   *
   * @param axis Calendar days in ascending order
   * @param holidaysByState Holidays per state, covering every year of the axis.
   *   States without an entry are treated as having no holidays.
   * @throws EmptyRangeError if the axis has no days
   */
  aggregate(
    axis: CalendarDay[],
    holidaysByState: ReadonlyMap<StateCode, HolidayRecord[]>,
    options: AggregationOptions,
  ): ExportTable {
    if (axis.length === 0) {
      throw new EmptyRangeError();
    }

    const calendars = this.indexHolidays(holidaysByState);
    const buckets = new Map<string, BucketAccumulator>();

    for (const day of axis) {
      const timeBucket = this.dateFeaturesService.timeBucketOf(day, options.timeAgg);

      for (const state of SORTED_STATE_CODES) {
        const contribution = this.contributionOf(
          day,
          calendars.get(state) ?? EMPTY_CALENDAR,
          options,
        );
        const geoBucket: GeoBucket = options.geoAgg === "de" ? NATIONWIDE_BUCKET : state;
        const weight =
          options.geoAgg === "de" && options.weighting === "population"
            ? getPopulationShare(state)
            : 1;

        const key = `${timeBucket}|${geoBucket}`;
        let bucket = buckets.get(key);
        if (!bucket) {
          bucket = {
            timeBucket,
            geoBucket,
            holidayCount: 0,
            includesSunday: false,
            includesSpecial: false,
            openDays: 0,
          };
          buckets.set(key, bucket);
        }

        bucket.holidayCount += weight * contribution.holidayCount;
        bucket.openDays += weight * contribution.openDay;
        bucket.includesSunday ||= contribution.isSunday;
        bucket.includesSpecial ||= contribution.isSpecial;
      }
    }

    const table = Array.from(buckets.values())
      .map((bucket) => this.toRow(bucket, options))
      .sort(compareRows);

    this.logger.debug(
      `Aggregated ${axis.length} days x ${SORTED_STATE_CODES.length} states into ${table.length} rows (${options.timeAgg}/${options.geoAgg})`,
    );
    return table;
  }

  private indexHolidays(
    holidaysByState: ReadonlyMap<StateCode, HolidayRecord[]>,
  ): Map<StateCode, StateCalendar> {
    const calendars = new Map<StateCode, StateCalendar>();
    for (const [state, records] of holidaysByState) {
      const calendar: StateCalendar = { publicDates: new Set(), specialDates: new Set() };
      for (const record of records) {
        (record.isSpecial ? calendar.specialDates : calendar.publicDates).add(record.date);
      }
      calendars.set(state, calendar);
    }
    return calendars;
  }

  private contributionOf(
    day: CalendarDay,
    calendar: StateCalendar,
    options: AggregationOptions,
  ): DayContribution {
    const isPublic = calendar.publicDates.has(day.isoDate);
    const isSpecial = calendar.specialDates.has(day.isoDate);
    const counted =
      isPublic ||
      (options.countSundays && day.isSunday) ||
      (options.specialHolidays && isSpecial);

    return {
      holidayCount: counted ? 1 : 0,
      isSunday: day.isSunday,
      isSpecial,
      openDay: !day.isSunday && !isPublic ? 1 : 0,
    };
  }

  private toRow(bucket: BucketAccumulator, options: AggregationOptions): AggregatedRow {
    const row: AggregatedRow = {
      timeBucket: bucket.timeBucket,
      geoBucket: bucket.geoBucket,
      holidayCount: roundCount(bucket.holidayCount),
    };
    if (options.countSundays) row.includesSunday = bucket.includesSunday;
    if (options.specialHolidays) row.includesSpecial = bucket.includesSpecial;
    if (options.openDays) row.openDays = roundCount(bucket.openDays);
    return row;
  }
}
