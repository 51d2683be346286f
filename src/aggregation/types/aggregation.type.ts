import { StateCode } from "../../holidays/constants/german-states.constant";
import { TimeAggregation } from "../../date-features/types/calendar-day.type";

export const GEO_AGGREGATIONS = ["state", "de"] as const;

export type GeoAggregation = (typeof GEO_AGGREGATIONS)[number];

export const WEIGHTINGS = ["population", "none"] as const;

/**
 * How states are merged into the nationwide row:
 * - population: weighted by each state's population share
 * - none: plain sum over all states
 */
export type Weighting = (typeof WEIGHTINGS)[number];

/** Geo bucket of a nationwide row */
export const NATIONWIDE_BUCKET = "DE";

export type GeoBucket = StateCode | typeof NATIONWIDE_BUCKET;

export interface AggregationOptions {
  timeAgg: TimeAggregation;
  geoAgg: GeoAggregation;
  countSundays: boolean;
  specialHolidays: boolean;
  weighting: Weighting;
  openDays: boolean;
}

export interface AggregatedRow {
  timeBucket: string;
  geoBucket: GeoBucket;
  holidayCount: number;
  /** Present when countSundays is enabled */
  includesSunday?: boolean;
  /** Present when specialHolidays is enabled */
  includesSpecial?: boolean;
  /** Days that are neither Sundays nor public holidays; present when openDays is enabled */
  openDays?: number;
}

/** Rows sorted by time bucket, then geo bucket */
export type ExportTable = AggregatedRow[];
