/**
 * A calendar day of the export range with its derived time features.
 */
export interface CalendarDay {
  /** Local midnight */
  date: Date;
  /** YYYY-MM-DD */
  isoDate: string;
  year: number;
  /** 1-12 */
  month: number;
  /** ISO 8601 week number (1-53) */
  isoWeek: number;
  /** ISO week-numbering year, differs from `year` around New Year */
  isoWeekYear: number;
  /** 0 = Sunday, ..., 6 = Saturday */
  weekday: number;
  isSunday: boolean;
}

export interface DateRange {
  start: Date;
  end: Date;
}

export const TIME_AGGREGATIONS = ["day", "week", "month"] as const;

export type TimeAggregation = (typeof TIME_AGGREGATIONS)[number];
