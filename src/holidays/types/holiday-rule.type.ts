import { StateCode } from "../constants/german-states.constant";
import { YearRange } from "../holiday-source.interface";

/**
 * Holiday Rule Types
 *
 * A rule yields at most one date per year.
 */

interface HolidayRuleBase {
  name: string;
  /** States the rule applies to; null means nationwide */
  states: StateCode[] | null;
  /** Non-public observance */
  special: boolean;
  /** First year the rule is in force */
  sinceYear?: number;
  /** Last year the rule is in force */
  untilYear?: number;
}

/** Same day every year */
export interface FixedDateRule extends HolidayRuleBase {
  kind: "fixed";
  month: number;
  day: number;
}

/** Days relative to Easter Sunday */
export interface EasterOffsetRule extends HolidayRuleBase {
  kind: "easter";
  offset: number;
}

/** First given weekday (0 = Sunday) within a day range of a month */
export interface WeekdayInRangeRule extends HolidayRuleBase {
  kind: "weekdayInRange";
  month: number;
  fromDay: number;
  toDay: number;
  weekday: number;
}

/** A single dated occurrence */
export interface OneOffRule extends HolidayRuleBase {
  kind: "once";
  date: string;
}

export type HolidayRule =
  | FixedDateRule
  | EasterOffsetRule
  | WeekdayInRangeRule
  | OneOffRule;

export interface HolidayRuleTable {
  supportedYears: YearRange;
  rules: HolidayRule[];
}
