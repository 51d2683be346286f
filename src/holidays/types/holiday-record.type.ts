import { HolidayRegion } from "../constants/german-states.constant";

/**
 * One holiday occurrence as reported by a holiday source.
 * Unique by (date, region, name).
 */
export interface HolidayRecord {
  /** Calendar day, YYYY-MM-DD */
  date: string;
  name: string;
  region: HolidayRegion;
  /** True for non-public observances (Valentinstag, Silvester, ...) */
  isSpecial: boolean;
}

export interface HolidayLookupOptions {
  /** Also return non-public observances */
  includeSpecial?: boolean;
}
