import { IsIn, Matches } from "class-validator";
import { TIME_AGGREGATIONS } from "../../date-features/types/calendar-day.type";
import {
  GEO_AGGREGATIONS,
  WEIGHTINGS,
} from "../../aggregation/types/aggregation.type";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const BOOLEAN_FLAG = /^(true|false)$/i;

/**
 * Raw command-line arguments of an export, named as on the command line.
 * Values are still strings; ExportOptions holds the parsed form.
 */
export class ExportOptionsDto {
  @Matches(ISO_DATE)
  start_date!: string;

  @Matches(ISO_DATE)
  end_date!: string;

  @IsIn([...TIME_AGGREGATIONS])
  time_agg!: string;

  @IsIn([...GEO_AGGREGATIONS])
  geo_agg!: string;

  @Matches(BOOLEAN_FLAG)
  count_sundays!: string;

  @Matches(BOOLEAN_FLAG)
  special_holidays!: string;

  @IsIn([...WEIGHTINGS])
  weighting!: string;

  @Matches(BOOLEAN_FLAG)
  open_days!: string;
}
