import { parseArgs } from "util";
import { plainToInstance } from "class-transformer";
import { validateSync } from "class-validator";
import { ExportOptionsDto } from "./dto/export-options.dto";
import { ExportOptions } from "./types/export-options.type";
import { TIME_AGGREGATIONS } from "../date-features/types/calendar-day.type";
import {
  GEO_AGGREGATIONS,
  WEIGHTINGS,
} from "../aggregation/types/aggregation.type";
import { InvalidArgumentError } from "../common/errors/holiday-export.errors";
import { parseIsoDate } from "../common/utils/date.util";

export const USAGE =
  "german-holiday-export <start_date> <end_date> [--time_agg day|week|month] [--geo_agg state|de] " +
  "[--count_sundays True|False] [--special_holidays True|False] [--weighting population|none] [--open_days True|False]";

const ISO_DATE_EXPECTATION = "a date in YYYY-MM-DD format";
const BOOLEAN_EXPECTATION = "True, False";

/** Allowed values per argument, as reported to the user */
const EXPECTED_VALUES: Record<string, string> = {
  start_date: ISO_DATE_EXPECTATION,
  end_date: ISO_DATE_EXPECTATION,
  time_agg: TIME_AGGREGATIONS.join(", "),
  geo_agg: GEO_AGGREGATIONS.join(", "),
  count_sundays: BOOLEAN_EXPECTATION,
  special_holidays: BOOLEAN_EXPECTATION,
  weighting: WEIGHTINGS.join(", "),
  open_days: BOOLEAN_EXPECTATION,
};

const POSITIONALS = ["start_date", "end_date"];

function parameterLabel(property: string): string {
  return POSITIONALS.includes(property) ? property : `--${property}`;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        time_agg: { type: "string", default: "day" },
        geo_agg: { type: "string", default: "state" },
        count_sundays: { type: "string", default: "False" },
        special_holidays: { type: "string", default: "False" },
        weighting: { type: "string", default: "population" },
        open_days: { type: "string", default: "False" },
      },
    });
  } catch (error) {
    // parseArgs reports unknown flags and flags without a value as TypeError
    if (error instanceof TypeError) {
      throw new InvalidArgumentError(
        "arguments",
        USAGE,
        undefined,
        `${error.message}. Usage: ${USAGE}`,
      );
    }
    throw error;
  }
}

function pick<T extends string>(
  domain: readonly T[],
  value: string,
  parameter: string,
): T {
  const match = domain.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new InvalidArgumentError(parameter, domain.join(", "), value);
  }
  return match;
}

function toDate(value: string, parameter: string): Date {
  const date = parseIsoDate(value);
  if (!date) {
    throw new InvalidArgumentError(parameter, ISO_DATE_EXPECTATION, value);
  }
  return date;
}

function toBoolean(value: string): boolean {
  return value.toLowerCase() === "true";
}

/**
 * Parse and validate the command-line arguments of an export
 *
 * @param argv Arguments after the program name (process.argv.slice(2))
 * @throws InvalidArgumentError naming the offending parameter and its allowed values
 *
 * @example
 * parseExportArgs(["2023-01-01", "2023-01-08", "--geo_agg", "de", "--count_sundays", "True"])
 * // { startDate: 2023-01-01, endDate: 2023-01-08, timeAgg: "day", geoAgg: "de", countSundays: true, ... }
 */
export function parseExportArgs(argv: string[]): ExportOptions {
  const { values, positionals } = readArgs(argv);

  if (positionals.length < POSITIONALS.length) {
    throw new InvalidArgumentError(POSITIONALS[positionals.length], ISO_DATE_EXPECTATION);
  }
  if (positionals.length > POSITIONALS.length) {
    const extra = positionals.slice(POSITIONALS.length).join(" ");
    throw new InvalidArgumentError(
      "arguments",
      USAGE,
      extra,
      `Unexpected arguments: ${extra}. Usage: ${USAGE}`,
    );
  }

  const dto = plainToInstance(ExportOptionsDto, {
    start_date: positionals[0],
    end_date: positionals[1],
    ...values,
  });

  const [error] = validateSync(dto);
  if (error) {
    throw new InvalidArgumentError(
      parameterLabel(error.property),
      EXPECTED_VALUES[error.property] ?? "a valid value",
      String(error.value),
    );
  }

  return {
    startDate: toDate(dto.start_date, "start_date"),
    endDate: toDate(dto.end_date, "end_date"),
    timeAgg: pick(TIME_AGGREGATIONS, dto.time_agg, "--time_agg"),
    geoAgg: pick(GEO_AGGREGATIONS, dto.geo_agg, "--geo_agg"),
    countSundays: toBoolean(dto.count_sundays),
    specialHolidays: toBoolean(dto.special_holidays),
    weighting: pick(WEIGHTINGS, dto.weighting, "--weighting"),
    openDays: toBoolean(dto.open_days),
  };
}

/** Whether the arguments ask for usage help */
export function isHelpRequested(argv: string[]): boolean {
  return argv.includes("--help") || argv.includes("-h");
}
