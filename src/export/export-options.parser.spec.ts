import {
  USAGE,
  isHelpRequested,
  parseExportArgs,
} from "./export-options.parser";
import { InvalidArgumentError } from "../common/errors/holiday-export.errors";
import { calendarDate } from "../common/utils/date.util";

const parseError = (argv: string[]): InvalidArgumentError => {
  try {
    parseExportArgs(argv);
  } catch (error) {
    if (error instanceof InvalidArgumentError) return error;
    throw error;
  }
  throw new Error(`Expected ${argv.join(" ")} to be rejected`);
};

describe("parseExportArgs", () => {
  it("should apply defaults for omitted flags", () => {
    expect(parseExportArgs(["2023-01-01", "2023-12-31"])).toEqual({
      startDate: calendarDate(2023, 1, 1),
      endDate: calendarDate(2023, 12, 31),
      timeAgg: "day",
      geoAgg: "state",
      countSundays: false,
      specialHolidays: false,
      weighting: "population",
      openDays: false,
    });
  });

  it("should read every flag", () => {
    const options = parseExportArgs([
      "2023-01-01",
      "2023-01-08",
      "--time_agg",
      "week",
      "--geo_agg",
      "de",
      "--count_sundays",
      "True",
      "--special_holidays=TRUE",
      "--weighting",
      "none",
      "--open_days",
      "true",
    ]);

    expect(options).toEqual({
      startDate: calendarDate(2023, 1, 1),
      endDate: calendarDate(2023, 1, 8),
      timeAgg: "week",
      geoAgg: "de",
      countSundays: true,
      specialHolidays: true,
      weighting: "none",
      openDays: true,
    });
  });

  it("should accept flags before the dates", () => {
    const options = parseExportArgs(["--geo_agg", "de", "2024-02-01", "2024-02-29"]);

    expect(options.geoAgg).toBe("de");
    expect(options.endDate).toEqual(calendarDate(2024, 2, 29));
  });

  it("should name the allowed values of an enum flag", () => {
    const error = parseError(["2023-01-01", "2023-12-31", "--time_agg", "year"]);

    expect(error.parameter).toBe("--time_agg");
    expect(error.exitCode).toBe(2);
    expect(error.message).toBe('Invalid value "year" for --time_agg. Expected: day, week, month');
  });

  it("should reject booleans other than True and False", () => {
    const error = parseError(["2023-01-01", "2023-12-31", "--count_sundays", "yes"]);

    expect(error.message).toBe('Invalid value "yes" for --count_sundays. Expected: True, False');
  });

  it("should reject malformed dates", () => {
    const error = parseError(["2023/01/01", "2023-12-31"]);

    expect(error.message).toBe(
      'Invalid value "2023/01/01" for start_date. Expected: a date in YYYY-MM-DD format',
    );
  });

  it("should reject dates that do not exist", () => {
    const error = parseError(["2023-01-01", "2023-02-30"]);

    expect(error.parameter).toBe("end_date");
    expect(error.value).toBe("2023-02-30");
  });

  it("should report a missing end date", () => {
    const error = parseError(["2023-01-01"]);

    expect(error.message).toBe("Missing value for end_date. Expected: a date in YYYY-MM-DD format");
  });

  it("should reject extra positional arguments", () => {
    const error = parseError(["2023-01-01", "2023-12-31", "2024-01-01"]);

    expect(error.message).toBe(`Unexpected arguments: 2024-01-01. Usage: ${USAGE}`);
  });

  it("should reject unknown flags", () => {
    const error = parseError(["2023-01-01", "2023-12-31", "--region", "BY"]);

    expect(error.parameter).toBe("arguments");
    expect(error.message).toContain(`Usage: ${USAGE}`);
  });
});

describe("isHelpRequested", () => {
  it("should detect --help and -h", () => {
    expect(isHelpRequested(["--help"])).toBe(true);
    expect(isHelpRequested(["2023-01-01", "-h"])).toBe(true);
    expect(isHelpRequested(["2023-01-01", "2023-01-02"])).toBe(false);
  });
});
