import { LogLevel } from "@nestjs/common";
import { registerAs } from "@nestjs/config";
import {
  HOLIDAY_SOURCE_KINDS,
  HolidaySourceKind,
} from "../holidays/holiday-source.interface";
import { InvalidArgumentError } from "../common/errors/holiday-export.errors";

export interface ExportConfig {
  /** Directory the CSV file is written to */
  outputDir: string;
  holidaySource: HolidaySourceKind;
}

const LOG_LEVEL_ORDER: LogLevel[] = ["error", "warn", "log", "debug", "verbose"];

function parseHolidaySource(value: string | undefined): HolidaySourceKind {
  if (!value) return "ruleset";
  const kind = HOLIDAY_SOURCE_KINDS.find((k) => k === value.trim().toLowerCase());
  if (!kind) {
    throw new InvalidArgumentError(
      "HOLIDAY_SOURCE",
      HOLIDAY_SOURCE_KINDS.join(", "),
      value,
    );
  }
  return kind;
}

export const getExportConfig = (): ExportConfig => {
  return {
    outputDir: process.env.EXPORT_OUTPUT_DIR || process.cwd(),
    holidaySource: parseHolidaySource(process.env.HOLIDAY_SOURCE),
  };
};

/**
 * Log levels up to and including LOG_LEVEL (default "log").
 * Unknown values fall back to the default.
 */
export const getLogLevels = (): LogLevel[] => {
  const requested = (process.env.LOG_LEVEL || "log").trim().toLowerCase();
  const index = LOG_LEVEL_ORDER.findIndex((level) => level === requested);
  return LOG_LEVEL_ORDER.slice(0, (index === -1 ? 2 : index) + 1);
};

export const exportConfig = registerAs("export", getExportConfig);
