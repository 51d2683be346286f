/**
 * Holiday Export Errors
 *
 * Every failure the export can report to the user. The CLI boundary
 * (reportCliError) maps them to a log line and a process exit code.
 */

export type HolidayExportErrorCode =
  | "INVALID_ARGUMENT"
  | "INVALID_RANGE"
  | "INVALID_REGION"
  | "UNSUPPORTED_YEAR"
  | "EMPTY_RANGE"
  | "EXPORT_WRITE_FAILED";

/** Exit code for usage errors (bad flags, bad dates) */
export const USAGE_EXIT_CODE = 2;
export const FAILURE_EXIT_CODE = 1;

export abstract class HolidayExportError extends Error {
  abstract readonly code: HolidayExportErrorCode;
  readonly exitCode: number = FAILURE_EXIT_CODE;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends HolidayExportError {
  readonly code = "INVALID_ARGUMENT";
  readonly exitCode = USAGE_EXIT_CODE;

  constructor(
    readonly parameter: string,
    readonly expected: string,
    readonly value?: string,
    message?: string,
  ) {
    super(
      message ??
        (value === undefined
          ? `Missing value for ${parameter}. Expected: ${expected}`
          : `Invalid value "${value}" for ${parameter}. Expected: ${expected}`),
    );
  }
}

export class InvalidRangeError extends HolidayExportError {
  readonly code = "INVALID_RANGE";
  readonly exitCode = USAGE_EXIT_CODE;

  constructor(
    readonly startDate: string,
    readonly endDate: string,
  ) {
    super(
      `Invalid date range: start_date ${startDate} is after end_date ${endDate}`,
    );
  }
}

export class InvalidRegionError extends HolidayExportError {
  readonly code = "INVALID_REGION";

  constructor(readonly region: string) {
    super(`Unknown region "${region}". Expected a German state code or "nationwide"`);
  }
}

export class UnsupportedYearError extends HolidayExportError {
  readonly code = "UNSUPPORTED_YEAR";

  constructor(
    readonly year: number,
    readonly supported: { from: number; to: number },
  ) {
    super(
      `Year ${year} is not covered by the holiday calendar (supported: ${supported.from}-${supported.to})`,
    );
  }
}

export class EmptyRangeError extends HolidayExportError {
  readonly code = "EMPTY_RANGE";

  constructor() {
    super("Cannot aggregate an empty date axis");
  }
}

export class ExportWriteError extends HolidayExportError {
  readonly code = "EXPORT_WRITE_FAILED";

  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(
      `Failed to write ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}
