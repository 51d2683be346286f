import { Logger } from "@nestjs/common";
import {
  FAILURE_EXIT_CODE,
  HolidayExportError,
} from "../errors/holiday-export.errors";

/**
 * CLI error boundary.
 * - Known export errors: one clean log line, their own exit code
 * - Anything else: full stack trace, exit code 1
 *
 * @returns The process exit code for the error
 */
export function reportCliError(error: unknown, logger: Logger): number {
  if (error instanceof HolidayExportError) {
    logger.error(`${error.code}: ${error.message}`);
    return error.exitCode;
  }

  if (error instanceof Error) {
    logger.error(`Unexpected error: ${error.message}`, error.stack);
  } else {
    logger.error(`Unexpected error: ${String(error)}`);
  }
  return FAILURE_EXIT_CODE;
}
