#!/usr/bin/env node
import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { createAppContext } from "./app.context";
import { getLogLevels } from "./config/export.config";
import { ExportService } from "./export/export.service";
import {
  USAGE,
  isHelpRequested,
  parseExportArgs,
} from "./export/export-options.parser";
import { reportCliError } from "./common/filters/cli-error.handler";

const logger = new Logger("HolidayExport");

/**
 * Usage:
 *   german-holiday-export 2023-01-01 2023-12-31 --time_agg week --geo_agg de
 *
 * Prints the path of the written CSV on success.
 */
async function bootstrap(): Promise<void> {
  const argv = process.argv.slice(2);
  if (isHelpRequested(argv)) {
    console.log(`Usage: ${USAGE}`);
    return;
  }

  // Validate arguments before the application context starts
  const options = parseExportArgs(argv);

  const app = await createAppContext(getLogLevels());
  try {
    const result = await app.get(ExportService).run(options);
    console.log(result.path);
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  process.exitCode = reportCliError(error, logger);
});
