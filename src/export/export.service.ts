import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigType } from "@nestjs/config";
import { rename, rm, writeFile } from "fs/promises";
import * as path from "path";
import { AggregationService } from "../aggregation/aggregation.service";
import { DateFeaturesService } from "../date-features/date-features.service";
import { CalendarDay } from "../date-features/types/calendar-day.type";
import { HolidaysService } from "../holidays/holidays.service";
import {
  STATE_CODES,
  StateCode,
} from "../holidays/constants/german-states.constant";
import { HolidayRecord } from "../holidays/types/holiday-record.type";
import { exportConfig } from "../config/export.config";
import { ExportWriteError } from "../common/errors/holiday-export.errors";
import { ExportOptions, ExportResult } from "./types/export-options.type";
import {
  buildExportFileName,
  serializeExportTable,
} from "./utils/export-csv.util";

/**
 * Export Service
 *
 * Runs one holiday export end to end:
 * 1. Build the daily axis for the requested range
 * 2. Look up holidays for every state and year of the axis
 * 3. Aggregate by the requested time and geo granularity
 * 4. Write the CSV file
 *
 * Range errors surface from step 1, so nothing is written for invalid input.
 */
@Injectable()
export class ExportService {
  private readonly logger = new Logger(ExportService.name);

  constructor(
    private readonly dateFeaturesService: DateFeaturesService,
    private readonly holidaysService: HolidaysService,
    private readonly aggregationService: AggregationService,
    @Inject(exportConfig.KEY)
    private readonly config: ConfigType<typeof exportConfig>,
  ) {}

  async run(options: ExportOptions): Promise<ExportResult> {
    const axis = this.dateFeaturesService.buildAxis({
      start: options.startDate,
      end: options.endDate,
    });
    this.logger.log(
      `🎉 Exporting holidays ${axis[0].isoDate} to ${axis[axis.length - 1].isoDate} (${axis.length} days, ${options.timeAgg}/${options.geoAgg}, source: ${this.holidaysService.sourceName})`,
    );

    const holidaysByState = this.collectHolidays(axis, options.specialHolidays);
    const table = this.aggregationService.aggregate(axis, holidaysByState, options);

    const filePath = path.join(
      this.config.outputDir,
      buildExportFileName(options.startDate, options.endDate),
    );
    await this.writeAtomically(filePath, serializeExportTable(table, options));

    this.logger.log(`✅ Wrote ${table.length} rows to ${filePath}`);
    return { path: filePath, rowCount: table.length };
  }

  private collectHolidays(
    axis: CalendarDay[],
    includeSpecial: boolean,
  ): Map<StateCode, HolidayRecord[]> {
    const years = this.dateFeaturesService.yearsOf(axis);
    const holidaysByState = new Map<StateCode, HolidayRecord[]>();

    for (const state of STATE_CODES) {
      holidaysByState.set(
        state,
        years.flatMap((year) =>
          this.holidaysService.getHolidays(year, state, { includeSpecial }),
        ),
      );
    }
    return holidaysByState;
  }

  /**
   * Write to a temporary sibling first and rename it into place, so the
   * target never holds a partial export.
   */
  private async writeAtomically(filePath: string, content: string): Promise<void> {
    const tempPath = `${filePath}.${process.pid}.tmp`;
    try {
      await writeFile(tempPath, content, "utf8");
      await rename(tempPath, filePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw new ExportWriteError(filePath, error);
    }
  }
}
