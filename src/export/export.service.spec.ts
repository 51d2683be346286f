import { Test } from "@nestjs/testing";
import { mkdtemp, readFile, readdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import * as path from "path";
import { ExportService } from "./export.service";
import { ExportOptions } from "./types/export-options.type";
import { AggregationService } from "../aggregation/aggregation.service";
import { DateFeaturesService } from "../date-features/date-features.service";
import { HolidaysService } from "../holidays/holidays.service";
import { HOLIDAY_SOURCE } from "../holidays/holiday-source.interface";
import { RulesetHolidaySource } from "../holidays/sources/ruleset-holiday.source";
import { ExportConfig, exportConfig } from "../config/export.config";
import {
  ExportWriteError,
  InvalidRangeError,
} from "../common/errors/holiday-export.errors";
import { calendarDate } from "../common/utils/date.util";

const FIRST_WEEK_OF_2023: ExportOptions = {
  startDate: calendarDate(2023, 1, 1),
  endDate: calendarDate(2023, 1, 8),
  timeAgg: "day",
  geoAgg: "de",
  countSundays: true,
  specialHolidays: false,
  weighting: "population",
  openDays: false,
};

describe("ExportService", () => {
  let outputDir: string;

  const createService = async (config: ExportConfig): Promise<ExportService> => {
    const module = await Test.createTestingModule({
      providers: [
        ExportService,
        DateFeaturesService,
        AggregationService,
        HolidaysService,
        { provide: HOLIDAY_SOURCE, useClass: RulesetHolidaySource },
        { provide: exportConfig.KEY, useValue: config },
      ],
    }).compile();

    return module.get<ExportService>(ExportService);
  };

  beforeEach(async () => {
    outputDir = await mkdtemp(path.join(tmpdir(), "holiday-export-"));
  });

  afterEach(async () => {
    await rm(outputDir, { recursive: true, force: true });
  });

  it("should write the aggregated table to the output directory", async () => {
    const service = await createService({ outputDir, holidaySource: "ruleset" });

    const result = await service.run(FIRST_WEEK_OF_2023);

    expect(result).toEqual({
      path: path.join(outputDir, "Export_holidays_2023_01_2023_01.csv"),
      rowCount: 8,
    });
    expect(await readFile(result.path, "utf8")).toBe(
      [
        "time_bucket,geo_bucket,holiday_count,includes_sunday",
        "2023-01-01,DE,1,True",
        "2023-01-02,DE,0,False",
        "2023-01-03,DE,0,False",
        "2023-01-04,DE,0,False",
        "2023-01-05,DE,0,False",
        "2023-01-06,DE,0.34033,False",
        "2023-01-07,DE,0,False",
        "2023-01-08,DE,1,True",
        "",
      ].join("\n"),
    );
    expect(await readdir(outputDir)).toEqual(["Export_holidays_2023_01_2023_01.csv"]);
  });

  it("should replace an existing export", async () => {
    const service = await createService({ outputDir, holidaySource: "ruleset" });
    const target = path.join(outputDir, "Export_holidays_2023_01_2023_01.csv");
    await writeFile(target, "stale", "utf8");

    await service.run({ ...FIRST_WEEK_OF_2023, timeAgg: "month" });

    expect(await readFile(target, "utf8")).toBe(
      "time_bucket,geo_bucket,holiday_count,includes_sunday\n2023-01,DE,2.34033,True\n",
    );
  });

  it("should not write anything for an inverted range", async () => {
    const service = await createService({ outputDir, holidaySource: "ruleset" });

    await expect(
      service.run({
        ...FIRST_WEEK_OF_2023,
        startDate: calendarDate(2023, 1, 8),
        endDate: calendarDate(2023, 1, 1),
      }),
    ).rejects.toThrow(InvalidRangeError);
    expect(await readdir(outputDir)).toEqual([]);
  });

  it("should wrap write failures and leave no temporary file", async () => {
    const missingDir = path.join(outputDir, "missing");
    const service = await createService({ outputDir: missingDir, holidaySource: "ruleset" });

    await expect(service.run(FIRST_WEEK_OF_2023)).rejects.toThrow(ExportWriteError);
    expect(await readdir(outputDir)).toEqual([]);
  });
});
