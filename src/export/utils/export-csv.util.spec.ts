import {
  buildExportFileName,
  exportColumns,
  serializeExportTable,
} from "./export-csv.util";
import { AggregationOptions } from "../../aggregation/types/aggregation.type";
import { calendarDate } from "../../common/utils/date.util";

const BASE_OPTIONS: AggregationOptions = {
  timeAgg: "day",
  geoAgg: "state",
  countSundays: false,
  specialHolidays: false,
  weighting: "population",
  openDays: false,
};

describe("export-csv.util", () => {
  describe("exportColumns", () => {
    it("should only add optional columns that are enabled", () => {
      const headers = (options: Partial<AggregationOptions>) =>
        exportColumns({ ...BASE_OPTIONS, ...options }).map((column) => column.header);

      expect(headers({})).toEqual(["time_bucket", "geo_bucket", "holiday_count"]);
      expect(headers({ specialHolidays: true, openDays: true })).toEqual([
        "time_bucket",
        "geo_bucket",
        "holiday_count",
        "includes_special",
        "open_days",
      ]);
    });
  });

  describe("serializeExportTable", () => {
    it("should write a header and one line per row", () => {
      const csv = serializeExportTable(
        [
          { timeBucket: "2023-01-06", geoBucket: "BB", holidayCount: 0 },
          { timeBucket: "2023-01-06", geoBucket: "BE", holidayCount: 0 },
          { timeBucket: "2023-01-06", geoBucket: "BW", holidayCount: 1 },
        ],
        BASE_OPTIONS,
      );

      expect(csv).toBe(
        "time_bucket,geo_bucket,holiday_count\n" +
          "2023-01-06,BB,0\n" +
          "2023-01-06,BE,0\n" +
          "2023-01-06,BW,1\n",
      );
    });

    it("should write flags as True/False and fractional counts as decimals", () => {
      const csv = serializeExportTable(
        [
          {
            timeBucket: "2022-W52",
            geoBucket: "DE",
            holidayCount: 1,
            includesSunday: true,
            includesSpecial: false,
            openDays: 0,
          },
          {
            timeBucket: "2023-W01",
            geoBucket: "DE",
            holidayCount: 1.34033,
            includesSunday: true,
            includesSpecial: false,
            openDays: 5.65967,
          },
        ],
        { ...BASE_OPTIONS, geoAgg: "de", countSundays: true, specialHolidays: true, openDays: true },
      );

      expect(csv.split("\n")).toEqual([
        "time_bucket,geo_bucket,holiday_count,includes_sunday,includes_special,open_days",
        "2022-W52,DE,1,True,False,0",
        "2023-W01,DE,1.34033,True,False,5.65967",
        "",
      ]);
    });
  });

  describe("buildExportFileName", () => {
    it("should zero-pad months", () => {
      expect(buildExportFileName(calendarDate(2023, 1, 1), calendarDate(2023, 12, 31))).toBe(
        "Export_holidays_2023_01_2023_12.csv",
      );
      expect(buildExportFileName(calendarDate(2019, 9, 15), calendarDate(2021, 3, 2))).toBe(
        "Export_holidays_2019_09_2021_03.csv",
      );
    });
  });
});
