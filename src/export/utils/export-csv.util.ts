import * as Papa from "papaparse";
import {
  AggregatedRow,
  AggregationOptions,
  ExportTable,
} from "../../aggregation/types/aggregation.type";

type CsvCell = string | number;

interface CsvColumn {
  header: string;
  value: (row: AggregatedRow) => CsvCell;
}

function formatFlag(value: boolean | undefined): string {
  return value ? "True" : "False";
}

/**
 * CSV columns for the enabled options, in output order:
 * time_bucket, geo_bucket, holiday_count, [includes_sunday], [includes_special], [open_days]
 */
export function exportColumns(options: AggregationOptions): CsvColumn[] {
  const columns: CsvColumn[] = [
    { header: "time_bucket", value: (row) => row.timeBucket },
    { header: "geo_bucket", value: (row) => row.geoBucket },
    { header: "holiday_count", value: (row) => row.holidayCount },
  ];
  if (options.countSundays) {
    columns.push({ header: "includes_sunday", value: (row) => formatFlag(row.includesSunday) });
  }
  if (options.specialHolidays) {
    columns.push({ header: "includes_special", value: (row) => formatFlag(row.includesSpecial) });
  }
  if (options.openDays) {
    columns.push({ header: "open_days", value: (row) => row.openDays ?? 0 });
  }
  return columns;
}

/**
 * Serialize an export table as CSV with a header line and "\n" line endings.
 */
export function serializeExportTable(
  table: ExportTable,
  options: AggregationOptions,
): string {
  const columns = exportColumns(options);
  const csv = Papa.unparse(
    {
      fields: columns.map((column) => column.header),
      data: table.map((row) => columns.map((column) => column.value(row))),
    },
    { newline: "\n" },
  );
  return `${csv}\n`;
}

/**
 * Export_holidays_{start_year}_{start_month}_{end_year}_{end_month}.csv,
 * months zero-padded.
 *
 * @example
 * buildExportFileName(new Date(2023, 0, 1), new Date(2023, 11, 31))
 * // "Export_holidays_2023_01_2023_12.csv"
 */
export function buildExportFileName(startDate: Date, endDate: Date): string {
  const part = (date: Date): string =>
    `${date.getFullYear()}_${String(date.getMonth() + 1).padStart(2, "0")}`;
  return `Export_holidays_${part(startDate)}_${part(endDate)}.csv`;
}
