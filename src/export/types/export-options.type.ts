import { AggregationOptions } from "../../aggregation/types/aggregation.type";

/**
 * Fully validated options of one export run.
 */
export interface ExportOptions extends AggregationOptions {
  /** First day of the range (local midnight) */
  startDate: Date;
  /** Last day of the range, inclusive */
  endDate: Date;
}

export interface ExportResult {
  /** Absolute or output-dir-relative path of the written CSV */
  path: string;
  rowCount: number;
}
