import { Inject, Injectable, Logger } from "@nestjs/common";
import { HOLIDAY_SOURCE, HolidaySource } from "./holiday-source.interface";
import {
  HolidayLookupOptions,
  HolidayRecord,
} from "./types/holiday-record.type";
import {
  InvalidRegionError,
  UnsupportedYearError,
} from "../common/errors/holiday-export.errors";
import { normalizeRegionCode } from "../common/utils/region.util";

/**
 * Holidays Service
 *
 * Public entry point for holiday lookups. Validates the region and year,
 * delegates to the configured HolidaySource and memoises results, since
 * an export asks for the same (year, state) once per state and year.
 */
@Injectable()
export class HolidaysService {
  private readonly logger = new Logger(HolidaysService.name);
  private readonly cache = new Map<string, HolidayRecord[]>();

  constructor(@Inject(HOLIDAY_SOURCE) private readonly source: HolidaySource) {}

  get sourceName(): string {
    return this.source.name;
  }

  /**
   * Get holidays for a year and region
   *
   * @param year Calendar year
   * @param region State code ("BY", "DE-BY", "NRW", ...) or "nationwide"
   * @returns Records sorted by date, then name; unique by (date, region, name)
   * @throws InvalidRegionError if the region is not a German state or "nationwide"
   * @throws UnsupportedYearError if the source does not cover the year
   */
  getHolidays(
    year: number,
    region: string,
    options: HolidayLookupOptions = {},
  ): HolidayRecord[] {
    const normalizedRegion = normalizeRegionCode(region);
    if (!normalizedRegion) {
      throw new InvalidRegionError(region);
    }

    const { from, to } = this.source.supportedYears;
    if (!Number.isInteger(year) || year < from || year > to) {
      throw new UnsupportedYearError(year, this.source.supportedYears);
    }

    const includeSpecial = options.includeSpecial ?? false;
    const cacheKey = `${year}:${normalizedRegion}:${includeSpecial ? "special" : "public"}`;
    const cached = this.cache.get(cacheKey);
    if (cached) return [...cached];

    const records = this.deduplicate(
      this.source.listHolidays(year, normalizedRegion, includeSpecial),
    );
    this.logger.debug(
      `Loaded ${records.length} holidays for ${normalizedRegion} ${year} from ${this.source.name}`,
    );

    this.cache.set(cacheKey, records);
    return [...records];
  }

  private deduplicate(records: HolidayRecord[]): HolidayRecord[] {
    const unique = new Map<string, HolidayRecord>();
    for (const record of records) {
      unique.set(`${record.date}|${record.region}|${record.name}`, record);
    }
    return Array.from(unique.values()).sort(
      (a, b) => a.date.localeCompare(b.date) || a.name.localeCompare(b.name),
    );
  }
}
