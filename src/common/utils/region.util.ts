import {
  HolidayRegion,
  NATIONWIDE,
  isStateCode,
} from "../../holidays/constants/german-states.constant";

/**
 * Region Code Utilities
 *
 * Normalizes user- or source-provided region codes to the short
 * ISO 3166-2 state codes used throughout the export.
 */

/**
 * Non-ISO abbreviations that are common in German data sets.
 * Maps non-standard -> ISO 3166-2 code.
 */
const REGION_ALIASES: Record<string, string> = {
  NRW: "NW", // Nordrhein-Westfalen
  NDS: "NI", // Niedersachsen
  BAW: "BW", // Baden-Württemberg
  BAY: "BY", // Bayern
};

/** Spellings accepted for the nationwide pseudo-region */
const NATIONWIDE_ALIASES = new Set(["NATIONWIDE", "DE", "NATIONAL"]);

/**
 * Normalizes a region code:
 * 1. Trims and upper-cases it
 * 2. Strips a "DE-" prefix
 * 3. Applies alias mappings for non-ISO codes
 *
 * @returns The state code or "nationwide", or null if unrecognized
 *
 * @example
 * normalizeRegionCode("DE-NW") // "NW"
 * normalizeRegionCode("nrw") // "NW"
 * normalizeRegionCode("DE") // "nationwide"
 * normalizeRegionCode("XX") // null
 */
export function normalizeRegionCode(
  code: string | null | undefined,
): HolidayRegion | null {
  if (!code) return null;
  const upper = code.trim().toUpperCase();
  if (NATIONWIDE_ALIASES.has(upper)) return NATIONWIDE;

  const shortCode = upper.startsWith("DE-") ? upper.slice(3) : upper;
  const resolved = REGION_ALIASES[shortCode] ?? shortCode;
  return isStateCode(resolved) ? resolved : null;
}
