import { calendarDate } from "../../common/utils/date.util";

/**
 * Easter Sunday (Gregorian calendar) via the Gauss Easter formula,
 * including the corrections for the secular leap-year and lunar cycles.
 *
 * @see https://de.wikipedia.org/wiki/Gau%C3%9Fsche_Osterformel
 *
 * @example
 * getEasterSunday(2023) // 9 April 2023
 * getEasterSunday(2024) // 31 March 2024
 */
export function getEasterSunday(year: number): Date {
  const a = year % 19; // position in the Metonic cycle
  const k = Math.floor(year / 100);
  const m = 15 + Math.floor((3 * k + 3) / 4) - Math.floor((8 * k + 13) / 25);
  const d = (19 * a + m) % 30; // first full moon in spring, days after 21 March
  const s = 2 - Math.floor((3 * k + 3) / 4);
  const r = Math.floor(d / 29) + (Math.floor(d / 28) - Math.floor(d / 29)) * Math.floor(a / 11);
  const og = 21 + d + r; // Easter full moon as a March date
  const sz = 7 - ((year + Math.floor(year / 4) + s) % 7); // first Sunday in March
  const oe = 7 - ((og - sz) % 7);
  const os = og + oe; // Easter Sunday as a March date (32 = 1 April)

  return os > 31 ? calendarDate(year, 4, os - 31) : calendarDate(year, 3, os);
}
