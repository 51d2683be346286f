import { plainToInstance } from "class-transformer";
import { ValidationError, validateSync } from "class-validator";
import { addDays } from "date-fns";
import {
  HolidayRegion,
  NATIONWIDE,
  isStateCode,
} from "../constants/german-states.constant";
import {
  HolidayRuleDto,
  HolidayRuleTableDto,
} from "../dto/holiday-rule-table.dto";
import { HolidayRule, HolidayRuleTable } from "../types/holiday-rule.type";
import { calendarDate, parseIsoDate } from "../../common/utils/date.util";
import { getEasterSunday } from "./easter.util";

/**
 * Holiday Rule Utilities
 *
 * Loading of the static rule table and date resolution per rule.
 */

function describeErrors(errors: ValidationError[], path = ""): string[] {
  return errors.flatMap((error) => {
    const location = path ? `${path}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map(
      (message) => `${location}: ${message}`,
    );
    return [...own, ...describeErrors(error.children ?? [], location)];
  });
}

function toHolidayRule(dto: HolidayRuleDto, index: number): HolidayRule {
  const base = {
    name: dto.name,
    states: dto.states ? dto.states.filter(isStateCode) : null,
    special: dto.special ?? false,
    sinceYear: dto.sinceYear,
    untilYear: dto.untilYear,
  };

  if (dto.kind === "fixed" && dto.month !== undefined && dto.day !== undefined) {
    return { ...base, kind: "fixed", month: dto.month, day: dto.day };
  }
  if (dto.kind === "easter" && dto.offset !== undefined) {
    return { ...base, kind: "easter", offset: dto.offset };
  }
  if (
    dto.kind === "weekdayInRange" &&
    dto.month !== undefined &&
    dto.fromDay !== undefined &&
    dto.toDay !== undefined &&
    dto.weekday !== undefined
  ) {
    return {
      ...base,
      kind: "weekdayInRange",
      month: dto.month,
      fromDay: dto.fromDay,
      toDay: dto.toDay,
      weekday: dto.weekday,
    };
  }
  if (dto.kind === "once" && dto.date !== undefined) {
    return { ...base, kind: "once", date: dto.date };
  }
  throw new Error(`Holiday rule #${index} ("${dto.name}") is incomplete for kind "${dto.kind}"`);
}

/**
 * Validates a raw rule table (as read from JSON) and converts it into typed rules.
 *
 * @throws Error listing every invalid field
 */
export function loadHolidayRuleTable(raw: unknown): HolidayRuleTable {
  const dto = plainToInstance(HolidayRuleTableDto, raw);
  const errors = validateSync(dto);
  if (errors.length > 0) {
    throw new Error(`Invalid holiday rule table: ${describeErrors(errors).join("; ")}`);
  }

  return {
    supportedYears: { from: dto.supportedYears.from, to: dto.supportedYears.to },
    rules: dto.rules.map(toHolidayRule),
  };
}

/**
 * Whether a rule contributes to the holidays of a region.
 * Nationwide rules apply everywhere; state rules never apply to "nationwide".
 */
export function ruleAppliesTo(rule: HolidayRule, region: HolidayRegion): boolean {
  if (rule.states === null) return true;
  return region !== NATIONWIDE && rule.states.includes(region);
}

/**
 * Resolves the date a rule falls on in a given year.
 *
 * @returns Local-midnight date, or null if the rule is not in force that year
 */
export function resolveRuleDate(rule: HolidayRule, year: number): Date | null {
  if (rule.sinceYear !== undefined && year < rule.sinceYear) return null;
  if (rule.untilYear !== undefined && year > rule.untilYear) return null;

  switch (rule.kind) {
    case "fixed":
      return calendarDate(year, rule.month, rule.day);
    case "easter":
      return addDays(getEasterSunday(year), rule.offset);
    case "weekdayInRange": {
      for (let day = rule.fromDay; day <= rule.toDay; day++) {
        const candidate = calendarDate(year, rule.month, day);
        if (candidate.getDay() === rule.weekday) return candidate;
      }
      return null;
    }
    case "once": {
      const date = parseIsoDate(rule.date);
      return date && date.getFullYear() === year ? date : null;
    }
  }
}
