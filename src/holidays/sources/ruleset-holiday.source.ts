import { Injectable } from "@nestjs/common";
import holidayRulesJson from "../data/german-holiday-rules.json";
import { HolidayRegion } from "../constants/german-states.constant";
import { HolidaySource, YearRange } from "../holiday-source.interface";
import { HolidayRule } from "../types/holiday-rule.type";
import { HolidayRecord } from "../types/holiday-record.type";
import {
  loadHolidayRuleTable,
  resolveRuleDate,
  ruleAppliesTo,
} from "../utils/holiday-rules.util";
import { formatIsoDate } from "../../common/utils/date.util";

/**
 * Ruleset Holiday Source
 *
 * Computes German holidays from the static rule table in
 * data/german-holiday-rules.json: fixed dates, Easter offsets,
 * weekday-in-range rules and one-off dates, each scoped to states.
 */
@Injectable()
export class RulesetHolidaySource implements HolidaySource {
  readonly name = "ruleset";
  readonly supportedYears: YearRange;
  private readonly rules: HolidayRule[];

  constructor() {
    const table = loadHolidayRuleTable(holidayRulesJson);
    this.supportedYears = table.supportedYears;
    this.rules = table.rules;
  }

  listHolidays(
    year: number,
    region: HolidayRegion,
    includeSpecial: boolean,
  ): HolidayRecord[] {
    return this.rules
      .filter((rule) => (includeSpecial || !rule.special) && ruleAppliesTo(rule, region))
      .flatMap((rule) => {
        const date = resolveRuleDate(rule, year);
        return date
          ? [{ date: formatIsoDate(date), name: rule.name, region, isSpecial: rule.special }]
          : [];
      });
  }
}
