import { Type } from "class-transformer";
import {
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
  ValidateIf,
  ValidateNested,
} from "class-validator";
import { STATE_CODES } from "../constants/german-states.constant";

export class HolidayRuleDto {
  @IsString()
  name!: string;

  @IsIn(["fixed", "easter", "weekdayInRange", "once"])
  kind!: string;

  @IsOptional()
  @IsArray()
  @IsIn([...STATE_CODES], { each: true })
  states?: string[];

  @IsOptional()
  @IsBoolean()
  special?: boolean;

  @IsOptional()
  @IsInt()
  sinceYear?: number;

  @IsOptional()
  @IsInt()
  untilYear?: number;

  @ValidateIf((rule: HolidayRuleDto) => rule.kind === "fixed" || rule.kind === "weekdayInRange")
  @IsInt()
  @Min(1)
  @Max(12)
  month?: number;

  @ValidateIf((rule: HolidayRuleDto) => rule.kind === "fixed")
  @IsInt()
  @Min(1)
  @Max(31)
  day?: number;

  @ValidateIf((rule: HolidayRuleDto) => rule.kind === "easter")
  @IsInt()
  offset?: number;

  @ValidateIf((rule: HolidayRuleDto) => rule.kind === "weekdayInRange")
  @IsInt()
  @Min(1)
  @Max(31)
  fromDay?: number;

  @ValidateIf((rule: HolidayRuleDto) => rule.kind === "weekdayInRange")
  @IsInt()
  @Min(1)
  @Max(31)
  toDay?: number;

  @ValidateIf((rule: HolidayRuleDto) => rule.kind === "weekdayInRange")
  @IsInt()
  @Min(0)
  @Max(6)
  weekday?: number;

  @ValidateIf((rule: HolidayRuleDto) => rule.kind === "once")
  @Matches(/^\d{4}-\d{2}-\d{2}$/)
  date?: string;
}

export class YearRangeDto {
  @IsInt()
  from!: number;

  @IsInt()
  to!: number;
}

export class HolidayRuleTableDto {
  @ValidateNested()
  @Type(() => YearRangeDto)
  supportedYears!: YearRangeDto;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => HolidayRuleDto)
  rules!: HolidayRuleDto[];
}
