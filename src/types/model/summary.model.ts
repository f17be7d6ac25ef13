import { PeriodKind } from "../../common/common-enum";
import { MacroNutrient } from "./nutrient.model";

/**
 * Half-open UTC range: `start` is included, `end` is excluded.
 */
export interface TimeWindow {
  start: Date;
  end: Date;
}

export type PeriodAnchor =
  | { kind: PeriodKind.DAY; date: string }
  | { kind: PeriodKind.WEEK; startDate: string }
  | { kind: PeriodKind.MONTH; year: number; month: number }
  | { kind: PeriodKind.YEAR; year: number };

export type MacroTotals = Record<MacroNutrient, number>;

export interface TopFood {
  food_name: string;
  calories: number;
}

export interface DailySummary {
  date: string;
  timezone: string;
  totals: MacroTotals;
  top_foods: TopFood[];
}

export interface WeeklySummary {
  week_start: string;
  week_end: string;
  timezone: string;
  totals: MacroTotals;
  top_foods: TopFood[];
}

export interface MonthlySummary {
  year: number;
  month: number;
  totals: MacroTotals;
}

export interface YearlySummary {
  year: number;
  totals: MacroTotals;
}
