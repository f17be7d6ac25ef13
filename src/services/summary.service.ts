import { PeriodKind } from "../common/common-enum";
import { MACRO_NUTRIENTS } from "../types/model/nutrient.model";
import {
  DailySummary,
  MonthlySummary,
  WeeklySummary,
  YearlySummary,
} from "../types/model/summary.model";
import { addCalendarDays } from "../utils/convert";
import { DEFAULT_TIMEZONE } from "../utils/timezone";
import { AggregationService, pickMacroTotals } from "./aggregation.service";
import { resolveTimeWindow, resolveTimeZone, TimeWindowOptions } from "./timeWindow.service";

export interface SummaryServiceOptions {
  minYear?: number;
  clock?: () => Date;
}

/**
 * Period summaries. Daily and weekly ones are local to the caller's time zone
 * and rank the top foods; monthly and yearly ones are UTC and report totals only.
 */
export class SummaryService {
  private readonly minYear?: number;
  private readonly clock: () => Date;

  constructor(
    private readonly aggregation: AggregationService,
    options: SummaryServiceOptions = {}
  ) {
    this.minYear = options.minYear;
    this.clock = options.clock ?? (() => new Date());
  }

  async daily(date: string, timeZone: string = DEFAULT_TIMEZONE): Promise<DailySummary> {
    const zone = resolveTimeZone(timeZone);
    const window = resolveTimeWindow({ kind: PeriodKind.DAY, date }, zone);
    const { totals, topFoods } = await this.aggregation.summarize(window, MACRO_NUTRIENTS);

    return {
      date,
      timezone: zone,
      totals: pickMacroTotals(totals),
      top_foods: topFoods,
    };
  }

  async weekly(startDate: string, timeZone: string = DEFAULT_TIMEZONE): Promise<WeeklySummary> {
    const zone = resolveTimeZone(timeZone);
    const window = resolveTimeWindow({ kind: PeriodKind.WEEK, startDate }, zone);
    const { totals, topFoods } = await this.aggregation.summarize(window, MACRO_NUTRIENTS);

    return {
      week_start: startDate,
      week_end: addCalendarDays(startDate, 6),
      timezone: zone,
      totals: pickMacroTotals(totals),
      top_foods: topFoods,
    };
  }

  async monthly(year: number, month: number): Promise<MonthlySummary> {
    const window = resolveTimeWindow(
      { kind: PeriodKind.MONTH, year, month },
      DEFAULT_TIMEZONE,
      this.windowOptions()
    );
    const totals = await this.aggregation.aggregate(window, MACRO_NUTRIENTS);

    return { year, month, totals: pickMacroTotals(totals) };
  }

  async yearly(year: number): Promise<YearlySummary> {
    const window = resolveTimeWindow(
      { kind: PeriodKind.YEAR, year },
      DEFAULT_TIMEZONE,
      this.windowOptions()
    );
    const totals = await this.aggregation.aggregate(window, MACRO_NUTRIENTS);

    return { year, totals: pickMacroTotals(totals) };
  }

  private windowOptions(): TimeWindowOptions {
    return { now: this.clock(), minYear: this.minYear };
  }
}
