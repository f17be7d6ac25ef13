import { Request, Response } from "express";
import { SummaryService } from "../services/summary.service";
import { sendSuccess } from "../utils/response";
import {
  DailySummaryQuery,
  MonthlySummaryQuery,
  WeeklySummaryQuery,
  YearlySummaryQuery,
} from "../validators/summary.validator";

export class SummaryController {
  constructor(private readonly summaryService: SummaryService) {}

  getDailySummary = async ({ date, tz }: DailySummaryQuery, _req: Request, res: Response) => {
    const summary = await this.summaryService.daily(date, tz);
    sendSuccess(res, "Daily summary retrieved", summary);
  };

  getWeeklySummary = async (
    { start_date, tz }: WeeklySummaryQuery,
    _req: Request,
    res: Response
  ) => {
    const summary = await this.summaryService.weekly(start_date, tz);
    sendSuccess(res, "Weekly summary retrieved", summary);
  };

  getMonthlySummary = async (
    { year, month }: MonthlySummaryQuery,
    _req: Request,
    res: Response
  ) => {
    const summary = await this.summaryService.monthly(year, month);
    sendSuccess(res, "Monthly summary retrieved", summary);
  };

  getYearlySummary = async ({ year }: YearlySummaryQuery, _req: Request, res: Response) => {
    const summary = await this.summaryService.yearly(year);
    sendSuccess(res, "Yearly summary retrieved", summary);
  };
}
