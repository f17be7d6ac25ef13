import { Request, Response } from "express";
import {
  buildDailyFeedbackPrompt,
  FeedbackGenerator,
} from "../services/feedback.service";
import { SummaryService } from "../services/summary.service";
import { DailyFeedback } from "../types/model/feedback.model";
import { logger } from "../utils/logger";
import { sendSuccess } from "../utils/response";
import { DailySummaryQuery } from "../validators/summary.validator";

export class FeedbackController {
  constructor(
    private readonly summaryService: SummaryService,
    private readonly feedbackGenerator: FeedbackGenerator
  ) {}

  getDailyFeedback = async ({ date, tz }: DailySummaryQuery, _req: Request, res: Response) => {
    const summary = await this.summaryService.daily(date, tz);
    logger.info(`Generating feedback for ${summary.date} (${summary.timezone})`);

    const tip = await this.feedbackGenerator.generate(
      buildDailyFeedbackPrompt(summary.date, summary.timezone, summary.totals)
    );

    const feedback: DailyFeedback = {
      date: summary.date,
      timezone: summary.timezone,
      tip,
    };
    sendSuccess(res, "Daily feedback generated", feedback);
  };
}
