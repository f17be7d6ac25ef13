import { z } from "zod";
import { loadConfig } from "../configs/environment";
import { DEFAULT_TIMEZONE } from "../utils/timezone";
import { isoDateSchema } from "./foodLog.validator";

const config = loadConfig();

// Zone names are checked against the tz database when the window is resolved.
export const timeZoneSchema = z.string().trim().min(1, "tz must not be empty").default(DEFAULT_TIMEZONE);

export const yearSchema = z.coerce
  .number({ invalid_type_error: "year must be a number" })
  .int("year must be an integer")
  .min(config.summaries.minYear, `year must be >= ${config.summaries.minYear}`)
  .refine((year) => year <= new Date().getUTCFullYear(), "year must not be in the future");

export const monthSchema = z.coerce
  .number({ invalid_type_error: "month must be a number" })
  .int("month must be an integer")
  .min(1, "month must be between 1 and 12")
  .max(12, "month must be between 1 and 12");

export const dailySummaryQuerySchema = z.object({
  date: isoDateSchema("date"),
  tz: timeZoneSchema,
});

export const weeklySummaryQuerySchema = z.object({
  start_date: isoDateSchema("start_date"),
  tz: timeZoneSchema,
});

export const monthlySummaryQuerySchema = z.object({
  year: yearSchema,
  month: monthSchema,
});

export const yearlySummaryQuerySchema = z.object({
  year: yearSchema,
});

export type DailySummaryQuery = z.infer<typeof dailySummaryQuerySchema>;
export type WeeklySummaryQuery = z.infer<typeof weeklySummaryQuerySchema>;
export type MonthlySummaryQuery = z.infer<typeof monthlySummaryQuerySchema>;
export type YearlySummaryQuery = z.infer<typeof yearlySummaryQuerySchema>;
