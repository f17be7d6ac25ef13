import dayjs from "dayjs";
import timezone from "dayjs/plugin/timezone";
import utc from "dayjs/plugin/utc";
import { PeriodKind } from "../common/common-enum";
import { PeriodAnchor, TimeWindow } from "../types/model/summary.model";
import { addCalendarDays, isIsoDate } from "../utils/convert";
import { InvalidPeriodError, InvalidTimezoneError } from "../utils/errors";
import { canonicalTimeZone, DEFAULT_TIMEZONE, isValidIanaTimeZone } from "../utils/timezone";

dayjs.extend(utc);
dayjs.extend(timezone);

export const DEFAULT_MIN_YEAR = 1900;

export interface TimeWindowOptions {
  // Reference instant for the upper year bound
  now?: Date;
  minYear?: number;
}

/**
 * Resolve a calendar period into a half-open UTC range `[start, end)`.
 *
 * Day and week periods are local to `timeZone`: both boundaries are local
 * midnights, each mapped through the zone's own offset, so a DST day spans 23
 * or 25 hours of UTC. Month and year periods are always UTC and ignore
 * `timeZone`.
 */
export function resolveTimeWindow(
  anchor: PeriodAnchor,
  timeZone: string = DEFAULT_TIMEZONE,
  options: TimeWindowOptions = {}
): TimeWindow {
  switch (anchor.kind) {
    case PeriodKind.DAY:
      return resolveLocalDays(anchor.date, 1, timeZone);
    case PeriodKind.WEEK:
      return resolveLocalDays(anchor.startDate, 7, timeZone);
    case PeriodKind.MONTH:
      assertYearInRange(anchor.year, options);
      assertMonth(anchor.month);
      return {
        start: utcMonthStart(anchor.year, anchor.month - 1),
        end: utcMonthStart(anchor.year, anchor.month),
      };
    case PeriodKind.YEAR:
      assertYearInRange(anchor.year, options);
      return {
        start: utcMonthStart(anchor.year, 0),
        end: utcMonthStart(anchor.year + 1, 0),
      };
  }
}

/**
 * Resolve a zone name to its canonical spelling, falling back to UTC when none
 * is given.
 */
export function resolveTimeZone(timeZone: string | undefined): string {
  if (timeZone === undefined) return DEFAULT_TIMEZONE;
  if (!isValidIanaTimeZone(timeZone)) {
    throw new InvalidTimezoneError(timeZone);
  }
  return canonicalTimeZone(timeZone);
}

function resolveLocalDays(date: string, days: number, timeZone: string): TimeWindow {
  const zone = resolveTimeZone(timeZone);
  if (!isIsoDate(date)) {
    throw new InvalidPeriodError(`Invalid date '${date}', expected YYYY-MM-DD`);
  }

  const start = localMidnight(date, zone);
  const end = localMidnight(addCalendarDays(date, days), zone);
  return { start, end };
}

function localMidnight(date: string, zone: string): Date {
  return dayjs.tz(date, zone).toDate();
}

// Month index may be 12, which setUTCFullYear rolls into January of year + 1.
function utcMonthStart(year: number, monthIndex: number): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, 1);
  return date;
}

function assertMonth(month: number) {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new InvalidPeriodError(`Invalid month '${month}', expected 1-12`);
  }
}

function assertYearInRange(year: number, options: TimeWindowOptions) {
  const minYear = options.minYear ?? DEFAULT_MIN_YEAR;
  const maxYear = (options.now ?? new Date()).getUTCFullYear();
  if (!Number.isInteger(year) || year < minYear || year > maxYear) {
    throw new InvalidPeriodError(
      `Invalid year '${year}', expected ${minYear}-${maxYear}`
    );
  }
}
