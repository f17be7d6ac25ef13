import dayjs from "dayjs";
import customParseFormat from "dayjs/plugin/customParseFormat";
import utc from "dayjs/plugin/utc";
// active plugin dayjs
dayjs.extend(customParseFormat);
dayjs.extend(utc);

export const ISO_DATE_FORMAT = "YYYY-MM-DD";

/** True for a real calendar date written as YYYY-MM-DD. */
export function isIsoDate(value: string): boolean {
  return dayjs(value, ISO_DATE_FORMAT, true).isValid();
}

export function addCalendarDays(date: string, days: number): string {
  return dayjs.utc(date, ISO_DATE_FORMAT, true).add(days, "day").format(ISO_DATE_FORMAT);
}

export function startOfUtcDay(date: string): Date {
  return dayjs.utc(date, ISO_DATE_FORMAT, true).toDate();
}
