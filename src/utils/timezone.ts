export const DEFAULT_TIMEZONE = "UTC";

/**
 * Validate an IANA time zone identifier (e.g. "America/Chicago").
 *
 * Intl throws a RangeError for a zone it does not know, which makes it a
 * runtime validator backed by the same tz data dayjs resolves offsets with.
 */
export function isValidIanaTimeZone(value: unknown): value is string {
  if (typeof value !== "string") return false;
  const trimmed = value.trim();
  if (!trimmed) return false;

  try {
    new Intl.DateTimeFormat("en-US", { timeZone: trimmed }).format(new Date());
    return true;
  } catch {
    return false;
  }
}

/** The tz database spelling of a valid zone ("america/chicago" -> "America/Chicago"). */
export function canonicalTimeZone(value: string): string {
  return new Intl.DateTimeFormat("en-US", { timeZone: value.trim() }).resolvedOptions().timeZone;
}
