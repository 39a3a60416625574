import { UTCDate } from "@date-fns/utc";
import { format, isValid, parseISO } from "date-fns";

// Upstream timestamps are UTC ("...Z"); all grouping and labels stay in UTC.

// Date and time with an explicit zone; zone-less strings would be read in local time
const ZONED_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/;

/** Epoch milliseconds, or null when the string is not a zoned ISO-8601 timestamp. */
export function parseTimestamp(value: string): number | null {
  if (!ZONED_TIMESTAMP.test(value)) return null;
  const date = parseISO(value);
  return isValid(date) ? date.getTime() : null;
}

export function calendarDay(ms: number): string {
  return format(new UTCDate(ms), "yyyy-MM-dd");
}

export function timeOfDay(ms: number): string {
  return format(new UTCDate(ms), "HH:mm");
}

export function dateTimeLabel(ms: number): string {
  return format(new UTCDate(ms), "yyyy-MM-dd HH:mm");
}

/** Filename-safe generation stamp, e.g. `2024-03-15T10-00-00-123`. */
export function fileTimestamp(date: Date): string {
  return format(new UTCDate(date.getTime()), "yyyy-MM-dd'T'HH-mm-ss-SSS");
}
