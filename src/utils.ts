import type { Timestamped } from "./types.js";

export const DAY_MS = 24 * 60 * 60 * 1000;

const dateOnlyPattern = /^\d{4}-\d{2}-\d{2}$/;
const dateTimePattern = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2})?$/;
const zoneSuffixPattern = /([Zz]|[+-]\d{2}:?\d{2})$/;

export function isValidDate(value: Date) {
  return Number.isFinite(value.getTime());
}

/**
 * Records whose timestamp can take part in a window computation. Invalid dates
 * never reach a bucket.
 */
export function validRecords<T extends Timestamped>(records: readonly T[]): T[] {
  return records.filter((record) => isValidDate(record.createdAt));
}

export function daysToMs(days: number) {
  return days * DAY_MS;
}

export function startOfUtcDay(ms: number) {
  return Math.floor(ms / DAY_MS) * DAY_MS;
}

/** Last Monday on or before `value` (UTC), at the same time of day. */
export function previousMonday(value: Date) {
  const offset = (value.getUTCDay() + 6) % 7;
  return new Date(value.getTime() - offset * DAY_MS);
}

export function formatMonthKey(value: Date, timeZone?: string) {
  if (!timeZone) return value.toISOString().slice(0, 7);
  const parts = formatDateParts(value, timeZone);
  return `${parts.year}-${parts.month}`;
}

export function formatDateOnly(value: Date, timeZone?: string) {
  if (!timeZone) return value.toISOString().slice(0, 10);
  const parts = formatDateParts(value, timeZone);
  return `${parts.year}-${parts.month}-${parts.day}`;
}

function formatDateParts(value: Date, timeZone: string) {
  const formatter = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit"
  });
  return partsByType(formatter.formatToParts(value));
}

function partsByType(parts: Intl.DateTimeFormatPart[]): Partial<Record<Intl.DateTimeFormatPartTypes, string>> {
  return Object.fromEntries(parts.map((part) => [part.type, part.value]));
}

export function withDuration(startMs: number, includeTimings?: boolean) {
  if (!includeTimings) return {};
  return { durationMs: Date.now() - startMs };
}

/**
 * Parses a CLI date argument. Values without an explicit offset are read as wall
 * time in `timeZone`.
 */
export function parseDateArg(value: string, timeZone = "UTC"): Date {
  const trimmed = value.trim();
  if (zoneSuffixPattern.test(trimmed)) {
    const parsed = new Date(trimmed);
    if (!isValidDate(parsed)) {
      throw new Error(`Invalid date value: ${value}`);
    }
    return parsed;
  }

  if (dateOnlyPattern.test(trimmed)) {
    const [year, month, day] = trimmed.split("-").map((part) => Number(part));
    return zonedDateTimeToUtc({ year, month, day, hour: 0, minute: 0, second: 0 }, timeZone);
  }

  if (dateTimePattern.test(trimmed)) {
    const [datePart, timePart] = trimmed.split(/[T ]/);
    const [year, month, day] = datePart.split("-").map((part) => Number(part));
    const [hour, minute, second] = timePart.split(":").map((part) => Number(part));
    return zonedDateTimeToUtc({ year, month, day, hour, minute, second: second ?? 0 }, timeZone);
  }

  const parsed = new Date(trimmed);
  if (!isValidDate(parsed)) {
    throw new Error(`Invalid date value: ${value}`);
  }
  return parsed;
}

function zonedDateTimeToUtc(
  parts: { year: number; month: number; day: number; hour: number; minute: number; second: number },
  timeZone: string
) {
  const utcGuess = Date.UTC(
    parts.year,
    parts.month - 1,
    parts.day,
    parts.hour,
    parts.minute,
    parts.second
  );
  const offset = getOffsetMinutes(new Date(utcGuess), timeZone);
  return new Date(utcGuess - offset * 60 * 1000);
}

function getOffsetMinutes(date: Date, timeZone: string) {
  const formatter = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hour12: false
  });
  const map = partsByType(formatter.formatToParts(date));
  // en-CA renders midnight as "24" under hour12: false
  const hour = Number(map.hour) % 24;
  const asUtc = Date.UTC(
    Number(map.year),
    Number(map.month) - 1,
    Number(map.day),
    hour,
    Number(map.minute),
    Number(map.second)
  );
  return (asUtc - date.getTime()) / 60000;
}
