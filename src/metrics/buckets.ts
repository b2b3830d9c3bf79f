import { EmptyDatasetError, InvalidWindowSpecError } from "../errors.js";
import { daysToMs, isValidDate } from "../utils.js";
import type { Timestamped } from "../types.js";

export type TimestampRange = {
  min: Date;
  max: Date;
};

export type FixedPeriodOptions = {
  start: Date;
  end: Date;
  periodDays: number;
};

/**
 * Earliest and latest valid timestamps in the dataset. Records with an invalid
 * `createdAt` are ignored; a dataset without any valid one has no range.
 */
export function timestampRange(records: readonly Timestamped[], operation = "timestampRange"): TimestampRange {
  let min = Infinity;
  let max = -Infinity;
  for (const record of records) {
    const time = record.createdAt.getTime();
    if (!Number.isFinite(time)) continue;
    if (time < min) min = time;
    if (time > max) max = time;
  }
  if (!Number.isFinite(min)) {
    throw new EmptyDatasetError(operation);
  }
  return { min: new Date(min), max: new Date(max) };
}

export function monthStart(value: Date) {
  return new Date(Date.UTC(value.getUTCFullYear(), value.getUTCMonth(), 1));
}

/** Shifts a month-aligned UTC date by whole calendar months. */
export function addMonths(value: Date, months: number) {
  return new Date(Date.UTC(value.getUTCFullYear(), value.getUTCMonth() + months, value.getUTCDate()));
}

/**
 * Month starts covering `[monthStart(min), monthStart(max) + 1 month)`.
 */
export function calendarMonthBuckets(records: readonly Timestamped[]): Date[] {
  const { min, max } = timestampRange(records, "calendarMonthBuckets");
  const last = addMonths(monthStart(max), 1);
  const starts: Date[] = [];
  for (let cursor = monthStart(min); cursor < last; cursor = addMonths(cursor, 1)) {
    starts.push(cursor);
  }
  return starts;
}

/**
 * Starts of consecutive `periodDays` buckets anchored at `start`. A bucket is only
 * emitted while it ends strictly before `end`, so a trailing period that reaches or
 * straddles `end` is dropped.
 */
export function fixedPeriodBuckets(options: FixedPeriodOptions): Date[] {
  const period = assertPeriod("periodDays", options.periodDays);
  if (!isValidDate(options.start)) {
    throw new InvalidWindowSpecError("start", options.start, "must be a valid date");
  }
  if (!isValidDate(options.end)) {
    throw new InvalidWindowSpecError("end", options.end, "must be a valid date");
  }
  const end = options.end.getTime();
  const starts: Date[] = [];
  for (let cursor = options.start.getTime(); cursor + period < end; cursor += period) {
    starts.push(new Date(cursor));
  }
  return starts;
}

export function datasetPeriodBuckets(records: readonly Timestamped[], periodDays: number): Date[] {
  const { min, max } = timestampRange(records, "datasetPeriodBuckets");
  return fixedPeriodBuckets({ start: min, end: max, periodDays });
}

/** Converts a positive day count to milliseconds. */
export function assertPeriod(parameter: string, days: number) {
  if (!Number.isFinite(days) || days <= 0) {
    throw new InvalidWindowSpecError(parameter, days, "must be a positive number of days");
  }
  return daysToMs(days);
}
