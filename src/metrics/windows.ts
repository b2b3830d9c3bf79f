import { addMonths, assertPeriod, calendarMonthBuckets, fixedPeriodBuckets, timestampRange } from "./buckets.js";
import { DAY_MS, validRecords } from "../utils.js";
import type { BuildRecord, CountSeries, Dataset, TimeWindow, Timestamped } from "../types.js";

/** Picks the attribute whose distinct values are counted. */
export type Selector<T extends Timestamped = BuildRecord> = (record: T) => string;

export const byOrg: Selector = (record) => record.orgId;
export const byJob: Selector = (record) => record.jobId;

export type PeriodOptions = {
  periodDays: number;
  start?: Date;
  end?: Date;
};

export function countDistinct<T extends Timestamped>(
  records: readonly T[],
  select: Selector<T>,
  window: TimeWindow
) {
  const start = window.start.getTime();
  const end = window.end.getTime();
  const values = new Set<string>();
  for (const record of records) {
    const time = record.createdAt.getTime();
    if (time >= start && time < end) {
      values.add(select(record));
    }
  }
  return values.size;
}

/**
 * One distinct count per bucket. Buckets must be ordered and non-overlapping;
 * records are swept once in time order.
 */
export function bucketValue<T extends Timestamped>(
  records: readonly T[],
  select: Selector<T>,
  buckets: TimeWindow[]
) {
  return sweepBuckets(records, buckets, (members) => new Set(members.map(select)).size);
}

export function bucketRecordCount(records: readonly Timestamped[], buckets: TimeWindow[]) {
  return sweepBuckets(records, buckets, (members) => members.length);
}

export function monthlyValue(records: Dataset, select: Selector): CountSeries {
  const dates = calendarMonthBuckets(records);
  const buckets = dates.map((start) => ({ start, end: addMonths(start, 1) }));
  return { counts: bucketValue(records, select, buckets), dates };
}

export function monthlyUsers(records: Dataset) {
  return monthlyValue(records, byOrg);
}

export function monthlyBuilds(records: Dataset) {
  return monthlyValue(records, byJob);
}

/**
 * Distinct counts over fixed periods. Without an explicit range the periods run
 * from the earliest to the latest timestamp in the dataset.
 */
export function periodValue(records: Dataset, select: Selector, options: PeriodOptions): CountSeries {
  const { dates, buckets } = resolvePeriods(records, options, "periodValue");
  return { counts: bucketValue(records, select, buckets), dates };
}

/** Record counts (not distinct values) over fixed periods. */
export function periodRecordCount(records: Dataset, options: PeriodOptions): CountSeries {
  const { dates, buckets } = resolvePeriods(records, options, "periodRecordCount");
  return { counts: bucketRecordCount(records, buckets), dates };
}

/**
 * Distinct counts in a window of `windowDays` whose end slides forward one day at a
 * time. The first window ends at `min + windowDays`; the last end is strictly before
 * the latest timestamp. Dates in the result are window ends.
 */
export function slidingWindowValue(records: Dataset, select: Selector, windowDays: number): CountSeries {
  const width = assertPeriod("windowDays", windowDays);
  const { min, max } = timestampRange(records, "slidingWindowValue");
  const sorted = sortByTime(records);
  const inWindow = new Map<string, number>();
  const counts: number[] = [];
  const dates: Date[] = [];
  let head = 0;
  let tail = 0;

  for (let end = min.getTime() + width; end < max.getTime(); end += DAY_MS) {
    while (head < sorted.length && sorted[head].createdAt.getTime() < end) {
      const key = select(sorted[head]);
      inWindow.set(key, (inWindow.get(key) ?? 0) + 1);
      head += 1;
    }
    while (tail < head && sorted[tail].createdAt.getTime() < end - width) {
      const key = select(sorted[tail]);
      const remaining = (inWindow.get(key) ?? 0) - 1;
      if (remaining > 0) {
        inWindow.set(key, remaining);
      } else {
        inWindow.delete(key);
      }
      tail += 1;
    }
    counts.push(inWindow.size);
    dates.push(new Date(end));
  }

  return { counts, dates };
}

function resolvePeriods(records: Dataset, options: PeriodOptions, operation: string) {
  const range = timestampRange(records, operation);
  const period = assertPeriod("periodDays", options.periodDays);
  const dates = fixedPeriodBuckets({
    start: options.start ?? range.min,
    end: options.end ?? range.max,
    periodDays: options.periodDays
  });
  const buckets = dates.map((start) => ({ start, end: new Date(start.getTime() + period) }));
  return { dates, buckets };
}

function sweepBuckets<T extends Timestamped>(
  records: readonly T[],
  buckets: TimeWindow[],
  measure: (members: T[]) => number
) {
  const sorted = sortByTime(records);
  let cursor = 0;
  return buckets.map((bucket) => {
    const start = bucket.start.getTime();
    const end = bucket.end.getTime();
    while (cursor < sorted.length && sorted[cursor].createdAt.getTime() < start) {
      cursor += 1;
    }
    const members: T[] = [];
    while (cursor < sorted.length && sorted[cursor].createdAt.getTime() < end) {
      members.push(sorted[cursor]);
      cursor += 1;
    }
    return measure(members);
  });
}

function sortByTime<T extends Timestamped>(records: readonly T[]) {
  return validRecords(records).sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
}
