import { addMonths, assertPeriod, calendarMonthBuckets, timestampRange } from "./buckets.js";
import { bucketValue, monthlyUsers } from "./windows.js";
import { CohortInvariantError, EmptyDatasetError, InvalidWindowSpecError } from "../errors.js";
import { isValidDate } from "../utils.js";
import type { CountSeries, Dataset, FirstSeen, WeeklyUsers } from "../types.js";

export type WeeklyUsersOptions = {
  start: Date;
  periodDays?: number;
};

/**
 * One entry per organization holding its earliest valid timestamp, in order of
 * first appearance in the dataset.
 */
export function firstBuilds(records: Dataset): FirstSeen[] {
  const earliest = new Map<string, number>();
  for (const record of records) {
    const time = record.createdAt.getTime();
    if (!Number.isFinite(time)) continue;
    const current = earliest.get(record.orgId);
    if (current === undefined || time < current) {
      earliest.set(record.orgId, time);
    }
  }
  if (earliest.size === 0) {
    throw new EmptyDatasetError("firstBuilds");
  }
  return Array.from(earliest, ([orgId, time]) => ({ orgId, createdAt: new Date(time) }));
}

/**
 * Organizations counted in the month of their first build. Months span the whole
 * dataset so the series lines up with `monthlyUsers`.
 */
export function monthlyNewUsers(records: Dataset): CountSeries {
  const dates = calendarMonthBuckets(records);
  const cohort = firstBuilds(records);
  const buckets = dates.map((start) => ({ start, end: addMonths(start, 1) }));
  return { counts: bucketValue(cohort, (entry) => entry.orgId, buckets), dates };
}

export function monthlyReturningUsers(records: Dataset): CountSeries {
  const all = monthlyUsers(records);
  const fresh = monthlyNewUsers(records);
  const counts = all.counts.map((total, index) => {
    const returning = total - fresh.counts[index];
    if (returning < 0) {
      throw new CohortInvariantError(all.dates[index], total, fresh.counts[index]);
    }
    return returning;
  });
  return { counts, dates: all.dates };
}

/**
 * Distinct and first-time organizations per period, from `start` until the last
 * period that begins before the latest timestamp. Organizations seen before
 * `start` are never counted as new.
 */
export function weeklyUsers(records: Dataset, options: WeeklyUsersOptions): WeeklyUsers {
  const period = assertPeriod("periodDays", options.periodDays ?? 7);
  if (!isValidDate(options.start)) {
    throw new InvalidWindowSpecError("start", options.start, "must be a valid date");
  }
  const { max } = timestampRange(records, "weeklyUsers");
  const startMs = options.start.getTime();

  const seen = new Set<string>();
  for (const record of records) {
    if (record.createdAt.getTime() < startMs) {
      seen.add(record.orgId);
    }
  }

  const result: WeeklyUsers = { dates: [], users: [], newUsers: [] };
  for (let cursor = startMs; cursor < max.getTime(); cursor += period) {
    const end = cursor + period;
    const periodOrgs = new Set<string>();
    for (const record of records) {
      const time = record.createdAt.getTime();
      if (time >= cursor && time < end) {
        periodOrgs.add(record.orgId);
      }
    }
    let fresh = 0;
    for (const orgId of periodOrgs) {
      if (!seen.has(orgId)) {
        fresh += 1;
        seen.add(orgId);
      }
    }
    result.dates.push(new Date(cursor));
    result.users.push(periodOrgs.size);
    result.newUsers.push(fresh);
  }
  return result;
}
