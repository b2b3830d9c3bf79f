import { assertPeriod } from "./buckets.js";
import { InvalidWindowSpecError } from "../errors.js";
import { daysToMs, isValidDate, startOfUtcDay } from "../utils.js";
import type { Dataset } from "../types.js";

export type RepeatOrgOptions = {
  /** Builds that must fall inside one period. At least 2. */
  minBuilds: number;
  periodDays: number;
};

export type ActiveOrgOptions = {
  minDays: number;
  recentLimitDays: number;
  /** Reference time for the recency check. */
  now: Date;
};

/**
 * Ascending valid timestamps (epoch ms) per organization, keyed in order of first
 * appearance.
 */
export function orgTimestamps(records: Dataset): Map<string, number[]> {
  const byOrg = new Map<string, number[]>();
  for (const record of records) {
    const time = record.createdAt.getTime();
    if (!Number.isFinite(time)) continue;
    const times = byOrg.get(record.orgId);
    if (times) {
      times.push(time);
    } else {
      byOrg.set(record.orgId, [time]);
    }
  }
  for (const times of byOrg.values()) {
    times.sort((a, b) => a - b);
  }
  return byOrg;
}

/**
 * Organizations with some run of `minBuilds` consecutive builds spanning strictly
 * less than `periodDays`, i.e. `minBuilds - 1` consecutive gaps summing to less
 * than the period. An organization with fewer than `minBuilds` builds never
 * qualifies.
 */
export function repeatOrgs(records: Dataset, options: RepeatOrgOptions): Set<string> {
  const { minBuilds } = options;
  if (!Number.isInteger(minBuilds) || minBuilds < 2) {
    throw new InvalidWindowSpecError("minBuilds", minBuilds, "must be an integer of at least 2");
  }
  const period = assertPeriod("periodDays", options.periodDays);

  const result = new Set<string>();
  for (const [orgId, times] of orgTimestamps(records)) {
    if (hasDenseRun(times, minBuilds, period)) {
      result.add(orgId);
    }
  }
  return result;
}

function hasDenseRun(times: number[], minBuilds: number, period: number) {
  for (let i = 0; i + minBuilds - 1 < times.length; i += 1) {
    if (times[i + minBuilds - 1] - times[i] < period) {
      return true;
    }
  }
  return false;
}

/** Distinct UTC build days (epoch ms of midnight), ascending, per organization. */
export function orgBuildDays(records: Dataset): Map<string, number[]> {
  const days = new Map<string, number[]>();
  for (const [orgId, times] of orgTimestamps(records)) {
    const unique: number[] = [];
    for (const time of times) {
      const day = startOfUtcDay(time);
      if (unique[unique.length - 1] !== day) {
        unique.push(day);
      }
    }
    days.set(orgId, unique);
  }
  return days;
}

/**
 * Organizations that built on at least `minDays` distinct days and whose latest
 * build day starts after `now - recentLimitDays`.
 */
export function activeOrgs(records: Dataset, options: ActiveOrgOptions): string[] {
  const { minDays, recentLimitDays, now } = options;
  if (!Number.isInteger(minDays) || minDays < 1) {
    throw new InvalidWindowSpecError("minDays", minDays, "must be an integer of at least 1");
  }
  if (!Number.isFinite(recentLimitDays) || recentLimitDays <= 0) {
    throw new InvalidWindowSpecError("recentLimitDays", recentLimitDays, "must be a positive number of days");
  }
  if (!isValidDate(now)) {
    throw new InvalidWindowSpecError("now", now, "must be a valid date");
  }

  const cutoff = now.getTime() - daysToMs(recentLimitDays);
  const result: string[] = [];
  for (const [orgId, days] of orgBuildDays(records)) {
    if (days.length < minDays) continue;
    if (days[days.length - 1] > cutoff) {
      result.push(orgId);
    }
  }
  return result;
}
