import type { BuildRecord, Dataset, UserInfo } from "./types.js";

const missingName = "---";

/**
 * Removes builds made under accounts whose user name matches any pattern. Patterns
 * are case-insensitive regular expressions anchored at the start of the name.
 */
export function filterUsers(records: Dataset, users: UserInfo[] | undefined, patterns: string[]): BuildRecord[] {
  if (!users || patterns.length === 0) {
    return [...records];
  }
  const removed = new Set<string>();
  for (const pattern of patterns) {
    if (!pattern) continue;
    for (const user of matchUsers(users, pattern)) {
      removed.add(user.accountNumber);
    }
  }
  return records.filter((record) => !removed.has(record.accountNumber));
}

/** Org ids of every user whose name matches one of the patterns. */
export function getFilterIds(users: UserInfo[] | undefined, patterns: string[]): string[] {
  if (!users || patterns.length === 0) {
    return [];
  }
  const ids: string[] = [];
  for (const pattern of patterns) {
    if (!pattern) continue;
    for (const user of matchUsers(users, pattern)) {
      if (!ids.includes(user.orgId)) {
        ids.push(user.orgId);
      }
    }
  }
  return ids;
}

export function filterOrgs(records: Dataset, filterIds: readonly string[]): BuildRecord[] {
  const excluded = new Set(filterIds);
  return records.filter((record) => !excluded.has(record.orgId));
}

/** Builds created between `start` and `end`, both inclusive. */
export function sliceTime(records: Dataset, start: Date, end: Date): BuildRecord[] {
  const from = start.getTime();
  const to = end.getTime();
  return records.filter((record) => {
    const time = record.createdAt.getTime();
    return time >= from && time <= to;
  });
}

function matchUsers(users: UserInfo[], pattern: string) {
  const matcher = new RegExp(`^(?:${pattern})`, "i");
  return users.filter((user) => matcher.test(user.name ?? missingName));
}
