import dedent from "dedent";
import { timestampRange } from "./buckets.js";
import { countBy } from "./footprints.js";
import { AmbiguousLookupError } from "../errors.js";
import type { Dataset, DatasetSummary, RankedCount, UserInfo } from "../types.js";

export type LabeledCount = RankedCount & {
  label: string;
};

export function makeSummary(records: Dataset): DatasetSummary {
  const { min, max } = timestampRange(records, "makeSummary");
  return {
    start: min,
    end: max,
    builds: records.length,
    users: new Set(records.map((record) => record.orgId)).size,
    buildsWithPackages: records.filter((record) => record.packages.length > 0).length,
    buildsWithFilesystem: records.filter((record) => record.filesystem.length > 0).length,
    buildsWithRepos: records.filter((record) => record.payloadRepositories.length > 0).length
  };
}

export function summarise(summary: DatasetSummary) {
  return dedent`
    Summary
    =======

    Period: ${summary.start.toISOString()} - ${summary.end.toISOString()}

    - Total builds: ${summary.builds}
    - Number of users: ${summary.users}
    - Builds with packages: ${summary.buildsWithPackages}
    - Builds with filesystem customizations: ${summary.buildsWithFilesystem}
    - Builds with custom repos: ${summary.buildsWithRepos}
  `;
}

/** Most selected packages, each counted at most once per build. */
export function topPackages(records: Dataset, limit: number): RankedCount[] {
  const selections = records.flatMap((record) => Array.from(new Set(record.packages)));
  return countBy(selections, (name) => name).slice(0, limit);
}

/**
 * Accounts with the most builds, labeled with the user name when the user-info
 * table has exactly one entry for the account.
 */
export function topAccounts(records: Dataset, users: UserInfo[], limit: number): LabeledCount[] {
  const ranked = countBy(records, (record) => record.accountNumber).slice(0, limit);
  return ranked.map((entry) => ({ ...entry, label: resolveAccountName(entry.key, users) }));
}

export function resolveAccountName(accountNumber: string, users: UserInfo[]) {
  const matches = users.filter((user) => user.accountNumber === accountNumber);
  if (matches.length > 1) {
    throw new AmbiguousLookupError(accountNumber, matches.length);
  }
  return matches[0]?.name ?? accountNumber;
}

/** Numbered table rows: index, key padded to 40, count padded to 5. */
export function formatRanking(rows: Array<RankedCount & { label?: string }>) {
  return rows.map((row, index) => {
    const position = String(index + 1).padStart(3);
    const name = (row.label ?? row.key).padEnd(40);
    return `${position}. ${name} ${String(row.count).padStart(5)}`;
  });
}
