import { UndefinedRatioError } from "./errors.js";
import { logger } from "./logger.js";
import { activeOrgs, repeatOrgs } from "./metrics/activity.js";
import { monthlyNewUsers, monthlyReturningUsers, weeklyUsers } from "./metrics/cohorts.js";
import { footprintCounts, imageTypeCounts, type FootprintMap } from "./metrics/footprints.js";
import { dauOverMau, movingAverage, trendline } from "./metrics/ratios.js";
import { formatRanking, makeSummary, summarise, topAccounts, topPackages, type LabeledCount } from "./metrics/summary.js";
import { byOrg, monthlyBuilds, monthlyUsers, periodRecordCount, periodValue, slidingWindowValue } from "./metrics/windows.js";
import { formatDateOnly, formatMonthKey, previousMonday, startOfUtcDay } from "./utils.js";
import type { Dataset, DatasetSummary, RankedCount, RatioSeries, UserInfo, WeeklyUsers } from "./types.js";

export type MetricsSettings = {
  periodDays: number;
  slidingWindowDays: number;
  trendStdDev: number;
  topLimit: number;
  repeat: { minBuilds: number; periodDays: number };
  active: { minDays: number; recentLimitDays: number };
  footprints: FootprintMap;
};

export type ReportOptions = {
  settings: MetricsSettings;
  now: Date;
  users?: UserInfo[];
  /** Anchor of the fixed periods. Defaults to the Monday before the first build. */
  periodStart?: Date;
};

export type MetricsReport = {
  generatedAt: Date;
  summary: DatasetSummary;
  monthly: {
    dates: Date[];
    users: number[];
    builds: number[];
    newUsers: number[];
    returningUsers: number[];
  };
  periods: {
    periodDays: number;
    dates: Date[];
    builds: number[];
    buildsAverage: number[];
    buildsTrend: number[];
    users: number[];
    usersAverage: number[];
    usersTrend: number[];
  };
  weekly: WeeklyUsers;
  sliding: { windowDays: number; dates: Date[]; users: number[] };
  dauOverMau: RatioSeries;
  repeatOrgs: { minBuilds: number; periodDays: number; orgIds: string[] };
  activeOrgs: { minDays: number; recentLimitDays: number; orgIds: string[] };
  footprints: RankedCount[];
  imageTypes: RankedCount[];
  topPackages: RankedCount[];
  topAccounts: LabeledCount[];
};

export function buildReport(records: Dataset, options: ReportOptions): MetricsReport {
  const { settings, now } = options;
  const summary = makeSummary(records);
  const periodStart = options.periodStart ?? new Date(startOfUtcDay(previousMonday(summary.start).getTime()));

  const users = monthlyUsers(records);
  const builds = monthlyBuilds(records);
  const newUsers = monthlyNewUsers(records);
  const returningUsers = monthlyReturningUsers(records);

  const periodOptions = { periodDays: settings.periodDays, start: periodStart, end: summary.end };
  const periodBuilds = periodRecordCount(records, periodOptions);
  const periodUsers = periodValue(records, byOrg, periodOptions);
  const sliding = slidingWindowValue(records, byOrg, settings.slidingWindowDays);

  return {
    generatedAt: now,
    summary,
    monthly: {
      dates: users.dates,
      users: users.counts,
      builds: builds.counts,
      newUsers: newUsers.counts,
      returningUsers: returningUsers.counts
    },
    periods: {
      periodDays: settings.periodDays,
      dates: periodBuilds.dates,
      builds: periodBuilds.counts,
      buildsAverage: movingAverage(periodBuilds.counts),
      buildsTrend: trendline(periodBuilds.counts, settings.trendStdDev),
      users: periodUsers.counts,
      usersAverage: movingAverage(periodUsers.counts),
      usersTrend: trendline(periodUsers.counts, settings.trendStdDev)
    },
    weekly: weeklyUsers(records, { start: periodStart, periodDays: settings.periodDays }),
    sliding: { windowDays: settings.slidingWindowDays, dates: sliding.dates, users: sliding.counts },
    dauOverMau: dauOverMauOrEmpty(records),
    repeatOrgs: {
      ...settings.repeat,
      orgIds: Array.from(repeatOrgs(records, settings.repeat))
    },
    activeOrgs: {
      ...settings.active,
      orgIds: activeOrgs(records, { ...settings.active, now })
    },
    footprints: footprintCounts(records, settings.footprints),
    imageTypes: imageTypeCounts(records),
    topPackages: topPackages(records, settings.topLimit),
    topAccounts: topAccounts(records, options.users ?? [], settings.topLimit)
  };
}

/** A dataset with a month-long gap has no DAU/MAU; the rest of the report still stands. */
function dauOverMauOrEmpty(records: Dataset): RatioSeries {
  try {
    return dauOverMau(records);
  } catch (error) {
    if (!(error instanceof UndefinedRatioError)) throw error;
    logger.warn("report.dau_mau.undefined", { at: error.at.toISOString(), error: error.message });
    return { ratios: [], dates: [] };
  }
}

export function serializeReport(report: MetricsReport) {
  return JSON.stringify(report, null, 2);
}

/** Markdown report. Buckets are UTC; only the generation date follows `timeZone`. */
export function renderReport(report: MetricsReport, timeZone?: string) {
  const lines: string[] = [`# Build metrics (${formatDateOnly(report.generatedAt, timeZone)})`, "", summarise(report.summary), ""];

  lines.push("## Monthly organizations", "");
  lines.push(
    ...markdownTable(
      ["month", "users", "new", "returning", "builds"],
      report.monthly.dates.map((date, index) => [
        formatMonthKey(date),
        report.monthly.users[index],
        report.monthly.newUsers[index],
        report.monthly.returningUsers[index],
        report.monthly.builds[index]
      ])
    ),
    ""
  );

  lines.push(`## Builds and users per ${report.periods.periodDays}-day period`, "");
  lines.push(
    ...markdownTable(
      ["period start", "builds", "builds avg.", "users", "users avg.", "new users"],
      report.periods.dates.map((date, index) => [
        formatDateOnly(date),
        report.periods.builds[index],
        report.periods.buildsAverage[index].toFixed(1),
        report.periods.users[index],
        report.periods.usersAverage[index].toFixed(1),
        report.weekly.newUsers[index] ?? 0
      ])
    ),
    ""
  );

  lines.push("## Activity", "");
  const lastUsers = report.sliding.users[report.sliding.users.length - 1];
  if (lastUsers !== undefined) {
    lines.push(`- Users in the previous ${report.sliding.windowDays} days: ${lastUsers}`);
  }
  const lastRatio = report.dauOverMau.ratios[report.dauOverMau.ratios.length - 1];
  if (lastRatio !== undefined) {
    lines.push(`- Latest DAU/MAU: ${lastRatio.toFixed(3)}`);
  }
  lines.push(
    `- Repeat organizations (${report.repeatOrgs.minBuilds} builds within ${report.repeatOrgs.periodDays} days): ${report.repeatOrgs.orgIds.length}`,
    `- Active organizations (${report.activeOrgs.minDays}+ days, last build within ${report.activeOrgs.recentLimitDays} days): ${report.activeOrgs.orgIds.length}`,
    ""
  );

  lines.push("## Footprints", "", ...formatRanking(report.footprints), "");
  lines.push("## Image types", "", ...formatRanking(report.imageTypes), "");
  lines.push("## Most frequently selected packages", "", ...formatRanking(report.topPackages), "");
  lines.push("## Biggest accounts", "", ...formatRanking(report.topAccounts));

  return lines.join("\n");
}

function markdownTable(headers: string[], rows: Array<Array<string | number>>) {
  const header = `| ${headers.join(" | ")} |`;
  const separator = `| ${headers.map(() => "---").join(" | ")} |`;
  return [header, separator, ...rows.map((row) => `| ${row.map(String).join(" | ")} |`)];
}
