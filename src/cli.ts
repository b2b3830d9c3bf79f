#!/usr/bin/env node
import { Command } from "commander";
import { loadConfig, type AppConfig } from "./config.js";
import { filterUsers, sliceTime } from "./data.js";
import { getLoggerConfig, logger, setLoggerConfig } from "./logger.js";
import { activeOrgs, repeatOrgs } from "./metrics/activity.js";
import { imageTypeCounts } from "./metrics/footprints.js";
import { formatRanking, makeSummary, summarise, topAccounts, topPackages } from "./metrics/summary.js";
import { timestampRange } from "./metrics/buckets.js";
import { readDump, readUserFilter, readUserInfo } from "./reader.js";
import { buildReport, renderReport, serializeReport } from "./report.js";
import { createStorageClient, describeStorage, reportKeys, validateStorage, writeReport } from "./storage.js";
import { parseDateArg, withDuration } from "./utils.js";
import type { BuildRecord, UserInfo } from "./types.js";

type DataOptions = {
  start?: string;
  end?: string;
  userinfo?: string;
  userfilter?: string;
};

type LoadedData = {
  config: AppConfig;
  records: BuildRecord[];
  users: UserInfo[];
};

const program = new Command();
program
  .name("build-metrics")
  .description("Usage metrics from image build dumps")
  .version("0.1.0");

withDataOptions(program.command("summary").argument("<dump>", "Database dump file"))
  .option("--json", "JSON output")
  .action(async (dump: string, options: DataOptions & { json?: boolean }) => {
    const { config, records, users } = await loadData(dump, options);
    const summary = makeSummary(records);
    const packages = topPackages(records, config.metrics.topLimit);
    const imageTypes = imageTypeCounts(records);
    const accounts = topAccounts(records, users, config.metrics.topLimit);

    if (options.json) {
      console.log(JSON.stringify({ summary, packages, imageTypes, accounts }, null, 2));
      return;
    }
    console.log(
      [
        summarise(summary),
        "",
        "## Most frequently selected packages",
        ...formatRanking(packages),
        "",
        "## Image types",
        ...formatRanking(imageTypes),
        "",
        "## Biggest orgs",
        ...formatRanking(accounts)
      ].join("\n")
    );
  });

withDataOptions(program.command("report").argument("<dump>", "Database dump file"))
  .option("--now <date>", "Reference time for active organizations")
  .option("--prefix <prefix>", "Override storage prefix")
  .option("--no-write", "Print only, do not store the report")
  .option("--skip-existing", "Do nothing when the report is already stored")
  .option("--json", "JSON output")
  .action(
    async (
      dump: string,
      options: DataOptions & { now?: string; prefix?: string; write: boolean; skipExisting?: boolean; json?: boolean }
    ) => {
      const { config, records, users } = await loadData(dump, options);
      const now = options.now ? parseDateArg(options.now, config.logging.timeZone) : new Date();
      const keys = reportKeys(options.prefix ?? config.output.prefix, dump);
      const runLogger = logger.withContext({ dump, baseKey: keys.baseKey });

      const storage = options.write ? createStorageClient(config.storage) : undefined;
      if (storage) {
        runLogger.info("storage.validate.start", describeStorage(config.storage));
        await validateStorage(config.storage);
        if (options.skipExisting && (await storage.exists(keys.json))) {
          runLogger.info("report.skipped", { reason: "exists" });
          return;
        }
      }

      const buildStart = Date.now();
      const report = buildReport(records, { settings: config.metrics, now, users });
      runLogger.info("report.build.done", {
        months: report.monthly.dates.length,
        periods: report.periods.dates.length,
        ...withDuration(buildStart, getLoggerConfig().includeTimings)
      });

      const markdown = renderReport(report, config.logging.timeZone);
      const json = serializeReport(report);
      console.log(options.json ? json : markdown);

      if (!storage) return;
      const stored = await writeReport(storage, keys, { markdown, json }, {
        retries: config.network.retryCount,
        backoffMs: config.network.retryBackoffMs
      });
      runLogger.info("report.write.done", { artifacts: stored.map((item) => item.uri) });
    }
  );

withDataOptions(program.command("orgs").argument("<dump>", "Database dump file"))
  .requiredOption("--kind <kind>", "repeat or active")
  .option("--min-builds <n>", "Builds within one period (repeat)")
  .option("--period-days <n>", "Period length in days (repeat)")
  .option("--min-days <n>", "Distinct build days (active)")
  .option("--recent-days <n>", "Latest build must be newer than this (active)")
  .option("--now <date>", "Reference time for active organizations")
  .option("--json", "JSON output")
  .action(
    async (
      dump: string,
      options: DataOptions & {
        kind: string;
        minBuilds?: string;
        periodDays?: string;
        minDays?: string;
        recentDays?: string;
        now?: string;
        json?: boolean;
      }
    ) => {
      const { config, records } = await loadData(dump, options);
      let orgIds: string[];
      if (options.kind === "repeat") {
        orgIds = Array.from(
          repeatOrgs(records, {
            minBuilds: parseNumberOption("--min-builds", options.minBuilds) ?? config.metrics.repeat.minBuilds,
            periodDays: parseNumberOption("--period-days", options.periodDays) ?? config.metrics.repeat.periodDays
          })
        );
      } else if (options.kind === "active") {
        orgIds = activeOrgs(records, {
          minDays: parseNumberOption("--min-days", options.minDays) ?? config.metrics.active.minDays,
          recentLimitDays:
            parseNumberOption("--recent-days", options.recentDays) ?? config.metrics.active.recentLimitDays,
          now: options.now ? parseDateArg(options.now, config.logging.timeZone) : new Date()
        });
      } else {
        throw new Error(`Invalid --kind value: ${options.kind}`);
      }

      if (options.json) {
        console.log(JSON.stringify(orgIds, null, 2));
        return;
      }
      console.log(orgIds.length > 0 ? orgIds.join("\n") : "No results.");
    }
  );

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error("command.failed", {
    error: error instanceof Error ? error.message : String(error),
    code: typeof error === "object" && error !== null && "code" in error ? error.code : undefined
  });
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});

function withDataOptions(command: Command) {
  return command
    .option("--start <date>", "Ignore builds before this date")
    .option("--end <date>", "Ignore builds after this date")
    .option("--userinfo <file>", "User info JSON (account number, org id, name)")
    .option("--userfilter <file>", "File with user name patterns to remove");
}

async function loadData(dump: string, options: DataOptions): Promise<LoadedData> {
  const config = loadConfig();
  setLoggerConfig({
    level: config.logging.level,
    includeTimings: config.logging.includeTimings,
    format: config.logging.format,
    color: config.logging.color,
    timeZone: config.logging.timeZone
  });

  const all = await readDump(dump);
  const userInfoPath = options.userinfo ?? config.input.userInfoPath;
  const userFilterPath = options.userfilter ?? config.input.userFilterPath;
  const users = userInfoPath ? await readUserInfo(userInfoPath) : [];
  const patterns = userFilterPath ? await readUserFilter(userFilterPath) : [];

  const filtered = filterUsers(all, users, patterns);
  logger.info("data.filter.done", { before: all.length, after: filtered.length });

  const range = filtered.length > 0 ? timestampRange(filtered) : undefined;
  const start = options.start ? parseDateArg(options.start, config.logging.timeZone) : range?.min;
  const end = options.end ? parseDateArg(options.end, config.logging.timeZone) : range?.max;
  const records = start && end ? sliceTime(filtered, start, end) : filtered;
  return { config, records, users };
}

function parseNumberOption(flag: string, value: string | undefined) {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid ${flag} value: ${value}`);
  }
  return parsed;
}
