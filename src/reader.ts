import { readFile } from "node:fs/promises";
import { z } from "zod";
import { DumpFormatError } from "./errors.js";
import { getLoggerConfig, logger } from "./logger.js";
import { isValidDate, withDuration } from "./utils.js";
import type { BuildRecord, UserInfo } from "./types.js";

export type ParsedDump = {
  records: BuildRecord[];
  /** Row count announced by the dump footer, when present. */
  expectedRows?: number;
  warnings: string[];
};

const timestampPattern =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;
const rowCountPattern = /^\((\d+) rows?\)$/;
const requiredColumns = ["org_id", "created_at", "job_id", "image_type"] as const;

const rowSchema = z.object({
  org_id: z.string().min(1, "is empty"),
  created_at: z.string(),
  job_id: z.string().min(1, "is empty"),
  image_type: z.string(),
  account_number: z.string().default(""),
  packages: z.string().default(""),
  filesystem: z.string().default(""),
  payload_repositories: z.string().default("")
});

const idSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

const userInfoSchema = z.array(
  z.object({
    accountNumber: idSchema,
    org_id: idSchema,
    name: z.string().nullable().optional()
  })
);

/**
 * Parses a timestamp as written by the database dump. Values without a zone are
 * UTC. Anything unparseable becomes an invalid Date, which every window
 * computation skips.
 */
export function parseTimestamp(text: string): Date {
  const match = timestampPattern.exec(text.trim());
  if (!match) return new Date(Number.NaN);
  const [, year, month, day, hour, minute, second, fraction, zone] = match;
  const ms = fraction ? Number(fraction.slice(0, 3).padEnd(3, "0")) : 0;
  const utc = Date.UTC(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    second ? Number(second) : 0,
    ms
  );
  const parsed = new Date(utc - zoneOffsetMinutes(zone) * 60 * 1000);
  // Date.UTC rolls over out-of-range fields (month 13, day 32); reject those
  if (
    !isValidDate(parsed) ||
    new Date(utc).getUTCMonth() !== Number(month) - 1 ||
    new Date(utc).getUTCDate() !== Number(day)
  ) {
    return new Date(Number.NaN);
  }
  return parsed;
}

function zoneOffsetMinutes(zone: string | undefined) {
  if (!zone || zone.toUpperCase() === "Z") return 0;
  const sign = zone.startsWith("-") ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2)) : 0;
  return sign * (hours * 60 + minutes);
}

/**
 * Parses a `|`-separated table dump: a header row, a separator row, data rows and
 * an optional `(N rows)` footer.
 */
export function parseDump(text: string): ParsedDump {
  const lines = text.split(/\r?\n/);
  const header = lines[0]?.trim();
  if (!header) {
    throw new DumpFormatError("Dump is empty: missing header row");
  }
  const names = splitRow(lines[0]);
  const missing = requiredColumns.filter((column) => !names.includes(column));
  if (missing.length > 0) {
    throw new DumpFormatError(`Dump header is missing columns: ${missing.join(", ")}`);
  }

  const records: BuildRecord[] = [];
  const warnings: string[] = [];
  let expectedRows: number | undefined;

  for (let index = 2; index < lines.length; index += 1) {
    const line = lines[index];
    const footer = rowCountPattern.exec(line.trim());
    if (footer) {
      expectedRows = Number(footer[1]);
      break;
    }
    if (line.trim() === "") continue;

    const cells = splitRow(line);
    const row = Object.fromEntries(names.map((name, column) => [name, cells[column] ?? ""]));
    records.push(toRecord(row, index + 1));
  }

  if (expectedRows === undefined) {
    warnings.push("failed to parse row count");
  } else if (expectedRows !== records.length) {
    warnings.push(
      `read ${records.length} records but row count in dump footer states ${expectedRows} rows`
    );
  }

  return { records, expectedRows, warnings };
}

export async function readDump(path: string): Promise<BuildRecord[]> {
  const start = Date.now();
  const readLogger = logger.withContext({ path });
  const text = await readFile(path, "utf8");
  const parsed = parseDump(text);
  for (const warning of parsed.warnings) {
    readLogger.warn("dump.read.warning", { warning });
  }
  const invalidTimestamps = parsed.records.filter((record) => !isValidDate(record.createdAt)).length;
  if (invalidTimestamps > 0) {
    readLogger.warn("dump.read.invalid_timestamps", { count: invalidTimestamps });
  }
  readLogger.info("dump.read.done", {
    records: parsed.records.length,
    ...withDuration(start, getLoggerConfig().includeTimings)
  });
  return parsed.records;
}

export function parseUserInfo(text: string): UserInfo[] {
  const parsed = userInfoSchema.safeParse(JSON.parse(text));
  if (!parsed.success) {
    throw new Error(`Invalid user info: ${parsed.error.issues[0]?.message ?? "unknown issue"}`);
  }
  return parsed.data.map((entry) => ({
    accountNumber: entry.accountNumber,
    orgId: entry.org_id,
    name: entry.name ?? null
  }));
}

export async function readUserInfo(path: string): Promise<UserInfo[]> {
  const users = parseUserInfo(await readFile(path, "utf8"));
  logger.info("userinfo.read.done", { path, users: users.length });
  return users;
}

/** One name pattern per line; blank lines are kept and ignored by the filters. */
export async function readUserFilter(path: string): Promise<string[]> {
  const text = await readFile(path, "utf8");
  return text.split(/\r?\n/);
}

function splitRow(line: string) {
  return line.split("|").map((cell) => cell.trim());
}

function toRecord(row: Record<string, string>, lineNumber: number): BuildRecord {
  const parsed = rowSchema.safeParse(row);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new DumpFormatError(
      `Line ${lineNumber}: ${issue ? `${issue.path.join(".")} ${issue.message}` : "invalid row"}`
    );
  }
  const value = parsed.data;
  return {
    orgId: value.org_id,
    createdAt: parseTimestamp(value.created_at),
    jobId: value.job_id,
    imageType: value.image_type,
    packages: parseList(value.packages, "packages", lineNumber),
    filesystem: parseList(value.filesystem, "filesystem", lineNumber),
    payloadRepositories: parseList(value.payload_repositories, "payload_repositories", lineNumber),
    accountNumber: value.account_number
  };
}

function parseList(cell: string, column: string, lineNumber: number): string[] {
  if (!cell) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(cell);
  } catch (error) {
    throw new DumpFormatError(
      `Line ${lineNumber}: ${column} is not valid JSON`,
      error instanceof Error ? error : undefined
    );
  }
  if (parsed === null) return [];
  if (!Array.isArray(parsed)) {
    throw new DumpFormatError(`Line ${lineNumber}: ${column} is not a JSON array`);
  }
  return parsed.map((item: unknown) => (typeof item === "string" ? item : JSON.stringify(item)));
}
