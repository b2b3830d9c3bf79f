import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { parseDump, parseTimestamp, parseUserInfo, readDump, readUserFilter } from "../reader.js";
import { DumpFormatError } from "../errors.js";
import { resetLoggerConfig } from "../logger.js";

const header =
  " org_id | created_at          | job_id | image_type | account_number | packages | filesystem              | payload_repositories";
const separator =
  "--------+---------------------+--------+------------+----------------+----------+-------------------------+---------------------";
const rows = [
  ' o1     | 2024-01-15 10:00:00 | j1     | aws        | 1000           | ["vim"]  | []                      | ',
  ' o2     | 2024-01-16 11:00:00 | j2     | vhd        | 2000           |          | [{"mountpoint":"/var"}] | []'
];

function dump(...footer: string[]) {
  return [header, separator, ...rows, ...footer, ""].join("\n");
}

describe("parseTimestamp", () => {
  it.each([
    ["2024-01-15 10:20:30.123456", "2024-01-15T10:20:30.123Z"],
    ["2024-01-15T10:20:30+02:00", "2024-01-15T08:20:30.000Z"],
    ["2024-01-15 10:20:30.5-0130", "2024-01-15T11:50:30.500Z"],
    ["2024-01-15 10:20", "2024-01-15T10:20:00.000Z"],
    ["2024-01-15T10:20:30Z", "2024-01-15T10:20:30.000Z"]
  ])("parses %s", (text, expected) => {
    expect(parseTimestamp(text).toISOString()).toBe(expected);
  });

  it.each(["", "garbage", "2024-02-30 00:00:00", "2024-13-01 00:00:00"])("marks %j as invalid", (text) => {
    expect(Number.isNaN(parseTimestamp(text).getTime())).toBe(true);
  });
});

describe("parseDump", () => {
  it("reads records and the row count footer", () => {
    const parsed = parseDump(dump("(2 rows)"));

    expect(parsed.expectedRows).toBe(2);
    expect(parsed.warnings).toEqual([]);
    expect(parsed.records).toEqual([
      {
        orgId: "o1",
        createdAt: new Date("2024-01-15T10:00:00.000Z"),
        jobId: "j1",
        imageType: "aws",
        packages: ["vim"],
        filesystem: [],
        payloadRepositories: [],
        accountNumber: "1000"
      },
      {
        orgId: "o2",
        createdAt: new Date("2024-01-16T11:00:00.000Z"),
        jobId: "j2",
        imageType: "vhd",
        packages: [],
        filesystem: ['{"mountpoint":"/var"}'],
        payloadRepositories: [],
        accountNumber: "2000"
      }
    ]);
  });

  it("warns when the footer disagrees with the rows read", () => {
    expect(parseDump(dump("(3 rows)")).warnings).toEqual([
      "read 2 records but row count in dump footer states 3 rows"
    ]);
  });

  it("warns when there is no footer", () => {
    const parsed = parseDump(dump());

    expect(parsed.expectedRows).toBeUndefined();
    expect(parsed.warnings).toEqual(["failed to parse row count"]);
    expect(parsed.records).toHaveLength(2);
  });

  it("keeps rows with an unreadable timestamp", () => {
    const text = [header, separator, " o3 | not a date | j3 | aws | 3000 | | | ", "(1 row)"].join("\n");

    const [record] = parseDump(text).records;

    expect(record.orgId).toBe("o3");
    expect(Number.isNaN(record.createdAt.getTime())).toBe(true);
  });

  it("rejects an empty dump", () => {
    expect(() => parseDump("")).toThrow(DumpFormatError);
  });

  it("rejects a header without the required columns", () => {
    expect(() => parseDump(" org_id | job_id\n---+---\n(0 rows)")).toThrow(
      "Dump header is missing columns: created_at, image_type"
    );
  });

  it("rejects list cells that are not JSON arrays", () => {
    const text = [header, separator, ' o1 | 2024-01-15 10:00:00 | j1 | aws | 1000 | {"a":1} | | ', "(1 row)"].join(
      "\n"
    );

    expect(() => parseDump(text)).toThrow("Line 3: packages is not a JSON array");
  });

  it("rejects list cells with broken JSON", () => {
    const text = [header, separator, " o1 | 2024-01-15 10:00:00 | j1 | aws | 1000 | [vim | | ", "(1 row)"].join("\n");

    expect(() => parseDump(text)).toThrow(DumpFormatError);
  });

  it("rejects rows without an org id", () => {
    const text = [header, separator, "    | 2024-01-15 10:00:00 | j1 | aws | 1000 | | | ", "(1 row)"].join("\n");

    expect(() => parseDump(text)).toThrow("Line 3: org_id is empty");
  });
});

describe("parseUserInfo", () => {
  it("normalizes ids to strings", () => {
    const text = JSON.stringify([
      { accountNumber: 1000, org_id: "o1", name: "Example Corp" },
      { accountNumber: "2000", org_id: 2, name: null },
      { accountNumber: "3000", org_id: "o3" }
    ]);

    expect(parseUserInfo(text)).toEqual([
      { accountNumber: "1000", orgId: "o1", name: "Example Corp" },
      { accountNumber: "2000", orgId: "2", name: null },
      { accountNumber: "3000", orgId: "o3", name: null }
    ]);
  });

  it("rejects entries without an account number", () => {
    expect(() => parseUserInfo(JSON.stringify([{ org_id: "o1" }]))).toThrow(/^Invalid user info/);
  });
});

describe("file readers", () => {
  let directory: string;

  beforeEach(async () => {
    resetLoggerConfig();
    directory = await mkdtemp(join(tmpdir(), "build-metrics-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(directory, { recursive: true, force: true });
  });

  it("logs dump warnings", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const path = join(directory, "builds.dump");
    await writeFile(path, dump(), "utf8");

    const records = await readDump(path);

    expect(records).toHaveLength(2);
    const messages = errorSpy.mock.calls.map(([line]) => JSON.parse(String(line)).msg);
    expect(messages).toEqual(["dump.read.warning", "dump.read.done"]);
  });

  it("reads one filter pattern per line", async () => {
    const path = join(directory, "filter.txt");
    await writeFile(path, "test\r\nqa-\n", "utf8");

    expect(await readUserFilter(path)).toEqual(["test", "qa-", ""]);
  });
});
