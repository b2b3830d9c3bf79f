import { describe, expect, it } from "vitest";
import {
  addMonths,
  calendarMonthBuckets,
  datasetPeriodBuckets,
  fixedPeriodBuckets,
  timestampRange
} from "../buckets.js";
import { EmptyDatasetError, InvalidWindowSpecError } from "../../errors.js";
import { at, builds, buildRecord, invalidDate } from "../../__tests__/factories.js";

const iso = (dates: Date[]) => dates.map((date) => date.toISOString());

describe("timestampRange", () => {
  it("ignores records without a valid timestamp", () => {
    const records = [
      ...builds([
        ["a", "2024-03-02T08:00:00.000Z"],
        ["b", "2024-01-10T08:00:00.000Z"]
      ]),
      buildRecord({ createdAt: invalidDate() })
    ];

    const range = timestampRange(records);

    expect(range.min.toISOString()).toBe("2024-01-10T08:00:00.000Z");
    expect(range.max.toISOString()).toBe("2024-03-02T08:00:00.000Z");
  });

  it("fails on an empty dataset", () => {
    expect(() => timestampRange([])).toThrow(EmptyDatasetError);
  });

  it("fails when every timestamp is invalid", () => {
    expect(() => timestampRange([buildRecord({ createdAt: invalidDate() })])).toThrow(EmptyDatasetError);
  });
});

describe("calendarMonthBuckets", () => {
  it("covers every month from the first to the last build", () => {
    const records = builds([
      ["a", "2023-01-15T12:00:00.000Z"],
      ["a", "2023-03-10T12:00:00.000Z"]
    ]);

    expect(iso(calendarMonthBuckets(records))).toEqual([
      "2023-01-01T00:00:00.000Z",
      "2023-02-01T00:00:00.000Z",
      "2023-03-01T00:00:00.000Z"
    ]);
  });

  it("crosses year boundaries", () => {
    const records = builds([
      ["a", "2023-12-31T23:59:59.000Z"],
      ["b", "2024-02-01T00:00:00.000Z"]
    ]);

    expect(iso(calendarMonthBuckets(records))).toEqual([
      "2023-12-01T00:00:00.000Z",
      "2024-01-01T00:00:00.000Z",
      "2024-02-01T00:00:00.000Z"
    ]);
  });

  it("leaves no gap between consecutive buckets", () => {
    const records = builds([
      ["a", "2022-11-20T00:00:00.000Z"],
      ["a", "2023-04-02T00:00:00.000Z"]
    ]);
    const starts = calendarMonthBuckets(records);

    starts.slice(1).forEach((start, index) => {
      expect(start.getTime()).toBe(addMonths(starts[index], 1).getTime());
    });
    expect(starts[0].getTime()).toBeLessThanOrEqual(at("2022-11-20T00:00:00.000Z").getTime());
    expect(addMonths(starts[starts.length - 1], 1).getTime()).toBeGreaterThan(at("2023-04-02T00:00:00.000Z").getTime());
  });

  it("fails on an empty dataset", () => {
    expect(() => calendarMonthBuckets([])).toThrow(EmptyDatasetError);
  });
});

describe("fixedPeriodBuckets", () => {
  const start = at("2024-01-01T00:00:00.000Z");

  it("drops the period that ends exactly at the range end", () => {
    const starts = fixedPeriodBuckets({ start, end: at("2024-01-22T00:00:00.000Z"), periodDays: 7 });

    expect(iso(starts)).toEqual(["2024-01-01T00:00:00.000Z", "2024-01-08T00:00:00.000Z"]);
  });

  it("drops a trailing period that straddles the range end", () => {
    const starts = fixedPeriodBuckets({ start, end: at("2024-01-20T00:00:00.000Z"), periodDays: 7 });

    expect(iso(starts)).toEqual(["2024-01-01T00:00:00.000Z", "2024-01-08T00:00:00.000Z"]);
  });

  it("keeps a period that ends before the range end", () => {
    const starts = fixedPeriodBuckets({ start, end: at("2024-01-23T00:00:00.000Z"), periodDays: 7 });

    expect(starts).toHaveLength(3);
    expect(starts[2].toISOString()).toBe("2024-01-15T00:00:00.000Z");
  });

  it("returns nothing when the range is shorter than one period", () => {
    expect(fixedPeriodBuckets({ start, end: at("2024-01-05T00:00:00.000Z"), periodDays: 7 })).toEqual([]);
  });

  it.each([0, -3, Number.NaN])("rejects a period of %s days", (periodDays) => {
    expect(() => fixedPeriodBuckets({ start, end: at("2024-02-01T00:00:00.000Z"), periodDays })).toThrow(
      InvalidWindowSpecError
    );
  });

  it("rejects an invalid anchor", () => {
    expect(() => fixedPeriodBuckets({ start: invalidDate(), end: start, periodDays: 7 })).toThrow(
      InvalidWindowSpecError
    );
  });
});

describe("datasetPeriodBuckets", () => {
  it("anchors at the earliest build", () => {
    const records = builds([
      ["a", "2024-01-03T06:00:00.000Z"],
      ["b", "2024-01-20T06:00:00.000Z"]
    ]);

    expect(iso(datasetPeriodBuckets(records, 7))).toEqual([
      "2024-01-03T06:00:00.000Z",
      "2024-01-10T06:00:00.000Z"
    ]);
  });
});
