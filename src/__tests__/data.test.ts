import { describe, expect, it } from "vitest";
import { filterOrgs, filterUsers, getFilterIds, sliceTime } from "../data.js";
import { at, buildRecord, builds } from "./factories.js";
import type { UserInfo } from "../types.js";

const users: UserInfo[] = [
  { accountNumber: "1", orgId: "o1", name: "Test Account" },
  { accountNumber: "2", orgId: "o2", name: "Real Customer" },
  { accountNumber: "3", orgId: "o3", name: null }
];

const records = ["1", "2", "3", "4"].map((accountNumber) =>
  buildRecord({ accountNumber, orgId: `o${accountNumber}` })
);

const accounts = (list: { accountNumber: string }[]) => list.map((record) => record.accountNumber);

describe("filterUsers", () => {
  it("drops accounts whose name starts with a pattern, ignoring case", () => {
    expect(accounts(filterUsers(records, users, ["test"]))).toEqual(["2", "3", "4"]);
  });

  it("anchors patterns at the start of the name", () => {
    expect(accounts(filterUsers(records, users, ["account"]))).toEqual(["1", "2", "3", "4"]);
  });

  it("matches users without a name through the placeholder", () => {
    expect(accounts(filterUsers(records, users, ["---"]))).toEqual(["1", "2", "4"]);
  });

  it("ignores blank patterns", () => {
    expect(accounts(filterUsers(records, users, ["", "real"]))).toEqual(["1", "3", "4"]);
  });

  it("returns a copy when there is nothing to filter", () => {
    const result = filterUsers(records, undefined, ["test"]);

    expect(result).toEqual(records);
    expect(result).not.toBe(records);
  });
});

describe("getFilterIds", () => {
  it("collects org ids of matching users once", () => {
    expect(getFilterIds(users, ["test", "real", "TEST"])).toEqual(["o1", "o2"]);
  });

  it("is empty without users", () => {
    expect(getFilterIds(undefined, ["test"])).toEqual([]);
  });
});

describe("filterOrgs", () => {
  it("removes the listed organizations", () => {
    expect(accounts(filterOrgs(records, ["o1", "o4"]))).toEqual(["2", "3"]);
  });
});

describe("sliceTime", () => {
  it("keeps builds on both bounds", () => {
    const timeline = builds([
      ["a", "2024-01-01T00:00:00.000Z"],
      ["b", "2024-01-02T00:00:00.000Z"],
      ["c", "2024-01-03T00:00:00.000Z"],
      ["d", "2024-01-04T00:00:00.000Z"]
    ]);

    const sliced = sliceTime(timeline, at("2024-01-02T00:00:00.000Z"), at("2024-01-03T00:00:00.000Z"));

    expect(sliced.map((record) => record.orgId)).toEqual(["b", "c"]);
  });
});
