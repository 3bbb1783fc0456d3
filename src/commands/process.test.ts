import { describe, it, expect } from "vitest";
import { InvalidParametersError } from "../lib/errors";
import { groupSources } from "./process";
import { parseProjectId, splitList } from "./shared";

describe("groupSources", () => {
  it("names groups after their files by default", () => {
    expect(groupSources(["/data/customers.csv", "prospects.xlsx"], undefined)).toEqual([
      { group: "customers", path: "/data/customers.csv" },
      { group: "prospects", path: "prospects.xlsx" },
    ]);
  });

  it("uses explicit names in file order", () => {
    expect(groupSources(["a.csv", "b.csv"], ["Customers", "Prospects"])).toEqual([
      { group: "Customers", path: "a.csv" },
      { group: "Prospects", path: "b.csv" },
    ]);
  });

  it("needs one name per file", () => {
    expect(() => groupSources(["a.csv", "b.csv"], ["Customers"])).toThrow("Got 1 group name(s) for 2 file(s)");
  });
});

describe("option parsing", () => {
  it("splits comma lists and ignores blanks", () => {
    expect(splitList("Customers, Prospects,,")).toEqual(["Customers", "Prospects"]);
    expect(splitList(" , ")).toBeUndefined();
    expect(splitList(undefined)).toBeUndefined();
  });

  it("accepts positive integer project ids only", () => {
    expect(parseProjectId("12")).toBe(12);
    expect(() => parseProjectId("abc")).toThrow(InvalidParametersError);
    expect(() => parseProjectId("0")).toThrow(InvalidParametersError);
  });
});
