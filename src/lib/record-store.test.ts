import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import * as XLSX from "xlsx";
import { ValidationFailureError } from "./errors";
import { buildGroup, droppedRowsNotice, groupNameFromFile, isValid, loadRecordFile, preprocessRows, validateRows } from "./record-store";

let dir: string;

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), "record-store-"));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("loadRecordFile", () => {
  it("reads CSV rows keyed by header", async () => {
    const path = join(dir, "customers.csv");
    await writeFile(
      path,
      [
        "Question,Response,Respondent ID",
        '"How was onboarding?","It was  smooth",r1',
        '"How was onboarding?","",r2',
        '"What about pricing?","Too expensive",',
      ].join("\n")
    );

    const rows = await loadRecordFile(path);
    expect(rows).toHaveLength(3);
    expect(rows[0]).toEqual({ Question: "How was onboarding?", Response: "It was  smooth", "Respondent ID": "r1" });
  });

  it("reads the first sheet of a workbook", async () => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.json_to_sheet([{ question: "Why did you leave?", response: "Support was slow", respondent_id: 7 }]),
      "Responses"
    );
    const path = join(dir, "churned.xlsx");
    await writeFile(path, XLSX.write(workbook, { type: "buffer", bookType: "xlsx" }));

    const rows = await loadRecordFile(path);
    expect(rows).toEqual([{ question: "Why did you leave?", response: "Support was slow", respondent_id: 7 }]);
  });

  it("rejects other file types", async () => {
    await expect(loadRecordFile(join(dir, "notes.txt"))).rejects.toBeInstanceOf(ValidationFailureError);
  });
});

describe("validateRows", () => {
  it("accepts required columns in any case and spacing", () => {
    const rows = [{ Question: "q", Response: "r", "Respondent ID": "1" }];
    expect(validateRows(rows)).toEqual({ valid: true, problems: [] });
    expect(isValid(rows)).toBe(true);
  });

  it("reports an empty file", () => {
    expect(validateRows([])).toEqual({ valid: false, problems: ["no rows"] });
  });

  it("names the missing columns", () => {
    expect(validateRows([{ question: "q", answer: "a" }])).toEqual({
      valid: false,
      problems: ["missing column(s): response, respondent_id"],
    });
  });

  it("needs at least one complete row", () => {
    expect(validateRows([{ question: "q", response: " ", respondent_id: "1" }])).toEqual({
      valid: false,
      problems: ["no row has question, response, respondent_id all filled in"],
    });
  });
});

describe("preprocessRows", () => {
  it("normalizes cells, drops incomplete rows and fills respondent ids", () => {
    const rows = [
      { Question: "How was onboarding?", Response: "It was  smooth", "Respondent ID": "r1" },
      { Question: "How was onboarding?", Response: "", "Respondent ID": "r2" },
      { Question: "What about pricing?", Response: "Too expensive", "Respondent ID": "" },
    ];

    expect(preprocessRows(rows, "Customers")).toEqual([
      { question: "How was onboarding?", response: "It was smooth", respondentId: "r1", group: "Customers" },
      { question: "What about pricing?", response: "Too expensive", respondentId: "Customers-3", group: "Customers" },
    ]);
  });

  it("tells the caller how many rows were dropped", () => {
    expect(droppedRowsNotice("Customers", 3, 2)).toEqual({
      code: "ROWS_DROPPED",
      message: "Customers: dropped 1 of 3 row(s) without question or response",
    });
    expect(droppedRowsNotice("Customers", 2, 2)).toBeNull();
  });

  it("returns frozen records", () => {
    const [record] = preprocessRows([{ question: "q", response: "r", respondent_id: "1" }], "A");
    expect(Object.isFrozen(record)).toBe(true);
  });
});

describe("groups", () => {
  it("names a group after its file", () => {
    expect(groupNameFromFile("/data/Group A.csv")).toBe("Group A");
  });

  it("builds a frozen group", () => {
    const group = buildGroup("A", [], "a.csv");
    expect(group).toEqual({ group: "A", sourceFile: "a.csv", records: [] });
    expect(Object.isFrozen(group.records)).toBe(true);
  });
});
