import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import * as XLSX from "xlsx";
import type { AnalysisResult, ComparisonView } from "../types";
import { AnalysisSession } from "./analysis-session";
import { InvalidParametersError } from "./errors";
import { comparisonTable, exportReport, renderTable, resolveOutputPath, toPdfText } from "./report-export";

let dir: string;
let result: AnalysisResult;
let view: ComparisonView | null;

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), "report-export-"));

  const session = new AnalysisSession(null);
  const outcome = await session.process({
    name: "Churn study",
    sources: [
      {
        group: "A",
        rows: [
          { question: "What was hard?", response: "Pricing was confusing", respondent_id: "a1" },
          { question: "What was hard?", response: "Pricing tiers unclear", respondent_id: "a2" },
          { question: "Anything else?", response: "Onboarding went fine", respondent_id: "a3" },
        ],
      },
      {
        group: "B",
        rows: [
          { question: "What was hard?", response: "Onboarding took ages", respondent_id: "b1" },
          { question: "Anything else?", response: "Pricing seems fair", respondent_id: "b2" },
        ],
      },
    ],
    parameters: { minThemeFreq: 2, numThemes: 3, extractionMethod: "Keyword Extraction" },
  });
  result = outcome.result;
  view = outcome.comparison;
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("comparisonTable", () => {
  it("lays out prevalence with a matched and a share column per group", () => {
    if (!view) throw new Error("missing comparison");
    expect(comparisonTable(view)).toEqual({
      headers: ["Theme", "A matched", "A prevalence", "B matched", "B prevalence"],
      rows: [
        ["Pricing", 2, 0.6667, 1, 0.5],
        ["Onboarding", 1, 0.3333, 1, 0.5],
      ],
    });
  });
});

describe("renderTable", () => {
  it("pads columns to their widest cell", () => {
    expect(renderTable({ headers: ["Theme", "A"], rows: [["Pricing", 2]] })).toBe(
      "Theme    A\n-------  -\nPricing  2"
    );
  });
});

describe("resolveOutputPath", () => {
  it("adds the format's extension when it is missing", () => {
    expect(resolveOutputPath("out/report", "PDF")).toBe("out/report.pdf");
    expect(resolveOutputPath("out/report.XLSX", "Excel")).toBe("out/report.XLSX");
  });
});

describe("toPdfText", () => {
  it("keeps Windows-1252 text and replaces what the built-in fonts cannot draw", () => {
    expect(toPdfText("Café – “naïve” · 5 €")).toBe("Café – “naïve” · 5 €");
    expect(toPdfText("Tiếng Việt 日本")).toBe("Ti?ng Vi?t ??");
  });
});

describe("exportReport", () => {
  it("writes one CSV file per table", async () => {
    const paths = await exportReport(result, view, "CSV", join(dir, "csv", "report"));

    expect(paths).toEqual([
      join(dir, "csv", "report.csv"),
      join(dir, "csv", "report-themes.csv"),
      join(dir, "csv", "report-question-counts.csv"),
    ]);
    expect(await readFile(paths[0], "utf-8")).toBe(
      "Theme,A matched,A prevalence,B matched,B prevalence\nPricing,2,0.6667,1,0.5\nOnboarding,1,0.3333,1,0.5\n"
    );
    expect(await readFile(paths[1], "utf-8")).toBe("Theme,Keywords,Frequency\nPricing,pricing,3\nOnboarding,onboarding,2\n");
  });

  it("writes a workbook with one sheet per table", async () => {
    const [path] = await exportReport(result, view, "Excel", join(dir, "report"));
    expect(path).toBe(join(dir, "report.xlsx"));

    const workbook = XLSX.read(await readFile(path), { type: "buffer" });
    expect(workbook.SheetNames).toEqual(["Theme Prevalence", "Themes", "Question Counts"]);
    expect(XLSX.utils.sheet_to_json(workbook.Sheets["Themes"])).toEqual([
      { Theme: "Pricing", Keywords: "pricing", Frequency: 3 },
      { Theme: "Onboarding", Keywords: "onboarding", Frequency: 2 },
    ]);
  });

  it("writes a PDF document", async () => {
    const [path] = await exportReport(result, view, "PDF", join(dir, "report"));
    const content = await readFile(path);
    expect(content.subarray(0, 5).toString("latin1")).toBe("%PDF-");
  });

  it("rejects unknown formats", async () => {
    await expect(exportReport(result, view, "Word", join(dir, "report"))).rejects.toThrow(InvalidParametersError);
  });
});
