import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { AnalysisSession } from "./lib/analysis-session";
import { buildDashboardData } from "./build-data";

let dir: string;
let files: string[];

const readJson = async (name: string): Promise<unknown> => JSON.parse(await readFile(join(dir, name), "utf-8"));

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), "build-data-"));

  const { result } = await new AnalysisSession(null).process({
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
  files = await buildDashboardData(result, dir);
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("buildDashboardData", () => {
  it("writes every dashboard file", () => {
    expect(files).toEqual(
      ["meta.json", "themes.json", "counts.json", "comparisons.json", "indexes/theme-respondents.json"].map(f =>
        join(dir, f)
      )
    );
  });

  it("exports the taxonomy in discovery order", async () => {
    expect(await readJson("themes.json")).toEqual([
      { id: null, name: "Pricing", keywords: ["pricing"], frequency: 3, position: 0 },
      { id: null, name: "Onboarding", keywords: ["onboarding"], frequency: 2, position: 1 },
    ]);
  });

  it("summarizes the corpus", async () => {
    expect(await readJson("meta.json")).toMatchObject({
      project: null,
      classification: { similarityFloor: 0, maxThemesPerRecord: 0 },
      stats: { groups: 2, records: 5, themes: 2 },
      groups: [
        { group: "A", records: 3, sourceFile: null },
        { group: "B", records: 2, sourceFile: null },
      ],
    });
  });

  it("indexes respondents by theme and group", async () => {
    expect(await readJson("indexes/theme-respondents.json")).toEqual({
      Pricing: { A: ["a1", "a2"], B: ["b2"] },
      Onboarding: { A: ["a3"], B: ["b1"] },
    });
  });

  it("includes one question distribution per theme", async () => {
    expect(await readJson("comparisons.json")).toMatchObject({
      distributions: {
        Pricing: { theme: "Pricing", rows: [{ question: "What was hard?", total: 2 }, { question: "Anything else?", total: 1 }] },
        Onboarding: {
          theme: "Onboarding",
          rows: [
            { question: "Anything else?", total: 1 },
            { question: "What was hard?", total: 1 },
          ],
        },
      },
    });
  });
});
