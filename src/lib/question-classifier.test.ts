import { describe, it, expect } from "vitest";
import type { GroupData, InterviewRecord, Theme } from "../types";
import { buildGroup } from "./record-store";
import { buildTaxonomy } from "./theme-extractor";
import { classifyGroup, classifyGroups, matchRecord } from "./question-classifier";

const PLANS = "How do you feel about the plans?";
const CHANGE = "What would you change?";

const theme = (name: string, keywords: string[]): Theme => ({ id: null, name, keywords, frequency: 1 });

const record = (question: string, response: string, group = "A"): InterviewRecord => ({
  question,
  response,
  respondentId: `${group}-${response.length}`,
  group,
});

const taxonomy = buildTaxonomy([theme("Pricing", ["pricing"]), theme("Support", ["support"])]);

const customers: GroupData = buildGroup("A", [
  record(PLANS, "Pricing is too high"),
  record(PLANS, "The pricing tiers confuse me"),
  record(CHANGE, "I compare pricing with competitors"),
  record(PLANS, "The dashboard is fast"),
  record(CHANGE, "Reports export nicely"),
]);

describe("classifyGroup", () => {
  it("counts matching records per question for every theme", () => {
    const { counts, notice } = classifyGroup(customers, taxonomy);

    expect(notice).toBeNull();
    expect(counts).toEqual([
      {
        themeName: "Pricing",
        group: "A",
        total: 3,
        questions: [
          { themeName: "Pricing", questionText: PLANS, group: "A", count: 2 },
          { themeName: "Pricing", questionText: CHANGE, group: "A", count: 1 },
        ],
      },
      { themeName: "Support", group: "A", total: 0, questions: [] },
    ]);
  });

  it("does not depend on record order", () => {
    const reversed = buildGroup("A", [...customers.records].reverse());
    expect(classifyGroup(reversed, taxonomy)).toEqual(classifyGroup(customers, taxonomy));
  });

  it("keeps one theme per record when capped", () => {
    const group = buildGroup("B", [
      record(CHANGE, "Pricing and support both matter", "B"),
      record(CHANGE, "Support was slow", "B"),
      record(CHANGE, "Pricing fine", "B"),
    ]);

    const uncapped = classifyGroup(group, taxonomy).counts.map(c => c.total);
    const capped = classifyGroup(group, taxonomy, { similarityFloor: 0, maxThemesPerRecord: 1 }).counts.map(
      c => c.total
    );

    expect(uncapped).toEqual([2, 2]);
    // The tie goes to the theme discovered first
    expect(capped).toEqual([2, 1]);
    expect(capped.reduce((a, b) => a + b, 0)).toBeLessThanOrEqual(group.records.length);
  });

  it("returns a notice instead of counts for an empty taxonomy", () => {
    const { counts, notice } = classifyGroup(customers, new Map());
    expect(counts).toEqual([]);
    expect(notice?.code).toBe("EMPTY_TAXONOMY");
  });

  it("reports zero totals for a group without records", () => {
    const { counts } = classifyGroup(buildGroup("Empty", []), taxonomy);
    expect(counts.map(c => [c.themeName, c.total])).toEqual([
      ["Pricing", 0],
      ["Support", 0],
    ]);
  });
});

describe("matchRecord", () => {
  const partial = buildTaxonomy([theme("Pricing Tiers", ["pricing", "tiers"])]);
  const onlyPricing = record(CHANGE, "Pricing is too high");

  it("matches strictly above the similarity floor", () => {
    expect(matchRecord(onlyPricing, partial, { similarityFloor: 0.5, maxThemesPerRecord: 0 })).toEqual([]);
    expect(
      matchRecord(onlyPricing, partial, { similarityFloor: 0.4, maxThemesPerRecord: 0 }).map(t => t.name)
    ).toEqual(["Pricing Tiers"]);
  });

  it("matches inflected forms of a keyword", () => {
    expect(matchRecord(record(CHANGE, "They supported us well"), taxonomy).map(t => t.name)).toEqual(["Support"]);
  });
});

describe("classifyGroups", () => {
  it("returns one outcome per group in input order", async () => {
    const other = buildGroup("B", [record(PLANS, "Support is great", "B")]);
    const outcomes = await classifyGroups([customers, other], taxonomy, undefined, 2);

    expect(outcomes.map(o => o.counts.map(c => `${c.group}:${c.themeName}=${c.total}`))).toEqual([
      ["A:Pricing=3", "A:Support=0"],
      ["B:Pricing=0", "B:Support=1"],
    ]);
  });
});
