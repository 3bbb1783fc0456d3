import { describe, it, expect } from "vitest";
import type { InterviewRecord, Theme } from "../types";
import { aggregate, lengthStats } from "./aggregator";
import { InvalidParametersError, UnknownThemeError } from "./errors";
import { classifyGroup } from "./question-classifier";
import { buildGroup } from "./record-store";
import { buildTaxonomy } from "./theme-extractor";

const PLANS = "How do you feel about the plans?";
const CHANGE = "What would you change?";

const theme = (name: string, keywords: string[]): Theme => ({ id: null, name, keywords, frequency: 1 });

const record = (question: string, response: string, group: string): InterviewRecord => ({
  question,
  response,
  respondentId: `${group}-${response.length}`,
  group,
});

const taxonomy = buildTaxonomy([theme("Pricing", ["pricing"]), theme("Support", ["support"])]);

const customers = buildGroup("A", [
  record(PLANS, "Pricing is too high", "A"),
  record(PLANS, "The pricing tiers confuse me", "A"),
  record(CHANGE, "I compare pricing with competitors", "A"),
  record(PLANS, "The dashboard is fast", "A"),
]);
const prospects = buildGroup("B", [
  record(PLANS, "Support answered fast", "B"),
  record(CHANGE, "Pricing looks fair", "B"),
]);
const empty = buildGroup("C", []);

const groups = [customers, prospects, empty];
const counts = groups.map(g => classifyGroup(g, taxonomy).counts);

describe("aggregate", () => {
  it("computes theme prevalence per group", () => {
    const view = aggregate(groups, taxonomy, counts, { method: "Theme Prevalence" });

    expect(view).toEqual({
      method: "Theme Prevalence",
      groups: ["A", "B", "C"],
      rows: [
        { theme: "Pricing", matched: { A: 3, B: 1, C: 0 }, prevalence: { A: 0.75, B: 0.5, C: 0 } },
        { theme: "Support", matched: { A: 0, B: 1, C: 0 }, prevalence: { A: 0, B: 0.5, C: 0 } },
      ],
    });
  });

  it("keeps prevalence within [0, 1]", () => {
    const view = aggregate(groups, taxonomy, counts, { method: "Theme Prevalence" });
    if (view.method !== "Theme Prevalence") throw new Error("unexpected view");
    for (const row of view.rows) {
      for (const value of Object.values(row.prevalence)) {
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(1);
      }
    }
  });

  it("distributes a theme's questions across the selected groups", () => {
    const view = aggregate(groups, taxonomy, counts, {
      method: "Question Distribution",
      theme: "Pricing",
      groups: ["B", "A"],
    });

    expect(view).toEqual({
      method: "Question Distribution",
      theme: "Pricing",
      groups: ["B", "A"],
      rows: [
        { question: PLANS, counts: { B: 0, A: 2 }, total: 2 },
        { question: CHANGE, counts: { B: 1, A: 1 }, total: 2 },
      ],
    });
  });

  it("needs a known theme for Question Distribution", () => {
    expect(() => aggregate(groups, taxonomy, counts, { method: "Question Distribution" })).toThrow(
      InvalidParametersError
    );
    expect(() => aggregate(groups, taxonomy, counts, { method: "Question Distribution", theme: "Onboarding" })).toThrow(
      UnknownThemeError
    );
  });

  it("rejects unknown groups", () => {
    expect(() => aggregate(groups, taxonomy, counts, { method: "Theme Prevalence", groups: ["Z"] })).toThrow(
      "Unknown group(s): Z (available: A, B, C)"
    );
  });

  it("summarizes response lengths of matching records", () => {
    const view = aggregate(groups, taxonomy, counts, { method: "Response Length", groups: ["A", "C"] });
    if (view.method !== "Response Length") throw new Error("unexpected view");

    const pricing = view.rows[0];
    expect(pricing.theme).toBe("Pricing");
    expect(pricing.stats.A.count).toBe(3);
    expect(pricing.stats.A.mean).toBeCloseTo(14 / 3);
    expect(pricing.stats.A.variance).toBeCloseTo(2 / 9);
    expect(pricing.stats.C).toEqual({ count: 0, mean: 0, variance: 0 });
  });
});

describe("lengthStats", () => {
  it("uses the population variance", () => {
    expect(lengthStats([2, 4])).toEqual({ count: 2, mean: 3, variance: 1 });
    expect(lengthStats([])).toEqual({ count: 0, mean: 0, variance: 0 });
  });
});
