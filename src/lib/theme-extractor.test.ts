import { describe, it, expect } from "vitest";
import type { AnalysisParameters, InterviewRecord } from "../types";
import { EXTRACTION_METHODS } from "../types";
import { InvalidParametersError } from "./errors";
import { buildTaxonomy, extractThemes, withThemeIds } from "./theme-extractor";

const record = (response: string, question = "Tell us about your experience"): InterviewRecord => ({
  question,
  response,
  respondentId: response.slice(0, 8),
  group: "A",
});

const onboardingCorpus = [
  "The onboarding felt slow",
  "Onboarding videos helped",
  "Our onboarding was confusing",
  "I liked onboarding overall",
  "Pricing seems fair",
  "Dashboard loads quickly",
  "Export button broken",
  "Great customer service",
  "Mobile app crashes",
  "Search results irrelevant",
].map(response => record(response));

const mixedCorpus = [
  "Pricing is too high for small teams",
  "The pricing tiers are confusing",
  "Support answered quickly and kindly",
  "Support tickets take days to close",
  "Onboarding was smooth thanks to support",
  "Onboarding checklist helped our team",
  "Reports export slowly",
  "Pricing page hides the real costs",
].map(response => record(response));

describe("extractThemes", () => {
  it("turns a word present in four responses into a theme", () => {
    const { taxonomy, notice } = extractThemes(onboardingCorpus, {
      minThemeFreq: 2,
      numThemes: 3,
      extractionMethod: "Keyword Extraction",
    });

    expect(notice).toBeNull();
    expect([...taxonomy.keys()]).toEqual(["Onboarding"]);
    expect(taxonomy.get("Onboarding")).toEqual({
      id: null,
      name: "Onboarding",
      keywords: ["onboarding"],
      frequency: 4,
    });
  });

  it.each(EXTRACTION_METHODS)("returns an empty taxonomy for an empty corpus (%s)", method => {
    const { taxonomy, notice } = extractThemes([], { minThemeFreq: 1, numThemes: 5, extractionMethod: method });
    expect(taxonomy.size).toBe(0);
    expect(notice?.code).toBe("EMPTY_CORPUS");
  });

  it.each(EXTRACTION_METHODS)("is deterministic and respects numThemes (%s)", method => {
    const params: AnalysisParameters = { minThemeFreq: 1, numThemes: 3, extractionMethod: method };
    const first = extractThemes(mixedCorpus, params);
    const second = extractThemes(mixedCorpus, params);

    expect([...second.taxonomy.entries()]).toEqual([...first.taxonomy.entries()]);
    expect(first.taxonomy.size).toBeGreaterThan(0);
    expect(first.taxonomy.size).toBeLessThanOrEqual(3);
    for (const theme of first.taxonomy.values()) {
      expect(theme.keywords.length).toBeGreaterThan(0);
      expect(theme.frequency).toBeGreaterThanOrEqual(1);
    }
  });

  it("reports when nothing reaches the minimum frequency", () => {
    const { taxonomy, notice } = extractThemes(onboardingCorpus, {
      minThemeFreq: 5,
      numThemes: 3,
      extractionMethod: "Keyword Extraction",
    });
    expect(taxonomy.size).toBe(0);
    expect(notice?.code).toBe("NO_THEMES");
  });

  it("rejects parameters below 1 before doing any work", () => {
    expect(() => extractThemes([], { minThemeFreq: 0, numThemes: 5, extractionMethod: "Keyword Extraction" })).toThrow(
      InvalidParametersError
    );
    expect(() => extractThemes([], { minThemeFreq: 1, numThemes: 0, extractionMethod: "Topic Modeling" })).toThrow(
      InvalidParametersError
    );
  });
});

describe("buildTaxonomy", () => {
  const theme = { id: null, name: "Pricing", keywords: ["pricing"], frequency: 3 };

  it("rejects duplicate names and empty keyword lists", () => {
    expect(() => buildTaxonomy([theme, theme])).toThrow('Duplicate theme name "Pricing"');
    expect(() => buildTaxonomy([{ ...theme, keywords: [] }])).toThrow('Theme "Pricing" has no keywords');
  });

  it("attaches saved ids without touching the original", () => {
    const taxonomy = buildTaxonomy([theme]);
    const saved = withThemeIds(taxonomy, new Map([["Pricing", 12]]));
    expect(saved.get("Pricing")?.id).toBe(12);
    expect(taxonomy.get("Pricing")?.id).toBeNull();
  });
});
