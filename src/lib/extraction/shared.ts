import type { AnalysisParameters, Corpus, ExtractionTuning, Theme } from "../../types";
import { titleCase, tokenize } from "../text-normalizer";

// A theme before it is placed in a taxonomy (names may still collide)
export interface ThemeCandidate {
  name: string;
  keywords: string[];
  frequency: number;
}

export type ThemeStrategy = (
  documents: string[][],
  params: AnalysisParameters,
  tuning: ExtractionTuning
) => ThemeCandidate[];

// Responses are the documents; empty token lists are dropped
export function buildDocuments(corpus: Corpus): string[][] {
  return corpus.map(record => tokenize(record.response)).filter(tokens => tokens.length > 0);
}

// Sorted vocabulary so term indices never depend on corpus order quirks
export function buildVocabulary(documents: string[][]): string[] {
  const terms = new Set<string>();
  for (const doc of documents) {
    for (const token of doc) terms.add(token);
  }
  return [...terms].sort();
}

export function nameFromKeywords(keywords: readonly string[]): string {
  return keywords.slice(0, 2).map(titleCase).join(" & ");
}

// Code-unit order, independent of the host locale
export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// Highest weight first, alphabetical on ties
export function rankTerms(weights: Iterable<[string, number]>, limit: number): string[] {
  return [...weights]
    .filter(([, weight]) => weight > 0)
    .sort((a, b) => b[1] - a[1] || compareText(a[0], b[0]))
    .slice(0, limit)
    .map(([term]) => term);
}

export function toThemes(candidates: ThemeCandidate[]): Theme[] {
  const used = new Set<string>();
  return candidates.map(candidate => {
    let name = candidate.name;
    for (let n = 2; used.has(name); n++) {
      name = `${candidate.name} (${n})`;
    }
    used.add(name);
    return Object.freeze({
      id: null,
      name,
      keywords: Object.freeze([...candidate.keywords]),
      frequency: candidate.frequency,
    });
  });
}
