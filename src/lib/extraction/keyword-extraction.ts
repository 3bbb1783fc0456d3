import { stemPhrase, titleCase } from "../text-normalizer";
import { compareText, type ThemeCandidate, type ThemeStrategy } from "./shared";

interface KeywordCandidate {
  key: string; // stemmed form shared by near-duplicates
  representative: string;
  variants: string[]; // surface forms, most frequent first
  frequency: number;
  documents: Set<number>;
  stems: string[];
}

/**
 * Unigrams and bigrams of adjacent tokens, with near-duplicates (same
 * stem sequence) folded together.
 */
export function collectCandidates(documents: string[][]): KeywordCandidate[] {
  const byKey = new Map<string, { surfaces: Map<string, number>; documents: Set<number> }>();

  const add = (surface: string, docIndex: number) => {
    const key = stemPhrase(surface);
    let entry = byKey.get(key);
    if (!entry) {
      entry = { surfaces: new Map(), documents: new Set() };
      byKey.set(key, entry);
    }
    entry.surfaces.set(surface, (entry.surfaces.get(surface) || 0) + 1);
    entry.documents.add(docIndex);
  };

  documents.forEach((tokens, docIndex) => {
    tokens.forEach((token, i) => {
      add(token, docIndex);
      const next = tokens[i + 1];
      if (next !== undefined && next !== token) {
        add(`${token} ${next}`, docIndex);
      }
    });
  });

  const candidates: KeywordCandidate[] = [];
  for (const [key, entry] of byKey) {
    const variants = [...entry.surfaces.entries()]
      .sort((a, b) => b[1] - a[1] || a[0].length - b[0].length || compareText(a[0], b[0]))
      .map(([surface]) => surface);
    const frequency = [...entry.surfaces.values()].reduce((sum, n) => sum + n, 0);

    candidates.push({
      key,
      representative: variants[0],
      variants,
      frequency,
      documents: entry.documents,
      stems: key.split(" "),
    });
  }
  return candidates;
}

// Frequency, then spread across responses, then single words before phrases
function compareCandidates(a: KeywordCandidate, b: KeywordCandidate): number {
  return (
    b.frequency - a.frequency ||
    b.documents.size - a.documents.size ||
    a.stems.length - b.stems.length ||
    compareText(a.representative, b.representative)
  );
}

export const extractKeywordThemes: ThemeStrategy = (documents, params, tuning) => {
  const candidates = collectCandidates(documents);
  const eligible = candidates.filter(c => c.frequency >= params.minThemeFreq).sort(compareCandidates);

  // Selection: a candidate sharing a word with an already chosen one is a
  // near-duplicate and joins that theme's keywords instead
  const selected: Array<{ candidate: KeywordCandidate; folded: KeywordCandidate[] }> = [];
  for (const candidate of eligible) {
    const owner = selected.find(s => s.candidate.stems.some(stem => candidate.stems.includes(stem)));
    if (owner) {
      owner.folded.push(candidate);
    } else if (selected.length < params.numThemes) {
      selected.push({ candidate, folded: [] });
    }
  }

  const unigrams = candidates.filter(c => c.stems.length === 1);

  return selected.map(({ candidate, folded }): ThemeCandidate => {
    const keywords: string[] = [];
    const push = (term: string) => {
      if (!keywords.includes(term)) keywords.push(term);
    };

    candidate.variants.forEach(push);
    folded.forEach(f => push(f.representative));

    // Words that keep showing up in the same responses
    const cooccurring = unigrams
      .filter(u => !candidate.stems.includes(u.key))
      .map(u => {
        let shared = 0;
        for (const doc of u.documents) {
          if (candidate.documents.has(doc)) shared++;
        }
        return { term: u.representative, shared };
      })
      .filter(u => u.shared >= params.minThemeFreq)
      .sort((a, b) => b.shared - a.shared || compareText(a.term, b.term));
    cooccurring.forEach(u => push(u.term));

    return {
      name: titleCase(candidate.representative),
      keywords: keywords.slice(0, tuning.keywordsPerTheme),
      frequency: candidate.frequency,
    };
  });
};

