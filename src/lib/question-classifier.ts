import type {
  ClassificationOptions,
  ClassificationOutcome,
  GroupData,
  InterviewRecord,
  QuestionCount,
  Taxonomy,
  Theme,
  ThemeQuestionCounts,
} from "../types";
import { stemToken, tokenize } from "./text-normalizer";
import { compareText } from "./extraction/shared";
import { mapPool } from "./worker-pool";

export const DEFAULT_CLASSIFICATION: ClassificationOptions = {
  similarityFloor: 0,
  maxThemesPerRecord: 0,
};

export interface PreparedTheme {
  theme: Theme;
  order: number;
  keywordStems: string[][];
}

// Stem every keyword once per taxonomy instead of once per record
export function prepareTaxonomy(taxonomy: Taxonomy): PreparedTheme[] {
  return [...taxonomy.values()].map((theme, order) => ({
    theme,
    order,
    keywordStems: theme.keywords.map(keyword => tokenize(keyword).map(stemToken)),
  }));
}

export function recordStems(record: InterviewRecord): Set<string> {
  return new Set(tokenize(`${record.question} ${record.response}`).map(stemToken));
}

/**
 * Share of a theme's keywords present in the record, in [0, 1]. A phrase
 * keyword counts only when all of its words are present.
 */
export function scoreTheme(stems: ReadonlySet<string>, prepared: PreparedTheme): number {
  const { keywordStems } = prepared;
  if (keywordStems.length === 0) return 0;

  const present = keywordStems.filter(words => words.length > 0 && words.every(w => stems.has(w))).length;
  return present / keywordStems.length;
}

/**
 * Themes a record belongs to, in taxonomy order. A record matches every
 * theme scoring above the similarity floor; with a per-record cap the best
 * scores win and equal scores go to the theme discovered first.
 */
export function matchPrepared(
  record: InterviewRecord,
  prepared: readonly PreparedTheme[],
  options: ClassificationOptions = DEFAULT_CLASSIFICATION
): Theme[] {
  const stems = recordStems(record);

  let matches = prepared
    .map(p => ({ p, score: scoreTheme(stems, p) }))
    .filter(m => m.score > options.similarityFloor);

  if (options.maxThemesPerRecord > 0 && matches.length > options.maxThemesPerRecord) {
    matches = matches
      .sort((a, b) => b.score - a.score || a.p.order - b.p.order)
      .slice(0, options.maxThemesPerRecord)
      .sort((a, b) => a.p.order - b.p.order);
  }

  return matches.map(m => m.p.theme);
}

export function matchRecord(
  record: InterviewRecord,
  taxonomy: Taxonomy,
  options: ClassificationOptions = DEFAULT_CLASSIFICATION
): Theme[] {
  return matchPrepared(record, prepareTaxonomy(taxonomy), options);
}

/**
 * Count, per theme, how often each question text of the group led to a
 * matching record. Every theme gets an entry, zero totals included, and the
 * result does not depend on record order.
 */
export function classifyGroup(
  group: GroupData,
  taxonomy: Taxonomy,
  options: ClassificationOptions = DEFAULT_CLASSIFICATION
): ClassificationOutcome {
  if (taxonomy.size === 0) {
    return {
      counts: [],
      notice: { code: "EMPTY_TAXONOMY", message: `No themes to classify ${group.group} against` },
    };
  }

  const prepared = prepareTaxonomy(taxonomy);
  const tallies = new Map<string, Map<string, number>>(prepared.map(p => [p.theme.name, new Map()]));

  for (const record of group.records) {
    for (const theme of matchPrepared(record, prepared, options)) {
      const questions = tallies.get(theme.name);
      if (!questions) continue;
      questions.set(record.question, (questions.get(record.question) || 0) + 1);
    }
  }

  const counts = prepared.map(({ theme }): ThemeQuestionCounts => {
    const questions = [...(tallies.get(theme.name) ?? new Map<string, number>()).entries()]
      .sort((a, b) => b[1] - a[1] || compareText(a[0], b[0]))
      .map(([questionText, count]): QuestionCount => ({
        themeName: theme.name,
        questionText,
        group: group.group,
        count,
      }));

    return {
      themeName: theme.name,
      group: group.group,
      total: questions.reduce((sum, q) => sum + q.count, 0),
      questions,
    };
  });

  return { counts, notice: null };
}

// Groups only share the frozen taxonomy, so they classify independently
export async function classifyGroups(
  groups: readonly GroupData[],
  taxonomy: Taxonomy,
  options: ClassificationOptions = DEFAULT_CLASSIFICATION,
  concurrency = groups.length
): Promise<ClassificationOutcome[]> {
  return mapPool(groups, concurrency, async group => classifyGroup(group, taxonomy, options));
}
