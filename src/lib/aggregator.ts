import type {
  ClassificationOptions,
  ComparisonRequest,
  ComparisonView,
  DistributionRow,
  GroupData,
  GroupId,
  LengthStats,
  PrevalenceRow,
  ResponseLengthRow,
  Taxonomy,
  ThemeQuestionCounts,
} from "../types";
import { parseComparisonMethod } from "./analysis-config";
import { InvalidParametersError, UnknownThemeError } from "./errors";
import { DEFAULT_CLASSIFICATION, matchPrepared, prepareTaxonomy } from "./question-classifier";
import { countWords } from "./text-normalizer";
import { compareText } from "./extraction/shared";

type CountIndex = Map<GroupId, Map<string, ThemeQuestionCounts>>;

function indexCounts(counts: readonly (readonly ThemeQuestionCounts[])[]): CountIndex {
  const index: CountIndex = new Map();
  for (const groupCounts of counts) {
    for (const entry of groupCounts) {
      let byTheme = index.get(entry.group);
      if (!byTheme) {
        byTheme = new Map();
        index.set(entry.group, byTheme);
      }
      byTheme.set(entry.themeName, entry);
    }
  }
  return index;
}

function selectGroups(groups: readonly GroupData[], requested: GroupId[] | undefined): GroupData[] {
  if (!requested || requested.length === 0) return [...groups];

  const unknown = requested.filter(id => !groups.some(g => g.group === id));
  if (unknown.length > 0) {
    throw new InvalidParametersError(
      `Unknown group(s): ${unknown.join(", ")} (available: ${groups.map(g => g.group).join(", ")})`
    );
  }
  return requested.map(id => groups.find(g => g.group === id)).filter((g): g is GroupData => g !== undefined);
}

export function themePrevalence(
  groups: readonly GroupData[],
  taxonomy: Taxonomy,
  counts: CountIndex
): PrevalenceRow[] {
  return [...taxonomy.keys()].map(theme => {
    const matched: Record<GroupId, number> = {};
    const prevalence: Record<GroupId, number> = {};
    for (const group of groups) {
      const total = counts.get(group.group)?.get(theme)?.total ?? 0;
      matched[group.group] = total;
      prevalence[group.group] = group.records.length > 0 ? total / group.records.length : 0;
    }
    return { theme, matched, prevalence };
  });
}

export function questionDistribution(
  groups: readonly GroupData[],
  theme: string,
  counts: CountIndex
): DistributionRow[] {
  const rows = new Map<string, DistributionRow>();

  for (const group of groups) {
    for (const question of counts.get(group.group)?.get(theme)?.questions ?? []) {
      let row = rows.get(question.questionText);
      if (!row) {
        row = {
          question: question.questionText,
          counts: Object.fromEntries(groups.map(g => [g.group, 0])),
          total: 0,
        };
        rows.set(question.questionText, row);
      }
      row.counts[group.group] += question.count;
      row.total += question.count;
    }
  }

  return [...rows.values()].sort((a, b) => b.total - a.total || compareText(a.question, b.question));
}

export function lengthStats(lengths: readonly number[]): LengthStats {
  if (lengths.length === 0) return { count: 0, mean: 0, variance: 0 };

  const mean = lengths.reduce((sum, n) => sum + n, 0) / lengths.length;
  const variance = lengths.reduce((sum, n) => sum + (n - mean) ** 2, 0) / lengths.length;
  return { count: lengths.length, mean, variance };
}

// Response length in words, for the records matching each theme
export function responseLength(
  groups: readonly GroupData[],
  taxonomy: Taxonomy,
  options: ClassificationOptions
): ResponseLengthRow[] {
  const prepared = prepareTaxonomy(taxonomy);
  const lengths = new Map<string, Map<GroupId, number[]>>(
    prepared.map(p => [p.theme.name, new Map(groups.map(g => [g.group, []]))])
  );

  for (const group of groups) {
    for (const record of group.records) {
      for (const theme of matchPrepared(record, prepared, options)) {
        lengths.get(theme.name)?.get(group.group)?.push(countWords(record.response));
      }
    }
  }

  return prepared.map(({ theme }) => {
    const stats: Record<GroupId, LengthStats> = {};
    for (const group of groups) {
      stats[group.group] = lengthStats(lengths.get(theme.name)?.get(group.group) ?? []);
    }
    return { theme: theme.name, stats };
  });
}

/**
 * Build a cross-group comparison from a taxonomy and the per-group counts.
 * Groups without matching records report zeros.
 */
export function aggregate(
  groups: readonly GroupData[],
  taxonomy: Taxonomy,
  counts: readonly (readonly ThemeQuestionCounts[])[],
  request: ComparisonRequest,
  options: ClassificationOptions = DEFAULT_CLASSIFICATION
): ComparisonView {
  const method = parseComparisonMethod(request.method);
  const selected = selectGroups(groups, request.groups);
  const groupIds = selected.map(g => g.group);
  const index = indexCounts(counts);

  switch (method) {
    case "Theme Prevalence":
      return { method, groups: groupIds, rows: themePrevalence(selected, taxonomy, index) };

    case "Question Distribution": {
      if (!request.theme) {
        throw new InvalidParametersError("Question Distribution needs a theme");
      }
      if (!taxonomy.has(request.theme)) {
        throw new UnknownThemeError(request.theme);
      }
      return {
        method,
        theme: request.theme,
        groups: groupIds,
        rows: questionDistribution(selected, request.theme, index),
      };
    }

    case "Response Length":
      return { method, groups: groupIds, rows: responseLength(selected, taxonomy, options) };
  }
}
