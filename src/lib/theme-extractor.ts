import type {
  AnalysisParameters,
  Corpus,
  ExtractionMethod,
  ExtractionOutcome,
  ExtractionTuning,
  Taxonomy,
  Theme,
} from "../types";
import { parseAnalysisParameters } from "./analysis-config";
import { buildDocuments, toThemes, type ThemeStrategy } from "./extraction/shared";
import { extractClusterThemes } from "./extraction/tfidf-clustering";
import { extractKeywordThemes } from "./extraction/keyword-extraction";
import { extractTopicThemes } from "./extraction/topic-modeling";
import { debugLog } from "./debug";

export const DEFAULT_TUNING: ExtractionTuning = {
  keywordsPerTheme: 8,
  maxIterations: 50,
  topicIterations: 200,
  alpha: 0.1,
  beta: 0.01,
  seed: 42,
};

const STRATEGIES: Record<ExtractionMethod, ThemeStrategy> = {
  "TF-IDF Clustering": extractClusterThemes,
  "Keyword Extraction": extractKeywordThemes,
  "Topic Modeling": extractTopicThemes,
};

export function getStrategy(method: ExtractionMethod): ThemeStrategy {
  return STRATEGIES[method];
}

/**
 * Discover the theme taxonomy of a combined corpus.
 *
 * An empty corpus or a corpus where nothing reaches `minThemeFreq` yields an
 * empty taxonomy with a notice; bad parameters throw before any work.
 */
export function extractThemes(
  corpus: Corpus,
  params: AnalysisParameters,
  tuning: ExtractionTuning = DEFAULT_TUNING
): ExtractionOutcome {
  const validated = parseAnalysisParameters(params);

  if (corpus.length === 0) {
    return {
      taxonomy: new Map(),
      notice: { code: "EMPTY_CORPUS", message: "The corpus has no records; no themes were extracted" },
    };
  }

  const documents = buildDocuments(corpus);
  debugLog(`${validated.extractionMethod}: ${documents.length} non-empty response(s) of ${corpus.length}`);

  const themes = toThemes(getStrategy(validated.extractionMethod)(documents, validated, tuning)).slice(
    0,
    validated.numThemes
  );
  const taxonomy = buildTaxonomy(themes);

  if (taxonomy.size === 0) {
    return {
      taxonomy,
      notice: {
        code: "NO_THEMES",
        message: `No theme reached a frequency of ${validated.minThemeFreq} with ${validated.extractionMethod}`,
      },
    };
  }
  return { taxonomy, notice: null };
}

export function buildTaxonomy(themes: readonly Theme[]): Taxonomy {
  const taxonomy = new Map<string, Theme>();
  for (const theme of themes) {
    if (theme.keywords.length === 0) {
      throw new Error(`Theme "${theme.name}" has no keywords`);
    }
    if (taxonomy.has(theme.name)) {
      throw new Error(`Duplicate theme name "${theme.name}"`);
    }
    taxonomy.set(theme.name, theme);
  }
  return taxonomy;
}

// Ids come back from persistence; the taxonomy itself is never edited
export function withThemeIds(taxonomy: Taxonomy, ids: ReadonlyMap<string, number>): Taxonomy {
  return buildTaxonomy(
    [...taxonomy.values()].map(theme => Object.freeze({ ...theme, id: ids.get(theme.name) ?? theme.id }))
  );
}
