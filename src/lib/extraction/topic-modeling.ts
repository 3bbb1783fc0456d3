import { debugLog } from "../debug";
import { createRandom } from "./random";
import { buildVocabulary, nameFromKeywords, rankTerms, type ThemeCandidate, type ThemeStrategy } from "./shared";

export interface LdaOptions {
  topics: number;
  alpha: number;
  beta: number;
  iterations: number;
  seed: number;
}

export interface LdaModel {
  vocabulary: string[];
  topicWordCounts: Int32Array[]; // [topic][word]
  topicTotals: Int32Array;
}

/**
 * Latent Dirichlet allocation fitted with collapsed Gibbs sampling. All
 * randomness comes from a seeded generator, so a fixed seed reproduces the
 * same topics. The topic count is capped at the vocabulary size.
 */
export function fitLda(documents: string[][], options: LdaOptions): LdaModel {
  const vocabulary = buildVocabulary(documents);
  const wordIndex = new Map(vocabulary.map((word, i) => [word, i]));
  const { alpha, beta, iterations } = options;
  const vocabSize = vocabulary.length;
  // More topics than distinct words cannot be told apart
  const topics = Math.max(1, Math.min(options.topics, vocabSize));
  if (topics < options.topics) {
    debugLog(`Fitting ${topics} topic(s) instead of ${options.topics}: vocabulary has ${vocabSize} word(s)`);
  }
  const random = createRandom(options.seed);

  const words = documents.map(doc => doc.map(token => wordIndex.get(token) ?? 0));
  const docTopicCounts = documents.map(() => new Int32Array(topics));
  const topicWordCounts = Array.from({ length: topics }, () => new Int32Array(vocabSize));
  const topicTotals = new Int32Array(topics);

  const assignments = words.map((doc, d) =>
    doc.map(w => {
      const topic = Math.min(topics - 1, Math.floor(random() * topics));
      docTopicCounts[d][topic]++;
      topicWordCounts[topic][w]++;
      topicTotals[topic]++;
      return topic;
    })
  );

  const weights = new Float64Array(topics);
  const betaSum = beta * vocabSize;

  for (let iter = 0; iter < iterations; iter++) {
    words.forEach((doc, d) => {
      doc.forEach((w, i) => {
        const current = assignments[d][i];
        docTopicCounts[d][current]--;
        topicWordCounts[current][w]--;
        topicTotals[current]--;

        let total = 0;
        for (let k = 0; k < topics; k++) {
          total += ((docTopicCounts[d][k] + alpha) * (topicWordCounts[k][w] + beta)) / (topicTotals[k] + betaSum);
          weights[k] = total;
        }

        const target = random() * total;
        let topic = 0;
        while (topic < topics - 1 && weights[topic] <= target) topic++;

        assignments[d][i] = topic;
        docTopicCounts[d][topic]++;
        topicWordCounts[topic][w]++;
        topicTotals[topic]++;
      });
    });
  }

  return { vocabulary, topicWordCounts, topicTotals };
}

export const extractTopicThemes: ThemeStrategy = (documents, params, tuning) => {
  if (documents.length === 0) return [];

  const model = fitLda(documents, {
    topics: params.numThemes,
    alpha: tuning.alpha,
    beta: tuning.beta,
    iterations: tuning.topicIterations,
    seed: tuning.seed,
  });

  const topics: Array<ThemeCandidate & { index: number }> = [];
  model.topicWordCounts.forEach((counts, index) => {
    const mass = model.topicTotals[index];
    if (mass < params.minThemeFreq || mass === 0) {
      debugLog(`Dropping topic ${index} (mass ${mass} < ${params.minThemeFreq})`);
      return;
    }

    // Within one topic the word weight is proportional to its count
    const keywords = rankTerms(
      model.vocabulary.map((word, w): [string, number] => [word, counts[w]]),
      tuning.keywordsPerTheme
    );
    topics.push({ name: nameFromKeywords(keywords), keywords, frequency: mass, index });
  });

  return topics
    .sort((a, b) => b.frequency - a.frequency || a.index - b.index)
    .map(({ name, keywords, frequency }) => ({ name, keywords, frequency }));
};
