import { debugLog } from "../debug";
import { buildVocabulary, nameFromKeywords, compareText, type ThemeCandidate, type ThemeStrategy } from "./shared";

const EPSILON = 1e-12;

// L2-normalized sparse document vector
export interface SparseVector {
  indices: number[];
  weights: number[];
  mass: number; // sum of weights before normalization
}

export interface TfidfModel {
  vocabulary: string[];
  idf: Float64Array;
  vectors: SparseVector[];
}

/**
 * Smoothed TF-IDF: tf = count / document length,
 * idf = ln((1 + N) / (1 + df)) + 1.
 */
export function buildTfidf(documents: string[][]): TfidfModel {
  const vocabulary = buildVocabulary(documents);
  const termIndex = new Map(vocabulary.map((term, i) => [term, i]));

  const df = new Float64Array(vocabulary.length);
  const termCounts = documents.map(doc => {
    const counts = new Map<number, number>();
    for (const token of doc) {
      const index = termIndex.get(token);
      if (index === undefined) continue;
      counts.set(index, (counts.get(index) || 0) + 1);
    }
    for (const index of counts.keys()) df[index]++;
    return counts;
  });

  const n = documents.length;
  const idf = df.map(d => Math.log((1 + n) / (1 + d)) + 1);

  const vectors = termCounts.map((counts, docIndex): SparseVector => {
    const length = documents[docIndex].length;
    const indices = [...counts.keys()].sort((a, b) => a - b);
    const raw = indices.map(i => ((counts.get(i) || 0) / length) * idf[i]);
    const norm = Math.sqrt(raw.reduce((sum, w) => sum + w * w, 0));
    return {
      indices,
      weights: raw.map(w => (norm > 0 ? w / norm : 0)),
      mass: raw.reduce((sum, w) => sum + w, 0),
    };
  });

  return { vocabulary, idf, vectors };
}

function dot(vector: SparseVector, centre: Float64Array): number {
  let sum = 0;
  for (let i = 0; i < vector.indices.length; i++) {
    sum += vector.weights[i] * centre[vector.indices[i]];
  }
  return sum;
}

function squaredNorm(centre: Float64Array): number {
  let sum = 0;
  for (const value of centre) sum += value * value;
  return sum;
}

// ||d - c||^2 with ||d|| = 1
function distance(vector: SparseVector, centre: Float64Array, centreNorm: number): number {
  return Math.max(0, 1 + centreNorm - 2 * dot(vector, centre));
}

function toDense(vector: SparseVector, size: number): Float64Array {
  const dense = new Float64Array(size);
  vector.indices.forEach((index, i) => {
    dense[index] = vector.weights[i];
  });
  return dense;
}

/**
 * Farthest-first seeding: start from the document with the largest TF-IDF
 * mass, then repeatedly take the document farthest from its nearest
 * centre. Ties resolve to the lowest document index. Stops early when every
 * document already coincides with a centre.
 */
export function seedCentres(vectors: SparseVector[], k: number, size: number): Float64Array[] {
  if (vectors.length === 0 || k < 1) return [];

  let first = 0;
  vectors.forEach((v, i) => {
    if (v.mass > vectors[first].mass + EPSILON) first = i;
  });

  const centres = [toDense(vectors[first], size)];
  const nearest = vectors.map(v => distance(v, centres[0], 1));

  while (centres.length < k) {
    let farthest = -1;
    nearest.forEach((d, i) => {
      if (d > EPSILON && (farthest === -1 || d > nearest[farthest] + EPSILON)) farthest = i;
    });
    if (farthest === -1) break;

    const centre = toDense(vectors[farthest], size);
    centres.push(centre);
    vectors.forEach((v, i) => {
      nearest[i] = Math.min(nearest[i], distance(v, centre, 1));
    });
  }

  return centres;
}

export interface ClusterAssignment {
  assignments: number[];
  centres: Float64Array[];
  iterations: number;
}

export function kMeans(vectors: SparseVector[], k: number, size: number, maxIterations: number): ClusterAssignment {
  const centres = seedCentres(vectors, k, size);
  let assignments = new Array<number>(vectors.length).fill(-1);
  let iterations = 0;

  while (iterations < maxIterations) {
    iterations++;
    const norms = centres.map(squaredNorm);

    const next = vectors.map(v => {
      let best = 0;
      let bestDistance = distance(v, centres[0], norms[0]);
      for (let c = 1; c < centres.length; c++) {
        const d = distance(v, centres[c], norms[c]);
        if (d < bestDistance - EPSILON) {
          best = c;
          bestDistance = d;
        }
      }
      return best;
    });

    const changed = next.some((c, i) => c !== assignments[i]);
    assignments = next;
    if (!changed) break;

    // Recompute means; an empty cluster keeps its previous centre
    centres.forEach((centre, c) => {
      const members = vectors.filter((_, i) => assignments[i] === c);
      if (members.length === 0) return;
      centre.fill(0);
      for (const member of members) {
        member.indices.forEach((index, j) => {
          centre[index] += member.weights[j] / members.length;
        });
      }
    });
  }

  return { assignments, centres, iterations };
}

export const extractClusterThemes: ThemeStrategy = (documents, params, tuning) => {
  if (documents.length === 0) return [];

  const model = buildTfidf(documents);
  const k = Math.min(params.numThemes, documents.length);
  const { assignments, centres, iterations } = kMeans(model.vectors, k, model.vocabulary.length, tuning.maxIterations);
  debugLog(`k-means: ${centres.length} cluster(s) after ${iterations} iteration(s)`);

  const clusters: Array<ThemeCandidate & { members: number }> = [];
  centres.forEach((centre, c) => {
    const members = documents.filter((_, i) => assignments[i] === c);
    if (members.length === 0) return;

    const keywords = model.vocabulary
      .map((term, i): [string, number] => [term, centre[i]])
      .filter(([, weight]) => weight > EPSILON)
      .sort((a, b) => b[1] - a[1] || compareText(a[0], b[0]))
      .slice(0, tuning.keywordsPerTheme)
      .map(([term]) => term);
    if (keywords.length === 0) return;

    // Aggregate term frequency: occurrences of the lead keyword in the cluster
    const lead = keywords[0];
    const frequency = members.reduce((sum, doc) => sum + doc.filter(t => t === lead).length, 0);
    if (frequency < params.minThemeFreq) {
      debugLog(`Dropping cluster "${lead}" (frequency ${frequency} < ${params.minThemeFreq})`);
      return;
    }

    clusters.push({ name: nameFromKeywords(keywords), keywords, frequency, members: members.length });
  });

  return clusters
    .sort((a, b) => b.members - a.members || compareText(a.name, b.name))
    .map(({ name, keywords, frequency }) => ({ name, keywords, frequency }));
};
