import { readFileSync } from "fs";

const STOPWORDS_URL = new URL("../../data/stopwords.json", import.meta.url);
const MIN_TOKEN_LENGTH = 3;

let stopwords: Set<string> | null = null;

export function getStopwords(): Set<string> {
  if (!stopwords) {
    const words: unknown = JSON.parse(readFileSync(STOPWORDS_URL, "utf-8"));
    if (!Array.isArray(words)) {
      throw new Error(`Stop-word list at ${STOPWORDS_URL.pathname} is not an array`);
    }
    stopwords = new Set(words.map(w => String(w).toLowerCase()));
  }
  return stopwords;
}

// Whitespace collapse and null handling for a single cell
export function normalizeText(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value).replace(/\s+/g, " ").trim();
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(w => w.length > 0).length;
}

/**
 * Lower-cased content words, in text order. Possessives are stripped and
 * stop words, bare numbers and words shorter than three letters dropped.
 */
export function tokenize(text: string): string[] {
  const stop = getStopwords();
  const matches = text.toLowerCase().replace(/[‘’]/g, "'").match(/[a-z0-9]+(?:'[a-z]+)*/g) ?? [];

  const tokens: string[] = [];
  for (const match of matches) {
    if (stop.has(match)) continue;
    const word = match.endsWith("'s") ? match.slice(0, -2) : match;
    if (word.length < MIN_TOKEN_LENGTH || /^\d+$/.test(word) || stop.has(word)) continue;
    tokens.push(word);
  }
  return tokens;
}

// Light suffix stripping, enough to fold plurals and -ing/-ed forms together
export function stemToken(token: string): string {
  let stem = token;

  if (stem.endsWith("ies") && stem.length > 4) {
    stem = `${stem.slice(0, -3)}y`;
  } else if (stem.endsWith("sses")) {
    stem = stem.slice(0, -2);
  } else if (stem.endsWith("s") && !/(ss|us|is)$/.test(stem) && stem.length > 3) {
    stem = stem.slice(0, -1);
  }

  if (stem.endsWith("ing") && stem.length > 5) {
    stem = stem.slice(0, -3);
  } else if (stem.endsWith("ed") && stem.length > 4) {
    stem = stem.slice(0, -2);
  }

  return stem;
}

export function stemPhrase(phrase: string): string {
  return phrase.split(" ").map(stemToken).join(" ");
}

export function titleCase(phrase: string): string {
  return phrase
    .split(" ")
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}
