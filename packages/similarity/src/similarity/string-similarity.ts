/**
 * String Similarity Functions
 *
 * Core algorithms for measuring string similarity.
 * Uses fastest-levenshtein for the edit distance.
 */

import { distance as levenshteinDistance } from 'fastest-levenshtein';
import type { SimilarityResult, SimilarityAlgorithm } from '../types/similarity.js';

/**
 * Calculate normalized Levenshtein similarity
 *
 * @param a First string
 * @param b Second string
 * @returns Similarity score 0-1 (1 = identical)
 */
export function levenshtein(a: string, b: string): SimilarityResult {
  if (a === b) {
    return { score: 1, algorithm: 'levenshtein' };
  }

  if (a.length === 0 || b.length === 0) {
    return { score: 0, algorithm: 'levenshtein' };
  }

  const dist = levenshteinDistance(a, b);
  const maxLen = Math.max(a.length, b.length);
  const score = 1 - dist / maxLen;

  return {
    score,
    algorithm: 'levenshtein',
    details: `Distance: ${dist}, Max length: ${maxLen}`,
  };
}

/**
 * Jaro similarity, the base of Jaro-Winkler
 */
function jaro(a: string, b: string): number {
  if (a === b) return 1;
  if (a.length === 0 || b.length === 0) return 0;

  const matchWindow = Math.max(0, Math.floor(Math.max(a.length, b.length) / 2) - 1);
  const aMatches: boolean[] = new Array<boolean>(a.length).fill(false);
  const bMatches: boolean[] = new Array<boolean>(b.length).fill(false);

  let matches = 0;
  let transpositions = 0;

  for (let i = 0; i < a.length; i++) {
    const start = Math.max(0, i - matchWindow);
    const end = Math.min(i + matchWindow + 1, b.length);

    for (let j = start; j < end; j++) {
      if (bMatches[j] || a[i] !== b[j]) continue;
      aMatches[i] = true;
      bMatches[j] = true;
      matches++;
      break;
    }
  }

  if (matches === 0) return 0;

  let k = 0;
  for (let i = 0; i < a.length; i++) {
    if (!aMatches[i]) continue;
    while (!bMatches[k]) k++;
    if (a[i] !== b[k]) transpositions++;
    k++;
  }

  return (
    (matches / a.length +
      matches / b.length +
      (matches - transpositions / 2) / matches) /
    3
  );
}

/**
 * Calculate Jaro-Winkler similarity
 *
 * Gives more weight to a common prefix, which suits code families
 * such as "I21" / "I21.4".
 *
 * @param prefixScale Scaling factor for common prefix (default: 0.1, max: 0.25)
 */
export function jaroWinkler(
  a: string,
  b: string,
  prefixScale = 0.1
): SimilarityResult {
  const base = jaro(a, b);

  if (base === 1) {
    return { score: 1, algorithm: 'jaro_winkler' };
  }

  // Common prefix, max 4 characters
  let prefixLength = 0;
  const maxPrefix = Math.min(4, a.length, b.length);

  for (let i = 0; i < maxPrefix; i++) {
    if (a[i] === b[i]) {
      prefixLength++;
    } else {
      break;
    }
  }

  const scale = Math.min(0.25, prefixScale);
  const score = base + prefixLength * scale * (1 - base);

  return {
    score,
    algorithm: 'jaro_winkler',
    details: `Jaro: ${base.toFixed(3)}, Common prefix: ${prefixLength}`,
  };
}

/**
 * Calculate Dice-Sorensen coefficient over character n-grams
 *
 * Good for multi-word cause labels where word order shifts.
 */
export function diceSorensen(a: string, b: string, ngramSize = 2): SimilarityResult {
  if (a === b) {
    return { score: 1, algorithm: 'dice_sorensen' };
  }

  const aNgrams = getNgrams(a, ngramSize);
  const bNgrams = getNgrams(b, ngramSize);

  if (aNgrams.size === 0 || bNgrams.size === 0) {
    return { score: 0, algorithm: 'dice_sorensen' };
  }

  let intersection = 0;
  for (const ngram of aNgrams) {
    if (bNgrams.has(ngram)) {
      intersection++;
    }
  }

  const score = (2 * intersection) / (aNgrams.size + bNgrams.size);

  return {
    score,
    algorithm: 'dice_sorensen',
    details: `Intersection: ${intersection}, A ngrams: ${aNgrams.size}, B ngrams: ${bNgrams.size}`,
  };
}

/**
 * Extract n-grams from a string
 */
function getNgrams(str: string, n: number): Set<string> {
  const ngrams = new Set<string>();
  if (str.length === 0) return ngrams;

  if (str.length < n) {
    ngrams.add(str);
    return ngrams;
  }

  for (let i = 0; i <= str.length - n; i++) {
    ngrams.add(str.substring(i, i + n));
  }

  return ngrams;
}

/**
 * Calculate similarity using specified algorithm
 */
export function calculateSimilarity(
  a: string,
  b: string,
  algorithm: SimilarityAlgorithm,
  options?: { ngramSize?: number; prefixScale?: number }
): SimilarityResult {
  switch (algorithm) {
    case 'levenshtein':
      return levenshtein(a, b);
    case 'jaro_winkler':
      return jaroWinkler(a, b, options?.prefixScale);
    case 'dice_sorensen':
      return diceSorensen(a, b, options?.ngramSize);
    default: {
      const exhaustive: never = algorithm;
      throw new Error(`Unknown algorithm: ${String(exhaustive)}`);
    }
  }
}
