/**
 * String Similarity Types
 */

/** Result of a similarity comparison */
export interface SimilarityResult {
  /** Similarity score between 0 (no match) and 1 (exact match) */
  score: number;

  /** Which algorithm produced this result */
  algorithm: SimilarityAlgorithm;

  /** Optional details about the comparison */
  details?: string;
}

/** Available similarity algorithms */
export type SimilarityAlgorithm = 'levenshtein' | 'jaro_winkler' | 'dice_sorensen';

/** Preprocessing applied before comparison */
export interface ProjectionOptions {
  /** Keep letter case (default: false, text is case-folded) */
  caseSensitive?: boolean;
  /** Strip punctuation other than '.' inside codes (default: false) */
  removePunctuation?: boolean;
}
