/**
 * Candidate Matcher Interface
 *
 * Approximate matching of free text against the canonical catalog.
 */

export interface ScoredCode {
  canonicalCode: string;
  /** Similarity between 0 and 1 */
  similarity: number;
}

export interface CandidateMatcher {
  /** Recorded as the rule version of fuzzy events */
  readonly catalogVersion: string;

  /**
   * Best matches for `text`, highest similarity first, ties by canonical code.
   * Empty when the projected query is empty.
   */
  query(text: string, topK?: number): ScoredCode[];
}
