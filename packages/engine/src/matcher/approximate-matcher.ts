/**
 * Approximate Matcher
 *
 * Scores free text against every canonical catalog entry and keeps the top-k.
 * The index is built once per run and shared read-only between workers.
 */

import type { CatalogEntry } from '@causeway/core';
import { ConfigError } from '@causeway/core';
import {
  calculateSimilarity,
  projectText,
  type ProjectionOptions,
  type SimilarityAlgorithm,
} from '@causeway/similarity';
import type { CandidateMatcher, ScoredCode } from '../interfaces/index.js';

export interface ApproximateMatcherOptions {
  /** Default: 'levenshtein' */
  algorithm?: SimilarityAlgorithm;
  /** Default top-k for queries (default: 5) */
  topK?: number;
  /** Recorded as the rule version of fuzzy events (default: 'unversioned') */
  catalogVersion?: string;
  projection?: ProjectionOptions;
}

interface IndexedEntry {
  readonly canonicalCode: string;
  readonly projected: string;
}

const MAX_TOP_K = 50;

function ranksBefore(a: ScoredCode, b: ScoredCode): boolean {
  if (a.similarity !== b.similarity) return a.similarity > b.similarity;
  return a.canonicalCode < b.canonicalCode;
}

function validateTopK(topK: number): number {
  if (!Number.isInteger(topK) || topK < 1 || topK > MAX_TOP_K) {
    throw new ConfigError({
      message: `topK must be an integer between 1 and ${MAX_TOP_K} (got ${topK})`,
    });
  }
  return topK;
}

export class ApproximateMatcher implements CandidateMatcher {
  readonly algorithm: SimilarityAlgorithm;
  readonly catalogVersion: string;
  private readonly defaultTopK: number;

  private constructor(
    private readonly entries: readonly IndexedEntry[],
    private readonly projection: ProjectionOptions,
    options: ApproximateMatcherOptions
  ) {
    this.algorithm = options.algorithm ?? 'levenshtein';
    this.catalogVersion = options.catalogVersion ?? 'unversioned';
    this.defaultTopK = validateTopK(options.topK ?? 5);
  }

  /**
   * Index a catalog. Labels are matched when present, codes otherwise; a
   * repeated code keeps its first label.
   */
  static build(
    catalog: Iterable<CatalogEntry>,
    options: ApproximateMatcherOptions = {}
  ): ApproximateMatcher {
    const projection = options.projection ?? {};
    const seen = new Set<string>();
    const entries: IndexedEntry[] = [];

    for (const entry of catalog) {
      const code = entry.canonicalCode;
      if (typeof code !== 'string' || code.trim().length === 0) {
        throw new ConfigError({
          message: `Catalog entry ${entries.length} has an empty canonical code`,
        });
      }
      if (seen.has(code)) continue;
      seen.add(code);

      const projected = projectText(entry.label ?? code, projection);
      if (projected.length === 0) continue;
      entries.push(Object.freeze({ canonicalCode: code, projected }));
    }

    return new ApproximateMatcher(Object.freeze(entries), projection, options);
  }

  get size(): number {
    return this.entries.length;
  }

  query(text: string, topK: number = this.defaultTopK): ScoredCode[] {
    const limit = validateTopK(topK);
    const projected = projectText(text, this.projection);
    if (projected.length === 0) return [];

    // Bounded insertion keeps the scan O(n * k)
    const best: ScoredCode[] = [];
    for (const entry of this.entries) {
      const { score } = calculateSimilarity(projected, entry.projected, this.algorithm);
      if (score <= 0) continue;

      const candidate: ScoredCode = {
        canonicalCode: entry.canonicalCode,
        similarity: Math.min(1, score),
      };

      if (best.length === limit) {
        const last = best[best.length - 1];
        if (last && !ranksBefore(candidate, last)) continue;
        best.pop();
      }

      let at = best.length;
      while (at > 0) {
        const previous = best[at - 1];
        if (!previous || !ranksBefore(candidate, previous)) break;
        at--;
      }
      best.splice(at, 0, candidate);
    }

    return best;
  }
}
