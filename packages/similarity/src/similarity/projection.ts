/**
 * Text projection shared by the index and its queries, so both sides of a
 * comparison see the same normalized form.
 */

import type { ProjectionOptions } from '../types/similarity.js';

/**
 * Case-fold, collapse whitespace and trim.
 *
 * @example projectText('  Acute   Myocardial\tInfarction ') // 'acute myocardial infarction'
 */
export function projectText(text: string, options?: ProjectionOptions): string {
  let out = text.normalize('NFKC');

  if (options?.removePunctuation) {
    out = out.replace(/[^\p{L}\p{N}.\s]/gu, ' ');
  }

  out = out.replace(/\s+/g, ' ').trim();
  return options?.caseSensitive ? out : out.toLowerCase();
}
