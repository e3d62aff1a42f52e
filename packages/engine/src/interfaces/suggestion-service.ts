/**
 * Suggestion Service Interface
 *
 * External pre-trained classifier proposing canonical codes for free text.
 */

import type { Fields } from '@causeway/core';

export interface SuggestionContext {
  recordId: number;
  sourceField: string;
  /** Free-text description of the record, when configured */
  description: string | null;
  fields: Readonly<Fields>;
}

export interface Suggestion {
  canonicalCode: string;
  confidence: number;
}

export interface SuggestionService {
  readonly modelVersion: string;

  /**
   * Propose canonical codes for `text`. Implementations should stop work
   * when `signal` aborts.
   */
  suggest(text: string, context: SuggestionContext, signal: AbortSignal): Promise<Suggestion[]>;
}
