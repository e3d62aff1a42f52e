/**
 * Interface exports for the engine
 */

export type { ReferenceLookup } from './reference-lookup.js';

export type { CandidateMatcher, ScoredCode } from './candidate-matcher.js';

export type {
  SuggestionService,
  SuggestionContext,
  Suggestion,
} from './suggestion-service.js';

export type { RecordCleaner } from './record-cleaner.js';
