export {
  SuggestionServiceAdapter,
  type SuggestionAdapterOptions,
  type SuggestionFailure,
  type SuggestionResult,
} from './suggestion-adapter.js';
export {
  HttpSuggestionService,
  type HttpSuggestionServiceConfig,
} from './http-suggestion-service.js';
