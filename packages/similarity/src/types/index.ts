export type {
  SimilarityResult,
  SimilarityAlgorithm,
  ProjectionOptions,
} from './similarity.js';
