export {
  similarityAlgorithmSchema,
  thresholdSchema,
  directStrategySchema,
  fuzzyStrategySchema,
  suggestedStrategySchema,
  strategiesSchema,
  qualitySeveritySchema,
  qualityCheckConfigSchema,
  qualityConfigSchema,
  loggingConfigSchema,
  runConfigSchema,
  formatZodError,
  parseRunConfig,
} from './schemas.js';
export type {
  SimilarityAlgorithmInput,
  QualityCheckConfig,
  RunConfig,
  RunConfigInput,
} from './schemas.js';
