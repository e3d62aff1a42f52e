/**
 * Type exports for the engine
 */

export type {
  PipelineComponents,
  RunOptions,
  RecordSource,
  RunStats,
  RunResult,
} from './pipeline.js';
