/**
 * Pipeline Types
 */

import type {
  CatalogEntry,
  Escalation,
  Fields,
  HarmonizedRecord,
  LedgerSnapshot,
  QualityAssessment,
  ReferenceEntry,
  RunStatus,
  Strategy,
} from '@causeway/core';
import type { Logger } from '@causeway/runtime';
import type { RecordCleaner, SuggestionService } from '../interfaces/index.js';

/** Collaborators a run is built from */
export interface PipelineComponents {
  /** Required when the direct strategy is enabled */
  referenceEntries?: Iterable<ReferenceEntry>;
  /** Canonical catalog for fuzzy matching; defaults to the reference table's codes */
  catalog?: Iterable<CatalogEntry>;
  /** Required when the suggested strategy is enabled */
  suggestionService?: SuggestionService;
  cleaner?: RecordCleaner;
  logger?: Logger;
  /** Display timestamps of the ledger */
  clock?: () => Date;
}

export interface RunOptions {
  /** Observed between record work units */
  signal?: AbortSignal;
}

export type RecordSource = Iterable<Fields> | AsyncIterable<Fields>;

export interface RunStats {
  totalRecords: number;
  resolvedCount: number;
  escalatedCount: number;
  /** Escalated because the run was cancelled before dispatch */
  cancelledCount: number;
  /** Resolved records per strategy */
  byStrategy: Record<Strategy, number>;
  /** resolved / total, 0 for an empty run */
  mappingRate: number;
}

export interface RunResult {
  runId: string;
  status: Exclude<RunStatus, 'running' | 'aborted'>;
  /** Input order */
  records: HarmonizedRecord[];
  /** Review set, ordered by record id */
  escalations: Escalation[];
  quality: QualityAssessment;
  ledger: LedgerSnapshot;
  stats: RunStats;
}
