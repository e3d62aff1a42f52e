/**
 * Pipeline Orchestrator
 *
 * build -> clean (external) -> resolve (worker pool) -> assess (after the
 * resolution barrier) -> seal. Components are built before the first record
 * is read, and a fatal error leaves nothing in the ledger but an abort marker.
 */

import { createHash } from 'node:crypto';
import type {
  Escalation,
  Fields,
  HarmonizedRecord,
  InputRecord,
  ProvenanceDecision,
  ProvenanceEventInput,
  QualityAssessment,
  RunConfig,
  RunConfigInput,
  Strategy,
} from '@causeway/core';
import {
  CausewayError,
  ConfigError,
  freezeRecord,
  parseRunConfig,
  stableStringify,
  wrapError,
} from '@causeway/core';
import { Logger, Semaphore, fingerprintConfig } from '@causeway/runtime';
import { ApproximateMatcher } from '../matcher/index.js';
import { ProvenanceLedger } from '../provenance/index.js';
import { QualityAssessor, createQualityDataset } from '../quality/index.js';
import { ReferenceTable } from '../reference/index.js';
import { ResolutionPolicy, type ResolutionTrace } from '../resolution/index.js';
import { SuggestionServiceAdapter } from '../suggestion/index.js';
import type {
  PipelineComponents,
  RecordSource,
  RunOptions,
  RunResult,
  RunStats,
} from '../types/index.js';

interface BuiltComponents {
  policy: ResolutionPolicy;
  assessor: QualityAssessor;
  versions: {
    tableVersion: string | null;
    catalogVersion: string | null;
    modelVersion: string | null;
  };
}

function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

function fingerprintRecords(records: readonly InputRecord[]): string {
  const hash = createHash('sha256');
  for (const record of records) {
    hash.update(`${record.recordId}:${stableStringify(record.fields)}\n`);
  }
  return hash.digest('hex');
}

/** Identical configuration and input give the same run id */
export function deriveRunId(configFingerprint: string, inputFingerprint: string): string {
  return `run_${sha256(`${configFingerprint}:${inputFingerprint}`).slice(0, 16)}`;
}

function runEvent(
  decision: ProvenanceDecision,
  inputSummary: string,
  details?: Record<string, unknown>
): ProvenanceEventInput {
  const event: ProvenanceEventInput = {
    recordId: null,
    stage: 'run',
    inputSummary,
    decision,
    strategyUsed: null,
    confidence: null,
    ruleVersion: null,
  };
  if (details) event.details = details;
  return event;
}

export class Pipeline {
  private lastLedger: ProvenanceLedger | undefined;
  private readonly clock: () => Date;

  constructor(
    private readonly config: RunConfigInput,
    private readonly components: PipelineComponents = {}
  ) {
    this.clock = components.clock ?? (() => new Date());
  }

  /** Ledger of the most recent run, including aborted ones */
  get ledger(): ProvenanceLedger | undefined {
    return this.lastLedger;
  }

  async run(source: RecordSource, options: RunOptions = {}): Promise<RunResult> {
    const { signal } = options;
    let config: RunConfig;
    try {
      config = parseRunConfig(this.config);
    } catch (err) {
      const runId = `run_${sha256(stableStringify(this.config)).slice(0, 16)}`;
      const logger = (this.components.logger ?? new Logger()).child({ runId });
      throw this.abort(this.openLedger(runId), err, 'configuration', logger);
    }

    // Run id is bound once known; components log through the same instance
    const logger = (this.components.logger ?? new Logger(config.logging)).child({});
    const configFingerprint = fingerprintConfig(config);

    let built: BuiltComponents;
    try {
      built = this.build(config, logger);
    } catch (err) {
      const runId = config.runId ?? `run_${configFingerprint.slice(0, 16)}`;
      logger.bind({ runId });
      throw this.abort(this.openLedger(runId), err, 'component construction', logger);
    }
    const { policy, assessor } = built;

    let records: InputRecord[];
    try {
      records = await this.readRecords(source);
    } catch (err) {
      const runId = config.runId ?? deriveRunId(configFingerprint, 'unreadable');
      logger.bind({ runId });
      throw this.abort(this.openLedger(runId), err, 'cleaning', logger);
    }

    const inputFingerprint = fingerprintRecords(records);
    const runId = config.runId ?? deriveRunId(configFingerprint, inputFingerprint);
    logger.bind({ runId });
    const ledger = this.openLedger(runId);

    ledger.append(
      runEvent('run_started', `${records.length} records`, {
        runId,
        configFingerprint,
        inputFingerprint,
        recordCount: records.length,
        workers: config.concurrency.workers,
        ...built.versions,
      })
    );
    logger.info('Run started', { records: records.length, workers: config.concurrency.workers });

    // Resolution
    ledger.append(runEvent('resolution_started', `${records.length} records`));
    ledger.expectRecords(records.map((r) => r.recordId));

    const traces = new Map<number, ResolutionTrace>();
    const failures: unknown[] = [];
    const tasks: Promise<void>[] = [];
    const pool = new Semaphore(config.concurrency.workers);

    for (const record of records) {
      if (signal?.aborted) break;
      const release = await pool.acquire();
      if (signal?.aborted) {
        release();
        break;
      }
      tasks.push(
        ledger
          .writeRecord(record.recordId, (emit) => policy.resolve(record, emit))
          .then(
            (trace) => {
              traces.set(record.recordId, trace);
            },
            (err: unknown) => {
              failures.push(err);
            }
          )
          .finally(release)
      );
    }
    await Promise.all(tasks);

    if (failures.length > 0) {
      throw this.abort(ledger, failures[0], 'resolution', logger);
    }

    const dispatched = traces.size;
    for (const record of records) {
      if (traces.has(record.recordId)) continue;
      const trace = await ledger.writeRecord(record.recordId, (emit) => policy.cancel(record, emit));
      traces.set(record.recordId, trace);
    }
    const cancelledCount = records.length - dispatched;
    if (cancelledCount > 0) {
      logger.warn('Run cancelled, escalating undispatched records', {
        dispatched,
        cancelled: cancelledCount,
      });
    }

    const harmonized = records.map((record) =>
      this.harmonize(record, traces.get(record.recordId), config.targetField)
    );
    const escalations = this.collectEscalations(records, traces);
    const stats = this.computeStats(harmonized, cancelledCount);

    ledger.append(
      runEvent('resolution_complete', `${stats.resolvedCount}/${stats.totalRecords} mapped`, {
        total: stats.totalRecords,
        mapped: stats.resolvedCount,
        escalated: stats.escalatedCount,
        cancelled: cancelledCount,
        mappingRate: stats.mappingRate,
      })
    );
    logger.debug('Resolution complete', { ...stats.byStrategy, escalated: stats.escalatedCount });

    // Quality
    ledger.append(runEvent('quality_started', `${assessor.checkNames.length} checks`));
    let quality: QualityAssessment;
    try {
      quality = await assessor.assess(createQualityDataset(harmonized, config));
    } catch (err) {
      throw this.abort(ledger, err, 'quality assessment', logger);
    }

    for (const result of quality.results) {
      ledger.append({
        recordId: null,
        stage: 'quality',
        inputSummary: `${result.checkName} over ${quality.totalRecords} records`,
        decision: result.passed ? 'check_passed' : 'check_failed',
        strategyUsed: null,
        confidence: null,
        ruleVersion: null,
        check: result,
      });
    }
    ledger.append({
      recordId: null,
      stage: 'quality',
      inputSummary: `${quality.results.length} checks`,
      decision: 'quality_scored',
      strategyUsed: null,
      confidence: null,
      ruleVersion: null,
      score: quality.score,
    });

    const status = cancelledCount > 0 ? 'cancelled' : 'completed';
    ledger.append(
      status === 'cancelled'
        ? runEvent('incomplete_run', `${cancelledCount} records not dispatched`, {
            dispatched,
            cancelled: cancelledCount,
          })
        : runEvent('run_complete', `${records.length} records`)
    );
    const snapshot = ledger.finalize(status);

    logger.info('Run finished', {
      status,
      resolved: stats.resolvedCount,
      escalated: stats.escalatedCount,
      score: quality.score,
    });

    return {
      runId,
      status,
      records: harmonized,
      escalations,
      quality,
      ledger: snapshot,
      stats,
    };
  }

  private openLedger(runId: string): ProvenanceLedger {
    const ledger = new ProvenanceLedger(runId, { clock: this.clock });
    this.lastLedger = ledger;
    return ledger;
  }

  private async readRecords(source: RecordSource): Promise<InputRecord[]> {
    const { cleaner } = this.components;
    const records: InputRecord[] = [];
    let index = 0;
    for await (const fields of source) {
      const cleaned: Fields | null = cleaner ? await cleaner.clean(fields, index) : fields;
      if (cleaned !== null) records.push(freezeRecord(index, cleaned));
      index++;
    }
    return records;
  }

  private build(config: RunConfig, logger: Logger): BuiltComponents {
    const { direct, fuzzy, suggested } = config.strategies;
    const { referenceEntries, catalog, suggestionService } = this.components;

    let referenceTable: ReferenceTable | undefined;
    if (direct.enabled) {
      if (!referenceEntries) {
        throw new ConfigError({
          message: 'Direct strategy is enabled but no reference entries were provided',
          suggestion: 'Load a reference table or disable strategies.direct.',
        });
      }
      referenceTable = ReferenceTable.load(referenceEntries, direct.tableVersion ?? '');
    }

    let matcher: ApproximateMatcher | undefined;
    if (fuzzy.enabled) {
      const entries = catalog ?? referenceTable?.toCatalog();
      if (!entries) {
        throw new ConfigError({
          message: 'Fuzzy strategy is enabled but no catalog was provided',
          suggestion: 'Pass a catalog, or enable the direct strategy to match against its codes.',
        });
      }
      matcher = ApproximateMatcher.build(entries, {
        algorithm: fuzzy.algorithm,
        topK: fuzzy.topK,
        catalogVersion: fuzzy.catalogVersion,
      });
    }

    const suggestions =
      suggested.enabled && suggestionService
        ? new SuggestionServiceAdapter(suggestionService, {
            topK: suggested.topK,
            timeoutMs: suggested.timeoutMs,
            maxConcurrency: suggested.maxConcurrency,
            logger,
          })
        : undefined;

    const policy = ResolutionPolicy.fromConfig(config, { referenceTable, matcher, suggestions });
    const assessor = new QualityAssessor(config.quality.checks, {
      strict: config.quality.strict,
      logger,
    });

    return {
      policy,
      assessor,
      versions: {
        tableVersion: referenceTable?.version ?? null,
        catalogVersion: matcher?.catalogVersion ?? null,
        modelVersion: suggestions?.modelVersion ?? null,
      },
    };
  }

  private harmonize(
    record: InputRecord,
    trace: ResolutionTrace | undefined,
    targetField: string
  ): HarmonizedRecord {
    if (!trace) {
      throw new CausewayError({
        code: 'UNKNOWN',
        message: `Record ${record.recordId} finished without an outcome`,
      });
    }
    const { outcome } = trace;
    const canonicalCode = outcome.status === 'resolved' ? outcome.candidate.canonicalCode : null;
    return Object.freeze({
      recordId: record.recordId,
      fields: Object.freeze({ ...record.fields, [targetField]: canonicalCode }),
      outcome,
    });
  }

  private collectEscalations(
    records: readonly InputRecord[],
    traces: ReadonlyMap<number, ResolutionTrace>
  ): Escalation[] {
    const escalations: Escalation[] = [];
    for (const record of records) {
      const trace = traces.get(record.recordId);
      if (!trace || trace.outcome.status !== 'escalated') continue;
      escalations.push(
        Object.freeze({
          recordId: trace.recordId,
          sourceCode: trace.sourceCode,
          outcome: trace.outcome,
          candidates: Object.freeze([...trace.candidates]),
        })
      );
    }
    return escalations;
  }

  private computeStats(records: readonly HarmonizedRecord[], cancelledCount: number): RunStats {
    const byStrategy: Record<Strategy, number> = { direct: 0, fuzzy: 0, suggested: 0 };
    for (const record of records) {
      if (record.outcome.status === 'resolved') byStrategy[record.outcome.candidate.strategy]++;
    }
    const resolvedCount = byStrategy.direct + byStrategy.fuzzy + byStrategy.suggested;
    const totalRecords = records.length;
    return {
      totalRecords,
      resolvedCount,
      escalatedCount: totalRecords - resolvedCount,
      cancelledCount,
      byStrategy,
      mappingRate: totalRecords === 0 ? 0 : resolvedCount / totalRecords,
    };
  }

  private abort(ledger: ProvenanceLedger, err: unknown, phase: string, logger: Logger): CausewayError {
    const error = wrapError(err);
    if (!ledger.isSealed) {
      ledger.abort(
        runEvent('run_aborted', `aborted during ${phase}`, {
          phase,
          code: error.code,
          error: error.message,
        })
      );
    }
    logger.error('Run aborted', { phase, code: error.code, error: error.message });
    return error;
  }
}
