/**
 * Provenance Ledger
 *
 * Append-only, sequence-numbered log of every decision in a run.
 *
 * Record events are written under a per-record lock and staged; a single
 * sequencing step numbers staged batches in the registered record order as
 * soon as every earlier record is staged. The resulting sequence does not
 * depend on how concurrent work was scheduled.
 *
 * An aborted run keeps nothing but its abort marker.
 */

import type {
  LedgerSnapshot,
  ProvenanceDecision,
  ProvenanceEvent,
  ProvenanceEventInput,
  ProvenanceStage,
  RunStatus,
} from '@causeway/core';
import { LedgerSealedError } from '@causeway/core';
import { KeyedMutex } from '@causeway/runtime';

export interface LedgerOptions {
  /** Display timestamps only (default: system clock) */
  clock?: () => Date;
}

export interface LedgerQueryOptions {
  recordId?: number;
  stage?: ProvenanceStage;
  decision?: ProvenanceDecision | ProvenanceDecision[];
  limit?: number;
  offset?: number;
}

export interface StageSummary {
  eventCount: number;
  decisions: Partial<Record<ProvenanceDecision, number>>;
}

export interface LedgerSummary {
  runId: string;
  status: RunStatus;
  totalEvents: number;
  recordCount: number;
  stages: Partial<Record<ProvenanceStage, StageSummary>>;
}

type FinalStatus = Exclude<RunStatus, 'running' | 'aborted'>;

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const inner of Object.values(value)) deepFreeze(inner);
    Object.freeze(value);
  }
  return value;
}

export class ProvenanceLedger {
  private readonly committed: ProvenanceEvent[] = [];
  private readonly recordLocks = new KeyedMutex<number>();
  private readonly staged = new Map<number, ProvenanceEventInput[]>();
  private order: number[] = [];
  private position = 0;
  /** Registered records whose batch is not numbered yet */
  private readonly awaiting = new Set<number>();
  private nextSequence = 1;
  private runStatus: RunStatus = 'running';
  private readonly startedAt: Date;
  private sealedAt: Date | null = null;
  private readonly clock: () => Date;

  constructor(
    readonly runId: string,
    options: LedgerOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.startedAt = this.clock();
  }

  get status(): RunStatus {
    return this.runStatus;
  }

  get isSealed(): boolean {
    return this.sealedAt !== null;
  }

  get size(): number {
    return this.committed.length;
  }

  /**
   * Append a run-level event immediately
   */
  append(input: ProvenanceEventInput): ProvenanceEvent {
    this.assertOpen(input.decision);
    return this.commit(input);
  }

  /**
   * Register the order in which record batches are numbered. Records not
   * registered are numbered as soon as their batch is staged.
   */
  expectRecords(recordIds: readonly number[]): void {
    this.assertOpen('expectRecords');
    this.order = [...recordIds];
    this.position = 0;
    this.awaiting.clear();
    for (const id of recordIds) this.awaiting.add(id);
  }

  /**
   * Run `work` holding the lock of `recordId`; the events it emits are
   * staged as one batch when it settles.
   */
  writeRecord<T>(
    recordId: number,
    work: (emit: (event: ProvenanceEventInput) => void) => Promise<T> | T
  ): Promise<T> {
    this.assertOpen(`record ${recordId}`);

    return this.recordLocks.runExclusive(recordId, async () => {
      const batch: ProvenanceEventInput[] = [];
      const emit = (event: ProvenanceEventInput) => {
        this.assertOpen(event.decision);
        batch.push({ ...event, recordId });
      };

      try {
        return await work(emit);
      } finally {
        if (!this.isSealed && batch.length > 0) this.stage(recordId, batch);
      }
    });
  }

  /**
   * Seal the ledger. Staged batches still waiting on an earlier record are
   * numbered first, in registered order.
   */
  finalize(status: FinalStatus): LedgerSnapshot {
    this.assertOpen('finalize');

    for (const recordId of this.order.slice(this.position)) {
      const batch = this.staged.get(recordId);
      if (batch) this.commitBatch(recordId, batch);
    }
    for (const [recordId, batch] of [...this.staged].sort(([a], [b]) => a - b)) {
      this.commitBatch(recordId, batch);
    }
    this.position = this.order.length;

    return this.seal(status);
  }

  /**
   * Seal the ledger as aborted. Events written so far are dropped; the
   * marker is committed as event 1.
   */
  abort(marker: ProvenanceEventInput): LedgerSnapshot {
    this.assertOpen(marker.decision);

    this.committed.length = 0;
    this.staged.clear();
    this.awaiting.clear();
    this.order = [];
    this.position = 0;
    this.nextSequence = 1;
    this.commit(marker);

    return this.seal('aborted');
  }

  events(): ProvenanceEvent[] {
    return [...this.committed];
  }

  query(options: LedgerQueryOptions = {}): ProvenanceEvent[] {
    const decisions =
      options.decision === undefined
        ? null
        : new Set(Array.isArray(options.decision) ? options.decision : [options.decision]);

    const matches = this.committed.filter(
      (e) =>
        (options.recordId === undefined || e.recordId === options.recordId) &&
        (options.stage === undefined || e.stage === options.stage) &&
        (decisions === null || decisions.has(e.decision))
    );

    const offset = options.offset ?? 0;
    return options.limit === undefined
      ? matches.slice(offset)
      : matches.slice(offset, offset + options.limit);
  }

  summary(): LedgerSummary {
    const stages: Partial<Record<ProvenanceStage, StageSummary>> = {};
    const records = new Set<number>();

    for (const event of this.committed) {
      if (event.recordId !== null) records.add(event.recordId);
      const stage = stages[event.stage] ?? { eventCount: 0, decisions: {} };
      stage.eventCount++;
      stage.decisions[event.decision] = (stage.decisions[event.decision] ?? 0) + 1;
      stages[event.stage] = stage;
    }

    return {
      runId: this.runId,
      status: this.runStatus,
      totalEvents: this.committed.length,
      recordCount: records.size,
      stages,
    };
  }

  snapshot(): LedgerSnapshot {
    return {
      runId: this.runId,
      status: this.runStatus,
      startedAt: this.startedAt.toISOString(),
      sealedAt: this.sealedAt ? this.sealedAt.toISOString() : null,
      events: this.events(),
    };
  }

  private seal(status: Exclude<RunStatus, 'running'>): LedgerSnapshot {
    this.runStatus = status;
    this.sealedAt = this.clock();
    return this.snapshot();
  }

  private stage(recordId: number, batch: ProvenanceEventInput[]): void {
    const existing = this.staged.get(recordId);
    this.staged.set(recordId, existing ? [...existing, ...batch] : batch);

    if (this.awaiting.has(recordId)) {
      this.drain();
      return;
    }

    const pending = this.staged.get(recordId);
    if (pending) this.commitBatch(recordId, pending);
  }

  /** Number batches in registered order up to the first record not yet staged */
  private drain(): void {
    while (this.position < this.order.length) {
      const recordId = this.order[this.position];
      if (recordId === undefined) break;
      const batch = this.staged.get(recordId);
      if (!batch) break;
      this.commitBatch(recordId, batch);
      this.position++;
    }
  }

  private commitBatch(recordId: number, batch: ProvenanceEventInput[]): void {
    this.staged.delete(recordId);
    this.awaiting.delete(recordId);
    for (const event of batch) this.commit(event);
  }

  private commit(input: ProvenanceEventInput): ProvenanceEvent {
    // Deep copy: a written event shares no objects with its input
    const event = deepFreeze(structuredClone({ ...input, sequenceNumber: this.nextSequence++ }));
    this.committed.push(event);
    return event;
  }

  private assertOpen(action: string): void {
    if (this.isSealed) {
      throw new LedgerSealedError({
        message: `Ledger for run ${this.runId} is sealed; cannot append ${action}`,
        suggestion: 'Start a new run to record further decisions.',
        context: { runId: this.runId },
      });
    }
  }
}
