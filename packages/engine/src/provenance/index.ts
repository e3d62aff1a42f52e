export {
  ProvenanceLedger,
  type LedgerOptions,
  type LedgerQueryOptions,
  type LedgerSummary,
  type StageSummary,
} from './provenance-ledger.js';
export { reconstructRun, type RunReconstruction } from './reconstruct.js';
