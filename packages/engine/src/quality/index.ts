export { QualityAssessor, compositeScore, type QualityAssessorOptions } from './quality-assessor.js';
export {
  BUILTIN_CHECKS,
  isIsoDate,
  type BoundCheck,
  type CheckFinding,
  type QualityCheckDefinition,
} from './checks.js';
export { createQualityDataset, type QualityDataset } from './quality-dataset.js';
