export {
  extractFieldNames,
  isMissing,
  fieldText,
  freezeRecord,
  stableStringify,
} from './records.js';
