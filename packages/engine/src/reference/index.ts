export { ReferenceTable } from './reference-table.js';
export {
  parseReferenceCsv,
  parseReferenceJson,
  loadReferenceFile,
  type ReferenceFileOptions,
} from './reference-loader.js';
