export { formatRunSummary } from './run-summary-formatter.js';
export { formatPercent } from './utils.js';
