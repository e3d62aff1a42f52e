export { buildReviewRows, type ReviewRow, type ReviewRowOptions } from './review-rows.js';
