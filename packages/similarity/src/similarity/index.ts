export {
  levenshtein,
  jaroWinkler,
  diceSorensen,
  calculateSimilarity,
} from './string-similarity.js';
export { projectText } from './projection.js';
