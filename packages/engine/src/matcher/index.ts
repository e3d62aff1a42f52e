export { ApproximateMatcher, type ApproximateMatcherOptions } from './approximate-matcher.js';
