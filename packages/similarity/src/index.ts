/**
 * @causeway/similarity
 *
 * String similarity algorithms and the text projection used by the
 * approximate matcher.
 */

export * from './similarity/index.js';
export * from './types/index.js';
