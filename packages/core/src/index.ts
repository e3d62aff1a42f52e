/**
 * @causeway/core
 *
 * Shared types, errors and configuration schemas for cause resolution
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';
