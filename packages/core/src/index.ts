/**
 * @tierpay/core: Shared types, validation schemas, and conversion utilities
 */

// Re-export all types
export * from './types.js';

// Re-export constants
export * from './constants.js';

// Re-export schemas
export * from './schemas.js';

// Re-export conversion arithmetic
export * from './conversion.js';

// Re-export domain events
export * from './events.js';

// Re-export error taxonomy
export * from './errors.js';
