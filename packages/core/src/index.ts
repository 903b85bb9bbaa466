/**
 * @pkv2/core — Record types, schemas, decoding and payload encoding
 */

// Re-export all types
export * from './types.js';

// Re-export schemas and the record registry
export * from './schemas.js';

// Re-export the object mapper
export * from './mapper.js';

// Re-export payload encoding
export * from './encode.js';

// Re-export date helpers
export * from './dates.js';

// Re-export constants
export * from './constants.js';

// Re-export error utilities
export { getErrorMessage, DecodeError, EncodeError } from './errors.js';
export type { DecodeErrorKind } from './errors.js';
