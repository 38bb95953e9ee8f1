/**
 * @ipwatch/core
 *
 * Shared types, collaborator interfaces, errors and utilities
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';
