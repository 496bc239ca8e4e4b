/**
 * @storyteller/core
 *
 * Storyteller Core - Domain Types, Engine Contracts, and Error Definitions
 */

// Types
export * from './types/index.js';

// Utils
export * from './utils/index.js';

// State Machine - Task lifecycle
export * from './state-machine/index.js';

// Errors
export * from './errors/index.js';
