/**
 * @rbstub/types - Type definitions for the rbstub toolkit
 */

// Declaration model
export * from './declarations.js';

// Diagnostics and logging
export * from './diagnostics.js';
