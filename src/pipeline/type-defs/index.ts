/**
 * Pipeline types: barrel re-export.
 * Imported through ../types.js.
 */

export * from './enums.js';
export * from './version.js';
export * from './release.js';
export * from './targets.js';
export * from './checks.js';
export * from './artifacts.js';
