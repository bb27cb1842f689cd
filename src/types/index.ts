/**
 * Type Exports
 *
 * Re-exports all public types from the bridge.
 */

export * from './settings.js';
export * from './health.js';
export * from './metrics.js';
export * from './query.js';
