/**
 * Resources Index
 *
 * Re-exports all resource classes.
 */

export { HealthResource } from './health.js';
export { MetricsResource } from './metrics.js';
export { QueryResource, decodeQuery } from './query.js';
export type { ResourceContext, CallOptions } from './context.js';
