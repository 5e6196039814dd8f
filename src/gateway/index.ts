/**
 * Gatehouse - Gateway Module
 *
 * Barrel export file for the gateway module
 */

export * from './middleware/index.js';

export { GatehouseServer, createGatehouseServer } from './server.js';
export type { GatehouseServerOptions } from './server.js';
export { UpstreamForwarder, createUpstreamForwarder, toUpstreamError } from './upstream.js';
export { GatewayMetrics, METRICS_PATH } from './metrics.js';
