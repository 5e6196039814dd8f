/**
 * Gatehouse - Gatekeeper
 *
 * Barrel export file for the admission pipeline
 */

export { AuditLogger, createAuditLogger, redactHeaders, REDACTED } from './audit.js';
export { captureBodySnapshot, TRUNCATED_MARKER, UNAVAILABLE_MARKER } from './body-snapshot.js';
export { HostValidator, createHostValidator, normalizeHost, parseHostPattern } from './host-validator.js';
export { IpAuthorizer, createIpAuthorizer } from './ip-authorizer.js';
export { buildGateContext, createGatekeeperMiddleware } from './middleware.js';
export { GatekeeperPipeline, createGatekeeperPipeline } from './pipeline.js';
export { PublicRoutes, createPublicRoutes } from './public-routes.js';
export { RateLimitGate, createRateLimitGate } from './rate-limit-gate.js';
export { TokenAuthorizer, createTokenAuthorizer, extractCredential } from './token-authorizer.js';

export type { AuditLoggerOptions, AuditSink, LooseHeaders } from './audit.js';
export type { BodySnapshotOptions } from './body-snapshot.js';
export type { HostMatch, HostPattern, HostRule } from './host-validator.js';
export type { GatekeeperMiddlewareOptions } from './middleware.js';
export type { GatekeeperDependencies } from './pipeline.js';
export type { Credential } from './token-authorizer.js';
export type {
  FailureMode,
  Gate,
  GateContext,
  GateDecision,
  GateName,
  PipelineResult,
  PipelineState,
  Rejection,
  RejectionReason,
} from './types.js';
