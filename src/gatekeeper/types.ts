/**
 * Gatehouse - Gatekeeper Type Definitions
 */

import type { AuditSeverity } from '../utils/logger.js';
import type { HeaderMap } from '../utils/types.js';

// =============================================================================
// Pipeline States
// =============================================================================

export type PipelineState =
  | 'ENTERED'
  | 'EDGE_LIMITED'
  | 'HOST_CHECKED'
  | 'IP_CHECKED'
  | 'TOKEN_CHECKED'
  | 'ADMITTED'
  | 'REJECTED';

export type RejectionReason =
  | 'rate_limited'
  | 'invalid_host'
  | 'unauthorized'
  | 'unavailable'
  | 'client_closed';

export type GateName = 'rate_limit' | 'host' | 'ip' | 'token';

export type FailureMode = 'open' | 'closed';

// =============================================================================
// Gate Context
// =============================================================================

/**
 * Everything a gate may look at. Headers are the request's own collection
 * and must not be mutated.
 */
export interface GateContext {
  requestId: string;
  method: string;
  /** Path without query string */
  path: string;
  /** Original URL, query string included */
  route: string;
  /** Raw Host header */
  host: string | undefined;
  clientIp: string;
  headers: Readonly<HeaderMap>;
  /** Fires when the client goes away before a response is written */
  signal: AbortSignal;
  /** Bounded snapshot of the request body; undefined when snapshots are off */
  readBody: () => Promise<string | undefined>;
}

// =============================================================================
// Decisions
// =============================================================================

export interface RejectionBody {
  error: string;
  message?: string;
  retry_after?: number;
}

export interface AuditDraft {
  severity: AuditSeverity;
  event: string;
  /** Whether the audit record should carry a body snapshot */
  includeBody: boolean;
}

export interface Rejection {
  gate: GateName;
  reason: Exclude<RejectionReason, 'client_closed'>;
  statusCode: number;
  body: RejectionBody;
  headers: Record<string, string>;
  audit: AuditDraft;
}

export type GateDecision =
  | { outcome: 'pass'; headers?: Record<string, string> }
  | { outcome: 'reject'; rejection: Rejection }
  | { outcome: 'abandon' };

// =============================================================================
// Gate Interface
// =============================================================================

export interface Gate {
  readonly name: GateName;
  /** State the pipeline reaches when this gate passes */
  readonly completes: PipelineState;
  /** Policy applied when the gate itself faults */
  readonly failureMode: FailureMode;
  evaluate(context: GateContext): Promise<GateDecision>;
  /** Rejection used under the closed policy when evaluation faults */
  unavailable(): Rejection;
}

// =============================================================================
// Pipeline Result
// =============================================================================

export type PipelineResult =
  | {
      state: 'ADMITTED';
      transitions: PipelineState[];
      headers: Record<string, string>;
    }
  | {
      state: 'REJECTED';
      transitions: PipelineState[];
      headers: Record<string, string>;
      reason: RejectionReason;
      /** Absent when the client went away before a decision */
      rejection?: Rejection;
    };

// =============================================================================
// Helpers
// =============================================================================

export const pass = (headers?: Record<string, string>): GateDecision =>
  headers === undefined ? { outcome: 'pass' } : { outcome: 'pass', headers };

export const reject = (rejection: Rejection): GateDecision => ({ outcome: 'reject', rejection });

export const abandon = (): GateDecision => ({ outcome: 'abandon' });
