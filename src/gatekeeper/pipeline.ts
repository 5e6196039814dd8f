/**
 * Gatehouse - Gatekeeper Pipeline
 * Runs the admission gates in order and drives the request through
 *
 *   ENTERED -> EDGE_LIMITED -> HOST_CHECKED -> IP_CHECKED -> TOKEN_CHECKED -> ADMITTED
 *
 * or, from any of those, to REJECTED. The first rejection is final: later
 * gates are not consulted and exactly one audit record is written for it.
 */

import type { DirectoryService } from '../directory/types.js';
import type { RateLimiter } from '../rate-limiter/limiter.js';
import logger from '../utils/logger.js';
import type { AuditLogger } from './audit.js';
import { UNAVAILABLE_MARKER } from './body-snapshot.js';
import { HostValidator } from './host-validator.js';
import { IpAuthorizer } from './ip-authorizer.js';
import { PublicRoutes } from './public-routes.js';
import { RateLimitGate } from './rate-limit-gate.js';
import { TokenAuthorizer } from './token-authorizer.js';
import type { Gate, GateContext, GateDecision, PipelineResult, PipelineState, Rejection } from './types.js';

export class GatekeeperPipeline {
  private gates: readonly Gate[];
  private auditLogger: AuditLogger;

  constructor(gates: readonly Gate[], auditLogger: AuditLogger) {
    this.gates = gates;
    this.auditLogger = auditLogger;
  }

  public getGates(): readonly Gate[] {
    return this.gates;
  }

  public async run(context: GateContext): Promise<PipelineResult> {
    const transitions: PipelineState[] = ['ENTERED'];
    const headers: Record<string, string> = {};

    for (const gate of this.gates) {
      if (context.signal.aborted) {
        return this.abandoned(context, transitions, headers, gate);
      }

      const decision = await this.evaluate(gate, context);

      if (decision.outcome === 'abandon') {
        return this.abandoned(context, transitions, headers, gate);
      }

      if (decision.outcome === 'reject') {
        transitions.push('REJECTED');
        await this.audit(context, decision.rejection);
        return {
          state: 'REJECTED',
          transitions,
          headers: { ...headers, ...decision.rejection.headers },
          reason: decision.rejection.reason,
          rejection: decision.rejection,
        };
      }

      Object.assign(headers, decision.headers);
      transitions.push(gate.completes);
    }

    transitions.push('ADMITTED');
    return { state: 'ADMITTED', transitions, headers };
  }

  /**
   * A gate that throws gets its declared failure policy: open passes the
   * request on, closed rejects it as unavailable.
   */
  private async evaluate(gate: Gate, context: GateContext): Promise<GateDecision> {
    try {
      return await gate.evaluate(context);
    } catch (error) {
      logger.error('Gate evaluation failed', {
        requestId: context.requestId,
        gate: gate.name,
        failureMode: gate.failureMode,
        error: error instanceof Error ? error.message : String(error),
      });

      if (context.signal.aborted) {
        return { outcome: 'abandon' };
      }
      return gate.failureMode === 'open'
        ? { outcome: 'pass' }
        : { outcome: 'reject', rejection: gate.unavailable() };
    }
  }

  private async audit(context: GateContext, rejection: Rejection): Promise<void> {
    let body: string | undefined;
    if (rejection.audit.includeBody) {
      try {
        body = await context.readBody();
      } catch (error) {
        logger.debug('Body snapshot failed', {
          requestId: context.requestId,
          error: error instanceof Error ? error.message : String(error),
        });
        body = UNAVAILABLE_MARKER;
      }
    }

    const record = {
      severity: rejection.audit.severity,
      event: rejection.audit.event,
      gate: rejection.gate,
      reason: rejection.reason,
      requestId: context.requestId,
      clientIp: context.clientIp,
      route: context.route,
      method: context.method,
      headers: context.headers,
    };

    this.auditLogger.rejection(body === undefined ? record : { ...record, body });
  }

  private abandoned(
    context: GateContext,
    transitions: PipelineState[],
    headers: Record<string, string>,
    gate: Gate
  ): PipelineResult {
    logger.info('Client closed the connection before admission completed', {
      requestId: context.requestId,
      clientIp: context.clientIp,
      gate: gate.name,
    });

    transitions.push('REJECTED');
    return { state: 'REJECTED', transitions, headers, reason: 'client_closed' };
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export interface GatekeeperDependencies {
  rateLimiter: RateLimiter;
  directory: DirectoryService;
  auditLogger: AuditLogger;
  allowedHosts: readonly string[];
  publicRoutes: readonly string[];
  baseUrl?: string;
  ipAuthEnabled: boolean;
  tokenAuthEnabled: boolean;
}

/**
 * Build the pipeline in its fixed order: edge limit, host, IP, token.
 * Throws ConfigurationError on an invalid host pattern.
 */
export function createGatekeeperPipeline(deps: GatekeeperDependencies): GatekeeperPipeline {
  const publicRoutes = new PublicRoutes(deps.publicRoutes, deps.baseUrl);

  return new GatekeeperPipeline(
    [
      new RateLimitGate(deps.rateLimiter),
      new HostValidator(deps.allowedHosts),
      new IpAuthorizer(deps.directory, publicRoutes, { enabled: deps.ipAuthEnabled }),
      new TokenAuthorizer(deps.directory, publicRoutes, { enabled: deps.tokenAuthEnabled }),
    ],
    deps.auditLogger
  );
}

export default GatekeeperPipeline;
