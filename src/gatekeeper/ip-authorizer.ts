/**
 * Gatehouse - IP Authorizer
 * Admits callers whose address is active in the allow-list directory.
 */

import type { DirectoryService } from '../directory/types.js';
import logger from '../utils/logger.js';
import { RequestAbortedError } from '../utils/types.js';
import type { PublicRoutes } from './public-routes.js';
import type { Gate, GateContext, GateDecision, Rejection } from './types.js';
import { abandon, pass, reject } from './types.js';

export interface IpAuthorizerOptions {
  enabled: boolean;
}

export class IpAuthorizer implements Gate {
  public readonly name = 'ip';
  public readonly completes = 'IP_CHECKED';
  public readonly failureMode = 'closed';

  private directory: DirectoryService;
  private publicRoutes: PublicRoutes;
  private options: IpAuthorizerOptions;

  constructor(directory: DirectoryService, publicRoutes: PublicRoutes, options: IpAuthorizerOptions) {
    this.directory = directory;
    this.publicRoutes = publicRoutes;
    this.options = options;
  }

  public async evaluate(context: GateContext): Promise<GateDecision> {
    if (!this.options.enabled || this.publicRoutes.matches(context.path)) {
      return pass();
    }

    try {
      const verdict = await this.directory.lookupIp(context.clientIp, context.signal);
      if (verdict === 'active') {
        return pass();
      }

      logger.debug('IP address not allowed', {
        requestId: context.requestId,
        clientIp: context.clientIp,
        verdict,
      });
      return reject(this.denied());
    } catch (error) {
      if (error instanceof RequestAbortedError) {
        return abandon();
      }
      return reject(this.unavailable());
    }
  }

  public unavailable(): Rejection {
    return {
      gate: this.name,
      reason: 'unavailable',
      statusCode: 403,
      body: { error: 'forbidden', message: 'Forbidden: IP address could not be verified' },
      headers: {},
      audit: { severity: 'CRITICAL', event: 'ip_directory_unavailable', includeBody: true },
    };
  }

  private denied(): Rejection {
    return {
      gate: this.name,
      reason: 'unauthorized',
      statusCode: 403,
      body: { error: 'forbidden', message: 'Forbidden: IP address not allowed' },
      headers: {},
      audit: { severity: 'CRITICAL', event: 'unauthorized_ip_address_attempt', includeBody: true },
    };
  }
}

export function createIpAuthorizer(
  directory: DirectoryService,
  publicRoutes: PublicRoutes,
  options: IpAuthorizerOptions
): IpAuthorizer {
  return new IpAuthorizer(directory, publicRoutes, options);
}
