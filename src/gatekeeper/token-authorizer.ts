/**
 * Gatehouse - Token Authorizer
 * Admits callers presenting an active API token, either as a Bearer
 * credential or in the x-api-key header.
 */

import type { DirectoryService } from '../directory/types.js';
import { headerValue } from '../utils/helpers.js';
import logger from '../utils/logger.js';
import { RequestAbortedError, type HeaderMap } from '../utils/types.js';
import type { PublicRoutes } from './public-routes.js';
import type { Gate, GateContext, GateDecision, Rejection } from './types.js';
import { abandon, pass, reject } from './types.js';

// =============================================================================
// Credential Extraction
// =============================================================================

export interface Credential {
  token: string;
  source: 'authorization' | 'x-api-key';
}

const BEARER = /^bearer\s+(.*)$/i;

/**
 * Bearer wins over x-api-key. An Authorization header with another scheme,
 * or an empty Bearer value, falls through to x-api-key.
 */
export function extractCredential(headers: Readonly<HeaderMap>): Credential | undefined {
  const authorization = headerValue(headers['authorization'])?.trim();
  if (authorization) {
    const token = BEARER.exec(authorization)?.[1]?.trim();
    if (token) {
      return { token, source: 'authorization' };
    }
  }

  const apiKey = headerValue(headers['x-api-key'])?.trim();
  if (apiKey) {
    return { token: apiKey, source: 'x-api-key' };
  }

  return undefined;
}

// =============================================================================
// Token Authorizer Gate
// =============================================================================

export interface TokenAuthorizerOptions {
  enabled: boolean;
}

export class TokenAuthorizer implements Gate {
  public readonly name = 'token';
  public readonly completes = 'TOKEN_CHECKED';
  public readonly failureMode = 'closed';

  private directory: DirectoryService;
  private publicRoutes: PublicRoutes;
  private options: TokenAuthorizerOptions;

  constructor(directory: DirectoryService, publicRoutes: PublicRoutes, options: TokenAuthorizerOptions) {
    this.directory = directory;
    this.publicRoutes = publicRoutes;
    this.options = options;
  }

  public async evaluate(context: GateContext): Promise<GateDecision> {
    if (!this.options.enabled || this.publicRoutes.matches(context.path)) {
      return pass();
    }

    const credential = extractCredential(context.headers);
    if (!credential) {
      return reject(
        this.rejection('unauthorized', 'Unauthorized: API token required', 'unauthorized_api_token_missing')
      );
    }

    try {
      const verdict = await this.directory.lookupToken(credential.token, context.signal);
      if (verdict === 'active') {
        return pass();
      }

      logger.debug('API token not accepted', {
        requestId: context.requestId,
        source: credential.source,
        verdict,
      });
      return reject(
        this.rejection(
          'unauthorized',
          'Unauthorized: Invalid or inactive API token',
          'unauthorized_api_token_attempt'
        )
      );
    } catch (error) {
      if (error instanceof RequestAbortedError) {
        return abandon();
      }
      return reject(this.unavailable());
    }
  }

  public unavailable(): Rejection {
    return this.rejection(
      'unavailable',
      'Unauthorized: API token could not be verified',
      'token_directory_unavailable'
    );
  }

  private rejection(reason: Rejection['reason'], message: string, event: string): Rejection {
    return {
      gate: this.name,
      reason,
      statusCode: 401,
      body: { error: 'unauthorized', message },
      headers: {},
      audit: { severity: 'CRITICAL', event, includeBody: true },
    };
  }
}

export function createTokenAuthorizer(
  directory: DirectoryService,
  publicRoutes: PublicRoutes,
  options: TokenAuthorizerOptions
): TokenAuthorizer {
  return new TokenAuthorizer(directory, publicRoutes, options);
}
