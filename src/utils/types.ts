/**
 * Gatehouse - Request Admission Gateway
 * Core Type Definitions
 */

// =============================================================================
// Server Configuration Types
// =============================================================================

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: 'development' | 'production' | 'test';
  /** Optional path prefix the protected API is mounted under */
  baseUrl?: string;
}

export interface UpstreamConfig {
  url: string;
  timeoutMs: number;
}

export interface CorsConfig {
  allowedOrigins: string[];
  allowCredentials: boolean;
}

// =============================================================================
// Database Configuration Types
// =============================================================================

export interface PostgresConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: boolean;
  poolMin: number;
  poolMax: number;
  connectTimeoutMs: number;
  idleTimeoutMs: number;
  queryTimeoutMs: number;
}

export interface RedisConfig {
  host: string;
  port: number;
  password?: string;
  db: number;
  tls: boolean;
  keyPrefix: string;
  connectTimeoutMs: number;
  commandTimeoutMs: number;
}

// =============================================================================
// Gatekeeping Types
// =============================================================================

export interface RouteClassConfig {
  name: string;
  paths: string[];
  limit: number;
  windowSeconds: number;
}

export interface RateLimitConfig {
  enabled: boolean;
  failureMode: 'open' | 'closed';
  keyPrefix: string;
  default: {
    limit: number;
    windowSeconds: number;
  };
  routeClasses: RouteClassConfig[];
}

export interface HostsConfig {
  allowed: string[];
}

export interface GatesConfig {
  publicRoutes: string[];
  trustedProxies: string[];
  ipAuth: { enabled: boolean };
  tokenAuth: { enabled: boolean };
}

export interface DirectoryConfig {
  timeoutMs: number;
}

// =============================================================================
// Logging Types
// =============================================================================

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'http' | 'debug';
  format: 'json' | 'pretty';
  fileEnabled: boolean;
  filePath: string;
  requestLogging: boolean;
  sensitiveHeaders: string[];
  bodySnapshotLimit: number;
}

export interface MetricsConfig {
  enabled: boolean;
}

// =============================================================================
// Main Configuration Type
// =============================================================================

export interface GatehouseConfig {
  server: ServerConfig;
  upstream?: UpstreamConfig;
  cors: CorsConfig;
  hosts: HostsConfig;
  gates: GatesConfig;
  rateLimit: RateLimitConfig;
  directory: DirectoryConfig;
  postgres: PostgresConfig;
  redis: RedisConfig;
  logging: LoggingConfig;
  metrics: MetricsConfig;
  configFilePath: string;
}

// =============================================================================
// Request Augmentation
// =============================================================================

/**
 * Final state of the admission pipeline, attached to the request once the
 * gatekeeper has decided.
 */
export interface AdmissionSummary {
  state: string;
  /** States visited, ENTERED first */
  transitions: readonly string[];
  clientIp: string;
  rejectionReason?: string;
}

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      requestId?: string;
      startTime?: number;
      admission?: AdmissionSummary;
    }
  }
}

// =============================================================================
// Error Types
// =============================================================================

export class GatehouseError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, code = 'INTERNAL_ERROR', isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.name = 'GatehouseError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends GatehouseError {
  public readonly validationErrors: string[];

  constructor(message: string, validationErrors: string[] = []) {
    super(message, 500, 'CONFIGURATION_ERROR', false);
    this.name = 'ConfigurationError';
    this.validationErrors = validationErrors;
  }
}

export class DatabaseError extends GatehouseError {
  constructor(message: string) {
    super(message, 500, 'DATABASE_ERROR', true);
    this.name = 'DatabaseError';
  }
}

/**
 * The allow-list directory could not answer. Never conflated with a
 * negative lookup.
 */
export class DirectoryUnavailableError extends GatehouseError {
  constructor(message: string) {
    super(message, 503, 'DIRECTORY_UNAVAILABLE', true);
    this.name = 'DirectoryUnavailableError';
  }
}

export class TimeoutError extends GatehouseError {
  public readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message, 504, 'TIMEOUT', true);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class RequestAbortedError extends GatehouseError {
  constructor(message = 'Client closed the connection') {
    super(message, 499, 'REQUEST_ABORTED', true);
    this.name = 'RequestAbortedError';
  }
}

export class ProxyError extends GatehouseError {
  constructor(message: string, statusCode = 502) {
    super(message, statusCode, 'PROXY_ERROR', true);
    this.name = 'ProxyError';
  }
}

// =============================================================================
// Utility Types
// =============================================================================

export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [P in keyof T]: DeepReadonly<T[P]> }
    : T;

export type HeaderValue = string | string[] | undefined;
export type HeaderMap = Record<string, HeaderValue>;
