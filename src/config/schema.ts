/**
 * Gatehouse - Configuration Schema
 * Zod-based validation schemas for gateway configuration
 */

import { z } from 'zod';

// =============================================================================
// Shared Field Schemas
// =============================================================================

/**
 * Hostname label rules, optionally with a leading dot (wildcard form), or a
 * bracketed IPv6 literal. Ports, schemes, paths and `*` are rejected.
 */
const HOST_PATTERN_REGEX =
  /^(\.?[a-z0-9_]([a-z0-9_-]*[a-z0-9_])?(\.[a-z0-9_]([a-z0-9_-]*[a-z0-9_])?)*|\[[0-9a-f:.]+\])$/;

export const HostPatternSchema = z
  .string()
  .trim()
  .toLowerCase()
  .min(1, 'Host pattern must not be empty')
  .regex(HOST_PATTERN_REGEX, 'Invalid host pattern (expected host, domain or .domain)');

export const RoutePathSchema = z
  .string()
  .trim()
  .startsWith('/', 'Route paths must start with "/"');

export const DEFAULT_PUBLIC_ROUTES = [
  '/',
  '/healthcheck',
  '/metrics',
  '/local/swagger-ui',
  '/api-doc/openapi.json',
];

export const DEFAULT_SENSITIVE_HEADERS = [
  'authorization',
  'cookie',
  'set-cookie',
  'x-api-key',
  'x-auth-token',
  'x-access-token',
  'x-refresh-token',
  'proxy-authorization',
];

// =============================================================================
// Server Configuration Schema
// =============================================================================

export const ServerConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(8080),
  host: z.string().default('0.0.0.0'),
  baseUrl: z
    .string()
    .trim()
    .regex(/^\/[^\s]*[^/\s]$/, 'baseUrl must start with "/" and not end with "/"')
    .optional(),
});

export const UpstreamConfigSchema = z.object({
  url: z.string().url(),
  timeoutMs: z.number().int().min(100).default(30000),
});

export const CorsConfigSchema = z.object({
  allowedOrigins: z.array(z.string().min(1)).default([]),
  allowCredentials: z.boolean().default(false),
});

// =============================================================================
// Gatekeeping Configuration Schemas
// =============================================================================

export const HostsConfigSchema = z.object({
  allowed: z
    .array(HostPatternSchema)
    .min(1, 'At least one allowed host pattern is required')
    .default(['localhost', '127.0.0.1']),
});

export const GatesConfigSchema = z.object({
  publicRoutes: z.array(RoutePathSchema).default(DEFAULT_PUBLIC_ROUTES),
  trustedProxies: z.array(z.string().trim().min(1)).default([]),
  ipAuth: z.object({ enabled: z.boolean().default(true) }).default({}),
  tokenAuth: z.object({ enabled: z.boolean().default(true) }).default({}),
});

export const RouteClassSchema = z.object({
  name: z.string().min(1),
  paths: z.array(RoutePathSchema).min(1),
  limit: z.number().int().min(1),
  windowSeconds: z.number().int().min(1),
});

export const RateLimitConfigSchema = z.object({
  enabled: z.boolean().default(true),
  failureMode: z.enum(['open', 'closed']).default('open'),
  keyPrefix: z.string().default('rl:'),
  default: z
    .object({
      limit: z.number().int().min(1).default(60),
      windowSeconds: z.number().int().min(1).default(60),
    })
    .default({}),
  routeClasses: z.array(RouteClassSchema).default([]),
});

export const DirectoryConfigSchema = z.object({
  timeoutMs: z.number().int().min(1).default(2000),
});

// =============================================================================
// PostgreSQL Configuration Schema
// =============================================================================

export const PostgresConfigSchema = z.object({
  host: z.string().default('localhost'),
  port: z.number().int().min(1).max(65535).default(5432),
  database: z.string().default('gatehouse'),
  user: z.string().default('gatehouse_user'),
  password: z.string().default('dev_password'),
  ssl: z.boolean().default(false),
  poolMin: z.number().int().min(0).default(5),
  poolMax: z.number().int().min(1).default(100),
  connectTimeoutMs: z.number().int().min(1).default(8000),
  idleTimeoutMs: z.number().int().min(1).default(8000),
  queryTimeoutMs: z.number().int().min(1).default(2000),
});

// =============================================================================
// Redis Configuration Schema
// =============================================================================

export const RedisConfigSchema = z.object({
  host: z.string().default('localhost'),
  port: z.number().int().min(1).max(65535).default(6379),
  password: z.string().optional(),
  db: z.number().int().min(0).max(15).default(0),
  tls: z.boolean().default(false),
  keyPrefix: z.string().default('gatehouse:'),
  connectTimeoutMs: z.number().int().min(1).default(2000),
  commandTimeoutMs: z.number().int().min(1).default(50),
});

// =============================================================================
// Logging Configuration Schema
// =============================================================================

export const LoggingConfigSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  format: z.enum(['json', 'pretty']).default('json'),
  fileEnabled: z.boolean().default(false),
  filePath: z.string().default('./logs/gatehouse.log'),
  requestLogging: z.boolean().default(true),
  sensitiveHeaders: z.array(z.string().trim().toLowerCase().min(1)).default(DEFAULT_SENSITIVE_HEADERS),
  bodySnapshotLimit: z.number().int().min(0).default(16 * 1024),
});

export const MetricsConfigSchema = z.object({
  enabled: z.boolean().default(true),
});

// =============================================================================
// Main Configuration Schema (YAML/JSON file merged with environment)
// =============================================================================

export const ConfigFileSchema = z.object({
  server: ServerConfigSchema.default({}),
  upstream: UpstreamConfigSchema.optional(),
  cors: CorsConfigSchema.default({}),
  hosts: HostsConfigSchema.default({}),
  gates: GatesConfigSchema.default({}),
  rateLimit: RateLimitConfigSchema.default({}),
  directory: DirectoryConfigSchema.default({}),
  postgres: PostgresConfigSchema.default({}),
  redis: RedisConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  metrics: MetricsConfigSchema.default({}),
});

// =============================================================================
// Exported Types from Schemas
// =============================================================================

export type ServerConfigInput = z.input<typeof ServerConfigSchema>;
export type ServerConfigOutput = z.output<typeof ServerConfigSchema>;

export type RateLimitConfigInput = z.input<typeof RateLimitConfigSchema>;
export type RateLimitConfigOutput = z.output<typeof RateLimitConfigSchema>;

export type GatesConfigInput = z.input<typeof GatesConfigSchema>;
export type GatesConfigOutput = z.output<typeof GatesConfigSchema>;

export type ConfigFileInput = z.input<typeof ConfigFileSchema>;
export type ConfigFileOutput = z.output<typeof ConfigFileSchema>;

// =============================================================================
// Validation Helper Functions
// =============================================================================

/**
 * Safely validate configuration file content (returns result object)
 */
export function safeValidateConfigFile(
  config: unknown
): z.SafeParseReturnType<ConfigFileInput, ConfigFileOutput> {
  return ConfigFileSchema.safeParse(config);
}

/**
 * Format Zod validation errors into readable messages
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.errors.map((err) => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });
}
