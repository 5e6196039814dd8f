/**
 * Gatehouse - Configuration Module
 *
 * Barrel export file for configuration management
 */

// Export schema types and validators
export {
  HostPatternSchema,
  ServerConfigSchema,
  UpstreamConfigSchema,
  HostsConfigSchema,
  GatesConfigSchema,
  RateLimitConfigSchema,
  PostgresConfigSchema,
  RedisConfigSchema,
  LoggingConfigSchema,
  MetricsConfigSchema,
  ConfigFileSchema,
  DEFAULT_PUBLIC_ROUTES,
  DEFAULT_SENSITIVE_HEADERS,
  safeValidateConfigFile,
  formatValidationErrors,
} from './schema.js';

export type {
  ServerConfigInput,
  ServerConfigOutput,
  RateLimitConfigInput,
  RateLimitConfigOutput,
  GatesConfigInput,
  GatesConfigOutput,
  ConfigFileInput,
  ConfigFileOutput,
} from './schema.js';

// Export loader functionality
export { ConfigLoader, DEFAULT_CONFIG_PATH, loadConfig, getConfig, getConfigLoader } from './loader.js';

export type { FrozenConfig } from './loader.js';
