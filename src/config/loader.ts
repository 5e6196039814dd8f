/**
 * Gatehouse - Configuration Loader
 * Loads configuration once at startup: file, then environment overrides,
 * then validation. The result is frozen.
 */

import fs from 'fs';
import path from 'path';

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { logConfig } from '../utils/logger.js';
import { getEnvBool, getEnvInt, getEnvList, getEnvString } from '../utils/helpers.js';
import { ConfigurationError, type DeepReadonly, type GatehouseConfig } from '../utils/types.js';
import { formatValidationErrors, safeValidateConfigFile, type ConfigFileOutput } from './schema.js';

export const DEFAULT_CONFIG_PATH = './config/gatehouse.config.yaml';

const NodeEnvSchema = z.enum(['development', 'production', 'test']).default('development');

export type FrozenConfig = DeepReadonly<GatehouseConfig>;

// =============================================================================
// Merge Helpers
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(section: unknown, key: string): unknown {
  return isRecord(section) ? section[key] : undefined;
}

/**
 * Overlay defined override values onto a raw section from the file.
 * A non-object section is returned untouched so validation reports it.
 */
function overlay(section: unknown, overrides: Record<string, unknown>): unknown {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );

  if (Object.keys(defined).length === 0) {
    return section;
  }
  if (section === undefined) {
    return defined;
  }
  if (isRecord(section)) {
    return { ...section, ...defined };
  }
  return section;
}

function deepFreeze<T>(value: T): DeepReadonly<T>;
function deepFreeze(value: unknown): unknown {
  if (typeof value === 'object' && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

// =============================================================================
// Configuration Loader Class
// =============================================================================

export class ConfigLoader {
  private configPath: string;
  private currentConfig: FrozenConfig | null = null;

  constructor(configPath?: string) {
    this.configPath = configPath ?? getEnvString('CONFIG_FILE_PATH') ?? DEFAULT_CONFIG_PATH;
  }

  /**
   * Load configuration from file and environment variables.
   * Throws ConfigurationError on any unreadable or invalid input.
   */
  public async load(): Promise<FrozenConfig> {
    const fileConfig = this.readFile();
    const merged = this.applyEnvironment(fileConfig);

    const result = safeValidateConfigFile(merged);
    if (!result.success) {
      const messages = formatValidationErrors(result.error);
      throw new ConfigurationError(`Invalid configuration: ${messages.join('; ')}`, messages);
    }

    const nodeEnv = NodeEnvSchema.safeParse(getEnvString('NODE_ENV'));
    if (!nodeEnv.success) {
      throw new ConfigurationError('NODE_ENV must be one of development, production, test');
    }

    const config = deepFreeze(this.buildConfig(result.data, nodeEnv.data));

    logConfig('Configuration loaded', {
      path: this.configPath,
      allowedHosts: config.hosts.allowed,
      publicRoutes: config.gates.publicRoutes,
      ipAuth: config.gates.ipAuth.enabled,
      tokenAuth: config.gates.tokenAuth.enabled,
      rateLimit: config.rateLimit.enabled,
      requestLogging: config.logging.requestLogging,
      upstream: config.upstream?.url ?? null,
    });

    this.currentConfig = config;
    return config;
  }

  /**
   * Read and parse the config file. A missing file means defaults.
   */
  private readFile(): unknown {
    if (!fs.existsSync(this.configPath)) {
      logConfig('No config file found, using defaults and environment variables', {
        path: this.configPath,
      });
      return {};
    }

    const extension = path.extname(this.configPath).toLowerCase();
    let parsed: unknown;

    try {
      const fileContent = fs.readFileSync(this.configPath, 'utf-8');

      if (extension === '.yaml' || extension === '.yml') {
        parsed = parseYaml(fileContent);
      } else if (extension === '.json') {
        parsed = JSON.parse(fileContent);
      } else {
        throw new Error(`Unsupported config file format: ${extension}`);
      }
    } catch (error) {
      throw new ConfigurationError(
        `Failed to read config file ${this.configPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    // An empty YAML document parses to null
    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigurationError(`Config file ${this.configPath} must contain a mapping at the top level`);
    }

    logConfig('Configuration file loaded', { path: this.configPath });
    return parsed;
  }

  /**
   * Overlay environment variables onto the raw file content
   */
  private applyEnvironment(file: unknown): unknown {
    const overrides: Record<string, unknown> = {
      server: overlay(field(file, 'server'), {
        port: getEnvInt('PORT'),
        host: getEnvString('HOST'),
        baseUrl: getEnvString('BASE_URL'),
      }),

      upstream: overlay(field(file, 'upstream'), {
        url: getEnvString('UPSTREAM_URL'),
        timeoutMs: getEnvInt('UPSTREAM_TIMEOUT_MS'),
      }),

      cors: overlay(field(file, 'cors'), {
        allowedOrigins: getEnvList('CORS_ALLOWED_ORIGINS'),
        allowCredentials: getEnvBool('CORS_ALLOW_CREDENTIALS'),
      }),

      hosts: overlay(field(file, 'hosts'), {
        allowed: getEnvList('ALLOWED_HOSTS'),
      }),

      gates: overlay(field(file, 'gates'), {
        publicRoutes: getEnvList('PUBLIC_ROUTES'),
        trustedProxies: getEnvList('TRUSTED_PROXIES'),
        ipAuth: overlay(field(field(file, 'gates'), 'ipAuth'), {
          enabled: getEnvBool('IP_ADDRESS_AUTH_ENABLED'),
        }),
        tokenAuth: overlay(field(field(file, 'gates'), 'tokenAuth'), {
          enabled: getEnvBool('API_TOKEN_AUTH_ENABLED'),
        }),
      }),

      rateLimit: overlay(field(file, 'rateLimit'), {
        enabled: getEnvBool('RATE_LIMIT_ENABLED'),
        failureMode: getEnvString('RATE_LIMIT_FAILURE_MODE'),
        default: overlay(field(field(file, 'rateLimit'), 'default'), {
          limit: getEnvInt('RATE_LIMIT_DEFAULT_LIMIT'),
          windowSeconds: getEnvInt('RATE_LIMIT_WINDOW_SECONDS'),
        }),
      }),

      directory: overlay(field(file, 'directory'), {
        timeoutMs: getEnvInt('DIRECTORY_TIMEOUT_MS'),
      }),

      postgres: overlay(field(file, 'postgres'), {
        host: getEnvString('POSTGRES_HOST'),
        port: getEnvInt('POSTGRES_PORT'),
        database: getEnvString('POSTGRES_DB'),
        user: getEnvString('POSTGRES_USER'),
        password: getEnvString('POSTGRES_PASSWORD'),
        ssl: getEnvBool('POSTGRES_SSL'),
        poolMin: getEnvInt('POSTGRES_POOL_MIN'),
        poolMax: getEnvInt('POSTGRES_POOL_MAX'),
        connectTimeoutMs: getEnvInt('POSTGRES_CONNECT_TIMEOUT_MS'),
        idleTimeoutMs: getEnvInt('POSTGRES_IDLE_TIMEOUT_MS'),
        queryTimeoutMs: getEnvInt('POSTGRES_QUERY_TIMEOUT_MS'),
      }),

      redis: overlay(field(file, 'redis'), {
        host: getEnvString('REDIS_HOST'),
        port: getEnvInt('REDIS_PORT'),
        password: getEnvString('REDIS_PASSWORD'),
        db: getEnvInt('REDIS_DB'),
        tls: getEnvBool('REDIS_TLS'),
        keyPrefix: getEnvString('REDIS_KEY_PREFIX'),
        connectTimeoutMs: getEnvInt('REDIS_CONNECT_TIMEOUT_MS'),
        commandTimeoutMs: getEnvInt('REDIS_COMMAND_TIMEOUT_MS'),
      }),

      logging: overlay(field(file, 'logging'), {
        level: getEnvString('LOG_LEVEL')?.toLowerCase(),
        format: getEnvString('LOG_FORMAT'),
        fileEnabled: getEnvBool('LOG_FILE_ENABLED'),
        filePath: getEnvString('LOG_FILE_PATH'),
        requestLogging: getEnvBool('REQUEST_LOGGING'),
      }),

      metrics: overlay(field(file, 'metrics'), {
        enabled: getEnvBool('METRICS_ENABLED'),
      }),
    };

    return overlay(file, overrides);
  }

  /**
   * Map the validated document onto the runtime configuration shape
   */
  private buildConfig(file: ConfigFileOutput, nodeEnv: GatehouseConfig['server']['nodeEnv']): GatehouseConfig {
    return {
      server: { ...file.server, nodeEnv },
      upstream: file.upstream,
      cors: file.cors,
      hosts: file.hosts,
      gates: file.gates,
      rateLimit: file.rateLimit,
      directory: file.directory,
      postgres: file.postgres,
      redis: file.redis,
      logging: file.logging,
      metrics: file.metrics,
      configFilePath: this.configPath,
    };
  }

  /**
   * Get current configuration
   */
  public getConfig(): FrozenConfig {
    if (this.currentConfig === null) {
      throw new ConfigurationError('Configuration not loaded. Call load() first.');
    }
    return this.currentConfig;
  }
}

// =============================================================================
// Singleton Instance
// =============================================================================

let configLoaderInstance: ConfigLoader | null = null;

export function getConfigLoader(configPath?: string): ConfigLoader {
  if (configLoaderInstance === null) {
    configLoaderInstance = new ConfigLoader(configPath);
  }
  return configLoaderInstance;
}

export async function loadConfig(configPath?: string): Promise<FrozenConfig> {
  const loader = getConfigLoader(configPath);
  return loader.load();
}

export function getConfig(): FrozenConfig {
  const loader = getConfigLoader();
  return loader.getConfig();
}

export default ConfigLoader;
