import winston from 'winston';
import type { DeepReadonly, LoggingConfig } from './types.js';

const { combine, timestamp, printf, colorize, json, errors } = winston.format;

// Custom log format for development (human-readable)
const devFormat = printf(({ level, message, timestamp, ...metadata }) => {
  let msg = `${String(timestamp)} [${level}]: ${String(message)}`;

  if (Object.keys(metadata).length > 0) {
    // Filter out Symbol properties that Winston adds
    const cleanMetadata: Record<string, unknown> = {};
    for (const key of Object.keys(metadata)) {
      if (!key.startsWith('Symbol')) {
        cleanMetadata[key] = metadata[key];
      }
    }
    if (Object.keys(cleanMetadata).length > 0) {
      msg += ` ${JSON.stringify(cleanMetadata)}`;
    }
  }

  return msg;
});

// Determine log level from environment
const getLogLevel = (): string => {
  const envLevel = process.env['LOG_LEVEL'];
  if (envLevel) {
    return envLevel.toLowerCase();
  }
  return process.env['NODE_ENV'] === 'production' ? 'info' : 'debug';
};

// Determine log format from environment
const getLogFormat = (): winston.Logform.Format => {
  const format = process.env['LOG_FORMAT'];
  const isDev = process.env['NODE_ENV'] !== 'production';

  if (format === 'json' || !isDev) {
    return combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }), errors({ stack: true }), json());
  }

  return combine(
    colorize({ all: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    errors({ stack: true }),
    devFormat
  );
};

// File transports: everything, plus audit-level records in their own file
const createFileTransports = (logFilePath: string): winston.transport[] => [
  new winston.transports.File({
    filename: logFilePath,
    maxsize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
    tailable: true,
  }),
  new winston.transports.File({
    filename: logFilePath.replace('.log', '.audit.log'),
    level: 'warn',
    maxsize: 10 * 1024 * 1024,
    maxFiles: 5,
    tailable: true,
  }),
];

// Create transports array
const getTransports = (): winston.transport[] => {
  const transports: winston.transport[] = [new winston.transports.Console()];

  if (process.env['LOG_FILE_ENABLED'] === 'true') {
    transports.push(...createFileTransports(process.env['LOG_FILE_PATH'] ?? './logs/gatehouse.log'));
  }

  return transports;
};

// Create the main logger instance
const logger = winston.createLogger({
  level: getLogLevel(),
  format: getLogFormat(),
  transports: getTransports(),
  silent: process.env['NODE_ENV'] === 'test' && process.env['LOG_LEVEL'] === undefined,
  exitOnError: false,
});

let fileTransportsAttached = process.env['LOG_FILE_ENABLED'] === 'true';

/**
 * Apply the validated logging section once configuration has loaded.
 * Environment-derived defaults above cover the window before that.
 */
export const configureLogger = (config: DeepReadonly<LoggingConfig>): void => {
  logger.level = config.level;

  if (config.format === 'json') {
    logger.format = combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }), errors({ stack: true }), json());
  }

  if (config.fileEnabled && !fileTransportsAttached) {
    for (const transport of createFileTransports(config.filePath)) {
      logger.add(transport);
    }
    fileTransportsAttached = true;
  }
};

// Request logger for HTTP requests
export interface RequestLogData {
  requestId: string;
  method: string;
  path: string;
  statusCode?: number;
  responseTimeMs?: number;
  ipAddress?: string;
  userAgent?: string;
  admission?: string;
  error?: string;
}

export const logRequest = (data: RequestLogData): void => {
  const level = data.statusCode
    ? data.statusCode >= 500
      ? 'error'
      : data.statusCode >= 400
        ? 'warn'
        : 'info'
    : 'info';

  logger.log(level, `${data.method} ${data.path}`, {
    type: 'request',
    ...data,
  });
};

// Trace logger (incoming/outgoing records)
export interface TraceLogData {
  direction: 'incoming' | 'outgoing';
  requestId: string;
  method: string;
  path: string;
  clientIp?: string;
  statusCode?: number;
  durationMs?: number;
  headers: Record<string, string>;
}

export const logTrace = (data: TraceLogData): void => {
  logger.info(`${data.direction === 'incoming' ? '-->' : '<--'} ${data.method} ${data.path}`, {
    type: 'trace',
    ...data,
  });
};

// Upstream forwarding logger
export interface ProxyLogData {
  requestId: string;
  event: 'proxy_complete' | 'proxy_error' | 'proxy_timeout';
  target: string;
  path: string;
  statusCode?: number;
  error?: string;
}

export const logProxy = (data: ProxyLogData): void => {
  const level = data.event === 'proxy_complete' ? 'debug' : 'warn';

  logger.log(level, `Proxy ${data.event}: ${data.target}${data.path}`, {
    type: 'proxy',
    ...data,
  });
};

// Rate limit logger
export interface RateLimitLogData {
  requestId: string;
  identifier: string;
  endpoint: string;
  routeClass: string;
  currentCount: number;
  limit: number;
  windowSeconds: number;
  blocked: boolean;
}

export const logRateLimit = (data: RateLimitLogData): void => {
  const level = data.blocked ? 'warn' : 'debug';

  logger.log(level, data.blocked ? 'Rate limit exceeded' : 'Rate limit check passed', {
    type: 'rate_limit',
    ...data,
  });
};

// Audit logger (rejections)
export type AuditSeverity = 'CRITICAL' | 'ERROR' | 'WARNING';

export interface AuditLogData {
  severity: AuditSeverity;
  event: string;
  gate: string;
  reason: string;
  requestId: string;
  clientIp: string;
  route: string;
  method: string;
  headers: Record<string, string>;
  body?: string;
  timestamp: string;
}

export const logAudit = (data: AuditLogData): void => {
  const level = data.severity === 'WARNING' ? 'warn' : 'error';

  logger.log(level, `Request rejected: ${data.event}`, {
    type: 'audit',
    ...data,
  });
};

// Config logger
export const logConfig = (message: string, data?: Record<string, unknown>): void => {
  logger.info(message, {
    type: 'config',
    ...data,
  });
};

// Startup/shutdown logger
export const logLifecycle = (
  event: 'startup' | 'shutdown' | 'ready' | 'error',
  message: string,
  data?: Record<string, unknown>
): void => {
  const level = event === 'error' ? 'error' : 'info';

  logger.log(level, `[${event.toUpperCase()}] ${message}`, {
    type: 'lifecycle',
    event,
    ...data,
  });
};

// Create a child logger with additional context
export const createChildLogger = (context: Record<string, unknown>): winston.Logger => {
  return logger.child(context);
};

// Export the base logger for direct use
export default logger;
