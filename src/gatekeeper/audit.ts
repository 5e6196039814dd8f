/**
 * Gatehouse - Audit Logger
 * Structured records for rejections plus optional incoming/outgoing traces.
 * Sensitive header values are redacted before anything is written, and a
 * failing sink never propagates into the request path.
 */

import { logAudit, logTrace, type AuditLogData, type AuditSeverity, type TraceLogData } from '../utils/logger.js';

export const REDACTED = '[REDACTED]';

export type LooseHeaders = Readonly<Record<string, string | number | readonly string[] | undefined>>;

/**
 * Copy of `headers` with every sensitive value replaced. Names compare
 * case-insensitively; the input is left untouched.
 */
export function redactHeaders(headers: LooseHeaders, sensitive: ReadonlySet<string>): Record<string, string> {
  const redacted: Record<string, string> = {};

  for (const [name, raw] of Object.entries(headers)) {
    if (raw === undefined) {
      continue;
    }
    if (sensitive.has(name.toLowerCase())) {
      redacted[name] = REDACTED;
      continue;
    }
    redacted[name] = typeof raw === 'string' ? raw : typeof raw === 'number' ? raw.toString() : raw.join(',');
  }

  return redacted;
}

// =============================================================================
// Audit Logger
// =============================================================================

export interface AuditSink {
  audit: (data: AuditLogData) => void;
  trace: (data: TraceLogData) => void;
}

export interface AuditLoggerOptions {
  sensitiveHeaders: readonly string[];
  traceEnabled: boolean;
  sink?: AuditSink;
}

export interface RejectionRecordInput {
  severity: AuditSeverity;
  event: string;
  gate: string;
  reason: string;
  requestId: string;
  clientIp: string;
  route: string;
  method: string;
  headers: LooseHeaders;
  body?: string;
}

export interface TraceRecordInput {
  requestId: string;
  method: string;
  path: string;
  headers: LooseHeaders;
  clientIp?: string;
  statusCode?: number;
  durationMs?: number;
}

export class AuditLogger {
  private sensitive: ReadonlySet<string>;
  private traceEnabled: boolean;
  private sink: AuditSink;
  private dropped = 0;

  constructor(options: AuditLoggerOptions) {
    this.sensitive = new Set(options.sensitiveHeaders.map((h) => h.toLowerCase()));
    this.traceEnabled = options.traceEnabled;
    this.sink = options.sink ?? { audit: logAudit, trace: logTrace };
  }

  public redact(headers: LooseHeaders): Record<string, string> {
    return redactHeaders(headers, this.sensitive);
  }

  public isTraceEnabled(): boolean {
    return this.traceEnabled;
  }

  /**
   * Records that could not be written
   */
  public getDroppedCount(): number {
    return this.dropped;
  }

  public rejection(input: RejectionRecordInput): AuditLogData | undefined {
    return this.write(() => {
      const record: AuditLogData = {
        severity: input.severity,
        event: input.event,
        gate: input.gate,
        reason: input.reason,
        requestId: input.requestId,
        clientIp: input.clientIp,
        route: input.route,
        method: input.method,
        headers: this.redact(input.headers),
        timestamp: new Date().toISOString(),
      };
      if (input.body !== undefined) {
        record.body = input.body;
      }
      this.sink.audit(record);
      return record;
    });
  }

  public traceIncoming(input: TraceRecordInput): void {
    this.trace('incoming', input);
  }

  public traceOutgoing(input: TraceRecordInput): void {
    this.trace('outgoing', input);
  }

  private trace(direction: TraceLogData['direction'], input: TraceRecordInput): void {
    if (!this.traceEnabled) {
      return;
    }
    this.write(() => {
      const record: TraceLogData = {
        direction,
        requestId: input.requestId,
        method: input.method,
        path: input.path,
        headers: this.redact(input.headers),
      };
      if (input.clientIp !== undefined) record.clientIp = input.clientIp;
      if (input.statusCode !== undefined) record.statusCode = input.statusCode;
      if (input.durationMs !== undefined) record.durationMs = input.durationMs;
      this.sink.trace(record);
      return record;
    });
  }

  private write<T>(emit: () => T): T | undefined {
    try {
      return emit();
    } catch (error) {
      this.dropped += 1;
      try {
        process.stderr.write(
          `audit record dropped: ${error instanceof Error ? error.message : String(error)}\n`
        );
      } catch {
        // stderr unavailable
      }
      return undefined;
    }
  }
}

export function createAuditLogger(options: AuditLoggerOptions): AuditLogger {
  return new AuditLogger(options);
}
