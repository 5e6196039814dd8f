/**
 * Gatehouse - Test Doubles
 * In-process stand-ins for the counter store, the directory and the config
 */

import type { DirectoryService, DirectoryVerdict } from '../../src/directory/types.js';
import type { GateContext } from '../../src/gatekeeper/types.js';
import { ConfigFileSchema, type ConfigFileInput } from '../../src/config/schema.js';
import type { RedisClientWrapper } from '../../src/storage/redis.js';
import { RequestAbortedError, type GatehouseConfig } from '../../src/utils/types.js';

// =============================================================================
// Fake Redis
// =============================================================================

interface CounterEntry {
  count: number;
  expiresAtMs: number | null;
}

/**
 * Executes the fixed window script's semantics against an in-memory map.
 * The clock only moves when a test calls `advance`.
 */
export class FakeRedis implements RedisClientWrapper {
  public isConnected = true;
  public nowMs = 1_700_000_000_000;
  public failWith: Error | null = null;
  public evalCalls: Array<{ keys: string[]; args: string[] }> = [];
  private counters = new Map<string, CounterEntry>();

  public async connect(): Promise<void> {
    this.isConnected = true;
  }

  public async disconnect(): Promise<void> {
    this.isConnected = false;
  }

  public async ping(): Promise<boolean> {
    return this.isConnected;
  }

  public async eval(_script: string, keys: string[], args: string[]): Promise<unknown> {
    this.evalCalls.push({ keys, args });
    if (this.failWith) {
      throw this.failWith;
    }

    const key = keys[0] ?? '';
    const windowSeconds = parseInt(args[0] ?? '0', 10);
    const limit = parseInt(args[1] ?? '0', 10);

    const entry = this.live(key) ?? { count: 0, expiresAtMs: null };
    this.counters.set(key, entry);

    entry.count += 1;
    if (entry.count === 1) {
      entry.expiresAtMs = this.nowMs + windowSeconds * 1000;
    }

    let ttl = this.ttl(key);
    if (ttl < 0) {
      entry.expiresAtMs = this.nowMs + windowSeconds * 1000;
      ttl = windowSeconds;
    }

    return [entry.count > limit ? 0 : 1, entry.count, ttl];
  }

  /** Seconds left on a key, -1 without expiry, -2 when absent */
  public ttl(key: string): number {
    const entry = this.live(key);
    if (!entry) {
      return -2;
    }
    if (entry.expiresAtMs === null) {
      return -1;
    }
    return Math.ceil((entry.expiresAtMs - this.nowMs) / 1000);
  }

  /** Store a counter with no expiry, as a crash between INCR and EXPIRE would */
  public seedWithoutExpiry(key: string, count: number): void {
    this.counters.set(key, { count, expiresAtMs: null });
  }

  public advance(ms: number): void {
    this.nowMs += ms;
  }

  public now = (): number => this.nowMs;

  private live(key: string): CounterEntry | undefined {
    const entry = this.counters.get(key);
    if (entry && entry.expiresAtMs !== null && entry.expiresAtMs <= this.nowMs) {
      this.counters.delete(key);
      return undefined;
    }
    return entry;
  }
}

// =============================================================================
// Fake Directory
// =============================================================================

export class FakeDirectory implements DirectoryService {
  public ips = new Map<string, DirectoryVerdict>();
  public tokens = new Map<string, DirectoryVerdict>();
  public failWith: Error | null = null;
  public calls: Array<{ kind: 'ip' | 'token'; value: string }> = [];
  /** When set, lookups wait for the signal instead of answering */
  public hang = false;

  public lookupIp(ip: string, signal?: AbortSignal): Promise<DirectoryVerdict> {
    this.calls.push({ kind: 'ip', value: ip });
    return this.answer(this.ips.get(ip), signal);
  }

  public lookupToken(token: string, signal?: AbortSignal): Promise<DirectoryVerdict> {
    this.calls.push({ kind: 'token', value: token });
    return this.answer(this.tokens.get(token), signal);
  }

  private answer(verdict: DirectoryVerdict | undefined, signal?: AbortSignal): Promise<DirectoryVerdict> {
    if (this.failWith) {
      return Promise.reject(this.failWith);
    }
    if (this.hang) {
      return new Promise((_resolve, reject) => {
        signal?.addEventListener('abort', () => reject(new RequestAbortedError('lookup abandoned')), {
          once: true,
        });
      });
    }
    return Promise.resolve(verdict ?? 'not-found');
  }
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * Validated configuration built from schema defaults plus overrides, with
 * no file or environment involved. The server always binds an ephemeral
 * loopback port, which is set after validation since files may not ask
 * for port 0.
 */
export function buildTestConfig(overrides: ConfigFileInput = {}): GatehouseConfig {
  const parsed = ConfigFileSchema.parse(overrides);

  return {
    ...parsed,
    server: { ...parsed.server, port: 0, host: '127.0.0.1', nodeEnv: 'test' },
    configFilePath: 'test',
  };
}

// =============================================================================
// Gate Context
// =============================================================================

export function buildGateContext(overrides: Partial<GateContext> = {}): GateContext {
  return {
    requestId: 'req-1',
    method: 'GET',
    path: '/api/items',
    route: '/api/items',
    host: 'localhost',
    clientIp: '10.0.0.1',
    headers: {},
    signal: new AbortController().signal,
    readBody: () => Promise.resolve(undefined),
    ...overrides,
  };
}
