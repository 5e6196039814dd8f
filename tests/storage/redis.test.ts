/**
 * Gatehouse - Redis Client Tests
 */

import { describe, it, expect, afterEach } from '@jest/globals';

import { closeRedis, initializeRedis } from '../../src/storage/redis.js';
import { buildTestConfig } from '../helpers/fakes.js';

describe('initializeRedis', () => {
  afterEach(async () => {
    await closeRedis();
  });

  it('should return a disconnected client when nothing listens on the port', async () => {
    const { redis } = buildTestConfig({
      redis: { host: '127.0.0.1', port: 1, connectTimeoutMs: 200 },
    });
    const started = Date.now();

    const client = await initializeRedis({ config: redis, maxReconnectDelayMs: 50 });

    expect(client.isConnected).toBe(false);
    expect(Date.now() - started).toBeLessThan(2000);
  });
});
