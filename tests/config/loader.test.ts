/**
 * Gatehouse - Configuration Loader Tests
 */

import fs from 'fs';
import os from 'os';
import path from 'path';

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';

import { ConfigLoader } from '../../src/config/loader.js';
import { ConfigurationError } from '../../src/utils/types.js';

const ENV_KEYS = [
  'PORT',
  'HOST',
  'BASE_URL',
  'UPSTREAM_URL',
  'UPSTREAM_TIMEOUT_MS',
  'ALLOWED_HOSTS',
  'PUBLIC_ROUTES',
  'TRUSTED_PROXIES',
  'IP_ADDRESS_AUTH_ENABLED',
  'API_TOKEN_AUTH_ENABLED',
  'RATE_LIMIT_ENABLED',
  'RATE_LIMIT_FAILURE_MODE',
  'RATE_LIMIT_DEFAULT_LIMIT',
  'RATE_LIMIT_WINDOW_SECONDS',
  'LOG_LEVEL',
  'REQUEST_LOGGING',
  'METRICS_ENABLED',
];

describe('ConfigLoader', () => {
  const saved = { ...process.env };
  let dir: string;

  const writeConfig = (name: string, content: string): string => {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content, 'utf-8');
    return file;
  };

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      delete process.env[key];
    }
    process.env['NODE_ENV'] = 'test';
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'gatehouse-config-'));
  });

  afterEach(() => {
    process.env = { ...saved };
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should fall back to defaults when the file is missing', async () => {
    const configPath = path.join(dir, 'absent.yaml');
    const config = await new ConfigLoader(configPath).load();

    expect(config.server.port).toBe(8080);
    expect(config.server.nodeEnv).toBe('test');
    expect(config.hosts.allowed).toEqual(['localhost', '127.0.0.1']);
    expect(config.rateLimit.default).toEqual({ limit: 60, windowSeconds: 60 });
    expect(config.rateLimit.failureMode).toBe('open');
    expect(config.upstream).toBeUndefined();
    expect(config.metrics.enabled).toBe(true);
    expect(config.configFilePath).toBe(configPath);
  });

  it('should read and normalize a YAML file', async () => {
    const configPath = writeConfig(
      'gatehouse.yaml',
      [
        'server:',
        '  port: 9000',
        'hosts:',
        '  allowed:',
        '    - " Example.COM "',
        '    - .internal.test',
        'rateLimit:',
        '  routeClasses:',
        '    - name: auth',
        '      paths: ["/api/auth/**"]',
        '      limit: 5',
        '      windowSeconds: 30',
      ].join('\n')
    );

    const config = await new ConfigLoader(configPath).load();

    expect(config.server.port).toBe(9000);
    expect(config.hosts.allowed).toEqual(['example.com', '.internal.test']);
    expect(config.rateLimit.routeClasses).toEqual([
      { name: 'auth', paths: ['/api/auth/**'], limit: 5, windowSeconds: 30 },
    ]);
  });

  it('should read a JSON file', async () => {
    const configPath = writeConfig('gatehouse.json', JSON.stringify({ gates: { publicRoutes: ['/status'] } }));

    const config = await new ConfigLoader(configPath).load();

    expect(config.gates.publicRoutes).toEqual(['/status']);
  });

  it('should let environment variables override the file', async () => {
    const configPath = writeConfig(
      'gatehouse.yaml',
      ['server:', '  port: 9000', 'gates:', '  publicRoutes: ["/status"]'].join('\n')
    );
    process.env['PORT'] = '9090';
    process.env['ALLOWED_HOSTS'] = 'example.com, .example.org';
    process.env['IP_ADDRESS_AUTH_ENABLED'] = 'false';

    const config = await new ConfigLoader(configPath).load();

    expect(config.server.port).toBe(9090);
    expect(config.hosts.allowed).toEqual(['example.com', '.example.org']);
    expect(config.gates.ipAuth.enabled).toBe(false);
    expect(config.gates.tokenAuth.enabled).toBe(true);
    expect(config.gates.publicRoutes).toEqual(['/status']);
  });

  it('should switch metrics off from the environment', async () => {
    const configPath = writeConfig('gatehouse.yaml', 'metrics:\n  enabled: true\n');
    process.env['METRICS_ENABLED'] = 'false';

    const config = await new ConfigLoader(configPath).load();

    expect(config.metrics.enabled).toBe(false);
  });

  it('should reject port 0 in a file', async () => {
    const configPath = writeConfig('gatehouse.yaml', 'server:\n  port: 0\n');

    await expect(new ConfigLoader(configPath).load()).rejects.toThrow('server.port');
  });

  it('should freeze the loaded configuration', async () => {
    const config = await new ConfigLoader(path.join(dir, 'absent.yaml')).load();

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.hosts.allowed)).toBe(true);
    expect(Object.isFrozen(config.rateLimit.default)).toBe(true);
  });

  it('should reject a malformed boolean variable', async () => {
    process.env['RATE_LIMIT_ENABLED'] = 'maybe';

    await expect(new ConfigLoader(path.join(dir, 'absent.yaml')).load()).rejects.toThrow(
      'Environment variable RATE_LIMIT_ENABLED must be true/false or 1/0, got "maybe"'
    );
  });

  it('should reject host patterns carrying a port', async () => {
    const configPath = writeConfig('gatehouse.yaml', 'hosts:\n  allowed: ["example.com:8080"]\n');

    const load = new ConfigLoader(configPath).load();

    await expect(load).rejects.toBeInstanceOf(ConfigurationError);
    await expect(load).rejects.toThrow(
      'Invalid configuration: hosts.allowed.0: Invalid host pattern (expected host, domain or .domain)'
    );
  });

  it('should reject an empty allow-list', async () => {
    const configPath = writeConfig('gatehouse.yaml', 'hosts:\n  allowed: []\n');

    await expect(new ConfigLoader(configPath).load()).rejects.toThrow(
      'At least one allowed host pattern is required'
    );
  });

  it('should reject an unparseable file', async () => {
    const configPath = writeConfig('gatehouse.yaml', 'server: [unclosed\n');

    await expect(new ConfigLoader(configPath).load()).rejects.toThrow(
      `Failed to read config file ${configPath}`
    );
  });

  it('should reject a file whose top level is not a mapping', async () => {
    const configPath = writeConfig('gatehouse.yaml', '- a\n- b\n');

    await expect(new ConfigLoader(configPath).load()).rejects.toThrow(
      `Config file ${configPath} must contain a mapping at the top level`
    );
  });

  it('should refuse to hand out configuration before loading', () => {
    expect(() => new ConfigLoader(path.join(dir, 'absent.yaml')).getConfig()).toThrow(
      'Configuration not loaded. Call load() first.'
    );
  });
});
