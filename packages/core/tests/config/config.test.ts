import { describe, it, expect } from 'vitest';
import { loadConfig, withOverrides, withScheme } from '../../src/config/config.js';
import { ConfigError } from '../../src/errors/index.js';

describe('withScheme', () => {
  it('prefixes http:// when no scheme is present', () => {
    expect(withScheme('localhost:8001')).toBe('http://localhost:8001');
  });

  it('leaves a url with a scheme alone', () => {
    expect(withScheme('https://auth.test')).toBe('https://auth.test');
  });
});

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ DATABASE_PATH: '/tmp/tasks.db' });

    expect(config).toEqual({
      databasePath: '/tmp/tasks.db',
      host: '0.0.0.0',
      port: 8000,
      authServiceUrl: 'http://localhost:8001',
      authTimeoutMs: 5000,
      instructionBackend: null,
      logLevel: 'info',
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('reads every variable', () => {
    const config = loadConfig({
      DATABASE_PATH: '/data/t.db',
      SERVICE_HOST: '127.0.0.1',
      SERVICE_PORT: '9000',
      AUTH_SERVICE_URL: 'auth.internal:8001',
      AUTH_TIMEOUT_MS: '250',
      INSTRUCTION_API_URL: 'https://instructions.test/v1/generate',
      INSTRUCTION_API_TOKEN: 'test-token',
      INSTRUCTION_TIMEOUT_MS: '3000',
      LOG_LEVEL: 'debug',
    });

    expect(config).toEqual({
      databasePath: '/data/t.db',
      host: '127.0.0.1',
      port: 9000,
      authServiceUrl: 'http://auth.internal:8001',
      authTimeoutMs: 250,
      instructionBackend: {
        url: 'https://instructions.test/v1/generate',
        token: 'test-token',
        timeoutMs: 3000,
      },
      logLevel: 'debug',
    });
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ DATABASE_PATH: '/tmp/t.db', SERVICE_HOST: '  ', INSTRUCTION_API_URL: '' });

    expect(config.host).toBe('0.0.0.0');
    expect(config.instructionBackend).toBeNull();
  });

  it('uses a null token when only the url is set', () => {
    const config = loadConfig({ DATABASE_PATH: '/tmp/t.db', INSTRUCTION_API_URL: 'http://instructions.test' });

    expect(config.instructionBackend?.token).toBeNull();
  });

  it('carries the instruction timeout on the backend settings only', () => {
    const config = loadConfig({ DATABASE_PATH: '/tmp/t.db', INSTRUCTION_API_URL: 'http://instructions.test' });

    expect(config.instructionBackend?.timeoutMs).toBe(10000);
    expect(Object.keys(config)).toEqual([
      'databasePath',
      'host',
      'port',
      'authServiceUrl',
      'authTimeoutMs',
      'instructionBackend',
      'logLevel',
    ]);
  });

  it('throws a ConfigError naming every invalid variable', () => {
    let caught: unknown;
    try {
      loadConfig({ SERVICE_PORT: 'http', LOG_LEVEL: 'loud' });
    } catch (err: unknown) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues : [];
    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^SERVICE_PORT: /);
    expect(issues[1]).toMatch(/^LOG_LEVEL: /);
  });

  it('rejects a port out of range', () => {
    expect(() => loadConfig({ SERVICE_PORT: '70000' })).toThrow(ConfigError);
  });
});

describe('withOverrides', () => {
  it('replaces only the given fields', () => {
    const base = loadConfig({ DATABASE_PATH: '/tmp/t.db' });

    const config = withOverrides(base, { port: 0, databasePath: ':memory:' });

    expect(config).toEqual({ ...base, port: 0, databasePath: ':memory:' });
    expect(base.port).toBe(8000);
  });
});
