import { describe, it, expect, afterEach, vi } from 'vitest';
import { join } from 'path';
import { config, parsePort } from './config.js';

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('parsePort', () => {
  it('defaults to 8000 when unset or empty', () => {
    expect(parsePort(undefined)).toBe(8000);
    expect(parsePort('')).toBe(8000);
  });

  it('accepts a port in range', () => {
    expect(parsePort('3000')).toBe(3000);
    expect(parsePort('65535')).toBe(65535);
  });

  it('rejects non-numeric and out-of-range values', () => {
    expect(parsePort('abc')).toBeNull();
    expect(parsePort('80.5')).toBeNull();
    expect(parsePort('0')).toBeNull();
    expect(parsePort('70000')).toBeNull();
  });
});

describe('config', () => {
  it('reads values from the environment', () => {
    vi.stubEnv('PORT', '9100');
    vi.stubEnv('HOST', '127.0.0.1');
    vi.stubEnv('STATIC_DIR', '/srv/static');
    vi.stubEnv('LOG_REQUESTS', 'false');
    expect(config.PORT).toBe(9100);
    expect(config.HOST).toBe('127.0.0.1');
    expect(config.STATIC_DIR).toBe('/srv/static');
    expect(config.LOG_REQUESTS).toBe(false);
  });

  it('falls back to defaults', () => {
    vi.stubEnv('PORT', '');
    vi.stubEnv('HOST', '');
    vi.stubEnv('STATIC_DIR', '');
    vi.stubEnv('LOG_REQUESTS', '');
    expect(config.PORT).toBe(8000);
    expect(config.HOST).toBe('0.0.0.0');
    expect(config.STATIC_DIR).toBe(join(process.cwd(), 'static'));
    expect(config.LOG_REQUESTS).toBe(true);
  });
});
