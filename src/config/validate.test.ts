import { describe, it, expect } from 'vitest';
import { validateConfig, MAX_RECOMMENDED_WORKERS } from './validate.js';
import type { CanneryConfig } from './config.js';

function validConfig(overrides?: Partial<CanneryConfig>): CanneryConfig {
  return {
    host: '127.0.0.1',
    port: 7878,
    workers: 4,
    contentDir: '/srv',
    fallbackFile: 'unknown.html',
    routes: [{ path: '/', file: 'main.html' }],
    notFoundStatus: false,
    ...overrides,
  };
}

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(validateConfig(validConfig())).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('accepts port 0 for an ephemeral port', () => {
    expect(validateConfig(validConfig({ port: 0 })).valid).toBe(true);
  });

  it.each([-1, 65536, 80.5])('rejects port %s', (port) => {
    expect(validateConfig(validConfig({ port })).errors).toEqual(['port must be an integer 0-65535']);
  });

  it.each([0, -2, 1.5])('rejects workers=%s', (workers) => {
    const result = validateConfig(validConfig({ workers }));
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([`workers must be an integer >= 1, got ${workers}`]);
  });

  it('warns about an unusually large pool', () => {
    const result = validateConfig(validConfig({ workers: MAX_RECOMMENDED_WORKERS + 1 }));
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(['workers=257 is unusually high; each worker holds one connection at a time']);
  });

  it('rejects non-positive timeouts', () => {
    const result = validateConfig(validConfig({ readTimeoutMs: 0, writeTimeoutMs: -5 }));
    expect(result.errors).toEqual([
      'readTimeoutMs must be a positive integer',
      'writeTimeoutMs must be a positive integer',
    ]);
  });

  it('accepts positive timeouts', () => {
    expect(validateConfig(validConfig({ readTimeoutMs: 5000, writeTimeoutMs: 5000 })).valid).toBe(true);
  });

  it('warns when no routes are configured', () => {
    const result = validateConfig(validConfig({ routes: [] }));
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(['no routes configured, every request gets the fallback response']);
  });

  it('rejects paths that cannot match a request line', () => {
    const result = validateConfig(validConfig({
      routes: [
        { path: 'about', file: 'about.html' },
        { path: '/two words', file: 'x.html' },
      ],
    }));
    expect(result.errors).toEqual([
      'route "about": path must start with /',
      'route "/two words": path cannot contain whitespace',
    ]);
  });

  it('warns about duplicate paths', () => {
    const result = validateConfig(validConfig({
      routes: [
        { path: '/', file: 'main.html' },
        { path: '/', file: 'other.html' },
      ],
    }));
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(['route "/" is listed more than once, the last entry wins']);
  });
});
