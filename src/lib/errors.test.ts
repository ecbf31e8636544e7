import { describe, it, expect } from 'vitest';
import {
  AcceptError,
  BindError,
  CanneryError,
  ConfigError,
  FileReadError,
  PoolConfigurationError,
  TimeoutError,
  WorkerFault,
  formatError,
  isCanneryError,
} from './errors.js';

describe('CanneryError subclasses', () => {
  it('carry their code, name and cause', () => {
    const cause = new Error('EADDRINUSE');
    const err = new BindError('127.0.0.1:7878', cause);

    expect(err).toBeInstanceOf(CanneryError);
    expect(err.name).toBe('BindError');
    expect(err.code).toBe('BIND_FAILED');
    expect(err.cause).toBe(cause);
    expect(err.message).toBe('Error binding to address 127.0.0.1:7878: EADDRINUSE');
  });

  it('describe non-Error causes', () => {
    expect(new AcceptError('EMFILE').message).toBe('Failed to accept connection: EMFILE');
    expect(new FileReadError('main.html', undefined).message).toBe('Error reading contents of main.html: unknown error');
  });

  it('format the remaining messages', () => {
    expect(new PoolConfigurationError(0).message).toBe('Worker pool size must be an integer >= 1, got 0');
    expect(new TimeoutError('read', 20).message).toBe('Connection read exceeded 20ms');
    expect(new WorkerFault(2, 9, new Error('boom')).message).toBe('Worker 2 failed on job 9: boom');
  });

  it('list config issues one per line', () => {
    const err = new ConfigError(['port must be an integer 0-65535', 'route "x": path must start with /']);
    expect(err.issues).toHaveLength(2);
    expect(err.message).toBe(
      'Invalid configuration:\n  port must be an integer 0-65535\n  route "x": path must start with /',
    );
  });
});

describe('formatError', () => {
  it('prefixes cannery errors with their code', () => {
    expect(formatError(new TimeoutError('write', 5))).toBe('TIMEOUT: Connection write exceeded 5ms');
  });

  it('uses the message of plain errors', () => {
    expect(formatError(new Error('plain'))).toBe('plain');
  });

  it('stringifies anything else', () => {
    expect(formatError('text')).toBe('text');
    expect(formatError(42)).toBe('42');
  });
});

describe('isCanneryError', () => {
  it('narrows only cannery errors', () => {
    expect(isCanneryError(new PoolConfigurationError(0))).toBe(true);
    expect(isCanneryError(new Error('x'))).toBe(false);
    expect(isCanneryError(null)).toBe(false);
  });
});
