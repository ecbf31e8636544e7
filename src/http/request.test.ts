import { describe, it, expect } from 'vitest';
import { parseRequestLine } from './request.js';
import { RequestParseError } from '../lib/errors.js';

function messages(line: string): string[] {
  return parseRequestLine(line).warnings.map((w) => w.message);
}

describe('parseRequestLine', () => {
  it('parses a well-formed request line', () => {
    expect(parseRequestLine('GET / HTTP/1.1')).toEqual({
      request: { method: 'GET', path: '/', protocol: 'HTTP/1.1' },
      warnings: [],
    });
  });

  it.each(['GET', 'POST', 'PUT', 'DELETE'] as const)('accepts %s', (method) => {
    const { request, warnings } = parseRequestLine(`${method} /items HTTP/1.0`);
    expect(request).toEqual({ method, path: '/items', protocol: 'HTTP/1.0' });
    expect(warnings).toEqual([]);
  });

  it('defaults an unknown method to GET with a warning', () => {
    const { request, warnings } = parseRequestLine('PATCH /x HTTP/1.1');
    expect(request.method).toBe('GET');
    expect(request.path).toBe('/x');
    expect(warnings.map((w) => w.message)).toEqual(['unknown method "PATCH", defaulting to GET']);
  });

  it('treats method names as case-sensitive', () => {
    expect(parseRequestLine('get /x HTTP/1.1').request.method).toBe('GET');
    expect(messages('get /x HTTP/1.1')).toEqual(['unknown method "get", defaulting to GET']);
  });

  it('defaults every field of an empty line', () => {
    const { request } = parseRequestLine('');
    expect(request).toEqual({ method: 'GET', path: '/', protocol: 'HTTP/1.1' });
    expect(messages('')).toEqual([
      'missing method, defaulting to GET',
      'missing path, defaulting to /',
      'missing protocol, defaulting to HTTP/1.1',
    ]);
  });

  it('defaults path and protocol when only a method is given', () => {
    expect(parseRequestLine('DELETE').request).toEqual({ method: 'DELETE', path: '/', protocol: 'HTTP/1.1' });
    expect(messages('DELETE')).toEqual([
      'missing path, defaulting to /',
      'missing protocol, defaulting to HTTP/1.1',
    ]);
  });

  it('defaults the protocol when missing', () => {
    expect(parseRequestLine('GET /only-path').request.protocol).toBe('HTTP/1.1');
    expect(messages('GET /only-path')).toEqual(['missing protocol, defaulting to HTTP/1.1']);
  });

  it('splits on any run of whitespace', () => {
    expect(parseRequestLine('  PUT \t /a/b   HTTP/1.1  ').request).toEqual({
      method: 'PUT',
      path: '/a/b',
      protocol: 'HTTP/1.1',
    });
  });

  it('ignores tokens past the protocol', () => {
    const { request, warnings } = parseRequestLine('GET /a HTTP/1.1 trailing junk');
    expect(request).toEqual({ method: 'GET', path: '/a', protocol: 'HTTP/1.1' });
    expect(warnings).toEqual([]);
  });

  it('never populates a body', () => {
    expect(parseRequestLine('POST /submit HTTP/1.1').request.body).toBeUndefined();
  });

  it('reports warnings as RequestParseError', () => {
    const [warning] = parseRequestLine('').warnings;
    expect(warning).toBeInstanceOf(RequestParseError);
    expect(warning.code).toBe('REQUEST_PARSE');
  });
});
