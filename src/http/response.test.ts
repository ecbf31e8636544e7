import { describe, it, expect } from 'vitest';
import { Status, createResponse, formatResponse, statusLine } from './response.js';
import { parseRawResponse } from '../testing/fakes.js';

describe('formatResponse', () => {
  it('writes the status line, one Content-Length header and the body', () => {
    const raw = formatResponse(createResponse('Hello'));
    expect(raw.toString('utf-8')).toBe('HTTP/1.1 200 OK\r\nContent-Length: 5\r\n\r\nHello');
  });

  it('measures Content-Length in bytes for multi-byte text', () => {
    const body = 'héllo ✓';
    const raw = formatResponse(createResponse(body));

    const parsed = parseRawResponse(raw);
    expect(parsed.contentLength).toBe(10);
    expect(parsed.body.toString('utf-8')).toBe(body);
    expect(raw.byteLength).toBe(raw.indexOf('\r\n\r\n') + 4 + 10);
  });

  it('writes an empty body with Content-Length 0', () => {
    expect(formatResponse(createResponse('')).toString('utf-8')).toBe('HTTP/1.1 200 OK\r\nContent-Length: 0\r\n\r\n');
  });

  it('passes binary bodies through untouched', () => {
    const bytes = Buffer.from([0x00, 0xff, 0x10, 0x0a]);
    const parsed = parseRawResponse(formatResponse(createResponse(bytes)));
    expect(parsed.contentLength).toBe(4);
    expect(parsed.body.equals(bytes)).toBe(true);
  });
});

describe('Response', () => {
  it('keeps its bytes when the source buffer or a handed-out body changes', () => {
    const source = Buffer.from('Hello', 'utf-8');
    const response = createResponse(source);

    source.write('J');
    response.body.write('M');
    formatResponse(response).write('X');

    expect(response.body.toString('utf-8')).toBe('Hello');
    expect(formatResponse(response).toString('utf-8')).toBe('HTTP/1.1 200 OK\r\nContent-Length: 5\r\n\r\nHello');
  });

  it('is frozen', () => {
    const response = createResponse('Hello');
    expect(Object.isFrozen(response)).toBe(true);
    expect(Reflect.set(response, 'status', Status.InternalServerError)).toBe(false);
    expect(response.status).toBe(Status.Ok);
    expect(response.byteLength).toBe(5);
  });
});

describe('statusLine', () => {
  it.each([
    [Status.Ok, 'HTTP/1.1 200 OK'],
    [Status.BadRequest, 'HTTP/1.1 400 Bad Request'],
    [Status.NotFound, 'HTTP/1.1 404 Not Found'],
    [Status.InternalServerError, 'HTTP/1.1 500 Internal Server Error'],
  ] as const)('formats %s', (status, expected) => {
    expect(statusLine(createResponse('', status))).toBe(expected);
  });

  it('uses the response protocol', () => {
    expect(statusLine(createResponse('', Status.Ok, 'HTTP/1.0'))).toBe('HTTP/1.0 200 OK');
  });
});
