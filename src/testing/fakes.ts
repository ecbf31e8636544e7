/**
 * In-process stand-ins for sockets and log sinks, shared by the test suites
 */

import { Duplex } from 'node:stream';
import type { Logger } from '../lib/logger.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface RecordingLogger extends Logger {
  records: Array<{ level: LogLevel; message: string }>;
  messages(level: LogLevel): string[];
}

export function createRecordingLogger(): RecordingLogger {
  const records: RecordingLogger['records'] = [];

  const build = (labels: string[]): Logger => {
    const record = (level: LogLevel) => (...args: unknown[]) => {
      records.push({ level, message: [...labels, ...args].map(String).join(' ') });
    };
    return {
      debug: record('debug'),
      info: record('info'),
      warn: record('warn'),
      error: record('error'),
      child: (fn) => fn(),
      with: (label) => build([...labels, label]),
    };
  };

  return {
    ...build([]),
    records,
    messages: (level) => records.filter((r) => r.level === level).map((r) => r.message),
  };
}

export interface FakeConnectionOptions {
  /** End the readable side after the input (client half-close). Default true. */
  endInput?: boolean;
  /** Fail every write with this error */
  failWrite?: Error;
}

export interface FakeConnection {
  conn: Duplex;
  /** Everything the server wrote */
  output(): Buffer;
  text(): string;
}

/**
 * A duplex that plays `input` as the client's bytes and records what is written back
 */
export function createFakeConnection(input: string | Buffer = '', opts: FakeConnectionOptions = {}): FakeConnection {
  const written: Buffer[] = [];

  const conn = new Duplex({
    read() {},
    write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
      if (opts.failWrite) {
        callback(opts.failWrite);
        return;
      }
      written.push(chunk);
      callback();
    },
  });

  const bytes = typeof input === 'string' ? Buffer.from(input, 'utf-8') : input;
  if (bytes.byteLength > 0) conn.push(bytes);
  if (opts.endInput ?? true) conn.push(null);

  return {
    conn,
    output: () => Buffer.concat(written),
    text: () => Buffer.concat(written).toString('utf-8'),
  };
}

/**
 * Split a raw response into its head and exactly Content-Length bytes of body
 */
export function parseRawResponse(raw: Buffer): { statusLine: string; contentLength: number; body: Buffer } {
  const sep = raw.indexOf('\r\n\r\n');
  if (sep === -1) throw new Error('response has no header terminator');

  const [statusLine, ...headers] = raw.subarray(0, sep).toString('utf-8').split('\r\n');
  const lengthHeader = headers.find((h) => h.toLowerCase().startsWith('content-length:'));
  if (!lengthHeader) throw new Error('response has no Content-Length');

  const contentLength = Number(lengthHeader.slice('content-length:'.length).trim());
  const body = raw.subarray(sep + 4, sep + 4 + contentLength);
  return { statusLine, contentLength, body };
}
