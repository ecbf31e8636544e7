/**
 * Connection I/O
 * Reads the request line and writes the response. Deadlines are opt-in: without
 * them a silent client keeps its worker busy indefinitely.
 */

import type { Duplex } from 'node:stream';
import { ReadError, TimeoutError, WriteError } from '../lib/errors.js';

export const MAX_REQUEST_LINE = 8 * 1024;
const CLOSE_LINGER_MS = 2_000;
const LF = 0x0a;

function decodeLine(buf: Buffer): string {
  return buf.subarray(0, MAX_REQUEST_LINE).toString('utf-8').replace(/\r$/, '');
}

/**
 * Resolve with the first line of the stream, without its line terminator.
 * End of stream before a newline resolves with whatever arrived, possibly ''.
 * Anything after the first line is left unread.
 */
export function readRequestLine(conn: Duplex, timeoutMs?: number): Promise<string> {
  if (conn.destroyed) {
    return Promise.reject(new ReadError('connection closed before the request line arrived'));
  }

  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let timer: NodeJS.Timeout | undefined;

    const settle = (result: { line: string } | { error: Error }) => {
      conn.off('data', onData);
      conn.off('end', onEnd);
      conn.off('error', onError);
      conn.off('close', onClose);
      if (timer) clearTimeout(timer);
      conn.pause();
      if ('line' in result) resolve(result.line);
      else reject(result.error);
    };

    const onData = (chunk: Buffer | string) => {
      const buf = typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk;
      const newline = buf.indexOf(LF);
      if (newline !== -1) {
        chunks.push(buf.subarray(0, newline));
        settle({ line: decodeLine(Buffer.concat(chunks)) });
        return;
      }
      chunks.push(buf);
      size += buf.byteLength;
      if (size >= MAX_REQUEST_LINE) {
        settle({ line: decodeLine(Buffer.concat(chunks)) });
      }
    };
    const onEnd = () => settle({ line: decodeLine(Buffer.concat(chunks)) });
    const onError = (err: Error) => settle({ error: new ReadError(err) });
    const onClose = () => settle({ error: new ReadError('connection closed before the request line arrived') });

    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        settle({ error: new TimeoutError('read', timeoutMs) });
        conn.destroy();
      }, timeoutMs);
    }

    conn.on('data', onData);
    conn.once('end', onEnd);
    conn.once('error', onError);
    conn.once('close', onClose);
    conn.resume();
  });
}

/**
 * Write the whole buffer and end the writable side. Resolves once flushed.
 */
export function writeResponse(conn: Duplex, bytes: Buffer, timeoutMs?: number): Promise<void> {
  if (conn.destroyed || conn.writableEnded) {
    return Promise.reject(new WriteError('connection closed before the response was written'));
  }

  return new Promise((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined;

    const settle = (error?: Error) => {
      conn.off('finish', onFinish);
      conn.off('error', onError);
      conn.off('close', onClose);
      if (timer) clearTimeout(timer);
      if (error) reject(error);
      else resolve();
    };

    const onFinish = () => settle();
    const onError = (err: Error) => settle(new WriteError(err));
    const onClose = () => settle(new WriteError('connection closed before the response was flushed'));

    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        settle(new TimeoutError('write', timeoutMs));
        conn.destroy();
      }, timeoutMs);
    }

    conn.once('finish', onFinish);
    conn.once('error', onError);
    conn.once('close', onClose);
    conn.end(bytes);
  });
}

/**
 * Close after a successful write. Unread input is drained first so the peer
 * sees an orderly close instead of a reset.
 */
export function closeConnection(conn: Duplex): void {
  if (conn.destroyed) return;
  conn.resume();
  const timer = setTimeout(() => conn.destroy(), CLOSE_LINGER_MS);
  timer.unref();
  conn.once('close', () => clearTimeout(timer));
}
