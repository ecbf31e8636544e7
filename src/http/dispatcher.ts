/**
 * Per-connection pipeline: read request line → parse → route → respond → close
 */

import type { Duplex } from 'node:stream';
import { closeConnection, readRequestLine, writeResponse } from './connection.js';
import { parseRequestLine, type Request } from './request.js';
import { formatResponse, type Response } from './response.js';
import { isCanneryError, formatError } from '../lib/errors.js';
import { createLogger, type Logger } from '../lib/logger.js';
import type { RouteTable } from '../routes/route-table.js';

export interface DispatcherOptions {
  routes: RouteTable;
  logger?: Logger;
  readTimeoutMs?: number;
  writeTimeoutMs?: number;
}

export type DispatchOutcome =
  | { kind: 'responded'; request: Request; response: Response; matched: boolean }
  | { kind: 'dropped'; error: Error };

export class Dispatcher {
  private readonly routes: RouteTable;
  private readonly log: Logger;
  private readonly readTimeoutMs?: number;
  private readonly writeTimeoutMs?: number;

  constructor(opts: DispatcherOptions) {
    this.routes = opts.routes;
    this.log = opts.logger ?? createLogger('dispatch');
    this.readTimeoutMs = opts.readTimeoutMs;
    this.writeTimeoutMs = opts.writeTimeoutMs;
  }

  /**
   * Serve one connection. I/O failures drop the connection and resolve as
   * `dropped`; anything else propagates to the worker. Log lines carry `conn#<id>`
   * when an id is given.
   */
  async dispatch(conn: Duplex, id?: number): Promise<DispatchOutcome> {
    const log = id === undefined ? this.log : this.log.with(`conn#${id}`);
    conn.on('error', (err) => log.debug(`socket error: ${err.message}`));

    let line: string;
    try {
      line = await readRequestLine(conn, this.readTimeoutMs);
    } catch (err) {
      return this.drop(conn, err, log);
    }

    const { request, warnings } = parseRequestLine(line);
    for (const warning of warnings) {
      log.warn(`${warning.message} (request line: ${JSON.stringify(line)})`);
    }

    const { route, matched } = this.routes.resolve(request.path);
    if (!matched) {
      log.info(`no handler found for path: ${request.path}`);
    }
    log.debug(`${request.method} ${request.path} -> ${route.response.status}`);

    try {
      await writeResponse(conn, formatResponse(route.response), this.writeTimeoutMs);
    } catch (err) {
      return this.drop(conn, err, log);
    }

    closeConnection(conn);
    return { kind: 'responded', request, response: route.response, matched };
  }

  private drop(conn: Duplex, err: unknown, log: Logger): DispatchOutcome {
    if (!isCanneryError(err)) throw err;
    log.error(formatError(err));
    conn.destroy();
    return { kind: 'dropped', error: err };
  }
}
