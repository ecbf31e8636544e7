/**
 * Accept loop: the pool's single producer
 * Wraps each accepted connection in a job; never parses requests itself
 */

import type { Duplex } from 'node:stream';
import type { Acceptor } from './acceptor.js';
import type { WorkerPool } from '../pool/worker-pool.js';
import { PoolClosedError, formatError } from '../lib/errors.js';
import { createLogger, type Logger } from '../lib/logger.js';

export type ConnectionHandler = (conn: Duplex, id: number) => Promise<unknown>;

export interface ListenerOptions {
  acceptor: Acceptor;
  pool: WorkerPool;
  handler: ConnectionHandler;
  logger?: Logger;
}

export class Listener {
  private readonly acceptor: Acceptor;
  private readonly pool: WorkerPool;
  private readonly handler: ConnectionHandler;
  private readonly log: Logger;
  private nextJobId = 1;
  private acceptFailures = 0;

  constructor(opts: ListenerOptions) {
    this.acceptor = opts.acceptor;
    this.pool = opts.pool;
    this.handler = opts.handler;
    this.log = opts.logger ?? createLogger('listener');
  }

  /**
   * Accept until the acceptor closes. Accept failures are logged and skipped.
   */
  async run(): Promise<void> {
    this.log.debug(`accepting on ${this.acceptor.address}`);

    for (;;) {
      const next = await this.acceptor.accept();
      if (next === null) break;

      if (!next.ok) {
        this.acceptFailures++;
        this.log.error(formatError(next.error));
        continue;
      }

      this.submit(next.conn);
    }

    this.log.debug('accept loop ended');
  }

  close(): Promise<void> {
    return this.acceptor.close();
  }

  get accepted(): number {
    return this.nextJobId - 1;
  }

  get failures(): number {
    return this.acceptFailures;
  }

  private submit(conn: Duplex): void {
    const id = this.nextJobId++;
    const handler = this.handler;

    try {
      this.pool.submit({
        id,
        async run() {
          await handler(conn, id);
        },
      });
    } catch (err) {
      if (!(err instanceof PoolClosedError)) throw err;
      this.log.warn(`dropping connection ${id}: ${err.message}`);
      conn.destroy();
    }
  }
}
