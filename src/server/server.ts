/**
 * Canned-response server
 * Owns the worker pool, the listening socket and the accept loop
 */

import { bindTcp, type Acceptor, type BindFn } from './acceptor.js';
import { Listener } from './listener.js';
import { Dispatcher } from '../http/dispatcher.js';
import { WorkerPool, type WorkerPoolStats } from '../pool/worker-pool.js';
import type { RouteTable } from '../routes/route-table.js';
import { formatError } from '../lib/errors.js';
import { createLogger, type Logger } from '../lib/logger.js';

const log = createLogger('server');

export interface ServerOptions {
  host?: string;
  port?: number;
  workers?: number;
  /** Must be fully built before start(); never mutated while serving */
  routes: RouteTable;
  readTimeoutMs?: number;
  writeTimeoutMs?: number;
  bind?: BindFn;
  logger?: Logger;
}

interface Running {
  acceptor: Acceptor;
  listener: Listener;
  pool: WorkerPool;
  loop: Promise<void>;
}

export class Server {
  private readonly host: string;
  private readonly port: number;
  private readonly workers: number;
  private readonly dispatcher: Dispatcher;
  private readonly bind: BindFn;
  private readonly log: Logger;
  /** Shared with the pool, listener and dispatcher when given; each uses its own scope otherwise */
  private readonly sharedLogger?: Logger;
  private running: Running | null = null;

  constructor(opts: ServerOptions) {
    this.host = opts.host ?? '127.0.0.1';
    this.port = opts.port ?? 7878;
    this.workers = opts.workers ?? 4;
    this.log = opts.logger ?? log;
    this.sharedLogger = opts.logger;
    this.bind = opts.bind ?? ((address) => bindTcp(address, opts.logger));
    this.dispatcher = new Dispatcher({
      routes: opts.routes,
      logger: opts.logger,
      readTimeoutMs: opts.readTimeoutMs,
      writeTimeoutMs: opts.writeTimeoutMs,
    });
  }

  /**
   * Start the pool, bind, and begin accepting. Resolves with the bound address.
   * Throws PoolConfigurationError or BindError; both are fatal.
   */
  async start(): Promise<string> {
    if (this.running) {
      throw new Error('Server already running');
    }

    const pool = new WorkerPool(this.workers, { logger: this.sharedLogger });

    let acceptor: Acceptor;
    try {
      acceptor = await this.bind({ host: this.host, port: this.port });
    } catch (err) {
      await pool.shutdown();
      throw err;
    }

    const listener = new Listener({
      acceptor,
      pool,
      handler: (conn, id) => this.dispatcher.dispatch(conn, id),
      logger: this.sharedLogger,
    });

    const loop = listener.run().catch((err) => {
      this.log.error(`accept loop failed: ${formatError(err)}`);
    });

    this.running = { acceptor, listener, pool, loop };
    this.log.info(`listening on ${acceptor.address} with ${pool.size} workers`);
    return acceptor.address;
  }

  /**
   * Stop accepting, let in-flight and queued connections finish, then release the socket
   */
  async stop(): Promise<void> {
    const running = this.running;
    if (!running) return;
    this.running = null;

    this.log.info('stopping...');
    const released = running.listener.close();
    await running.loop;
    await running.pool.shutdown();
    await released;
    this.log.info('stopped');
  }

  get address(): string | null {
    return this.running?.acceptor.address ?? null;
  }

  isRunning(): boolean {
    return this.running !== null;
  }

  stats(): WorkerPoolStats | null {
    return this.running?.pool.stats() ?? null;
  }
}
