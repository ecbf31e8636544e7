/**
 * Connection sources for the listener
 * An acceptor turns inbound connections (and accept failures) into a pull-style
 * `accept()` stream. The TCP binding feeds one from a `node:net` server.
 */

import net from 'node:net';
import type { Duplex } from 'node:stream';
import { Channel } from '../pool/channel.js';
import { AcceptError, BindError } from '../lib/errors.js';
import { createLogger, type Logger } from '../lib/logger.js';

export type Accepted = { ok: true; conn: Duplex } | { ok: false; error: AcceptError };

export interface Acceptor {
  readonly address: string;
  /** Next connection or accept failure; null once the acceptor is closed and drained */
  accept(): Promise<Accepted | null>;
  /** Stop accepting. Resolves when the underlying socket is fully released. */
  close(): Promise<void>;
}

export interface BindAddress {
  host: string;
  port: number;
}

export type BindFn = (address: BindAddress) => Promise<Acceptor>;

export class ChannelAcceptor implements Acceptor {
  private readonly events = new Channel<Accepted>();
  private closing: Promise<void> | null = null;

  constructor(
    readonly address: string,
    private readonly release: () => Promise<void> = () => Promise.resolve(),
  ) {}

  offer(conn: Duplex): void {
    if (this.events.isClosed) {
      conn.destroy();
      return;
    }
    this.events.send({ ok: true, conn });
  }

  fail(cause: unknown): void {
    if (this.events.isClosed) return;
    this.events.send({ ok: false, error: new AcceptError(cause) });
  }

  async accept(): Promise<Accepted | null> {
    const next = await this.events.receive();
    return next.ok ? next.value : null;
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.events.close();
      this.closing = this.release();
    }
    return this.closing;
  }

  get isClosed(): boolean {
    return this.events.isClosed;
  }
}

/**
 * Bind a TCP listening socket. Rejects with BindError; the caller treats that as fatal.
 */
export function bindTcp(address: BindAddress, logger: Logger = createLogger('listener')): Promise<Acceptor> {
  const target = `${address.host}:${address.port}`;
  // Half-open: a client may FIN right after its request line and still read the response.
  // closeConnection ends the socket once the response is written.
  const server = net.createServer({ allowHalfOpen: true });

  return new Promise((resolve, reject) => {
    const onBindError = (err: Error) => {
      server.off('listening', onListening);
      reject(new BindError(target, err));
    };

    const onListening = () => {
      server.off('error', onBindError);

      const info = server.address();
      const port = info !== null && typeof info === 'object' ? info.port : address.port;

      const acceptor = new ChannelAcceptor(`${address.host}:${port}`, () => new Promise((done) => {
        server.close((err) => {
          if (err) logger.debug(`close: ${err.message}`);
          done();
        });
      }));

      server.on('connection', (socket) => {
        socket.on('error', (err) => logger.debug(`socket error: ${err.message}`));
        acceptor.offer(socket);
      });
      server.on('error', (err) => acceptor.fail(err));

      resolve(acceptor);
    };

    server.once('error', onBindError);
    server.once('listening', onListening);
    server.listen(address.port, address.host);
  });
}
