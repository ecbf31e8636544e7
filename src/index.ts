/**
 * cannery
 * Canned-response TCP server: static route table, fixed worker pool, request-line dispatch
 */

export { boot, buildRouteTable, type BootOptions, type BootResult } from './boot.js';

export { WorkerPool, type Job, type WorkerPoolOptions, type WorkerPoolStats } from './pool/worker-pool.js';
export { Channel, ChannelClosedError, type Received } from './pool/channel.js';

export { Dispatcher, type DispatcherOptions, type DispatchOutcome } from './http/dispatcher.js';
export { parseRequestLine, METHODS, type Method, type Request, type ParsedRequest } from './http/request.js';
export {
  Status,
  REASON_PHRASES,
  createResponse,
  formatResponse,
  statusLine,
  Response,
  type StatusCode,
} from './http/response.js';
export { readRequestLine, writeResponse, closeConnection, MAX_REQUEST_LINE } from './http/connection.js';

export {
  RouteTable,
  RouteTableBuilder,
  DEFAULT_FALLBACK_FILE,
  type Route,
  type RouteMatch,
  type ReadFileFn,
  type RouteTableBuilderOptions,
} from './routes/route-table.js';

export { Server, type ServerOptions } from './server/server.js';
export { Listener, type ListenerOptions, type ConnectionHandler } from './server/listener.js';
export {
  ChannelAcceptor,
  bindTcp,
  type Acceptor,
  type Accepted,
  type BindAddress,
  type BindFn,
} from './server/acceptor.js';

export {
  loadConfig,
  applyOverrides,
  parseConfigFile,
  readEnvOverrides,
  DEFAULTS,
  type CanneryConfig,
  type ConfigOverrides,
  type RouteEntry,
} from './config/config.js';
export { validateConfig, type ValidationResult } from './config/validate.js';

export * from './lib/errors.js';
export { createLogger, type Logger } from './lib/logger.js';
