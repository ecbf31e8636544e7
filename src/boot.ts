/**
 * Boot sequence shared by the CLI and embedders
 * Validate config → freeze the route table → start the pool and bind
 */

import { validateConfig } from './config/validate.js';
import type { CanneryConfig } from './config/config.js';
import { RouteTableBuilder, type ReadFileFn, type RouteTable } from './routes/route-table.js';
import { Server } from './server/server.js';
import type { BindFn } from './server/acceptor.js';
import { ConfigError } from './lib/errors.js';
import { createLogger, type Logger } from './lib/logger.js';

const log = createLogger('boot');

export interface BootOptions {
  bind?: BindFn;
  readFile?: ReadFileFn;
  logger?: Logger;
}

export interface BootResult {
  server: Server;
  address: string;
  routes: RouteTable;
  warnings: string[];
}

/**
 * Read every configured file once and freeze the table.
 * Rejects with RouteRegistrationError if the fallback file is unreadable.
 */
export async function buildRouteTable(config: CanneryConfig, opts: Pick<BootOptions, 'readFile' | 'logger'> = {}): Promise<RouteTable> {
  const builder = new RouteTableBuilder({
    contentDir: config.contentDir,
    fallbackFile: config.fallbackFile,
    notFoundStatus: config.notFoundStatus,
    readFile: opts.readFile,
    logger: opts.logger,
  });

  // Sequential so a duplicate path resolves to the last entry
  for (const route of config.routes) {
    await builder.registerGet(route.path, route.file);
  }
  return builder.build();
}

export async function boot(config: CanneryConfig, opts: BootOptions = {}): Promise<BootResult> {
  const logger = opts.logger ?? log;
  const validation = validateConfig(config);
  for (const w of validation.warnings) logger.warn(w);
  if (!validation.valid) throw new ConfigError(validation.errors);

  const routes = await buildRouteTable(config, opts);
  logger.debug(`route table frozen with ${routes.size} routes`);

  const server = new Server({
    host: config.host,
    port: config.port,
    workers: config.workers,
    routes,
    readTimeoutMs: config.readTimeoutMs,
    writeTimeoutMs: config.writeTimeoutMs,
    bind: opts.bind,
    logger: opts.logger,
  });
  const address = await server.start();

  return { server, address, routes, warnings: validation.warnings };
}
