#!/usr/bin/env node
/**
 * cannery CLI
 * `serve` boots the server; `routes` prints the frozen route table without binding
 */

import 'dotenv/config';

import { Command, InvalidArgumentError } from 'commander';
import { createRequire } from 'node:module';
import { boot, buildRouteTable } from './boot.js';
import { loadConfig, type ConfigOverrides } from './config/config.js';
import { validateConfig } from './config/validate.js';
import { renderBanner, renderIssues, renderReady, renderRoutes } from './cli/banner.js';
import { ConfigError, formatError } from './lib/errors.js';

const require = createRequire(import.meta.url);
const pkg: { version: string } = require('../package.json');
const VERSION = pkg.version;

interface ServeFlags {
  config?: string;
  host?: string;
  port?: number;
  workers?: number;
  readTimeout?: number;
  writeTimeout?: number;
  notFound?: boolean;
}

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError('Not an integer.');
  return n;
}

function toOverrides(flags: ServeFlags): ConfigOverrides {
  return {
    host: flags.host,
    port: flags.port,
    workers: flags.workers,
    readTimeoutMs: flags.readTimeout,
    writeTimeoutMs: flags.writeTimeout,
    notFoundStatus: flags.notFound,
  };
}

async function serve(flags: ServeFlags): Promise<void> {
  const started = Date.now();
  const config = await loadConfig({ configPath: flags.config, overrides: toOverrides(flags) });
  const { server, address, routes, warnings } = await boot(config);

  renderBanner({
    version: VERSION,
    address,
    workers: config.workers,
    contentDir: config.contentDir,
    timeouts: { readMs: config.readTimeoutMs, writeMs: config.writeTimeoutMs },
  });
  renderRoutes(routes);
  renderIssues(warnings);
  renderReady(Date.now() - started);

  const shutdown = (signal: string) => {
    process.stderr.write(`\n  ${signal} received, draining connections...\n`);
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(formatError(err));
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

async function listRoutes(flags: Pick<ServeFlags, 'config' | 'notFound'>): Promise<void> {
  const config = await loadConfig({ configPath: flags.config, overrides: { notFoundStatus: flags.notFound } });
  const validation = validateConfig(config);
  renderIssues(validation.warnings, validation.errors);
  if (!validation.valid) throw new ConfigError(validation.errors);

  const routes = await buildRouteTable(config);
  renderRoutes(routes, (line) => process.stdout.write(line + '\n'));
}

const program = new Command();

program
  .name('cannery')
  .description('Serve canned responses from a static route table with a fixed worker pool')
  .version(VERSION);

program
  .command('serve', { isDefault: true })
  .description('Start the server')
  .option('-c, --config <file>', 'Config file (default: ./cannery.json if present)')
  .option('-H, --host <host>', 'Bind address')
  .option('-p, --port <port>', 'Bind port', parseInteger)
  .option('-w, --workers <n>', 'Worker pool size', parseInteger)
  .option('--read-timeout <ms>', 'Drop clients that send no request line within <ms>', parseInteger)
  .option('--write-timeout <ms>', 'Drop clients that do not accept the response within <ms>', parseInteger)
  .option('--not-found', 'Answer unmatched paths with 404 instead of 200')
  .action((flags: ServeFlags) => serve(flags));

program
  .command('routes')
  .description('Print the route table without binding')
  .option('-c, --config <file>', 'Config file (default: ./cannery.json if present)')
  .option('--not-found', 'Answer unmatched paths with 404 instead of 200')
  .action((flags: Pick<ServeFlags, 'config' | 'notFound'>) => listRoutes(flags));

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(formatError(err));
  process.exit(1);
});
