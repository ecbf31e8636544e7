import os from 'node:os';
import chalk from 'chalk';
import type { RouteTable } from '../routes/route-table.js';
import { REASON_PHRASES } from '../http/response.js';

export interface BannerData {
  version: string;
  address: string;
  workers: number;
  contentDir: string;
  timeouts: { readMs?: number; writeMs?: number };
}

const DIM = chalk.dim;
const OK = chalk.green('✓');
const FAIL = chalk.red('✗');
const WARN = chalk.yellow('⚠');
const URL = chalk.cyan;
const LABEL = chalk.gray;
const BOLD = chalk.bold;

function shortenHome(p: string): string {
  const home = os.homedir();
  return p.startsWith(home) ? '~' + p.slice(home.length) : p;
}

function pad(label: string, width = 12): string {
  return label.padEnd(width);
}

function formatBytes(n: number): string {
  return n < 1024 ? `${n} B` : `${(n / 1024).toFixed(1)} KiB`;
}

// stderr keeps stdout free for piping `cannery routes`
const out = (s: string) => process.stderr.write(s + '\n');

export function renderBanner(data: BannerData): void {
  const timeouts = [
    data.timeouts.readMs !== undefined ? `read ${data.timeouts.readMs}ms` : null,
    data.timeouts.writeMs !== undefined ? `write ${data.timeouts.writeMs}ms` : null,
  ].filter((t): t is string => t !== null);

  out('');
  out(`  ${BOLD('cannery')} ${DIM('v' + data.version)}`);
  out('');
  out(`  ${LABEL(pad('Listening'))}${URL(`http://${data.address}`)}`);
  out(`  ${LABEL(pad('Workers'))}${data.workers}`);
  out(`  ${LABEL(pad('Content'))}${shortenHome(data.contentDir)}`);
  out(`  ${LABEL(pad('Timeouts'))}${timeouts.length > 0 ? timeouts.join(DIM(', ')) : DIM('none')}`);
  out('');
}

export function renderRoutes(routes: RouteTable, write: (s: string) => void = out): void {
  write(`  ${LABEL('Routes')}`);
  for (const routePath of routes.paths()) {
    const route = routes.lookup(routePath);
    if (!route) continue;
    write(`    ${OK} ${pad(routePath, 20)}${DIM(formatBytes(route.response.byteLength))}`);
  }
  const { status, byteLength } = routes.fallback.response;
  write(`    ${DIM('*')} ${pad('(fallback)', 20)}${DIM(`${status} ${REASON_PHRASES[status]}, ${formatBytes(byteLength)}`)}`);
}

export function renderIssues(warnings: string[], errors: string[] = []): void {
  for (const w of warnings) out(`  ${WARN} ${w}`);
  for (const e of errors) out(`  ${FAIL} ${e}`);
}

export function renderReady(bootMs: number): void {
  out('');
  out(`  ${chalk.green(BOLD('Ready'))}${DIM(`  ${(bootMs / 1000).toFixed(1)}s`)}  ${DIM('Ctrl+C to stop')}`);
  out('');
}
