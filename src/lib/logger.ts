import { AsyncLocalStorage } from 'node:async_hooks';

const store = new AsyncLocalStorage<number>();
const DEBUG = process.env.DEBUG;
const enabled = !!DEBUG;
const filter = DEBUG && DEBUG !== '1'
  ? new Set(DEBUG.split(','))
  : null;

const bootTime = Date.now();

function ts(): string {
  const delta = ((Date.now() - bootTime) / 1000).toFixed(1);
  return `+${delta}s`;
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  child<T>(fn: () => T): T;
  /** Same scope, every line prefixed with `label` (e.g. a connection id) */
  with(label: string): Logger;
}

export function createLogger(scope: string): Logger {
  return build(scope, []);
}

function build(scope: string, labels: string[]): Logger {
  const active = enabled && (!filter || filter.has(scope));

  return {
    debug(...args: unknown[]) {
      if (!active) return;
      const depth = store.getStore() ?? 0;
      const indent = '  '.repeat(depth);
      console.error(`${ts()} ${indent}[${scope}]`, ...labels, ...args);
    },
    info(...args: unknown[]) {
      console.error(`${ts()} [${scope}]`, ...labels, ...args);
    },
    warn(...args: unknown[]) {
      console.error(`${ts()} [${scope}] WARN`, ...labels, ...args);
    },
    error(...args: unknown[]) {
      console.error(`${ts()} [${scope}] ERROR`, ...labels, ...args);
    },
    child<T>(fn: () => T): T {
      const depth = store.getStore() ?? 0;
      return store.run(depth + 1, fn);
    },
    with(label: string): Logger {
      return build(scope, [...labels, label]);
    },
  };
}
