/**
 * Static route table
 * Responses are read from disk once at registration and frozen; the built table
 * is a read-only map shared by reference across all workers.
 */

import { readFile as fsReadFile } from 'node:fs/promises';
import path from 'node:path';
import { FileReadError, RouteRegistrationError, formatError } from '../lib/errors.js';
import { createLogger, type Logger } from '../lib/logger.js';
import { Status, createResponse, type Response } from '../http/response.js';

export const DEFAULT_FALLBACK_FILE = 'unknown.html';
export const FALLBACK_PATH = '/';

export type ReadFileFn = (file: string) => Promise<Buffer>;

export interface Route {
  readonly path: string;
  readonly response: Response;
}

export interface RouteMatch {
  route: Route;
  matched: boolean;
}

export interface RouteTableBuilderOptions {
  /** Directory that relative file names resolve against (default: cwd) */
  contentDir?: string;
  /** Served for unmatched paths and for routes whose own file is unreadable */
  fallbackFile?: string;
  /** Answer unmatched paths with 404 instead of 200 */
  notFoundStatus?: boolean;
  readFile?: ReadFileFn;
  logger?: Logger;
}

export class RouteTable {
  constructor(
    private readonly routes: ReadonlyMap<string, Route>,
    readonly fallback: Route,
  ) {
    Object.freeze(this);
  }

  lookup(requestPath: string): Route | undefined {
    return this.routes.get(requestPath);
  }

  /**
   * Exact-match lookup; misses resolve to the fallback route
   */
  resolve(requestPath: string): RouteMatch {
    const route = this.routes.get(requestPath);
    return route ? { route, matched: true } : { route: this.fallback, matched: false };
  }

  get size(): number {
    return this.routes.size;
  }

  paths(): string[] {
    return Array.from(this.routes.keys());
  }
}

export class RouteTableBuilder {
  private readonly routes = new Map<string, Route>();
  private readonly contentDir: string;
  private readonly fallbackFile: string;
  private readonly notFoundStatus: boolean;
  private readonly readFile: ReadFileFn;
  private readonly log: Logger;
  private sealed = false;

  constructor(opts: RouteTableBuilderOptions = {}) {
    this.contentDir = opts.contentDir ?? process.cwd();
    this.fallbackFile = opts.fallbackFile ?? DEFAULT_FALLBACK_FILE;
    this.notFoundStatus = opts.notFoundStatus ?? false;
    this.readFile = opts.readFile ?? ((file) => fsReadFile(file));
    this.log = opts.logger ?? createLogger('routes');
  }

  /**
   * Read `fileName` now and serve its contents for GET `routePath` from then on.
   * An unreadable file registers the fallback content instead; rejects with
   * RouteRegistrationError only when the fallback is unreadable too.
   */
  async registerGet(routePath: string, fileName: string): Promise<Route> {
    this.assertOpen(routePath);

    let body: Buffer;
    try {
      body = await this.load(fileName);
    } catch (err) {
      this.log.warn(formatError(err));
      try {
        body = await this.load(this.fallbackFile);
      } catch (fallbackErr) {
        throw new RouteRegistrationError(routePath, formatError(fallbackErr), fallbackErr);
      }
    }

    this.assertOpen(routePath);
    if (this.routes.has(routePath)) {
      this.log.warn(`route ${routePath} registered twice, keeping ${fileName}`);
    }

    const route: Route = Object.freeze({ path: routePath, response: createResponse(body) });
    this.routes.set(routePath, route);
    this.log.debug(`registered GET ${routePath} -> ${fileName} (${body.byteLength} bytes)`);
    return route;
  }

  /**
   * Load the fallback route and freeze the table. No registration is accepted afterwards.
   */
  async build(): Promise<RouteTable> {
    this.assertOpen(FALLBACK_PATH);

    let body: Buffer;
    try {
      body = await this.load(this.fallbackFile);
    } catch (err) {
      throw new RouteRegistrationError(FALLBACK_PATH, `fallback ${formatError(err)}`, err);
    }

    this.sealed = true;
    const status = this.notFoundStatus ? Status.NotFound : Status.Ok;
    const fallback: Route = Object.freeze({ path: FALLBACK_PATH, response: createResponse(body, status) });
    return new RouteTable(new Map(this.routes), fallback);
  }

  private async load(fileName: string): Promise<Buffer> {
    const file = path.resolve(this.contentDir, fileName);
    try {
      return await this.readFile(file);
    } catch (err) {
      throw new FileReadError(fileName, err);
    }
  }

  private assertOpen(routePath: string): void {
    if (this.sealed) {
      throw new RouteRegistrationError(routePath, 'route table is already built');
    }
  }
}
