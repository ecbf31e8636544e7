/**
 * Configuration loading
 * Defaults ← cannery.json ← CANNERY_* environment ← explicit overrides
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../lib/errors.js';

export const DEFAULT_CONFIG_FILE = 'cannery.json';

export interface RouteEntry {
  path: string;
  file: string;
}

export interface CanneryConfig {
  host: string;
  port: number;
  workers: number;
  contentDir: string;
  fallbackFile: string;
  routes: RouteEntry[];
  notFoundStatus: boolean;
  readTimeoutMs?: number;
  writeTimeoutMs?: number;
}

export type ConfigOverrides = Partial<Omit<CanneryConfig, 'routes' | 'contentDir'>>;

export const DEFAULTS = {
  host: '127.0.0.1',
  port: 7878,
  workers: 4,
  fallbackFile: 'unknown.html',
  routes: [{ path: '/', file: 'main.html' }],
  notFoundStatus: false,
} satisfies Omit<CanneryConfig, 'contentDir'>;

// ============================================================================
// Schemas
// ============================================================================

export const RouteEntrySchema = z.object({
  path: z.string().min(1),
  file: z.string().min(1),
});

export const ConfigFileSchema = z.object({
  host: z.string().min(1).optional(),
  port: z.number().int().min(0).max(65535).optional(),
  workers: z.number().int().optional(),
  contentDir: z.string().min(1).optional(),
  fallbackFile: z.string().min(1).optional(),
  routes: z.array(RouteEntrySchema).optional(),
  notFoundStatus: z.boolean().optional(),
  readTimeoutMs: z.number().int().positive().optional(),
  writeTimeoutMs: z.number().int().positive().optional(),
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

const EnvSchema = z.object({
  CANNERY_HOST: z.string().min(1).optional(),
  CANNERY_PORT: z.coerce.number().int().min(0).max(65535).optional(),
  CANNERY_WORKERS: z.coerce.number().int().optional(),
});

function formatIssues(source: string, error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${source}: ${where}: ${issue.message}`;
  });
}

// ============================================================================
// Loading
// ============================================================================

export function parseConfigFile(raw: string, source: string): ConfigFile {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError([`${source}: ${err instanceof Error ? err.message : String(err)}`]);
  }

  const result = ConfigFileSchema.safeParse(json);
  if (!result.success) throw new ConfigError(formatIssues(source, result.error));
  return result.data;
}

export function readEnvOverrides(env: NodeJS.ProcessEnv): ConfigOverrides {
  // Empty variables count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('CANNERY_') && value !== undefined && value.trim() !== ''),
  );

  const result = EnvSchema.safeParse(present);
  if (!result.success) throw new ConfigError(formatIssues('environment', result.error));

  const overrides: ConfigOverrides = {};
  if (result.data.CANNERY_HOST !== undefined) overrides.host = result.data.CANNERY_HOST;
  if (result.data.CANNERY_PORT !== undefined) overrides.port = result.data.CANNERY_PORT;
  if (result.data.CANNERY_WORKERS !== undefined) overrides.workers = result.data.CANNERY_WORKERS;
  return overrides;
}

async function readOptional(file: string): Promise<string | null> {
  try {
    return await fs.readFile(file, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
    throw new ConfigError([`${file}: ${err instanceof Error ? err.message : String(err)}`]);
  }
}

export interface LoadConfigOptions {
  /** Explicit config path; unlike the default file, it must exist */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

export async function loadConfig(opts: LoadConfigOptions = {}): Promise<CanneryConfig> {
  const cwd = opts.cwd ?? process.cwd();
  const env = opts.env ?? process.env;
  const explicit = opts.configPath ?? env.CANNERY_CONFIG?.trim() ?? '';
  const configPath = path.resolve(cwd, explicit || DEFAULT_CONFIG_FILE);

  const raw = await readOptional(configPath);
  if (raw === null && explicit) {
    throw new ConfigError([`${configPath}: config file not found`]);
  }

  const file: ConfigFile = raw === null ? {} : parseConfigFile(raw, configPath);
  const baseDir = raw === null ? cwd : path.dirname(configPath);

  const config: CanneryConfig = {
    host: file.host ?? DEFAULTS.host,
    port: file.port ?? DEFAULTS.port,
    workers: file.workers ?? DEFAULTS.workers,
    contentDir: path.resolve(baseDir, file.contentDir ?? '.'),
    fallbackFile: file.fallbackFile ?? DEFAULTS.fallbackFile,
    routes: (file.routes ?? DEFAULTS.routes).map((route) => ({ ...route })),
    notFoundStatus: file.notFoundStatus ?? DEFAULTS.notFoundStatus,
    readTimeoutMs: file.readTimeoutMs,
    writeTimeoutMs: file.writeTimeoutMs,
  };

  return applyOverrides(applyOverrides(config, readEnvOverrides(env)), opts.overrides ?? {});
}

/**
 * Overlay every override that is not undefined
 */
export function applyOverrides(config: CanneryConfig, overrides: ConfigOverrides): CanneryConfig {
  const next = { ...config };
  if (overrides.host !== undefined) next.host = overrides.host;
  if (overrides.port !== undefined) next.port = overrides.port;
  if (overrides.workers !== undefined) next.workers = overrides.workers;
  if (overrides.fallbackFile !== undefined) next.fallbackFile = overrides.fallbackFile;
  if (overrides.notFoundStatus !== undefined) next.notFoundStatus = overrides.notFoundStatus;
  if (overrides.readTimeoutMs !== undefined) next.readTimeoutMs = overrides.readTimeoutMs;
  if (overrides.writeTimeoutMs !== undefined) next.writeTimeoutMs = overrides.writeTimeoutMs;
  return next;
}
