/**
 * Boot-time configuration validation
 * Fails fast so a bad route or pool size surfaces before the socket is bound
 */

import type { CanneryConfig } from './config.js';

export const MAX_RECOMMENDED_WORKERS = 256;

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export function validateConfig(config: CanneryConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    errors.push('port must be an integer 0-65535');
  }

  if (!Number.isInteger(config.workers) || config.workers < 1) {
    errors.push(`workers must be an integer >= 1, got ${config.workers}`);
  } else if (config.workers > MAX_RECOMMENDED_WORKERS) {
    warnings.push(`workers=${config.workers} is unusually high; each worker holds one connection at a time`);
  }

  for (const [key, value] of [['readTimeoutMs', config.readTimeoutMs], ['writeTimeoutMs', config.writeTimeoutMs]] as const) {
    if (value !== undefined && (!Number.isInteger(value) || value <= 0)) {
      errors.push(`${key} must be a positive integer`);
    }
  }

  if (config.routes.length === 0) {
    warnings.push('no routes configured, every request gets the fallback response');
  }

  const seen = new Set<string>();
  for (const route of config.routes) {
    if (!route.path.startsWith('/')) {
      errors.push(`route "${route.path}": path must start with /`);
    }
    if (/\s/.test(route.path)) {
      errors.push(`route "${route.path}": path cannot contain whitespace`);
    }
    if (seen.has(route.path)) {
      warnings.push(`route "${route.path}" is listed more than once, the last entry wins`);
    }
    seen.add(route.path);
  }

  return { valid: errors.length === 0, errors, warnings };
}
