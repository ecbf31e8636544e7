/**
 * Error taxonomy
 * Construction-time errors abort boot; everything else is scoped to one connection
 */

export const ErrorCode = {
  BIND_FAILED: 'BIND_FAILED',
  POOL_CONFIG: 'POOL_CONFIG',
  POOL_CLOSED: 'POOL_CLOSED',
  ACCEPT_FAILED: 'ACCEPT_FAILED',
  REQUEST_PARSE: 'REQUEST_PARSE',
  FILE_READ: 'FILE_READ',
  ROUTE_REGISTRATION: 'ROUTE_REGISTRATION',
  READ_FAILED: 'READ_FAILED',
  WRITE_FAILED: 'WRITE_FAILED',
  TIMEOUT: 'TIMEOUT',
  WORKER_FAULT: 'WORKER_FAULT',
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export class CanneryError extends Error {
  readonly code: ErrorCodeValue;

  constructor(code: ErrorCodeValue, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class BindError extends CanneryError {
  constructor(readonly address: string, cause?: unknown) {
    super(ErrorCode.BIND_FAILED, `Error binding to address ${address}: ${describe(cause)}`, { cause });
  }
}

export class PoolConfigurationError extends CanneryError {
  constructor(readonly size: unknown) {
    super(ErrorCode.POOL_CONFIG, `Worker pool size must be an integer >= 1, got ${String(size)}`);
  }
}

export class PoolClosedError extends CanneryError {
  constructor() {
    super(ErrorCode.POOL_CLOSED, 'Worker pool is shut down');
  }
}

export class AcceptError extends CanneryError {
  constructor(cause: unknown) {
    super(ErrorCode.ACCEPT_FAILED, `Failed to accept connection: ${describe(cause)}`, { cause });
  }
}

/** Never thrown; attached to parse warnings so logs carry the code */
export class RequestParseError extends CanneryError {
  constructor(message: string) {
    super(ErrorCode.REQUEST_PARSE, message);
  }
}

export class FileReadError extends CanneryError {
  constructor(readonly file: string, cause: unknown) {
    super(ErrorCode.FILE_READ, `Error reading contents of ${file}: ${describe(cause)}`, { cause });
  }
}

export class RouteRegistrationError extends CanneryError {
  constructor(readonly path: string, message: string, cause?: unknown) {
    super(ErrorCode.ROUTE_REGISTRATION, `Cannot register ${path}: ${message}`, { cause });
  }
}

export class ReadError extends CanneryError {
  constructor(cause: unknown) {
    super(ErrorCode.READ_FAILED, `Error reading request line: ${describe(cause)}`, { cause });
  }
}

export class WriteError extends CanneryError {
  constructor(cause: unknown) {
    super(ErrorCode.WRITE_FAILED, `Error writing response to stream: ${describe(cause)}`, { cause });
  }
}

export class TimeoutError extends CanneryError {
  constructor(readonly phase: 'read' | 'write', readonly ms: number) {
    super(ErrorCode.TIMEOUT, `Connection ${phase} exceeded ${ms}ms`);
  }
}

export class WorkerFault extends CanneryError {
  constructor(readonly workerId: number, readonly jobId: number, cause: unknown) {
    super(ErrorCode.WORKER_FAULT, `Worker ${workerId} failed on job ${jobId}: ${describe(cause)}`, { cause });
  }
}

export class ConfigError extends CanneryError {
  constructor(readonly issues: string[]) {
    super(ErrorCode.CONFIG_INVALID, `Invalid configuration:\n  ${issues.join('\n  ')}`);
  }
}

function describe(cause: unknown): string {
  if (cause === undefined) return 'unknown error';
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Render any thrown value for a log line
 */
export function formatError(error: unknown): string {
  if (error instanceof CanneryError) return `${error.code}: ${error.message}`;
  if (error instanceof Error) return error.message;
  return String(error);
}

export function isCanneryError(error: unknown): error is CanneryError {
  return error instanceof CanneryError;
}
