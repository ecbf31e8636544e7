/**
 * Request-line parsing
 * A malformed line never fails: each missing or unknown token falls back to a default
 */

import { RequestParseError } from '../lib/errors.js';

export const METHODS = ['GET', 'POST', 'PUT', 'DELETE'] as const;

export type Method = typeof METHODS[number];

export const DEFAULT_METHOD: Method = 'GET';
export const DEFAULT_PATH = '/';
export const DEFAULT_PROTOCOL = 'HTTP/1.1';

export interface Request {
  method: Method;
  path: string;
  protocol: string;
  /** Body parsing is unsupported; always undefined */
  body?: undefined;
}

export interface ParsedRequest {
  request: Request;
  warnings: RequestParseError[];
}

function isMethod(token: string): token is Method {
  return (METHODS as readonly string[]).includes(token);
}

export function parseRequestLine(line: string): ParsedRequest {
  const warnings: RequestParseError[] = [];
  const [methodToken, path, protocol] = line.trim().split(/\s+/).filter(Boolean);

  let method: Method = DEFAULT_METHOD;
  if (methodToken === undefined) {
    warnings.push(new RequestParseError(`missing method, defaulting to ${DEFAULT_METHOD}`));
  } else if (isMethod(methodToken)) {
    method = methodToken;
  } else {
    warnings.push(new RequestParseError(`unknown method "${methodToken}", defaulting to ${DEFAULT_METHOD}`));
  }

  if (path === undefined) {
    warnings.push(new RequestParseError(`missing path, defaulting to ${DEFAULT_PATH}`));
  }
  if (protocol === undefined) {
    warnings.push(new RequestParseError(`missing protocol, defaulting to ${DEFAULT_PROTOCOL}`));
  }

  return {
    request: {
      method,
      path: path ?? DEFAULT_PATH,
      protocol: protocol ?? DEFAULT_PROTOCOL,
    },
    warnings,
  };
}
