/**
 * Response model and wire formatting
 */

export const Status = {
  Ok: 200,
  BadRequest: 400,
  NotFound: 404,
  InternalServerError: 500,
} as const;

export type StatusCode = (typeof Status)[keyof typeof Status];

export const REASON_PHRASES: Record<StatusCode, string> = {
  200: 'OK',
  400: 'Bad Request',
  404: 'Not Found',
  500: 'Internal Server Error',
};

/**
 * An immutable response. The wire bytes are encoded once at construction;
 * `body` and `formatResponse` hand out copies, so nothing a caller does to them
 * reaches later requests.
 */
export class Response {
  readonly #body: Buffer;
  readonly #wire: Buffer;

  constructor(
    readonly protocol: string,
    readonly status: StatusCode,
    body: Buffer | string,
  ) {
    this.#body = typeof body === 'string' ? Buffer.from(body, 'utf-8') : Buffer.from(body);
    const head = `${statusLine(this)}\r\nContent-Length: ${this.#body.byteLength}\r\n\r\n`;
    this.#wire = Buffer.concat([Buffer.from(head, 'utf-8'), this.#body]);
    Object.freeze(this);
  }

  get body(): Buffer {
    return Buffer.from(this.#body);
  }

  get byteLength(): number {
    return this.#body.byteLength;
  }

  /** Serialized status line, header and body */
  encode(): Buffer {
    return Buffer.from(this.#wire);
  }
}

export function createResponse(body: Buffer | string, status: StatusCode = Status.Ok, protocol = 'HTTP/1.1'): Response {
  return new Response(protocol, status, body);
}

export function statusLine(response: Response): string {
  return `${response.protocol} ${response.status} ${REASON_PHRASES[response.status]}`;
}

/**
 * Serialize to `<status line>\r\nContent-Length: <bytes>\r\n\r\n<body>`.
 * Content-Length counts bytes, not characters.
 */
export function formatResponse(response: Response): Buffer {
  return response.encode();
}
