import { Headers, type HeadersInit } from './headers';
import type { Send } from './types/Channel';

/**
 * Response types
 *
 * A response is sent as exactly one `http.response.start` message followed by
 * exactly one `http.response.body` message.
 *
 * @module responses
 */

export type ResponseBody = string | Uint8Array | null | undefined;

export interface ResponseInit {
  status?: number;
  headers?: HeadersInit;
}

const encoder = new TextEncoder();

const EMPTY_BODY = new Uint8Array(0);

export class TramwayResponse {

  public static readonly charset = 'utf-8';

  public readonly body: Uint8Array;

  public readonly status: number;

  private _headers: Headers;

  public constructor(body?: unknown, init: ResponseInit = {}) {
    this.status = init.status ?? 200;
    this.body = this.encode(body);
    this._headers = this.processHeaders(init.headers);
  }

  public get headers(): Headers {
    return this._headers;
  }

  /**
   * Replaces the headers; content-length and content-type defaults are applied again
   */
  public set headers(init: HeadersInit | undefined) {
    this._headers = this.processHeaders(init);
  }

  /**
   * Media type set as content-type unless the caller provides one
   */
  protected get mediaType(): string | null {
    return null;
  }

  /**
   * Sends the response over an http channel
   */
  public async send(send: Send): Promise<void> {
    await send({ type: 'http.response.start', status: this.status, headers: this.headers.raw() });
    await send({ type: 'http.response.body', body: this.body });
  }

  protected encode(body: unknown): Uint8Array {
    if (body === null || body === undefined) {
      return EMPTY_BODY;
    }

    if (body instanceof Uint8Array) {
      return body;
    }

    if (typeof body === 'string') {
      return encoder.encode(body);
    }

    throw new TypeError(`${this.constructor.name} cannot encode a body of type ${typeof body}`);
  }

  private processHeaders(init: HeadersInit | undefined): Headers {
    const headers = init instanceof Headers ? init : new Headers(init);

    if (!headers.has('content-length') && this.status >= 200 && this.status !== 204 && this.status !== 304) {
      headers.set('content-length', String(this.body.byteLength));
    }

    const mediaType = this.mediaType;

    if (!mediaType || headers.has('content-type')) {
      return headers;
    }

    headers.set('content-type', mediaType);

    if (mediaType.startsWith('text/') && !mediaType.toLowerCase().includes('charset=')) {
      headers.append('content-type', `charset=${TramwayResponse.charset}`, '; ');
    }

    return headers;
  }

}

/**
 * 204 with no body
 */
export class EmptyResponse extends TramwayResponse {

  public constructor(init: Omit<ResponseInit, 'status'> = {}) {
    super(null, { ...init, status: 204 });
  }

}

export class PlainTextResponse extends TramwayResponse {

  protected override get mediaType(): string {
    return 'text/plain';
  }

}

export class HTMLResponse extends TramwayResponse {

  protected override get mediaType(): string {
    return 'text/html';
  }

}

export class JSONResponse extends TramwayResponse {

  protected override get mediaType(): string {
    return 'application/json';
  }

  protected override encode(body: unknown): Uint8Array {
    return encoder.encode(JSON.stringify(body ?? null));
  }

}

/**
 * Wraps `send` so response bodies go out empty; headers, `content-length` included,
 * pass through unchanged. Used for HEAD requests.
 */
export function withoutBody(send: Send): Send {
  return async (message) => {
    await send(message.type === 'http.response.body' ? { ...message, body: new Uint8Array(0) } : message);
  };
}
