import { BadRequestException, ClientDisconnectedError } from './errors';
import { FrozenHeaders } from './headers';
import { State } from './State';
import type { HttpScope, Receive, Send } from './types/Channel';

/**
 * Request type alias, mirroring how handlers usually name it
 */
export type Context = TramwayRequest;

const decoder = new TextDecoder();

function concat(chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((size, chunk) => size + chunk.byteLength, 0);
  const body = new Uint8Array(total);
  let offset = 0;

  for (const chunk of chunks) {
    body.set(chunk, offset);
    offset += chunk.byteLength;
  }

  return body;
}

/**
 * TramwayRequest wraps one http channel
 *
 * Gives handlers a request-shaped view over the scope and the receive side of the
 * channel. The body is pulled from the channel on demand and memoised.
 */
export class TramwayRequest {

  private readonly _scope: HttpScope;

  private readonly _receive: Receive;

  private readonly _send: Send;

  private _headers?: FrozenHeaders;

  private _query?: URLSearchParams;

  private _state?: State;

  private _values?: Map<string, unknown>;

  private chunks: Uint8Array[] = [];

  private bodyCache?: Uint8Array;

  private jsonCache?: { value: unknown };

  private _disconnected = false;

  public constructor(scope: HttpScope, receive: Receive, send: Send) {
    this._scope = scope;
    this._receive = receive;
    this._send = send;
  }

  public get scope(): HttpScope {
    return this._scope;
  }

  /**
   * Raw send side of the channel, for handlers that stream their own response
   */
  public get send(): Send {
    return this._send;
  }

  public get method(): string {
    return this._scope.method.toUpperCase();
  }

  public get path(): string {
    return this._scope.path;
  }

  /**
   * Request headers (lazy, read-only)
   */
  public get headers(): FrozenHeaders {
    if (!this._headers) {
      this._headers = FrozenHeaders.fromRaw(this._scope.headers);
    }

    return this._headers;
  }

  public get query(): URLSearchParams {
    if (!this._query) {
      this._query = new URLSearchParams(decoder.decode(this._scope.query_string ?? new Uint8Array(0)));
    }

    return this._query;
  }

  /**
   * Converted path parameters
   */
  public get params(): Readonly<Record<string, unknown>> {
    return this._scope.pathParams ?? {};
  }

  /**
   * Shared application state, by reference
   */
  public get state(): State {
    if (!this._state) {
      if (!this._scope.state) {
        this._scope.state = {};
      }

      this._state = new State(this._scope.state);
    }

    return this._state;
  }

  public get app(): unknown {
    return this._scope.app;
  }

  /**
   * True once a disconnect message was received
   */
  public get disconnected(): boolean {
    return this._disconnected;
  }

  /**
   * Get path parameter by name
   */
  public getParam(name: string): unknown {
    return this.params[name];
  }

  /**
   * Per-request scratch values, shared between middleware and handler
   */
  public setValue(key: string, value: unknown): void {
    this.values.set(key, value);
  }

  public getValue(key: string): unknown {
    return this.values.get(key);
  }

  /**
   * Streams body chunks as they arrive
   *
   * Once the body has been read, yields the memoised body instead.
   *
   * @throws ClientDisconnectedError when the client goes away mid-body
   */
  public async *stream(): AsyncGenerator<Uint8Array, void, undefined> {
    if (this.bodyCache) {
      if (this.bodyCache.byteLength > 0) {
        yield this.bodyCache;
      }

      return;
    }

    while (true) {
      const message = await this._receive();

      if (message.type === 'http.disconnect') {
        this._disconnected = true;
        throw new ClientDisconnectedError();
      }

      if (message.type !== 'http.request') {
        continue;
      }

      const chunk = message.body ?? new Uint8Array(0);

      if (chunk.byteLength > 0) {
        this.chunks.push(chunk);
        yield chunk;
      }

      if (!message.more_body) {
        this.bodyCache = concat(this.chunks);
        this.chunks = [];
        return;
      }
    }
  }

  /**
   * Reads the whole body
   */
  public async body(): Promise<Uint8Array> {
    if (!this.bodyCache) {
      for await (const _chunk of this.stream()) {
        // drained into the cache
      }
    }

    return this.bodyCache ?? new Uint8Array(0);
  }

  public async text(): Promise<string> {
    return decoder.decode(await this.body());
  }

  /**
   * Get request body as JSON
   *
   * Throws BadRequestException if JSON is invalid. Empty body is valid and returns
   * an empty object.
   *
   * @throws BadRequestException - 400 if JSON parsing fails
   */
  public async json(): Promise<unknown> {
    if (this.jsonCache) {
      return this.jsonCache.value;
    }

    const text = await this.text();

    if (text.trim() === '') {
      this.jsonCache = { value: {} };
      return this.jsonCache.value;
    }

    try {
      this.jsonCache = { value: JSON.parse(text) };
    } catch (error) {
      throw new BadRequestException({
        error: 'Invalid JSON in request body',
        message: error instanceof Error ? error.message : 'Failed to parse JSON',
      });
    }

    return this.jsonCache.value;
  }

  /**
   * Receive function for the rest of the chain
   *
   * When the body was already read, it is handed out again as a single message before
   * the channel is consulted.
   */
  public replay(): Receive {
    const body = this.bodyCache;

    if (!body) {
      return this._receive;
    }

    let replayed = false;

    return async () => {
      if (replayed) {
        return this._receive();
      }

      replayed = true;
      return { type: 'http.request', body, more_body: false };
    };
  }

  private get values(): Map<string, unknown> {
    if (!this._values) {
      this._values = new Map<string, unknown>();
    }

    return this._values;
  }

}
