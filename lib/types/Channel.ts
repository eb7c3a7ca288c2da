/**
 * Channel protocol type definitions
 *
 * A channel is one connection's message exchange with the hosting server.
 * Each channel is described by a scope and driven through a receive/send pair.
 *
 * @module types/Channel
 */

export type ChannelKind = 'http' | 'websocket' | 'lifespan';

/**
 * Raw header pairs as they travel on the wire (lowercased names on requests)
 */
export type RawHeaders = Array<[Uint8Array, Uint8Array]>;

export type SharedStateRecord = Record<string, unknown>;

export interface HttpScope {
  type: 'http';
  http_version?: string;
  method: string;
  scheme?: string;
  path: string;
  raw_path?: Uint8Array;
  query_string?: Uint8Array;
  root_path?: string;
  headers: RawHeaders;
  client?: [string, number] | null;
  server?: [string, number | null] | null;
  state?: SharedStateRecord;

  /**
   * Converted path parameters, attached by the router once a route resolves
   */
  pathParams?: Record<string, unknown>;

  /**
   * Owning application, attached by the application before dispatch
   */
  app?: unknown;
}

export interface WebsocketScope {
  type: 'websocket';
  path: string;
  root_path?: string;
  headers: RawHeaders;
  subprotocols?: string[];
  state?: SharedStateRecord;
}

export interface LifespanScope {
  type: 'lifespan';
  state?: SharedStateRecord;
}

export type Scope = HttpScope | WebsocketScope | LifespanScope;

// Received on http channels
export interface HttpRequestMessage {
  type: 'http.request';
  body?: Uint8Array;
  more_body?: boolean;
}

export interface HttpDisconnectMessage {
  type: 'http.disconnect';
}

// Received on lifespan channels
export interface LifespanStartupMessage {
  type: 'lifespan.startup';
}

export interface LifespanShutdownMessage {
  type: 'lifespan.shutdown';
}

export type ReceiveMessage =
  | HttpRequestMessage
  | HttpDisconnectMessage
  | LifespanStartupMessage
  | LifespanShutdownMessage;

// Sent on http channels
export interface HttpResponseStartMessage {
  type: 'http.response.start';
  status: number;
  headers: RawHeaders;
}

export interface HttpResponseBodyMessage {
  type: 'http.response.body';
  body: Uint8Array;
  more_body?: boolean;
}

// Sent on lifespan channels
export type LifespanSendMessage =
  | { type: 'lifespan.startup.complete' }
  | { type: 'lifespan.startup.failed'; message: string }
  | { type: 'lifespan.shutdown.complete' }
  | { type: 'lifespan.shutdown.failed'; message: string };

export type SendMessage = HttpResponseStartMessage | HttpResponseBodyMessage | LifespanSendMessage;

export type Receive = () => Promise<ReceiveMessage>;

export type Send = (message: SendMessage) => Promise<void>;

/**
 * Anything that can take over a channel: the application, a built chain entry point,
 * the router, or a single route.
 */
export type ChannelApp = (scope: Scope, receive: Receive, send: Send) => Promise<void>;
