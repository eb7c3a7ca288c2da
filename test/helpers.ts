import type {
  HttpResponseBodyMessage,
  HttpResponseStartMessage,
  HttpScope,
  Receive,
  ReceiveMessage,
  Send,
  SendMessage,
  SharedStateRecord,
} from '../lib';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export interface HttpChannelOptions {
  method?: string;
  path?: string;
  rootPath?: string;
  query?: string;
  headers?: Record<string, string>;

  /**
   * Body chunks; each becomes one http.request message
   */
  body?: string | string[];
  state?: SharedStateRecord;
}

export interface HttpChannel {
  scope: HttpScope;
  receive: Receive;
  send: Send;
  sent: SendMessage[];

  /**
   * Number of receive() calls so far
   */
  reads: () => number;
}

/**
 * In-process http channel: receive replays the body chunks, then reports a disconnect
 */
export function createHttpChannel(options: HttpChannelOptions = {}): HttpChannel {
  const chunks = options.body === undefined ? [] : typeof options.body === 'string' ? [options.body] : options.body;
  const messages: ReceiveMessage[] =
    chunks.length === 0
      ? [{ type: 'http.request', body: new Uint8Array(0), more_body: false }]
      : chunks.map((chunk, index) => ({
          type: 'http.request',
          body: encoder.encode(chunk),
          more_body: index < chunks.length - 1,
        }));

  const scope: HttpScope = {
    type: 'http',
    method: options.method ?? 'GET',
    path: options.path ?? '/',
    query_string: encoder.encode(options.query ?? ''),
    headers: Object.entries(options.headers ?? {}).map(([name, value]) => [
      encoder.encode(name.toLowerCase()),
      encoder.encode(value),
    ]),
    state: options.state,
  };

  if (options.rootPath !== undefined) {
    scope.root_path = options.rootPath;
  }

  let reads = 0;
  const sent: SendMessage[] = [];

  return {
    scope,
    receive: async () => {
      reads++;
      return messages.shift() ?? { type: 'http.disconnect' };
    },
    send: async (message) => {
      sent.push(message);
    },
    sent,
    reads: () => reads,
  };
}

export interface SentResponse {
  status: number;
  headers: Record<string, string>;
  text: string;
}

/**
 * Reads the response out of the messages sent on an http channel
 */
export function readResponse(sent: SendMessage[]): SentResponse {
  const start = sent.find((message): message is HttpResponseStartMessage => message.type === 'http.response.start');

  if (!start) {
    throw new Error('No response was started');
  }

  const headers: Record<string, string> = {};

  for (const [name, value] of start.headers) {
    headers[decoder.decode(name)] = decoder.decode(value);
  }

  const text = sent
    .filter((message): message is HttpResponseBodyMessage => message.type === 'http.response.body')
    .map((message) => decoder.decode(message.body))
    .join('');

  return { status: start.status, headers, text };
}
