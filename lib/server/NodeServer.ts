import { createServer, type IncomingMessage, type OutgoingHttpHeaders, type Server, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { toError, TramwayError } from '../errors';
import type { ServerLogger } from '../logger';
import type { Tramway } from '../Tramway';
import type {
  HttpScope,
  LifespanScope,
  RawHeaders,
  ReceiveMessage,
  SendMessage,
  SharedStateRecord,
} from '../types/Channel';
import { MessageQueue } from '../utils/channel';

export interface NodeServerOptions {

  /**
   * Server port; 0 picks a free one
   * @default 3000
   */
  port?: number;

  /**
   * Server hostname
   * @default undefined (binds to all interfaces)
   */
  hostname?: string;

  /**
   * Defaults to the application's logger
   */
  logger?: ServerLogger;
}

const encoder = new TextEncoder();

const decoder = new TextDecoder();

function toRawHeaders(rawHeaders: string[]): RawHeaders {
  const headers: RawHeaders = [];

  for (let index = 0; index + 1 < rawHeaders.length; index += 2) {
    headers.push([encoder.encode(rawHeaders[index].toLowerCase()), encoder.encode(rawHeaders[index + 1])]);
  }

  return headers;
}

function toOutgoingHeaders(headers: RawHeaders): OutgoingHttpHeaders {
  const outgoing: OutgoingHttpHeaders = {};

  for (const [name, value] of headers) {
    const key = decoder.decode(name);
    const existing = outgoing[key];
    const decoded = decoder.decode(value);

    if (existing === undefined) {
      outgoing[key] = decoded;
    } else {
      outgoing[key] = Array.isArray(existing) ? [...existing, decoded] : [String(existing), decoded];
    }
  }

  return outgoing;
}

/**
 * NodeServer - serves a Tramway application over node:http
 *
 * Each incoming request becomes an http channel. `start()` and `stop()` drive the
 * application's lifespan channel; the state record it fills is handed to every
 * request.
 *
 * @example
 * ```typescript
 * const server = new NodeServer(app, { port: 8080, hostname: '0.0.0.0' });
 *
 * await server.start();
 * process.once('SIGTERM', () => server.stop());
 * ```
 */
export class NodeServer {

  public readonly app: Tramway;

  private readonly port: number;

  private readonly hostname?: string;

  private readonly logger: ServerLogger;

  private readonly state: SharedStateRecord = {};

  private server?: Server;

  private lifespan?: {
    inbox: MessageQueue<ReceiveMessage>;
    replies: MessageQueue<SendMessage>;
    task: Promise<void>;
  };

  public constructor(app: Tramway, options: NodeServerOptions = {}) {
    this.app = app;
    this.port = options.port ?? 3000;
    this.hostname = options.hostname;
    this.logger = options.logger ?? app.logger;
  }

  /**
   * Bound address once listening
   */
  public get address(): AddressInfo | null {
    const address = this.server?.address();

    return address && typeof address === 'object' ? address : null;
  }

  /**
   * Runs the startup handshake, then starts listening
   *
   * @throws TramwayError when the application reports a startup failure
   */
  public async start(): Promise<void> {
    if (this.lifespan) {
      throw new TramwayError('Server already started');
    }

    const inbox = new MessageQueue<ReceiveMessage>();
    const replies = new MessageQueue<SendMessage>();
    const scope: LifespanScope = { type: 'lifespan', state: this.state };
    const task = this.app
      .handle(
        scope,
        () => inbox.next(),
        async (message) => replies.push(message),
      )
      .catch((error: unknown) => replies.fail(toError(error)));

    this.lifespan = { inbox, replies, task };
    inbox.push({ type: 'lifespan.startup' });

    const reply = await replies.next();

    if (reply.type === 'lifespan.startup.failed') {
      this.lifespan = undefined;
      await task;
      throw new TramwayError(reply.message);
    }

    const server = createServer((req, res) => {
      this.serve(req, res).catch((error: unknown) => {
        this.logger.error('Request handling error:', error);
      });
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, this.hostname, () => {
        server.off('error', reject);
        resolve();
      });
    });

    this.server = server;

    const address = this.address;

    this.logger.info(`${this.app.name} listening on ${address?.address}:${address?.port}`);
  }

  /**
   * Stops listening, then runs the shutdown handshake
   *
   * @throws TramwayError when the application reports a shutdown failure
   */
  public async stop(): Promise<void> {
    const { server, lifespan } = this;

    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
        server.closeAllConnections();
      });
      this.server = undefined;
    }

    if (!lifespan) {
      return;
    }

    this.lifespan = undefined;
    lifespan.inbox.push({ type: 'lifespan.shutdown' });

    const reply = await lifespan.replies.next();

    await lifespan.task;

    if (reply.type === 'lifespan.shutdown.failed') {
      throw new TramwayError(reply.message);
    }
  }

  private async serve(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', 'http://localhost');
    let path: string;

    try {
      path = decodeURIComponent(url.pathname);
    } catch {
      res.writeHead(400, { 'content-type': 'text/plain; charset=utf-8' }).end('Bad Request');
      return;
    }

    const address = this.address;
    const scope: HttpScope = {
      type: 'http',
      http_version: req.httpVersion,
      method: req.method ?? 'GET',
      scheme: 'http',
      path,
      raw_path: encoder.encode(url.pathname),
      query_string: encoder.encode(url.search.slice(1)),
      headers: toRawHeaders(req.rawHeaders),
      client: req.socket.remoteAddress ? [req.socket.remoteAddress, req.socket.remotePort ?? 0] : null,
      server: address ? [address.address, address.port] : null,
      state: this.state,
    };

    const inbox = new MessageQueue<ReceiveMessage>();

    req.on('data', (chunk: Buffer) => {
      inbox.push({ type: 'http.request', body: new Uint8Array(chunk), more_body: true });
    });
    req.on('end', () => {
      inbox.push({ type: 'http.request', body: new Uint8Array(0), more_body: false });
    });
    res.on('close', () => {
      inbox.push({ type: 'http.disconnect' });
    });

    try {
      await this.app.handle(
        scope,
        () => inbox.next(),
        (message) => this.write(res, message),
      );
    } catch (error) {
      this.logger.error(`Unhandled error for ${scope.method} ${scope.path}:`, error);

      if (!res.headersSent) {
        res.writeHead(500, { 'content-type': 'text/plain; charset=utf-8' }).end('Internal Server Error');
        return;
      }

      res.destroy(toError(error));
      return;
    }

    if (!res.headersSent) {
      this.logger.error(`No response was sent for ${scope.method} ${scope.path}`);
      res.writeHead(500, { 'content-type': 'text/plain; charset=utf-8' }).end('Internal Server Error');
      return;
    }

    if (!res.writableEnded) {
      res.end();
    }
  }

  private async write(res: ServerResponse, message: SendMessage): Promise<void> {
    switch (message.type) {
      case 'http.response.start':
        res.writeHead(message.status, toOutgoingHeaders(message.headers));
        return;
      case 'http.response.body':
        await new Promise<void>((resolve, reject) => {
          const done = (error?: Error | null) => (error ? reject(error) : resolve());

          if (message.more_body) {
            res.write(message.body, done);
          } else {
            res.end(message.body, () => resolve());
          }
        });
        return;
      default:
        this.logger.warn(`Ignoring ${message.type} on an http channel`);
    }
  }

}
