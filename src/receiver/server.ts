/**
 * Receiver Server — the other end of the relay
 *
 * Accepts what the agent sends: multipart photo uploads on /upload and JSON
 * messages on /sms and /clipboard. Each accepted item goes to the registered
 * handler before the sender gets its 200, so a failed write answers 500 and
 * the sender records a rejection.
 */

import { createServer, type IncomingMessage, type ServerResponse, type Server } from 'node:http';
import type pino from 'pino';
import type { z } from 'zod';
import { ReceiveError, toError } from '../core/errors.js';
import { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import {
  ClipboardPayloadSchema,
  SmsPayloadSchema,
  type ItemHandler,
  type ReceivedItem,
  type ReceivedPhoto,
} from './types.js';

export const DEFAULT_RECEIVER_PORT = 3000;
export const DEFAULT_MAX_BODY_BYTES = 50 * 1024 * 1024;
export const DEFAULT_PHOTO_NAME = 'photo.jpg';

const ROUTES = new Set(['/upload', '/sms', '/clipboard']);

export interface ReceiverServerOptions {
  /** 0 picks a free port */
  port?: number;
  host?: string;
  maxBodyBytes?: number;
  events?: EventBus;
  logger?: pino.Logger;
  now?: () => number;
}

export class ReceiverServer {
  private server: Server | null = null;
  private handler: ItemHandler | null = null;
  private readonly port: number;
  private readonly host: string;
  private readonly maxBodyBytes: number;
  private readonly events: EventBus;
  private readonly logger: pino.Logger;
  private readonly now: () => number;
  private boundPort: number | null = null;
  private received = 0;

  constructor(options: ReceiverServerOptions = {}) {
    this.port = options.port ?? DEFAULT_RECEIVER_PORT;
    this.host = options.host ?? '0.0.0.0';
    this.maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
    this.events = options.events ?? new EventBus();
    this.logger = (options.logger ?? getLogger()).child({ component: 'receiver' });
    this.now = options.now ?? Date.now;
  }

  /** Set the handler called for every accepted item */
  onItem(handler: ItemHandler): void {
    this.handler = handler;
  }

  getEvents(): EventBus {
    return this.events;
  }

  /** Start listening; resolves with the base URL */
  async start(): Promise<string> {
    if (this.server) {
      throw new ReceiveError('Receiver already started', 500);
    }

    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((err: unknown) => this.fail(res, req.url ?? '/', err));
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error): void => {
        this.server = null;
        reject(err);
      };
      server.once('error', onError);
      server.listen(this.port, this.host, () => {
        server.off('error', onError);
        resolve();
      });
    });

    server.on('error', (err) => this.logger.error({ err }, 'Receiver server error'));

    const address = server.address();
    const port = typeof address === 'object' && address !== null ? address.port : this.port;
    this.boundPort = port;
    const shownHost = this.host === '0.0.0.0' || this.host === '::' ? 'localhost' : this.host;
    const url = `http://${shownHost}:${port}`;

    this.logger.info({ url, maxBodyBytes: this.maxBodyBytes }, 'Receiver listening');
    this.events.emit('receiver:listening', { url, port });
    return url;
  }

  /** Stop listening and drop idle keep-alive connections */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    this.boundPort = null;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }

  isRunning(): boolean {
    return this.server?.listening ?? false;
  }

  /** Port actually bound, once listening */
  getPort(): number | null {
    return this.boundPort;
  }

  getReceivedCount(): number {
    return this.received;
  }

  // ─── Request Handling ─────────────────────────────────────

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const path = new URL(req.url ?? '/', 'http://receiver').pathname;

    if (path === '/health') {
      sendJson(res, 200, { status: 'ok', received: this.received });
      return;
    }

    if (!ROUTES.has(path)) {
      this.reject(req, res, path, new ReceiveError('Not found', 404));
      return;
    }

    if (req.method !== 'POST') {
      this.reject(req, res, path, new ReceiveError('Method not allowed', 405));
      return;
    }

    let item: ReceivedItem;
    try {
      const body = await this.readBody(req);
      item = await this.parseItem(path, req, body);
    } catch (err) {
      if (err instanceof ReceiveError) {
        this.reject(req, res, path, err);
        return;
      }
      throw err;
    }

    if (this.handler) {
      try {
        await this.handler(item);
      } catch (err) {
        this.logger.error({ err, kind: item.kind }, 'Failed to store received item');
        sendJson(res, 500, { error: 'Failed to store item' });
        return;
      }
    }

    this.received++;
    this.logger.info({ kind: item.kind, path }, 'Item received');
    this.events.emit('receiver:item', item);
    sendJson(res, 200, { accepted: true, kind: item.kind });
  }

  private async parseItem(path: string, req: IncomingMessage, body: Buffer): Promise<ReceivedItem> {
    const receivedAt = this.now();

    switch (path) {
      case '/upload':
        return this.parsePhoto(req.headers['content-type'], body, receivedAt);
      case '/sms':
        return { kind: 'sms', ...parseJson(body, SmsPayloadSchema, 'SMS'), receivedAt };
      default:
        return { kind: 'clipboard', ...parseJson(body, ClipboardPayloadSchema, 'clipboard'), receivedAt };
    }
  }

  private async parsePhoto(contentType: string | undefined, body: Buffer, receivedAt: number): Promise<ReceivedPhoto> {
    if (!contentType?.toLowerCase().startsWith('multipart/form-data')) {
      throw new ReceiveError('Expected a multipart/form-data upload', 400);
    }

    let form: FormData;
    try {
      form = await new Response(body, { headers: { 'content-type': contentType } }).formData();
    } catch (err) {
      throw new ReceiveError('Malformed multipart body', 400, toError(err));
    }

    const entry = form.get('data');
    if (entry === null) {
      throw new ReceiveError('Missing data', 400);
    }
    if (typeof entry === 'string') {
      return { kind: 'photo', fileName: DEFAULT_PHOTO_NAME, bytes: Buffer.from(entry), receivedAt };
    }
    return {
      kind: 'photo',
      fileName: entry.name || DEFAULT_PHOTO_NAME,
      bytes: new Uint8Array(await entry.arrayBuffer()),
      receivedAt,
    };
  }

  // ─── Helpers ──────────────────────────────────────────────

  private readBody(req: IncomingMessage): Promise<Buffer> {
    const tooLarge = (): ReceiveError =>
      new ReceiveError(`Body exceeds ${this.maxBodyBytes} bytes`, 413);

    const declared = Number(req.headers['content-length']);
    if (Number.isFinite(declared) && declared > this.maxBodyBytes) {
      req.resume();
      return Promise.reject(tooLarge());
    }

    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      const onData = (chunk: Buffer): void => {
        size += chunk.length;
        if (size > this.maxBodyBytes) {
          req.off('data', onData);
          req.resume();
          reject(tooLarge());
          return;
        }
        chunks.push(chunk);
      };
      req.on('data', onData);
      req.on('end', () => resolve(Buffer.concat(chunks)));
      req.on('error', reject);
    });
  }

  private reject(req: IncomingMessage, res: ServerResponse, path: string, error: ReceiveError): void {
    this.logger.warn({ path, method: req.method, status: error.status }, error.message);
    this.events.emit('receiver:rejected', { path, status: error.status, reason: error.message });
    if (error.status === 413) {
      res.setHeader('connection', 'close');
    }
    sendJson(res, error.status, { error: error.message });
  }

  private fail(res: ServerResponse, path: string, err: unknown): void {
    this.logger.error({ err, path }, 'Request handling failed');
    if (!res.headersSent) {
      sendJson(res, 500, { error: 'Internal error' });
    } else {
      res.destroy(toError(err));
    }
  }
}

// ═══════════════════════════════════════════════════════════════
// UTILITY
// ═══════════════════════════════════════════════════════════════

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function parseJson<T>(body: Buffer, schema: z.ZodType<T, z.ZodTypeDef, unknown>, label: string): T {
  let raw: unknown;
  try {
    raw = JSON.parse(body.toString('utf-8'));
  } catch (err) {
    throw new ReceiveError(`Invalid ${label} JSON`, 400, toError(err));
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ReceiveError(`Invalid ${label} payload: ${detail}`, 400, result.error);
  }
  return result.data;
}
