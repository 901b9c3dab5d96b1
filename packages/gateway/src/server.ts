/**
 * RelayServer: HTTP control plane plus the WebSocket control channel.
 *
 * Routes:
 *   GET     /health              - liveness check with the live room count
 *                                  (`?verbose` adds a summary of each room)
 *   POST    /upload              - multipart form (`code`, `file`) from the sender
 *   GET     /download?code=CODE  - the stored file as an attachment
 *   WS      /ws                  - pairing control channel
 *
 * Every WebSocket gets its own SessionChannelHandler; the handlers, the
 * blob relay and the idle sweep share one RoomRegistry.
 */

import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocketServer } from 'ws';
import type { IObserver } from '@codedrop/core';
import { CodeDropError, InvalidRequestError, EmptyPayloadError } from '@codedrop/core';
import { NoopObserver } from '@codedrop/observability';
import { CodeGenerator } from './code-generator.js';
import { RoomRegistry, type Room } from './room-registry.js';
import { BlobRelay } from './blob-relay.js';
import { SessionChannelHandler } from './channel-handler.js';
import { notifyPeer } from './notify.js';
import { boundaryFrom, contentDisposition, parseMultipart, readBody } from './multipart.js';

export const ROOM_EXPIRED = 'Room expired.';
const SHUTTING_DOWN = 'Server shutting down.';

/** Multipart framing allowance on top of the upload limit. */
const MULTIPART_OVERHEAD = 64 * 1024;

const STATUS_BY_CODE: Record<string, number> = {
  INVALID_REQUEST: 400,
  EMPTY_PAYLOAD: 400,
  NOT_FOUND: 404,
  NO_RECEIVER: 409,
  PAYLOAD_TOO_LARGE: 413,
};

export interface RelayServerOptions {
  port: number;
  host?: string;
  observer?: IObserver;
  /** Shared registry; a fresh one is created when omitted. */
  registry?: RoomRegistry;
  /** Characters per room code. Ignored when `registry` is given. */
  codeLength?: number;
  /** Collision retries per allocation. Ignored when `registry` is given. */
  maxCodeAttempts?: number;
  /** Largest accepted upload in bytes. */
  maxUploadBytes?: number;
  /** Rooms idle longer than this are closed. 0 disables the sweep. */
  roomIdleTimeoutMs?: number;
  /** How often the idle sweep runs. Default: 60 s. */
  sweepIntervalMs?: number;
}

export class RelayServer {
  private server: Server | null = null;
  private wss: InstanceType<typeof WebSocketServer> | null = null;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private readonly port: number;
  private readonly host: string;
  private readonly observer: IObserver;
  private readonly registry: RoomRegistry;
  private readonly relay: BlobRelay;
  private readonly roomIdleTimeoutMs: number;
  private readonly sweepIntervalMs: number;

  constructor(options: RelayServerOptions) {
    this.port = options.port;
    this.host = options.host ?? '127.0.0.1';
    this.observer = options.observer ?? new NoopObserver();
    this.registry =
      options.registry ??
      new RoomRegistry(new CodeGenerator({ length: options.codeLength, maxAttempts: options.maxCodeAttempts }));
    this.relay = new BlobRelay({
      registry: this.registry,
      observer: this.observer,
      maxBytes: options.maxUploadBytes,
    });
    this.roomIdleTimeoutMs = options.roomIdleTimeoutMs ?? 0;
    this.sweepIntervalMs = options.sweepIntervalMs ?? 60_000;
  }

  /** Start listening on the configured port. */
  async start(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.server = createServer((req, res) => {
        this.handleRequest(req, res).catch((err: unknown) => {
          this.fail(res, err, { method: req.method, url: req.url });
        });
      });

      this.wss = new WebSocketServer({ noServer: true });
      this.server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
        this.handleUpgrade(req, socket, head);
      });

      this.server.on('error', reject);

      this.server.listen(this.port, this.host, () => {
        if (this.roomIdleTimeoutMs > 0) {
          this.sweepTimer = setInterval(() => this.sweepIdleRooms(), this.sweepIntervalMs);
          this.sweepTimer.unref();
        }
        const addr = this.getAddress();
        this.observer.onServerStart({
          host: addr?.host ?? this.host,
          port: addr?.port ?? this.port,
          startedAt: new Date(),
        });
        resolve();
      });
    });
  }

  /** Close every room and connection, then the listener. */
  async stop(): Promise<void> {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }

    this.closeRooms(this.registry.clear(), 'shutdown', SHUTTING_DOWN);

    if (this.wss) {
      for (const client of this.wss.clients) {
        client.terminate();
      }
      this.wss.close();
      this.wss = null;
    }

    return new Promise<void>((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.close((err) => {
        this.server = null;
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /** Get the bound address (useful in tests with port 0). */
  getAddress(): { host: string; port: number } | null {
    if (!this.server) return null;
    const addr = this.server.address();
    if (typeof addr === 'string' || addr === null) return null;
    return { host: addr.address, port: addr.port };
  }

  /** Close rooms idle past the timeout. Runs on the sweep timer. */
  sweepIdleRooms(now = Date.now()): number {
    if (this.roomIdleTimeoutMs <= 0) return 0;
    const evicted = this.registry.evictIdle(this.roomIdleTimeoutMs, now);
    this.closeRooms(evicted, 'expired', ROOM_EXPIRED);
    return evicted.length;
  }

  // ---------------------------------------------------------------------------
  // WebSocket upgrade handling
  // ---------------------------------------------------------------------------

  private handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    const wss = this.wss;
    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;
    if (!wss || pathname !== '/ws') {
      socket.write('HTTP/1.1 404 Not Found\r\n\r\n');
      socket.destroy();
      return;
    }

    wss.handleUpgrade(req, socket, head, (ws) => {
      const handler = new SessionChannelHandler(ws, {
        registry: this.registry,
        observer: this.observer,
        remoteAddress: req.socket.remoteAddress,
      });
      handler.start();
      wss.emit('connection', ws, req);
    });
  }

  private closeRooms(rooms: Array<Readonly<Room>>, reason: 'expired' | 'shutdown', message: string): void {
    for (const room of rooms) {
      this.observer.onRoomClosed(room.code, reason);
      for (const peer of [room.sender, room.receiver]) {
        if (peer) {
          notifyPeer(this.observer, peer, { type: 'peer_left', reason: message }, room.code);
        }
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Request handling
  // ---------------------------------------------------------------------------

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method ?? 'GET';
    const url = new URL(req.url ?? '/', 'http://localhost');

    // CORS headers for browser clients.
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
    res.setHeader('Access-Control-Expose-Headers', 'Content-Disposition');

    if (method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    // GET /health
    if (method === 'GET' && url.pathname === '/health') {
      this.sendJson(res, 200, {
        status: 'ok',
        timestamp: new Date().toISOString(),
        rooms: this.registry.size,
        ...(url.searchParams.has('verbose') ? { roomList: this.registry.listRooms() } : {}),
      });
      return;
    }

    // POST /upload
    if (method === 'POST' && url.pathname === '/upload') {
      await this.handleUpload(req, res);
      return;
    }

    // GET /download?code=
    if (method === 'GET' && url.pathname === '/download') {
      const code = url.searchParams.get('code') ?? '';
      const payload = this.relay.download(code);
      res.writeHead(200, {
        'Content-Type': 'application/octet-stream',
        'Content-Disposition': contentDisposition(payload.filename),
        'Content-Length': payload.bytes.length,
      });
      res.end(payload.bytes);
      return;
    }

    this.sendJson(res, 404, { error: 'Not found' });
  }

  private async handleUpload(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const boundary = boundaryFrom(req.headers['content-type']);
    if (!boundary) {
      // Drain so the client sees the response rather than a reset.
      req.resume();
      throw new InvalidRequestError('Expected a multipart/form-data body.');
    }

    const maxBytes = this.relay.maxBytes;
    const body = await readBody(
      req,
      maxBytes === undefined ? undefined : { maxBytes, overheadBytes: MULTIPART_OVERHEAD },
    );
    const form = parseMultipart(body, boundary);

    const code = form.fields.get('code');
    if (!code) {
      throw new InvalidRequestError('Missing "code" field.');
    }
    const file = form.files.find((f) => f.field === 'file');
    if (!file) {
      throw new EmptyPayloadError({ roomCode: code });
    }

    const receipt = this.relay.upload(code, file.filename, file.data);
    this.sendJson(res, 200, { uploaded: true, ...receipt });
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private fail(res: ServerResponse, err: unknown, context: Record<string, unknown>): void {
    if (res.headersSent) {
      res.destroy();
      return;
    }
    if (err instanceof CodeDropError) {
      const status = STATUS_BY_CODE[err.code] ?? 500;
      if (status === 500) this.observer.onError(err, { ...context, ...err.context });
      this.sendJson(res, status, { error: err.message, code: err.code });
      return;
    }

    const error = err instanceof Error ? err : new Error(String(err));
    this.observer.onError(error, context);
    this.sendJson(res, 500, { error: 'Internal server error' });
  }

  private sendJson(res: ServerResponse, status: number, data: unknown): void {
    const body = JSON.stringify(data);
    res.writeHead(status, {
      'Content-Type': 'application/json',
      'Content-Length': Buffer.byteLength(body),
    });
    res.end(body);
  }
}
