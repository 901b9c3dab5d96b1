/**
 * FileObserver: structured JSONL file logging with rotation.
 *
 * Each event is serialised as a single JSON line (JSONL) and appended to the
 * configured log file. When the file exceeds `maxBytes` it is rotated: the
 * current file is renamed with a `.1` suffix (overwriting any previous
 * rotation) and a fresh file is opened.
 *
 * Default path : ~/.codedrop/logs/codedrop.jsonl
 * Default limit: 10 MB
 */

import { writeFileSync, appendFileSync, renameSync, statSync, mkdirSync, existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { homedir } from 'node:os';

import type {
  IObserver,
  ServerStartEvent,
  RoomEvent,
  PayloadEvent,
  ChannelEvent,
  NotifyFailedEvent,
  RoomCloseReason,
  RoomRole,
} from '@codedrop/core';
import { truncate } from '@codedrop/core';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function expandHome(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return resolve(homedir(), p.slice(2));
  }
  return resolve(p);
}

export function serializeError(err: Error): Record<string, unknown> {
  return {
    name: err.name,
    message: err.message,
    stack: err.stack,
  };
}

// ---------------------------------------------------------------------------
// FileObserver
// ---------------------------------------------------------------------------

export interface FileObserverOptions {
  /** Absolute or ~-relative path to the JSONL log file. */
  filePath?: string;
  /** Max file size in bytes before rotation (default 10 MB). */
  maxBytes?: number;
  /** Buffered lines are written after this many ms (default 100). */
  flushDelayMs?: number;
}

export class FileObserver implements IObserver {
  private readonly filePath: string;
  private readonly maxBytes: number;
  private readonly flushDelayMs: number;
  private buffer: string[] = [];
  private flushTimer: ReturnType<typeof setTimeout> | null = null;
  private flushing = false;

  constructor(opts: FileObserverOptions = {}) {
    this.filePath = expandHome(opts.filePath ?? '~/.codedrop/logs/codedrop.jsonl');
    this.maxBytes = opts.maxBytes ?? 10 * 1024 * 1024; // 10 MB
    this.flushDelayMs = opts.flushDelayMs ?? 100;
    this.ensureDir();
  }

  /** Resolved path of the active log file. */
  get path(): string {
    return this.filePath;
  }

  // ---- internal -----------------------------------------------------------

  private ensureDir(): void {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
  }

  private write(type: string, data: Record<string, unknown>): void {
    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      type,
      ...data,
    });
    this.buffer.push(line);
    this.scheduleFlush();
  }

  private scheduleFlush(): void {
    if (this.flushTimer !== null) return;
    this.flushTimer = setTimeout(() => {
      this.flushTimer = null;
      this.flushSync();
    }, this.flushDelayMs);
    this.flushTimer.unref();
  }

  private flushSync(): void {
    if (this.buffer.length === 0 || this.flushing) return;
    this.flushing = true;

    const payload = this.buffer.join('\n') + '\n';
    this.buffer = [];

    try {
      this.rotateIfNeeded();
      appendFileSync(this.filePath, payload, { encoding: 'utf-8', mode: 0o600 });
    } catch (err) {
      // Drop the batch; report once per flush.
      console.error(`codedrop: failed to write ${this.filePath}: ${err instanceof Error ? err.message : String(err)}`);
    } finally {
      this.flushing = false;
    }
  }

  private rotateIfNeeded(): void {
    if (!existsSync(this.filePath)) return;
    const stats = statSync(this.filePath);
    if (stats.size >= this.maxBytes) {
      renameSync(this.filePath, this.filePath + '.1');
      writeFileSync(this.filePath, '', { encoding: 'utf-8', mode: 0o600 });
    }
  }

  // ---- IObserver ----------------------------------------------------------

  onServerStart(event: ServerStartEvent): void {
    this.write('server_start', {
      host: event.host,
      port: event.port,
      startedAt: event.startedAt.toISOString(),
    });
  }

  onRoomCreated(event: RoomEvent): void {
    this.write('room_created', { code: event.code, channelId: event.channelId });
  }

  onReceiverJoined(event: RoomEvent): void {
    this.write('receiver_joined', { code: event.code, channelId: event.channelId });
  }

  onPayloadUploaded(event: PayloadEvent): void {
    this.write('payload_uploaded', { code: event.code, filename: event.filename, size: event.size });
  }

  onPayloadDownloaded(event: PayloadEvent): void {
    this.write('payload_downloaded', { code: event.code, filename: event.filename, size: event.size });
  }

  onRoomClosed(code: string, reason: RoomCloseReason): void {
    this.write('room_closed', { code, reason });
  }

  onChannelOpen(event: ChannelEvent): void {
    this.write('channel_open', { channelId: event.channelId, remoteAddress: event.remoteAddress });
  }

  onChannelClose(event: ChannelEvent & { code?: string; role?: RoomRole }): void {
    this.write('channel_close', { channelId: event.channelId, code: event.code, role: event.role });
  }

  onMalformedMessage(channelId: string, raw: string): void {
    this.write('malformed_message', { channelId, raw: truncate(raw, 200) });
  }

  onNotifyFailed(event: NotifyFailedEvent): void {
    this.write('notify_failed', {
      channelId: event.channelId,
      eventType: event.eventType,
      code: event.code,
      error: event.error ? serializeError(event.error) : undefined,
    });
  }

  onError(error: Error, context: Record<string, unknown>): void {
    this.write('error', {
      error: serializeError(error),
      context,
    });
  }

  async flush(): Promise<void> {
    if (this.flushTimer !== null) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
    this.flushSync();
  }
}
