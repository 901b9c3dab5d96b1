/**
 * ConsoleObserver: human-readable, level-filtered log lines on stdout/stderr.
 *
 *   12:04:55 INFO  room AB12C created (channel x8Kq...)
 *   12:05:10 WARN  notify failed: file_ready -> channel x8Kq... (room AB12C)
 */

import type {
  IObserver,
  LogLevel,
  ServerStartEvent,
  RoomEvent,
  PayloadEvent,
  ChannelEvent,
  NotifyFailedEvent,
  RoomCloseReason,
  RoomRole,
} from '@codedrop/core';
import { formatBytes, truncate } from '@codedrop/core';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_COLOR: Record<LogLevel, string> = {
  debug: '\x1b[2m',
  info: '\x1b[38;2;0;186;188m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

const RESET = '\x1b[0m';

export interface ConsoleObserverOptions {
  logLevel?: LogLevel;
  /** ANSI colours. Defaults to true when stdout is a TTY. */
  color?: boolean;
  /** Prefix each line with the local wall-clock time. Default: true. */
  timestamps?: boolean;
}

export class ConsoleObserver implements IObserver {
  private readonly threshold: number;
  private readonly color: boolean;
  private readonly timestamps: boolean;

  constructor(opts: ConsoleObserverOptions = {}) {
    this.threshold = LEVEL_ORDER[opts.logLevel ?? 'info'];
    this.color = opts.color ?? process.stdout.isTTY === true;
    this.timestamps = opts.timestamps ?? true;
  }

  onServerStart(event: ServerStartEvent): void {
    this.log('info', `listening on ${event.host}:${event.port}`);
  }

  onRoomCreated(event: RoomEvent): void {
    this.log('info', `room ${event.code} created (channel ${shortId(event.channelId)})`);
  }

  onReceiverJoined(event: RoomEvent): void {
    this.log('info', `receiver joined room ${event.code} (channel ${shortId(event.channelId)})`);
  }

  onPayloadUploaded(event: PayloadEvent): void {
    this.log('info', `room ${event.code} received "${event.filename}" (${formatBytes(event.size)})`);
  }

  onPayloadDownloaded(event: PayloadEvent): void {
    this.log('info', `room ${event.code} served "${event.filename}" (${formatBytes(event.size)})`);
  }

  onRoomClosed(code: string, reason: RoomCloseReason): void {
    this.log('info', `room ${code} closed: ${reason.replace(/_/g, ' ')}`);
  }

  onChannelOpen(event: ChannelEvent): void {
    const from = event.remoteAddress ? ` from ${event.remoteAddress}` : '';
    this.log('debug', `channel ${shortId(event.channelId)} opened${from}`);
  }

  onChannelClose(event: ChannelEvent & { code?: string; role?: RoomRole }): void {
    const binding = event.code ? ` (${event.role ?? 'peer'} of room ${event.code})` : '';
    this.log('debug', `channel ${shortId(event.channelId)} closed${binding}`);
  }

  onMalformedMessage(channelId: string, raw: string): void {
    this.log('warn', `ignored malformed message on channel ${shortId(channelId)}: ${truncate(raw, 80)}`);
  }

  onNotifyFailed(event: NotifyFailedEvent): void {
    const room = event.code ? ` (room ${event.code})` : '';
    this.log('warn', `notify failed: ${event.eventType} -> channel ${shortId(event.channelId)}${room}`);
  }

  onError(error: Error, context: Record<string, unknown>): void {
    const ctx = Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    this.log('error', `${error.message}${ctx}`);
  }

  async flush(): Promise<void> {
    // Console writes are unbuffered.
  }

  // ---- internal -----------------------------------------------------------

  private log(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < this.threshold) return;

    const label = level.toUpperCase().padEnd(5, ' ');
    const tag = this.color ? `${LEVEL_COLOR[level]}${label}${RESET}` : label;
    const time = this.timestamps ? `${new Date().toTimeString().slice(0, 8)} ` : '';
    const line = `${time}${tag} ${message}`;

    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
  }
}

function shortId(id: string): string {
  return id.length > 8 ? `${id.slice(0, 8)}...` : id;
}
