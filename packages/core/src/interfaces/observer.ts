/**
 * IObserver: observability contract.
 *
 * The gateway reports every lifecycle step of a room through these hooks.
 * Implementations (console, JSONL file, fan-out) live in
 * @codedrop/observability. Hooks must not throw: a failing observer must
 * never take down the request that triggered it.
 */

import type { RoomCloseReason, RoomRole } from '../types/index.js';

export interface ServerStartEvent {
  host: string;
  port: number;
  startedAt: Date;
}

export interface RoomEvent {
  code: string;
  channelId: string;
  timestamp: Date;
}

export interface PayloadEvent {
  code: string;
  filename: string;
  size: number;
  timestamp: Date;
}

export interface ChannelEvent {
  channelId: string;
  remoteAddress?: string;
  timestamp: Date;
}

export interface NotifyFailedEvent {
  channelId: string;
  eventType: string;
  code?: string;
  error?: Error;
  timestamp: Date;
}

export interface IObserver {
  onServerStart(event: ServerStartEvent): void;
  onRoomCreated(event: RoomEvent): void;
  onReceiverJoined(event: RoomEvent): void;
  onPayloadUploaded(event: PayloadEvent): void;
  onPayloadDownloaded(event: PayloadEvent): void;
  onRoomClosed(code: string, reason: RoomCloseReason): void;
  onChannelOpen(event: ChannelEvent): void;
  onChannelClose(event: ChannelEvent & { code?: string; role?: RoomRole }): void;
  onMalformedMessage(channelId: string, raw: string): void;
  onNotifyFailed(event: NotifyFailedEvent): void;
  onError(error: Error, context: Record<string, unknown>): void;
  flush(): Promise<void>;
}
