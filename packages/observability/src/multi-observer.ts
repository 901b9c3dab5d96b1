/**
 * MultiObserver fans every hook out to several observers. NoopObserver
 * discards everything and is the factory's answer to an empty list.
 */

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

export class MultiObserver implements IObserver {
  constructor(private readonly observers: IObserver[]) {}

  onServerStart(event: ServerStartEvent): void {
    for (const o of this.observers) o.onServerStart(event);
  }

  onRoomCreated(event: RoomEvent): void {
    for (const o of this.observers) o.onRoomCreated(event);
  }

  onReceiverJoined(event: RoomEvent): void {
    for (const o of this.observers) o.onReceiverJoined(event);
  }

  onPayloadUploaded(event: PayloadEvent): void {
    for (const o of this.observers) o.onPayloadUploaded(event);
  }

  onPayloadDownloaded(event: PayloadEvent): void {
    for (const o of this.observers) o.onPayloadDownloaded(event);
  }

  onRoomClosed(code: string, reason: RoomCloseReason): void {
    for (const o of this.observers) o.onRoomClosed(code, reason);
  }

  onChannelOpen(event: ChannelEvent): void {
    for (const o of this.observers) o.onChannelOpen(event);
  }

  onChannelClose(event: ChannelEvent & { code?: string; role?: RoomRole }): void {
    for (const o of this.observers) o.onChannelClose(event);
  }

  onMalformedMessage(channelId: string, raw: string): void {
    for (const o of this.observers) o.onMalformedMessage(channelId, raw);
  }

  onNotifyFailed(event: NotifyFailedEvent): void {
    for (const o of this.observers) o.onNotifyFailed(event);
  }

  onError(error: Error, context: Record<string, unknown>): void {
    for (const o of this.observers) o.onError(error, context);
  }

  async flush(): Promise<void> {
    await Promise.all(this.observers.map((o) => o.flush()));
  }
}

export class NoopObserver implements IObserver {
  onServerStart(): void {}
  onRoomCreated(): void {}
  onReceiverJoined(): void {}
  onPayloadUploaded(): void {}
  onPayloadDownloaded(): void {}
  onRoomClosed(): void {}
  onChannelOpen(): void {}
  onChannelClose(): void {}
  onMalformedMessage(): void {}
  onNotifyFailed(): void {}
  onError(): void {}
  async flush(): Promise<void> {}
}
