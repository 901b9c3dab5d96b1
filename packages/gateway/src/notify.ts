/**
 * Best-effort push into a peer's channel.
 *
 * The result is discarded on purpose: a peer that is mid-disconnect must
 * never fail the join, upload or teardown that tried to reach it. Failures
 * are only reported to the observer.
 */

import type { IObserver, IPeerChannel, PeerEvent } from '@codedrop/core';
import { ChannelClosedError } from '@codedrop/core';

export function notifyPeer(observer: IObserver, target: IPeerChannel, event: PeerEvent, code?: string): void {
  let error: Error | undefined;
  try {
    if (target.dispatch(event)) return;
    error = new ChannelClosedError(target.id, { eventType: event.type });
  } catch (err) {
    error = err instanceof Error ? err : new Error(String(err));
  }

  observer.onNotifyFailed({
    channelId: target.id,
    eventType: event.type,
    code,
    error,
    timestamp: new Date(),
  });
}
