/**
 * @codedrop/core: shared types, error taxonomy, observer and channel
 * contracts, and small utilities.
 */

export type { RoomRole, RoomSummary, RoomCloseReason, LogLevel, CodeDropConfig } from './types/index.js';

export type { IPeerChannel, PeerEvent } from './interfaces/channel.js';
export type {
  IObserver,
  ServerStartEvent,
  RoomEvent,
  PayloadEvent,
  ChannelEvent,
  NotifyFailedEvent,
} from './interfaces/observer.js';

export {
  CodeDropError,
  RoomNotFoundError,
  PayloadNotFoundError,
  ReceiverAlreadyBoundError,
  NoReceiverError,
  EmptyPayloadError,
  PayloadTooLargeError,
  InvalidRequestError,
  ChannelClosedError,
  CodeSpaceExhaustedError,
  ConfigError,
} from './errors/index.js';

export { generateId, truncate, formatBytes } from './utils/index.js';
