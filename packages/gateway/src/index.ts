/**
 * @codedrop/gateway: room registry, pairing state machine, blob relay and
 * the HTTP + WebSocket server that exposes them.
 */

export { CodeGenerator, normalizeCode, CODE_ALPHABET, DEFAULT_CODE_LENGTH, DEFAULT_MAX_ATTEMPTS } from './code-generator.js';
export type { CodeGeneratorOpts } from './code-generator.js';

export { RoomRegistry } from './room-registry.js';
export type { Room, StoredPayload } from './room-registry.js';

export { decodeClientMessage, encodeServerMessage, rawDataToString } from './protocol.js';
export type { ClientMessage, ServerMessage } from './protocol.js';

export { transition, initialState } from './channel-fsm.js';
export type {
  ChannelState,
  ChannelInput,
  ChannelEffect,
  SenderPhase,
  ReceiverPhase,
  Transition,
} from './channel-fsm.js';

export { SessionChannelHandler } from './channel-handler.js';
export type { ControlSocket, SessionChannelHandlerDeps } from './channel-handler.js';

export { BlobRelay } from './blob-relay.js';
export type { BlobRelayOptions, UploadReceipt, DownloadedPayload } from './blob-relay.js';

export { notifyPeer } from './notify.js';
export { parseMultipart, boundaryFrom, readBody, contentDisposition } from './multipart.js';
export type { MultipartForm, MultipartFile, BodyLimit } from './multipart.js';

export { RelayServer, ROOM_EXPIRED } from './server.js';
export type { RelayServerOptions } from './server.js';
