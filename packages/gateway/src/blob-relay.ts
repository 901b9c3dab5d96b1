/**
 * BlobRelay: the HTTP side of a room: one uploaded file, held in memory
 * until the room is torn down.
 *
 * Uploads are refused until a receiver has joined. A successful upload is
 * the only source of the receiver's `file_ready` push.
 */

import type { IObserver } from '@codedrop/core';
import {
  EmptyPayloadError,
  InvalidRequestError,
  NoReceiverError,
  PayloadTooLargeError,
  RoomNotFoundError,
} from '@codedrop/core';
import { NoopObserver } from '@codedrop/observability';
import { normalizeCode } from './code-generator.js';
import type { RoomRegistry } from './room-registry.js';
import { notifyPeer } from './notify.js';

export interface BlobRelayOptions {
  registry: RoomRegistry;
  observer?: IObserver;
  /** Largest accepted payload in bytes. Unlimited when omitted. */
  maxBytes?: number;
}

export interface UploadReceipt {
  code: string;
  filename: string;
  filesize: number;
}

export interface DownloadedPayload {
  filename: string;
  bytes: Buffer;
}

export class BlobRelay {
  private readonly registry: RoomRegistry;
  private readonly observer: IObserver;
  readonly maxBytes: number | undefined;

  constructor(opts: BlobRelayOptions) {
    this.registry = opts.registry;
    this.observer = opts.observer ?? new NoopObserver();
    this.maxBytes = opts.maxBytes;
  }

  upload(code: string, filename: string, bytes: Buffer): UploadReceipt {
    const key = requireCode(code);
    if (!this.registry.hasRoom(key)) {
      throw new RoomNotFoundError(key);
    }

    const receiver = this.registry.getPeerChannel(key, 'receiver');
    if (!receiver) {
      throw new NoReceiverError(key);
    }

    const name = baseName(filename);
    if (!name || bytes.length === 0) {
      throw new EmptyPayloadError({ roomCode: key });
    }
    if (this.maxBytes !== undefined && bytes.length > this.maxBytes) {
      throw new PayloadTooLargeError(this.maxBytes, { roomCode: key });
    }

    this.registry.attachPayload(key, name, bytes);
    this.observer.onPayloadUploaded({ code: key, filename: name, size: bytes.length, timestamp: new Date() });

    notifyPeer(this.observer, receiver, { type: 'payload_ready', filename: name, filesize: bytes.length }, key);
    const sender = this.registry.getPeerChannel(key, 'sender');
    if (sender) {
      notifyPeer(this.observer, sender, { type: 'payload_delivered' }, key);
    }

    return { code: key, filename: name, filesize: bytes.length };
  }

  download(code: string): DownloadedPayload {
    const key = requireCode(code);
    const payload = this.registry.takePayload(key);
    this.observer.onPayloadDownloaded({
      code: key,
      filename: payload.filename,
      size: payload.bytes.length,
      timestamp: new Date(),
    });
    return { filename: payload.filename, bytes: payload.bytes };
  }
}

function requireCode(code: string): string {
  const key = normalizeCode(code);
  if (!key) {
    throw new InvalidRequestError('Missing room code.');
  }
  return key;
}

/** Drop any client-side directory components. */
function baseName(filename: string): string {
  return (filename.split(/[\\/]/).pop() ?? '').trim();
}
