/**
 * RoomRegistry: the process-wide table of live rooms.
 *
 * A room pairs one sender channel with at most one receiver channel under a
 * short code and carries the uploaded payload until the room is torn down.
 * The registry is the only owner of the map; callers get rooms back as
 * read-only views.
 *
 * Every method is synchronous. Node runs them on a single thread, so each
 * call is a critical section: two receivers racing for the same code are
 * ordered by the event loop, the first binds and the second observes
 * ReceiverAlreadyBoundError.
 */

import type { IPeerChannel, RoomRole, RoomSummary } from '@codedrop/core';
import { RoomNotFoundError, PayloadNotFoundError, ReceiverAlreadyBoundError } from '@codedrop/core';
import { CodeGenerator, normalizeCode } from './code-generator.js';

export interface StoredPayload {
  filename: string;
  bytes: Buffer;
  uploadedAt: Date;
}

export interface Room {
  code: string;
  sender: IPeerChannel;
  receiver: IPeerChannel | null;
  payload: StoredPayload | null;
  createdAt: Date;
  lastActiveAt: Date;
}

export class RoomRegistry {
  private readonly rooms = new Map<string, Room>();

  constructor(private readonly codes: CodeGenerator = new CodeGenerator()) {}

  /**
   * Allocate a fresh code and insert a room with `sender` bound.
   * Throws CodeSpaceExhaustedError when no free code could be found.
   */
  createRoom(sender: IPeerChannel): { code: string; room: Readonly<Room> } {
    const code = this.codes.generate((candidate) => this.rooms.has(candidate));
    const now = new Date();
    const room: Room = {
      code,
      sender,
      receiver: null,
      payload: null,
      createdAt: now,
      lastActiveAt: now,
    };
    this.rooms.set(code, room);
    return { code, room };
  }

  /** Bind `channel` as the room's receiver. The slot can be filled once. */
  bindReceiver(code: string, channel: IPeerChannel): Readonly<Room> {
    const room = this.require(code);
    if (room.receiver) {
      throw new ReceiverAlreadyBoundError(room.code);
    }
    room.receiver = channel;
    room.lastActiveAt = new Date();
    return room;
  }

  /** Store the payload, replacing any earlier upload. */
  attachPayload(code: string, filename: string, bytes: Buffer): Readonly<Room> {
    const room = this.require(code);
    const now = new Date();
    room.payload = { filename, bytes, uploadedAt: now };
    room.lastActiveAt = now;
    return room;
  }

  /**
   * Return the stored payload. Reads are repeatable: the payload stays in
   * the room until the room itself is removed.
   */
  takePayload(code: string): Readonly<StoredPayload> {
    const room = this.require(code);
    if (!room.payload) {
      throw new PayloadNotFoundError(room.code);
    }
    room.lastActiveAt = new Date();
    return room.payload;
  }

  /** Remove a room. Returns the removed room, or undefined if it was already gone. */
  removeRoom(code: string): Readonly<Room> | undefined {
    const key = normalizeCode(code);
    const room = this.rooms.get(key);
    if (!room) return undefined;
    this.rooms.delete(key);
    return room;
  }

  getPeerChannel(code: string, role: RoomRole): IPeerChannel | undefined {
    const room = this.rooms.get(normalizeCode(code));
    if (!room) return undefined;
    return (role === 'sender' ? room.sender : room.receiver) ?? undefined;
  }

  hasRoom(code: string): boolean {
    return this.rooms.has(normalizeCode(code));
  }

  get size(): number {
    return this.rooms.size;
  }

  /** Snapshot of all rooms without channel references. */
  listRooms(): RoomSummary[] {
    return [...this.rooms.values()].map((room) => ({
      code: room.code,
      hasReceiver: room.receiver !== null,
      ...(room.payload ? { payload: { filename: room.payload.filename, size: room.payload.bytes.length } } : {}),
      createdAt: room.createdAt,
      lastActiveAt: room.lastActiveAt,
    }));
  }

  /** Touch a room's lastActiveAt timestamp. */
  touch(code: string): void {
    const room = this.rooms.get(normalizeCode(code));
    if (room) {
      room.lastActiveAt = new Date();
    }
  }

  /**
   * Remove rooms idle longer than `maxIdleMs` and return them so the
   * caller can notify their peers.
   */
  evictIdle(maxIdleMs: number, now = Date.now()): Array<Readonly<Room>> {
    const cutoff = now - maxIdleMs;
    const evicted: Room[] = [];
    for (const [code, room] of this.rooms) {
      if (room.lastActiveAt.getTime() < cutoff) {
        this.rooms.delete(code);
        evicted.push(room);
      }
    }
    return evicted;
  }

  /** Remove every room, returning them. Used on shutdown. */
  clear(): Array<Readonly<Room>> {
    const all = [...this.rooms.values()];
    this.rooms.clear();
    return all;
  }

  private require(code: string): Room {
    const key = normalizeCode(code);
    const room = this.rooms.get(key);
    if (!room) {
      throw new RoomNotFoundError(key);
    }
    return room;
  }
}
