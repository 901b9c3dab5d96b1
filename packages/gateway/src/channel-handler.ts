/**
 * SessionChannelHandler: one peer's WebSocket control channel.
 *
 * Decodes client frames, feeds them through the pairing state machine and
 * carries out the resulting effects against the room registry. The handler
 * is also the IPeerChannel the registry stores, so the counterpart peer and
 * the blob relay reach this socket through `dispatch`.
 *
 * Teardown runs once per channel, on whichever of `close` or `error`
 * arrives first.
 */

import type { IObserver, IPeerChannel, PeerEvent, RoomRole } from '@codedrop/core';
import {
  CodeSpaceExhaustedError,
  ReceiverAlreadyBoundError,
  RoomNotFoundError,
  generateId,
} from '@codedrop/core';
import type { ChannelInput, ChannelState } from './channel-fsm.js';
import { initialState, transition } from './channel-fsm.js';
import type { ServerMessage } from './protocol.js';
import { decodeClientMessage, encodeServerMessage, rawDataToString } from './protocol.js';
import type { RoomRegistry } from './room-registry.js';
import { notifyPeer } from './notify.js';

export const INVALID_CODE = 'Invalid or expired code.';
export const CODE_IN_USE = 'Code already in use.';
export const ALLOCATION_FAILED = 'Unable to allocate a room code. Please try again.';
export const SENDER_LEFT = 'Sender disconnected.';
export const RECEIVER_LEFT = 'Receiver disconnected.';

const OPEN = 1;

type Listener = (...args: unknown[]) => void;

/** The slice of a `ws` WebSocket the handler relies on. */
export interface ControlSocket {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  on(event: string, listener: Listener): unknown;
  off(event: string, listener: Listener): unknown;
}

export interface SessionChannelHandlerDeps {
  registry: RoomRegistry;
  observer: IObserver;
  id?: string;
  remoteAddress?: string;
}

export class SessionChannelHandler implements IPeerChannel {
  readonly id: string;
  private state: ChannelState = initialState();
  private started = false;
  private readonly registry: RoomRegistry;
  private readonly observer: IObserver;
  private readonly remoteAddress: string | undefined;

  constructor(
    private readonly socket: ControlSocket,
    deps: SessionChannelHandlerDeps,
  ) {
    this.id = deps.id ?? generateId(12);
    this.registry = deps.registry;
    this.observer = deps.observer;
    this.remoteAddress = deps.remoteAddress;
  }

  /** Attach socket listeners. Calling twice is a no-op. */
  start(): void {
    if (this.started) return;
    this.started = true;

    this.socket.on('message', this.handleMessage);
    this.socket.on('close', this.handleClose);
    this.socket.on('error', this.handleError);

    this.observer.onChannelOpen({
      channelId: this.id,
      remoteAddress: this.remoteAddress,
      timestamp: new Date(),
    });
  }

  getState(): Readonly<ChannelState> {
    return this.state;
  }

  dispatch(event: PeerEvent): boolean {
    if (this.state.kind === 'terminated' || this.socket.readyState !== OPEN) {
      return false;
    }
    return this.apply({ kind: 'peer', event });
  }

  // ---------------------------------------------------------------------------
  // Socket events
  // ---------------------------------------------------------------------------

  private readonly handleMessage = (data: unknown): void => {
    const raw = rawDataToString(data);
    const message = decodeClientMessage(raw);
    if (!message) {
      this.observer.onMalformedMessage(this.id, raw);
      return;
    }

    if (this.state.kind === 'sender' || this.state.kind === 'receiver') {
      this.registry.touch(this.state.code);
    }

    try {
      this.apply({ kind: 'message', message });
    } catch (err) {
      this.observer.onError(toError(err), { channelId: this.id, messageType: message.type });
    }
  };

  private readonly handleClose = (): void => {
    this.shutdown();
  };

  private readonly handleError = (err: unknown): void => {
    this.observer.onError(toError(err), { channelId: this.id });
    this.shutdown();
  };

  private shutdown(): void {
    if (this.state.kind === 'terminated') return;

    this.socket.off('message', this.handleMessage);
    this.socket.off('close', this.handleClose);
    this.socket.off('error', this.handleError);

    const bound = this.state.kind === 'sender' || this.state.kind === 'receiver' ? this.state : null;
    try {
      this.apply({ kind: 'closed' });
    } catch (err) {
      this.observer.onError(toError(err), { channelId: this.id, phase: 'teardown' });
    }

    this.observer.onChannelClose({
      channelId: this.id,
      code: bound?.code,
      role: bound?.kind,
      timestamp: new Date(),
    });
  }

  // ---------------------------------------------------------------------------
  // Effects
  // ---------------------------------------------------------------------------

  /** Run one input through the machine. Returns false if any frame failed to send. */
  private apply(input: ChannelInput): boolean {
    const { state, effects } = transition(this.state, input);
    this.state = state;

    let delivered = true;
    for (const effect of effects) {
      switch (effect.kind) {
        case 'send':
          delivered = this.send(effect.message) && delivered;
          break;
        case 'create_room':
          this.createRoom();
          break;
        case 'bind_receiver':
          this.bindReceiver(effect.code);
          break;
        case 'teardown':
          this.teardown(effect.code, effect.role);
          break;
      }
    }
    return delivered;
  }

  private send(message: ServerMessage): boolean {
    if (this.socket.readyState !== OPEN) return false;
    try {
      this.socket.send(encodeServerMessage(message));
      return true;
    } catch (err) {
      this.observer.onError(toError(err), { channelId: this.id, messageType: message.type });
      return false;
    }
  }

  private createRoom(): void {
    let code: string;
    try {
      code = this.registry.createRoom(this).code;
    } catch (err) {
      if (!(err instanceof CodeSpaceExhaustedError)) throw err;
      this.observer.onError(err, { channelId: this.id });
      this.apply({ kind: 'room_failed', message: ALLOCATION_FAILED });
      return;
    }

    this.observer.onRoomCreated({ code, channelId: this.id, timestamp: new Date() });
    this.apply({ kind: 'room_created', code });
  }

  private bindReceiver(code: string): void {
    try {
      this.registry.bindReceiver(code, this);
    } catch (err) {
      if (err instanceof RoomNotFoundError) {
        this.apply({ kind: 'join_rejected', message: INVALID_CODE });
        return;
      }
      if (err instanceof ReceiverAlreadyBoundError) {
        this.apply({ kind: 'join_rejected', message: CODE_IN_USE });
        return;
      }
      throw err;
    }

    this.observer.onReceiverJoined({ code, channelId: this.id, timestamp: new Date() });
    const sender = this.registry.getPeerChannel(code, 'sender');
    if (sender) {
      notifyPeer(this.observer, sender, { type: 'receiver_joined' }, code);
    }
    this.apply({ kind: 'join_accepted', code });
  }

  private teardown(code: string, role: RoomRole): void {
    // The code may have been reissued after a peer-side teardown we never heard about.
    if (this.registry.getPeerChannel(code, role) !== this) return;

    const room = this.registry.removeRoom(code);
    if (!room) return;

    this.observer.onRoomClosed(code, role === 'sender' ? 'sender_disconnected' : 'receiver_disconnected');

    const survivor = role === 'sender' ? room.receiver : room.sender;
    if (survivor) {
      notifyPeer(
        this.observer,
        survivor,
        { type: 'peer_left', reason: role === 'sender' ? SENDER_LEFT : RECEIVER_LEFT },
        code,
      );
    }
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
