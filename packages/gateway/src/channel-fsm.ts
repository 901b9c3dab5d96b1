/**
 * Pairing state machine for one control channel.
 *
 * `transition` is pure: it maps (state, input) to the next state plus a list
 * of effects for the handler to carry out. Effects that touch the registry
 * (`create_room`, `bind_receiver`) report their outcome back as a follow-up
 * input (`room_created`, `join_accepted`, ...), so every state change goes
 * through this function.
 *
 *   unregistered ──register_sender──▶ sender/awaiting_receiver ──▶ relaying ──▶ delivered
 *        │
 *        └──register_receiver──▶ receiver/awaiting_payload ──▶ ready_to_fetch
 *
 * Any `closed` input moves to `terminated`; a bound channel emits exactly
 * one `teardown` on the way.
 */

import type { PeerEvent, RoomRole } from '@codedrop/core';
import type { ClientMessage, ServerMessage } from './protocol.js';
import { normalizeCode } from './code-generator.js';

export type SenderPhase = 'awaiting_receiver' | 'relaying' | 'delivered';
export type ReceiverPhase = 'awaiting_payload' | 'ready_to_fetch';

export type ChannelState =
  | { kind: 'unregistered' }
  | { kind: 'sender'; code: string; phase: SenderPhase }
  | { kind: 'receiver'; code: string; phase: ReceiverPhase }
  | { kind: 'terminated' };

export type ChannelInput =
  | { kind: 'message'; message: ClientMessage }
  | { kind: 'room_created'; code: string }
  | { kind: 'room_failed'; message: string }
  | { kind: 'join_accepted'; code: string }
  | { kind: 'join_rejected'; message: string }
  | { kind: 'peer'; event: PeerEvent }
  | { kind: 'closed' };

export type ChannelEffect =
  | { kind: 'send'; message: ServerMessage }
  | { kind: 'create_room' }
  | { kind: 'bind_receiver'; code: string }
  | { kind: 'teardown'; code: string; role: RoomRole };

export interface Transition {
  state: ChannelState;
  effects: ChannelEffect[];
}

export const ALREADY_REGISTERED = 'Already registered.';
export const MISSING_CODE = 'Please enter a code.';

export function initialState(): ChannelState {
  return { kind: 'unregistered' };
}

function stay(state: ChannelState, ...effects: ChannelEffect[]): Transition {
  return { state, effects };
}

function send(message: ServerMessage): ChannelEffect {
  return { kind: 'send', message };
}

export function transition(state: ChannelState, input: ChannelInput, now: Date = new Date()): Transition {
  if (state.kind === 'terminated') {
    return stay(state);
  }

  switch (input.kind) {
    case 'closed':
      if (state.kind === 'unregistered') {
        return stay({ kind: 'terminated' });
      }
      return stay({ kind: 'terminated' }, { kind: 'teardown', code: state.code, role: state.kind });

    case 'message':
      return onMessage(state, input.message, now);

    case 'room_created':
      if (state.kind !== 'unregistered') return stay(state);
      return stay(
        { kind: 'sender', code: input.code, phase: 'awaiting_receiver' },
        send({ type: 'code_generated', code: input.code }),
      );

    case 'join_accepted':
      if (state.kind !== 'unregistered') return stay(state);
      return stay(
        { kind: 'receiver', code: input.code, phase: 'awaiting_payload' },
        send({ type: 'waiting_for_file' }),
      );

    case 'room_failed':
    case 'join_rejected':
      return stay(state, send({ type: 'error', message: input.message }));

    case 'peer':
      return onPeerEvent(state, input.event);
  }
}

function onMessage(state: ChannelState, message: ClientMessage, now: Date): Transition {
  switch (message.type) {
    case 'ping':
      return stay(state, send({ type: 'pong', timestamp: now.toISOString() }));

    case 'register_sender':
      if (state.kind !== 'unregistered') {
        return stay(state, send({ type: 'error', message: ALREADY_REGISTERED }));
      }
      return stay(state, { kind: 'create_room' });

    case 'register_receiver': {
      if (state.kind !== 'unregistered') {
        return stay(state, send({ type: 'error', message: ALREADY_REGISTERED }));
      }
      const code = normalizeCode(message.code);
      if (!code) {
        return stay(state, send({ type: 'error', message: MISSING_CODE }));
      }
      return stay(state, { kind: 'bind_receiver', code });
    }
  }
}

function onPeerEvent(state: ChannelState, event: PeerEvent): Transition {
  switch (event.type) {
    case 'receiver_joined':
      if (state.kind === 'sender' && state.phase === 'awaiting_receiver') {
        return stay({ ...state, phase: 'relaying' }, send({ type: 'receiver_joined' }));
      }
      return stay(state);

    case 'payload_ready':
      if (state.kind === 'receiver') {
        return stay(
          { ...state, phase: 'ready_to_fetch' },
          send({ type: 'file_ready', filename: event.filename, filesize: event.filesize }),
        );
      }
      return stay(state);

    case 'payload_delivered':
      if (state.kind === 'sender' && state.phase !== 'awaiting_receiver') {
        return stay({ ...state, phase: 'delivered' });
      }
      return stay(state);

    case 'peer_left':
      // The room is already gone; the survivor may register again.
      if (state.kind === 'unregistered') return stay(state);
      return stay({ kind: 'unregistered' }, send({ type: 'error', message: event.reason }));
  }
}
