/**
 * IPeerChannel: the server's handle on one peer's control connection.
 *
 * Rooms hold these as non-owning references: the transport owns the
 * connection lifecycle, the room only uses the handle to push events to
 * the counterpart peer.
 */

/** Events another component can push into a peer's channel. */
export type PeerEvent =
  | { type: 'receiver_joined' }
  | { type: 'payload_ready'; filename: string; filesize: number }
  | { type: 'payload_delivered' }
  | { type: 'peer_left'; reason: string };

export interface IPeerChannel {
  readonly id: string;

  /**
   * Push an event into the channel. Returns false when the peer could not
   * be reached. Delivery is best-effort: callers are expected to discard a
   * false result rather than fail the operation that triggered the push.
   */
  dispatch(event: PeerEvent): boolean;
}
