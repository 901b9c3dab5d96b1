/**
 * Shared types used across all codedrop packages.
 */

// === Rooms ===

/** Which side of a room a control channel is bound to. */
export type RoomRole = 'sender' | 'receiver';

/** Serializable view of a room, safe to log or return over HTTP. */
export interface RoomSummary {
  code: string;
  hasReceiver: boolean;
  payload?: {
    filename: string;
    size: number;
  };
  createdAt: Date;
  lastActiveAt: Date;
}

/** Why a room left the registry. */
export type RoomCloseReason = 'sender_disconnected' | 'receiver_disconnected' | 'expired' | 'shutdown';

// === Configuration ===

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface CodeDropConfig {
  server: {
    port: number;
    host: string;
  };
  relay: {
    /** Characters per room code. */
    codeLength: number;
    /** Collisions tolerated before a room request fails. */
    maxCodeAttempts: number;
    /** Upload size limit in megabytes. 0 disables the limit. */
    maxUploadMB: number;
    /** Rooms idle for longer than this are swept. 0 disables the sweep. */
    roomIdleTimeoutMs: number;
  };
  observability: {
    observers: string[];
    logLevel: LogLevel;
    /** JSONL log path for the file observer. Defaults to ~/.codedrop/logs/codedrop.jsonl. */
    logPath?: string;
  };
}
