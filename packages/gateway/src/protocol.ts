/**
 * Control-channel wire format.
 *
 * Every frame is a JSON object with a `type` discriminator. Client frames
 * are decoded defensively: anything that is not valid JSON, not an object,
 * or carries an unknown type decodes to null and is ignored by the caller.
 */

export type ClientMessage =
  | { type: 'register_sender' }
  | { type: 'register_receiver'; code: string }
  | { type: 'ping' };

export type ServerMessage =
  | { type: 'code_generated'; code: string }
  | { type: 'waiting_for_file' }
  | { type: 'error'; message: string }
  | { type: 'receiver_joined' }
  | { type: 'file_ready'; filename: string; filesize: number }
  | { type: 'pong'; timestamp: string };

export function encodeServerMessage(msg: ServerMessage): string {
  return JSON.stringify(msg);
}

export function decodeClientMessage(raw: string): ClientMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  if (typeof parsed !== 'object' || parsed === null || !('type' in parsed)) {
    return null;
  }

  switch (parsed.type) {
    case 'register_sender':
      return { type: 'register_sender' };
    case 'register_receiver': {
      const code = 'code' in parsed && typeof parsed.code === 'string' ? parsed.code : '';
      return { type: 'register_receiver', code };
    }
    case 'ping':
      return { type: 'ping' };
    default:
      return null;
  }
}

/** Flatten a `ws` message payload into a UTF-8 string. */
export function rawDataToString(data: unknown): string {
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf-8');
  if (Array.isArray(data)) {
    const chunks = data.filter((chunk): chunk is Buffer => Buffer.isBuffer(chunk));
    return Buffer.concat(chunks).toString('utf-8');
  }
  return '';
}
