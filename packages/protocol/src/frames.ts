import { z } from 'zod';

/**
 * Server → client control frames on the persistent connection.
 * The relay sends each frame as a single ASCII byte.
 */
export const RELAY_FRAME_BYTES = {
  '#': 'keep-alive',
  '!': 'new-message',
  R: 'reconnect',
  E: 'credentials-revoked',
  A: 'session-superseded',
} as const;

export const RelayFrameKindSchema = z.enum([
  'keep-alive',
  'new-message',
  'reconnect',
  'credentials-revoked',
  'session-superseded',
]);

export type RelayFrameKind = z.infer<typeof RelayFrameKindSchema>;

export type RelayFrame =
  | { kind: RelayFrameKind }
  | { kind: 'unknown'; raw: string };

function isFrameByte(value: string): value is keyof typeof RELAY_FRAME_BYTES {
  return Object.prototype.hasOwnProperty.call(RELAY_FRAME_BYTES, value);
}

/**
 * Decode one frame. Accepts the bytes of a binary message or the text of a
 * text message; anything that is not exactly one known byte is `unknown`.
 */
export function parseRelayFrame(data: Uint8Array | string): RelayFrame {
  const raw = typeof data === 'string' ? data : Buffer.from(data).toString('latin1');
  if (raw.length === 1 && isFrameByte(raw)) {
    return { kind: RELAY_FRAME_BYTES[raw] };
  }
  return { kind: 'unknown', raw };
}

/**
 * Identification frame sent right after the socket opens.
 */
export function encodeLoginFrame(deviceId: string, secret: string): string {
  return `login:${deviceId}:${secret}\n`;
}
