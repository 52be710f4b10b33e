import {
  START_MARKER,
  END_MARKER,
  ESCAPE_MARKER,
  ESCAPE_XOR,
  LENGTH_OFFSET,
  CRC_OFFSET,
  TYPE_OFFSET,
  PAYLOAD_OFFSET,
  FRAME_OVERHEAD,
  MIN_FRAME_SIZE,
} from './constants';
import { crc16, formatCrc } from './crc16';

export type FrameErrorKind = 'framing' | 'crc' | 'escape' | 'buffer-overflow' | 'timeout';

/** A rejected frame. Returned, never thrown. */
export interface FrameError {
  kind: FrameErrorKind;
  reason: string;
}

export interface DecodedFrame {
  messageType: number;
  /** Unescaped payload bytes */
  payload: Buffer;
  declaredLength: number;
  declaredCrc: number;
  /** Bytes the frame occupied on the wire, markers included */
  wireLength: number;
}

export type DecodeResult = { ok: true; frame: DecodedFrame } | { ok: false; error: FrameError };

export type UnescapeResult = { ok: true; payload: Buffer } | { ok: false; error: FrameError };

export function isReservedByte(value: number): boolean {
  return value === START_MARKER || value === END_MARKER || value === ESCAPE_MARKER;
}

/**
 * Byte-stuff a payload so no marker value appears in it.
 */
export function escapePayload(payload: Uint8Array): Buffer {
  let reserved = 0;
  for (const value of payload) {
    if (isReservedByte(value)) reserved++;
  }

  const escaped = Buffer.alloc(payload.length + reserved);
  let out = 0;
  for (const value of payload) {
    if (isReservedByte(value)) {
      escaped[out++] = ESCAPE_MARKER;
      escaped[out++] = value ^ ESCAPE_XOR;
    } else {
      escaped[out++] = value;
    }
  }
  return escaped;
}

export function unescapePayload(escaped: Uint8Array): UnescapeResult {
  const payload = Buffer.alloc(escaped.length);
  let out = 0;
  let escapeNext = false;

  for (const value of escaped) {
    if (escapeNext) {
      payload[out++] = value ^ ESCAPE_XOR;
      escapeNext = false;
    } else if (value === ESCAPE_MARKER) {
      escapeNext = true;
    } else {
      payload[out++] = value;
    }
  }

  if (escapeNext) {
    return {
      ok: false,
      error: { kind: 'escape', reason: 'Escape marker with no following byte before end marker' },
    };
  }

  return { ok: true, payload: payload.subarray(0, out) };
}

/**
 * Build a complete frame for transmission.
 *
 * @param messageType - header type byte (0-255)
 * @param payload - unescaped payload, normally UTF-8 JSON text
 */
export function encodeFrame(messageType: number, payload: Uint8Array): Buffer {
  const escaped = escapePayload(payload);
  const frame = Buffer.alloc(FRAME_OVERHEAD + escaped.length);

  frame[0] = START_MARKER;
  frame.writeUInt32LE(payload.length, LENGTH_OFFSET);
  frame.writeUInt16LE(crc16(payload), CRC_OFFSET);
  frame.writeUInt8(messageType & 0xff, TYPE_OFFSET);
  escaped.copy(frame, PAYLOAD_OFFSET);
  frame[frame.length - 1] = END_MARKER;

  return frame;
}

/**
 * Validate and unpack one complete frame, markers included.
 */
export function decodeFrame(bytes: Uint8Array): DecodeResult {
  if (bytes.length < MIN_FRAME_SIZE) {
    return framing(`Frame too short: expected at least ${MIN_FRAME_SIZE} bytes, got ${bytes.length}`);
  }

  const frame = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  if (frame[0] !== START_MARKER) {
    return framing(`Invalid start marker 0x${hexByte(frame[0])}`);
  }
  if (frame[frame.length - 1] !== END_MARKER) {
    return framing(`Invalid end marker 0x${hexByte(frame[frame.length - 1])}`);
  }
  if (frame.length < FRAME_OVERHEAD) {
    return framing(`Frame has no type byte: expected at least ${FRAME_OVERHEAD} bytes, got ${frame.length}`);
  }

  const declaredLength = frame.readUInt32LE(LENGTH_OFFSET);
  const declaredCrc = frame.readUInt16LE(CRC_OFFSET);
  const messageType = frame.readUInt8(TYPE_OFFSET);

  const unescaped = unescapePayload(frame.subarray(PAYLOAD_OFFSET, frame.length - 1));
  if (!unescaped.ok) {
    return unescaped;
  }

  const payload = unescaped.payload;
  if (payload.length !== declaredLength) {
    return framing(`Payload length mismatch: got ${payload.length}, expected ${declaredLength}`);
  }

  const calculatedCrc = crc16(payload);
  if (calculatedCrc !== declaredCrc) {
    return {
      ok: false,
      error: {
        kind: 'crc',
        reason: `CRC mismatch: calculated ${formatCrc(calculatedCrc)}, expected ${formatCrc(declaredCrc)}`,
      },
    };
  }

  return {
    ok: true,
    frame: { messageType, payload, declaredLength, declaredCrc, wireLength: frame.length },
  };
}

function framing(reason: string): DecodeResult {
  return { ok: false, error: { kind: 'framing', reason } };
}

export function hexByte(value: number): string {
  return value.toString(16).padStart(2, '0');
}

/** `[0x7e, 0x07, ...]` rendering, as the serial tooling prints raw traffic. */
export function formatBytes(bytes: Uint8Array): string {
  return `[${Array.from(bytes).map((b) => `0x${hexByte(b)}`).join(', ')}]`;
}
