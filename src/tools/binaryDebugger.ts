import {
  START_MARKER,
  END_MARKER,
  MIN_FRAME_SIZE,
  FRAME_OVERHEAD,
  LENGTH_OFFSET,
  CRC_OFFSET,
  TYPE_OFFSET,
  PAYLOAD_OFFSET,
} from '../protocol/constants';
import { crc16, formatCrc } from '../protocol/crc16';
import { escapePayload, unescapePayload, formatBytes, hexByte, type DecodedFrame, type FrameError } from '../protocol/frameCodec';
import { FrameAssembler } from '../protocol/frameAssembler';
import { ProtocolStatistics, type StatisticsSnapshot } from '../protocol/statistics';
import { BridgeError } from '../errors';

export interface FieldCheck {
  label: string;
  value: string;
  /** Absent for purely informational fields */
  ok?: boolean;
}

export interface FrameAnalysis {
  length: number;
  raw: string;
  checks: FieldCheck[];
  /** Every pass/fail check passed */
  valid: boolean;
  messageType?: number;
  payloadText?: string;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Field-by-field validation of one captured frame. Stops at the first
 * structural problem (length, start or end marker, escape), as the decoder
 * would.
 */
export function analyzeFrame(bytes: Uint8Array): FrameAnalysis {
  const frame = Buffer.from(bytes);
  const checks: FieldCheck[] = [{ label: 'Frame length', value: `${frame.length} bytes` }];
  const analysis: FrameAnalysis = { length: frame.length, raw: formatBytes(frame), checks, valid: false };

  if (frame.length < MIN_FRAME_SIZE) {
    checks.push({ label: 'Frame length', value: `too short - minimum ${MIN_FRAME_SIZE} bytes required`, ok: false });
    return analysis;
  }

  checks.push(markerCheck('Start marker', frame[0], START_MARKER));
  if (frame[0] !== START_MARKER) {
    return analysis;
  }

  const declaredLength = frame.readUInt32LE(LENGTH_OFFSET);
  const declaredCrc = frame.readUInt16LE(CRC_OFFSET);
  const messageType = frame.readUInt8(TYPE_OFFSET);
  analysis.messageType = messageType;
  checks.push({ label: 'Declared payload length', value: `${declaredLength} bytes` });
  checks.push({ label: 'Declared CRC', value: formatCrc(declaredCrc) });
  checks.push({ label: 'Message type', value: `0x${hexByte(messageType)}` });

  const last = frame[frame.length - 1];
  checks.push(markerCheck('End marker', last, END_MARKER));
  if (last !== END_MARKER) {
    return analysis;
  }
  if (frame.length < FRAME_OVERHEAD) {
    checks.push({ label: 'Message type', value: `overlaps the end marker - minimum ${FRAME_OVERHEAD} bytes required`, ok: false });
    return analysis;
  }

  const unescaped = unescapePayload(frame.subarray(PAYLOAD_OFFSET, frame.length - 1));
  if (!unescaped.ok) {
    checks.push({ label: 'Escape sequence', value: unescaped.error.reason, ok: false });
    return analysis;
  }

  const payload = unescaped.payload;
  checks.push({ label: 'Unescaped payload length', value: `${payload.length} bytes` });
  checks.push(
    payload.length === declaredLength
      ? { label: 'Payload length', value: 'matches', ok: true }
      : { label: 'Payload length', value: `got ${payload.length}, expected ${declaredLength}`, ok: false },
  );

  const calculatedCrc = crc16(payload);
  checks.push({ label: 'Calculated CRC', value: formatCrc(calculatedCrc) });
  checks.push(
    calculatedCrc === declaredCrc
      ? { label: 'CRC', value: 'matches', ok: true }
      : { label: 'CRC', value: `calculated ${formatCrc(calculatedCrc)}, expected ${formatCrc(declaredCrc)}`, ok: false },
  );

  try {
    analysis.payloadText = utf8.decode(payload);
    checks.push({ label: 'Payload text', value: analysis.payloadText });
  } catch {
    checks.push({ label: 'Payload text', value: 'not valid UTF-8', ok: false });
  }

  analysis.valid = checks.every((check) => check.ok !== false);
  return analysis;
}

function markerCheck(label: string, actual: number, expected: number): FieldCheck {
  return actual === expected
    ? { label, value: `0x${hexByte(actual)}`, ok: true }
    : { label, value: `0x${hexByte(actual)} (expected 0x${hexByte(expected)})`, ok: false };
}

export function formatCheck(check: FieldCheck): string {
  const marker = check.ok === undefined ? '' : check.ok ? '✅ ' : '❌ ';
  return `${marker}${check.label}: ${check.value}`;
}

export function formatAnalysis(analysis: FrameAnalysis): string[] {
  return [
    '=== Binary Frame Analysis ===',
    `Raw bytes: ${analysis.raw}`,
    ...analysis.checks.map(formatCheck),
    analysis.valid ? '✅ Frame is valid' : '❌ Frame is invalid',
    '=== End Analysis ===',
  ];
}

export interface CaptureReport {
  frames: DecodedFrame[];
  failures: FrameError[];
  /** Bytes left waiting for the rest of a frame */
  pending: number;
  statistics: Readonly<StatisticsSnapshot>;
}

export interface CaptureOptions {
  maxPayloadSize?: number;
}

/**
 * Replay captured reads through a fresh assembler. Time is frozen during the
 * replay so partial frames never time out.
 */
export function analyzeCapture(chunks: Uint8Array[], options: CaptureOptions = {}): CaptureReport {
  const clock = (): number => 0;
  const statistics = new ProtocolStatistics(clock);
  const assembler = new FrameAssembler({ statistics, maxPayloadSize: options.maxPayloadSize, clock });

  const report: CaptureReport = { frames: [], failures: [], pending: 0, statistics: statistics.snapshot() };
  for (const chunk of chunks) {
    const { frames, failures } = assembler.feed(chunk);
    report.frames.push(...frames);
    report.failures.push(...failures);
  }

  report.pending = assembler.pending.length;
  report.statistics = statistics.snapshot();
  return report;
}

export function formatCaptureReport(report: CaptureReport): string[] {
  const lines = ['=== Assembler Replay ==='];
  report.frames.forEach((frame, index) => {
    lines.push(
      `✅ Frame ${index + 1}: type 0x${hexByte(frame.messageType)}, ${frame.declaredLength} bytes, CRC ${formatCrc(frame.declaredCrc)}`,
    );
  });
  for (const failure of report.failures) {
    lines.push(`❌ ${failure.kind}: ${failure.reason}`);
  }
  if (report.pending > 0) {
    lines.push(`⚠️  ${report.pending} bytes waiting for the rest of a frame`);
  }
  const s = report.statistics;
  lines.push(
    `📊 Frames: ${s.messagesReceived}, Framing: ${s.framingErrors}, CRC: ${s.crcErrors}, ` +
      `Escape: ${s.escapeSequenceErrors}, Overflow: ${s.bufferOverflowErrors}`,
  );
  lines.push('=== End Replay ===');
  return lines;
}

export interface CrcVariation {
  name: string;
  crc: number;
}

/**
 * The protocol checksum next to the variants a mismatched firmware most
 * often uses instead.
 */
export function crcVariations(payload: Uint8Array): CrcVariation[] {
  return [
    { name: 'CRC-16 reflected (0xA001)', crc: crc16(payload) },
    { name: 'CRC-16 MSB-first (0x8005)', crc: crc16MsbFirst(payload, 0x8005, 0xffff) },
    { name: 'CRC-16 CCITT (0x1021)', crc: crc16MsbFirst(payload, 0x1021, 0xffff) },
    { name: 'CRC-16 reflected, zero init', crc: crc16Reflected(payload, 0xa001, 0x0000) },
    { name: 'CRC-16 over escaped payload', crc: crc16(escapePayload(payload)) },
  ];
}

export function formatCrcVariations(payload: Uint8Array): string[] {
  return [
    '=== CRC Variation Tests ===',
    `Payload: ${Buffer.from(payload).toString('utf8')}`,
    `Payload bytes: ${formatBytes(payload)}`,
    ...crcVariations(payload).map(({ name, crc }) => `${name}: ${formatCrc(crc)}`),
    '=== End CRC Tests ===',
  ];
}

function crc16MsbFirst(data: Uint8Array, polynomial: number, initial: number): number {
  let crc = initial;
  for (const value of data) {
    crc ^= value << 8;
    for (let i = 0; i < 8; i++) {
      crc = crc & 0x8000 ? ((crc << 1) ^ polynomial) & 0xffff : (crc << 1) & 0xffff;
    }
  }
  return crc;
}

function crc16Reflected(data: Uint8Array, polynomial: number, initial: number): number {
  let crc = initial;
  for (const value of data) {
    crc ^= value;
    for (let i = 0; i < 8; i++) {
      crc = crc & 0x0001 ? (crc >>> 1) ^ polynomial : crc >>> 1;
    }
  }
  return crc & 0xffff;
}

/**
 * Accepts `7E 01 02`, `7E-01-02`, `0x7E,0x01` and `7E0102`.
 */
export function parseHex(text: string): Buffer {
  const tokens = text
    .trim()
    .split(/[\s,;:-]+/)
    .filter((token) => token.length > 0)
    .map((token) => token.replace(/^0x/i, ''));
  const hex = tokens.map((token) => (tokens.length > 1 && token.length === 1 ? `0${token}` : token)).join('');

  if (!/^[0-9a-fA-F]*$/.test(hex) || hex.length % 2 !== 0) {
    throw new BridgeError(`Invalid hex input: ${text}`);
  }
  return Buffer.from(hex, 'hex');
}
