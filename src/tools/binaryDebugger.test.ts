import { describe, it, expect } from 'vitest';
import {
  analyzeFrame,
  analyzeCapture,
  formatAnalysis,
  formatCaptureReport,
  crcVariations,
  formatCrcVariations,
  parseHex,
} from './binaryDebugger';
import { encodeFrame } from '../protocol/frameCodec';
import { BridgeError } from '../errors';

// {"a":1} as a STATUS_UPDATE frame; the closing brace is escaped.
const FRAME = Buffer.from([
  0x7e, 0x07, 0x00, 0x00, 0x00, 0x94, 0x89, 0x01, 0x7b, 0x22, 0x61, 0x22, 0x3a, 0x31, 0x7d, 0x5d, 0x7f,
]);

describe('analyzeFrame', () => {
  it('walks every field of a valid frame', () => {
    const analysis = analyzeFrame(FRAME);

    expect(analysis.valid).toBe(true);
    expect(analysis.messageType).toBe(1);
    expect(analysis.payloadText).toBe('{"a":1}');
    expect(analysis.checks).toEqual([
      { label: 'Frame length', value: '17 bytes' },
      { label: 'Start marker', value: '0x7e', ok: true },
      { label: 'Declared payload length', value: '7 bytes' },
      { label: 'Declared CRC', value: '0x8994' },
      { label: 'Message type', value: '0x01' },
      { label: 'End marker', value: '0x7f', ok: true },
      { label: 'Unescaped payload length', value: '7 bytes' },
      { label: 'Payload length', value: 'matches', ok: true },
      { label: 'Calculated CRC', value: '0x8994' },
      { label: 'CRC', value: 'matches', ok: true },
      { label: 'Payload text', value: '{"a":1}' },
    ]);
  });

  it('reports a CRC mismatch', () => {
    const corrupted = Buffer.from(FRAME);
    corrupted[5] = 0x00;

    const analysis = analyzeFrame(corrupted);

    expect(analysis.valid).toBe(false);
    expect(analysis.checks).toContainEqual({ label: 'CRC', value: 'calculated 0x8994, expected 0x8900', ok: false });
  });

  it('stops at a bad start marker', () => {
    const analysis = analyzeFrame(Buffer.from([0x00, 0x07, 0x00, 0x00, 0x00, 0x94, 0x89, 0x01]));

    expect(analysis.valid).toBe(false);
    expect(analysis.checks.at(-1)).toEqual({ label: 'Start marker', value: '0x00 (expected 0x7e)', ok: false });
  });

  it('stops at a dangling escape', () => {
    const analysis = analyzeFrame(Buffer.from([0x7e, 0x01, 0x00, 0x00, 0x00, 0x00, 0x00, 0x01, 0x7d, 0x7f]));

    expect(analysis.checks.at(-1)).toEqual({
      label: 'Escape sequence',
      value: 'Escape marker with no following byte before end marker',
      ok: false,
    });
  });

  it('flags an eight byte frame with no room for the type byte', () => {
    const analysis = analyzeFrame(Buffer.from([0x7e, 0x00, 0x00, 0x00, 0x00, 0xff, 0xff, 0x7f]));

    expect(analysis.valid).toBe(false);
    expect(analysis.checks.at(-1)).toEqual({
      label: 'Message type',
      value: 'overlaps the end marker - minimum 9 bytes required',
      ok: false,
    });
  });

  it('flags a payload that is not UTF-8 text', () => {
    const analysis = analyzeFrame(encodeFrame(1, Buffer.from([0xff])));

    expect(analysis.checks.at(-1)).toEqual({ label: 'Payload text', value: 'not valid UTF-8', ok: false });
    expect(analysis.valid).toBe(false);
  });

  it('renders a short frame', () => {
    expect(formatAnalysis(analyzeFrame(Buffer.from([0x7e, 0x01])))).toEqual([
      '=== Binary Frame Analysis ===',
      'Raw bytes: [0x7e, 0x01]',
      'Frame length: 2 bytes',
      '❌ Frame length: too short - minimum 8 bytes required',
      '❌ Frame is invalid',
      '=== End Analysis ===',
    ]);
  });
});

describe('analyzeCapture', () => {
  it('reassembles a frame split across reads', () => {
    const report = analyzeCapture([FRAME.subarray(0, 5), FRAME.subarray(5)]);

    expect(report.frames).toHaveLength(1);
    expect(report.frames[0].payload.toString('utf8')).toBe('{"a":1}');
    expect(report.failures).toEqual([]);
    expect(report.pending).toBe(0);
  });

  it('reports noise, frames and leftovers', () => {
    const report = analyzeCapture([Buffer.concat([Buffer.from([0x7a, 0x7a]), FRAME]), FRAME.subarray(0, 10)]);

    expect(formatCaptureReport(report)).toEqual([
      '=== Assembler Replay ===',
      '✅ Frame 1: type 0x01, 7 bytes, CRC 0x8994',
      '❌ framing: Discarded 2 bytes before start marker',
      '⚠️  10 bytes waiting for the rest of a frame',
      '📊 Frames: 1, Framing: 1, CRC: 0, Escape: 0, Overflow: 0',
      '=== End Replay ===',
    ]);
  });
});

describe('crcVariations', () => {
  it('computes the common CRC-16 variants', () => {
    expect(crcVariations(Buffer.from('123456789', 'ascii'))).toEqual([
      { name: 'CRC-16 reflected (0xA001)', crc: 0x4b37 },
      { name: 'CRC-16 MSB-first (0x8005)', crc: 0xaee7 },
      { name: 'CRC-16 CCITT (0x1021)', crc: 0x29b1 },
      { name: 'CRC-16 reflected, zero init', crc: 0xbb3d },
      { name: 'CRC-16 over escaped payload', crc: 0x4b37 },
    ]);
  });

  it('formats the report', () => {
    expect(formatCrcVariations(Buffer.from('hello', 'ascii'))).toEqual([
      '=== CRC Variation Tests ===',
      'Payload: hello',
      'Payload bytes: [0x68, 0x65, 0x6c, 0x6c, 0x6f]',
      ...crcVariations(Buffer.from('hello', 'ascii')).map(({ name, crc }) => `${name}: 0x${crc.toString(16).padStart(4, '0')}`),
      '=== End CRC Tests ===',
    ]);
    expect(formatCrcVariations(Buffer.from('hello', 'ascii'))[3]).toBe('CRC-16 reflected (0xA001): 0x34f6');
  });
});

describe('parseHex', () => {
  it('accepts the usual capture notations', () => {
    expect(parseHex('7E 01 02')).toEqual(Buffer.from([0x7e, 0x01, 0x02]));
    expect(parseHex('0x7e,0x1')).toEqual(Buffer.from([0x7e, 0x01]));
    expect(parseHex('7e-01-02')).toEqual(Buffer.from([0x7e, 0x01, 0x02]));
    expect(parseHex('7e0102')).toEqual(Buffer.from([0x7e, 0x01, 0x02]));
  });

  it('rejects anything else', () => {
    expect(() => parseHex('zz')).toThrow(BridgeError);
    expect(() => parseHex('zz')).toThrow('Invalid hex input: zz');
    expect(() => parseHex('7e0')).toThrow('Invalid hex input: 7e0');
  });
});
