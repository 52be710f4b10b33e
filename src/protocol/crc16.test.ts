import { describe, it, expect } from 'vitest';
import { crc16, crc16Range, formatCrc, CRC16_INITIAL } from './crc16';

describe('crc16', () => {
  it('matches the reference check value', () => {
    expect(crc16(Buffer.from('123456789', 'ascii'))).toBe(0x4b37);
  });

  it('returns the initial value for empty input', () => {
    expect(crc16(Buffer.alloc(0))).toBe(CRC16_INITIAL);
  });

  it('computes over JSON payloads as the firmware does', () => {
    expect(crc16(Buffer.from('{"a":1}', 'utf8'))).toBe(0x8994);
    expect(crc16(Buffer.from('hello', 'utf8'))).toBe(0x34f6);
  });

  it('accepts any Uint8Array, not only Buffer', () => {
    expect(crc16(new Uint8Array([0x31, 0x32, 0x33, 0x34, 0x35, 0x36, 0x37, 0x38, 0x39]))).toBe(0x4b37);
  });
});

describe('crc16Range', () => {
  const data = Buffer.from('xx123456789yy', 'ascii');

  it('covers only the requested range', () => {
    expect(crc16Range(data, 2, 9)).toBe(0x4b37);
  });

  it('returns the initial value for invalid ranges', () => {
    expect(crc16Range(data, -1, 3)).toBe(CRC16_INITIAL);
    expect(crc16Range(data, 0, 0)).toBe(CRC16_INITIAL);
    expect(crc16Range(data, 10, 5)).toBe(CRC16_INITIAL);
  });
});

describe('formatCrc', () => {
  it('renders four lowercase hex digits', () => {
    expect(formatCrc(0x4b37)).toBe('0x4b37');
    expect(formatCrc(0x00ff)).toBe('0x00ff');
  });
});
