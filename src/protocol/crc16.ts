/**
 * Reflected CRC-16 (polynomial 0xA001, initial 0xFFFF, no final XOR).
 *
 * This is the same checksum the device firmware computes over the unescaped
 * payload; both sides must agree bit for bit.
 */

export const CRC16_POLYNOMIAL = 0xa001;
export const CRC16_INITIAL = 0xffff;

export function crc16(data: Uint8Array): number {
  return crc16Range(data, 0, data.length);
}

/**
 * CRC over `length` bytes starting at `offset`.
 * Returns the initial value for an empty or out-of-range request.
 */
export function crc16Range(data: Uint8Array, offset: number, length: number): number {
  if (offset < 0 || length <= 0 || offset + length > data.length) {
    return CRC16_INITIAL;
  }

  let crc = CRC16_INITIAL;

  for (let i = offset; i < offset + length; i++) {
    crc ^= data[i];

    for (let j = 0; j < 8; j++) {
      if (crc & 0x0001) {
        crc = (crc >>> 1) ^ CRC16_POLYNOMIAL;
      } else {
        crc = crc >>> 1;
      }
    }
  }

  return crc & 0xffff;
}

/** `0x4b37` style rendering used in logs and the debugger. */
export function formatCrc(crc: number): string {
  return `0x${crc.toString(16).padStart(4, '0')}`;
}
