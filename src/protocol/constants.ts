/**
 * Binary frame layout (all multi-byte fields little-endian):
 *
 * | 0x7E | length u32 | crc u16 | type u8 | escaped payload | 0x7F |
 *
 * Length and CRC describe the payload before escaping.
 */

export const START_MARKER = 0x7e;
export const END_MARKER = 0x7f;
export const ESCAPE_MARKER = 0x7d;
export const ESCAPE_XOR = 0x20;

export const LENGTH_OFFSET = 1;
export const CRC_OFFSET = 5;
export const TYPE_OFFSET = 7;
export const PAYLOAD_OFFSET = 8;

/** START + length + crc + type */
export const HEADER_SIZE = PAYLOAD_OFFSET;
/** Header plus END marker */
export const FRAME_OVERHEAD = HEADER_SIZE + 1;
/** Smallest byte count decodeFrame will look at */
export const MIN_FRAME_SIZE = 8;

export const DEFAULT_MAX_PAYLOAD_SIZE = 4096;
export const DEFAULT_FRAME_TIMEOUT_MS = 1000;

export const TEXT_START_DELIMITER = '<MSG>';
export const TEXT_END_DELIMITER = '</MSG>';
