import {
  START_MARKER,
  END_MARKER,
  ESCAPE_MARKER,
  HEADER_SIZE,
  LENGTH_OFFSET,
  PAYLOAD_OFFSET,
  FRAME_OVERHEAD,
  DEFAULT_MAX_PAYLOAD_SIZE,
  DEFAULT_FRAME_TIMEOUT_MS,
} from './constants';
import { decodeFrame, type DecodedFrame, type FrameError } from './frameCodec';
import type { ProtocolStatistics } from './statistics';
import { silentLogger, type Logger } from '../logging/logger';

export interface FrameAssemblerOptions {
  statistics: ProtocolStatistics;
  maxPayloadSize?: number;
  frameTimeoutMs?: number;
  logger?: Logger;
  clock?: () => number;
}

export interface FeedResult {
  frames: DecodedFrame[];
  failures: FrameError[];
}

/**
 * Incremental frame reassembly over an arbitrarily chunked byte stream.
 *
 * Bytes that are not yet part of a resolved frame stay in `pending` across
 * calls. A frame is emitted exactly once, after its END marker has arrived.
 */
export class FrameAssembler {
  private buffer: Buffer = Buffer.alloc(0);
  /** When the START at the head of the buffer was first seen incomplete */
  private partialSince: number | null = null;

  private readonly statistics: ProtocolStatistics;
  private readonly maxPayloadSize: number;
  private readonly frameTimeoutMs: number;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(options: FrameAssemblerOptions) {
    this.statistics = options.statistics;
    this.maxPayloadSize = options.maxPayloadSize ?? DEFAULT_MAX_PAYLOAD_SIZE;
    this.frameTimeoutMs = options.frameTimeoutMs ?? DEFAULT_FRAME_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? Date.now;
  }

  /** Unresolved bytes carried into the next feed() */
  get pending(): Buffer {
    return this.buffer;
  }

  /**
   * Largest unterminated frame worth waiting for: every payload byte may be
   * escaped into two.
   */
  get overflowLimit(): number {
    return FRAME_OVERHEAD + this.maxPayloadSize * 2;
  }

  feed(chunk: Uint8Array, now: number = this.clock()): FeedResult {
    const result: FeedResult = { frames: [], failures: [] };

    const expired = this.expireStale(now);
    if (expired) {
      result.failures.push(expired);
    }

    if (chunk.length > 0) {
      this.buffer = this.buffer.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buffer, chunk]);
    }

    this.scan(now, result);
    return result;
  }

  /**
   * Drop a partial frame that has been waiting longer than the frame timeout.
   */
  expireStale(now: number = this.clock()): FrameError | null {
    if (this.partialSince === null || now - this.partialSince <= this.frameTimeoutMs) {
      return null;
    }

    const error: FrameError = {
      kind: 'timeout',
      reason: `Partial frame incomplete after ${now - this.partialSince}ms (${this.buffer.length} bytes buffered)`,
    };
    this.fail(error);
    return error;
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
    this.partialSince = null;
  }

  private scan(now: number, result: FeedResult): void {
    while (this.buffer.length > 0) {
      const start = this.buffer.indexOf(START_MARKER);

      if (start !== 0) {
        const discarded = start === -1 ? this.buffer.length : start;
        this.buffer = start === -1 ? Buffer.alloc(0) : this.buffer.subarray(start);
        this.partialSince = null;

        const noise: FrameError = { kind: 'framing', reason: `Discarded ${discarded} bytes before start marker` };
        this.statistics.recordFrameError(noise);
        this.logger.debug(noise.reason);
        result.failures.push(noise);
        continue;
      }

      if (this.buffer.length < HEADER_SIZE) {
        this.waitForMore(now);
        return;
      }

      const declaredLength = this.buffer.readUInt32LE(LENGTH_OFFSET);
      if (declaredLength > this.maxPayloadSize) {
        result.failures.push(
          this.fail({
            kind: 'buffer-overflow',
            reason: `Declared payload length ${declaredLength} exceeds maximum ${this.maxPayloadSize}`,
          }),
        );
        continue;
      }

      const end = this.findEnd();
      if (end === -1) {
        if (this.buffer.length > this.overflowLimit) {
          result.failures.push(
            this.fail({
              kind: 'buffer-overflow',
              reason: `Unterminated frame exceeds ${this.overflowLimit} bytes`,
            }),
          );
          continue;
        }
        this.waitForMore(now);
        return;
      }

      const decoded = decodeFrame(this.buffer.subarray(0, end + 1));
      if (!decoded.ok) {
        result.failures.push(this.fail(decoded.error));
        continue;
      }

      // Copy out so the frame does not pin the receive buffer.
      const frame: DecodedFrame = { ...decoded.frame, payload: Buffer.from(decoded.frame.payload) };
      this.buffer = this.buffer.subarray(end + 1);
      this.partialSince = null;
      this.statistics.messageReceived(frame.wireLength);
      this.logger.debug('Frame decoded', {
        type: frame.messageType,
        length: frame.declaredLength,
        crc: frame.declaredCrc,
      });
      result.frames.push(frame);
    }
  }

  /** Index of the END marker closing the frame at the head of the buffer, or -1. */
  private findEnd(): number {
    let escapeNext = false;
    for (let i = PAYLOAD_OFFSET; i < this.buffer.length; i++) {
      const value = this.buffer[i];
      if (escapeNext) {
        escapeNext = false;
      } else if (value === ESCAPE_MARKER) {
        escapeNext = true;
      } else if (value === END_MARKER) {
        return i;
      }
    }
    return -1;
  }

  private waitForMore(now: number): void {
    if (this.partialSince === null) {
      this.partialSince = now;
    }
  }

  /**
   * Count the failure and resynchronize on the next START after the failed
   * frame's own START. The skipped span belongs to the failed frame and is
   * not counted again as noise.
   */
  private fail(error: FrameError): FrameError {
    this.statistics.recordFrameError(error);
    this.logger.debug(`Frame rejected (${error.kind}): ${error.reason}`);

    const next = this.buffer.indexOf(START_MARKER, 1);
    this.buffer = next === -1 ? Buffer.alloc(0) : this.buffer.subarray(next);
    this.partialSince = null;
    return error;
  }
}
