import { TEXT_START_DELIMITER, TEXT_END_DELIMITER, DEFAULT_MAX_PAYLOAD_SIZE } from './constants';
import type { ProtocolStatistics } from './statistics';
import { silentLogger, type Logger } from '../logging/logger';

/**
 * `newline`: one JSON document per line.
 * `wrapped`: `<MSG>{...}</MSG>` with anything outside the markers ignored.
 */
export type TextFraming = 'newline' | 'wrapped';

export interface LineFramerOptions {
  mode: TextFraming;
  statistics: ProtocolStatistics;
  maxLineLength?: number;
  logger?: Logger;
}

const NEWLINE = 0x0a;
const START = Buffer.from(TEXT_START_DELIMITER, 'utf8');
const END = Buffer.from(TEXT_END_DELIMITER, 'utf8');

/**
 * Splits the legacy text protocol into messages. Buffering is byte based so a
 * UTF-8 sequence split across reads is decoded whole.
 */
export class LineFramer {
  private buffer: Buffer = Buffer.alloc(0);
  private readonly mode: TextFraming;
  private readonly statistics: ProtocolStatistics;
  private readonly maxLineLength: number;
  private readonly logger: Logger;

  constructor(options: LineFramerOptions) {
    this.mode = options.mode;
    this.statistics = options.statistics;
    this.maxLineLength = options.maxLineLength ?? DEFAULT_MAX_PAYLOAD_SIZE;
    this.logger = options.logger ?? silentLogger;
  }

  get pending(): Buffer {
    return this.buffer;
  }

  feed(chunk: Uint8Array): string[] {
    this.buffer = this.buffer.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buffer, chunk]);
    const messages = this.mode === 'newline' ? this.extractLines() : this.extractWrapped();
    this.enforceLimit();
    return messages;
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
  }

  private extractLines(): string[] {
    const lines: string[] = [];
    let newline = this.buffer.indexOf(NEWLINE);

    while (newline !== -1) {
      const line = this.buffer.subarray(0, newline).toString('utf8').replace(/\r$/, '').trim();
      this.buffer = this.buffer.subarray(newline + 1);
      if (line.length > 0) {
        lines.push(line);
      }
      newline = this.buffer.indexOf(NEWLINE);
    }

    return lines;
  }

  private extractWrapped(): string[] {
    const messages: string[] = [];

    while (true) {
      const start = this.buffer.indexOf(START);
      if (start === -1) {
        // Keep a tail that could be the beginning of a split start delimiter.
        const keep = Math.min(this.buffer.length, START.length - 1);
        this.buffer = this.buffer.subarray(this.buffer.length - keep);
        break;
      }

      const end = this.buffer.indexOf(END, start + START.length);
      if (end === -1) {
        this.buffer = this.buffer.subarray(start);
        break;
      }

      const message = this.buffer.subarray(start + START.length, end).toString('utf8').trim();
      this.buffer = this.buffer.subarray(end + END.length);
      if (message.length > 0) {
        messages.push(message);
      }
    }

    return messages;
  }

  private enforceLimit(): void {
    if (this.buffer.length <= this.maxLineLength) {
      return;
    }

    this.logger.warn(`⚠️  Text message exceeds ${this.maxLineLength} bytes, discarding buffer`, {
      buffered: this.buffer.length,
    });
    this.statistics.recordFrameError({
      kind: 'buffer-overflow',
      reason: `Unterminated text message exceeds ${this.maxLineLength} bytes`,
    });
    this.buffer = Buffer.alloc(0);
  }
}

/** Outbound text representation of one JSON message. */
export function frameLine(json: string, mode: TextFraming): Buffer {
  const text = mode === 'newline' ? `${json}\n` : `${TEXT_START_DELIMITER}${json}${TEXT_END_DELIMITER}\n`;
  return Buffer.from(text, 'utf8');
}
