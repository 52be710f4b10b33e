import type { FrameError } from './frameCodec';

export interface StatisticsSnapshot {
  messagesSent: number;
  messagesReceived: number;
  bytesSent: number;
  bytesReceived: number;
  framingErrors: number;
  crcErrors: number;
  escapeSequenceErrors: number;
  bufferOverflowErrors: number;
  timeoutErrors: number;
  parseErrors: number;
  unknownMessageTypes: number;
  transportErrors: number;
  totalErrors: number;
  /** Percentage of frames accepted among accepted plus rejected frames */
  successRate: number;
  messagesPerSecond: number;
  bytesPerSecond: number;
  uptimeMs: number;
}

type Counter = Exclude<
  keyof StatisticsSnapshot,
  'totalErrors' | 'successRate' | 'messagesPerSecond' | 'bytesPerSecond' | 'uptimeMs'
>;

const FRAME_ERROR_COUNTERS = {
  framing: 'framingErrors',
  crc: 'crcErrors',
  escape: 'escapeSequenceErrors',
  'buffer-overflow': 'bufferOverflowErrors',
  timeout: 'timeoutErrors',
} as const satisfies Record<FrameError['kind'], Counter>;

/**
 * Link health counters for one session.
 *
 * Every update is a single synchronous increment, so readers on the event
 * loop never observe a half-applied change.
 */
export class ProtocolStatistics {
  private counters: Record<Counter, number> = ProtocolStatistics.zeroCounters();
  private startTime: number;

  constructor(private readonly clock: () => number = Date.now) {
    this.startTime = clock();
  }

  private static zeroCounters(): Record<Counter, number> {
    return {
      messagesSent: 0,
      messagesReceived: 0,
      bytesSent: 0,
      bytesReceived: 0,
      framingErrors: 0,
      crcErrors: 0,
      escapeSequenceErrors: 0,
      bufferOverflowErrors: 0,
      timeoutErrors: 0,
      parseErrors: 0,
      unknownMessageTypes: 0,
      transportErrors: 0,
    };
  }

  messageSent(bytes: number): void {
    this.counters.messagesSent++;
    this.counters.bytesSent += bytes;
  }

  messageReceived(bytes: number): void {
    this.counters.messagesReceived++;
    this.counters.bytesReceived += bytes;
  }

  recordFrameError(error: FrameError): void {
    this.counters[FRAME_ERROR_COUNTERS[error.kind]]++;
  }

  parseError(): void {
    this.counters.parseErrors++;
  }

  unknownMessageType(): void {
    this.counters.unknownMessageTypes++;
  }

  transportError(): void {
    this.counters.transportErrors++;
  }

  get frameErrors(): number {
    const c = this.counters;
    return c.framingErrors + c.crcErrors + c.escapeSequenceErrors + c.bufferOverflowErrors + c.timeoutErrors;
  }

  get totalErrors(): number {
    const c = this.counters;
    return this.frameErrors + c.parseErrors + c.unknownMessageTypes + c.transportErrors;
  }

  get uptimeMs(): number {
    return Math.max(0, this.clock() - this.startTime);
  }

  snapshot(): Readonly<StatisticsSnapshot> {
    const uptimeMs = this.uptimeMs;
    const seconds = uptimeMs / 1000;
    const c = this.counters;
    const attempts = c.messagesReceived + this.frameErrors;

    return Object.freeze({
      ...c,
      totalErrors: this.totalErrors,
      successRate: attempts > 0 ? (c.messagesReceived / attempts) * 100 : 0,
      messagesPerSecond: seconds > 0 ? (c.messagesSent + c.messagesReceived) / seconds : 0,
      bytesPerSecond: seconds > 0 ? (c.bytesSent + c.bytesReceived) / seconds : 0,
      uptimeMs,
    });
  }

  /** Zero every counter and restart uptime. */
  reset(): void {
    this.counters = ProtocolStatistics.zeroCounters();
    this.startTime = this.clock();
  }

  summary(): string {
    const s = this.snapshot();
    return (
      `Messages: Sent=${s.messagesSent}, Received=${s.messagesReceived}, ` +
      `Bytes: TX=${s.bytesSent}, RX=${s.bytesReceived}, ` +
      `Errors: Framing=${s.framingErrors}, CRC=${s.crcErrors}, Timeout=${s.timeoutErrors}, ` +
      `Overflow=${s.bufferOverflowErrors}, Escape=${s.escapeSequenceErrors}, ` +
      `Parse=${s.parseErrors}, Unknown=${s.unknownMessageTypes}, Transport=${s.transportErrors}, ` +
      `Success Rate=${s.successRate.toFixed(2)}%, ` +
      `Performance: ${s.messagesPerSecond.toFixed(2)} msg/s, ${s.bytesPerSecond.toFixed(2)} B/s, ` +
      `Uptime: ${formatUptime(s.uptimeMs)}`
    );
  }
}

/** hh:mm:ss */
export function formatUptime(ms: number): string {
  const total = Math.floor(ms / 1000);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = total % 60;
  return [hours, minutes, seconds].map((part) => String(part).padStart(2, '0')).join(':');
}
