import { EventEmitter } from 'events';
import type { Transport } from './transport';
import { delay } from './transport';
import { ProtocolModeController, type ModeState } from './protocolMode';
import { runStatisticsReporter } from './statisticsReporter';
import { FrameAssembler } from '../protocol/frameAssembler';
import { encodeFrame, type FrameError } from '../protocol/frameCodec';
import { LineFramer, frameLine, type TextFraming } from '../protocol/lineFramer';
import { ProtocolStatistics, type StatisticsSnapshot } from '../protocol/statistics';
import { DEFAULT_FRAME_TIMEOUT_MS, DEFAULT_MAX_PAYLOAD_SIZE } from '../protocol/constants';
import { MessageRegistry } from '../messages/messageRegistry';
import { MessageType } from '../messages/messageType';
import { parseMessage, type ParsedMessage } from '../messages/messageParser';
import { PayloadTooLargeError, TransportError, describeError } from '../errors';
import { silentLogger, type Logger } from '../logging/logger';

export type SessionState = 'disconnected' | 'connecting' | 'connected' | 'reconnecting';

export interface TransportSessionOptions {
  transport: Transport;
  /** Created with the session's statistics and logger when omitted */
  registry?: MessageRegistry;
  statistics?: ProtocolStatistics;
  logger?: Logger;
  binaryProtocol?: boolean;
  textFraming?: TextFraming;
  maxPayloadSize?: number;
  frameTimeoutMs?: number;
  fallbackThreshold?: number;
  pollIntervalMs?: number;
  autoReconnect?: boolean;
  reconnectDelayMs?: number;
  /** 0 disables the periodic statistics report */
  statsIntervalMs?: number;
  clock?: () => number;
}

export interface TransportSessionEvents {
  status: (state: SessionState, previous: SessionState) => void;
  message: (message: ParsedMessage, handled: boolean) => void;
  modeChange: (mode: ModeState, previous: ModeState) => void;
  statistics: (snapshot: Readonly<StatisticsSnapshot>) => void;
  error: (error: Error) => void;
}

export interface TransportSession {
  on<E extends keyof TransportSessionEvents>(event: E, listener: TransportSessionEvents[E]): this;
  once<E extends keyof TransportSessionEvents>(event: E, listener: TransportSessionEvents[E]): this;
  off<E extends keyof TransportSessionEvents>(event: E, listener: TransportSessionEvents[E]): this;
  emit<E extends keyof TransportSessionEvents>(event: E, ...args: Parameters<TransportSessionEvents[E]>): boolean;
}

export const DEFAULT_POLL_INTERVAL_MS = 10;
export const DEFAULT_RECONNECT_DELAY_MS = 5000;

/**
 * One connection's lifecycle: open, read loop, framed writes and reconnect.
 *
 * Inbound messages are dispatched one at a time and awaited before the next
 * read, so a slow handler throttles the link instead of queueing work.
 */
export class TransportSession extends EventEmitter {
  readonly registry: MessageRegistry;
  readonly statistics: ProtocolStatistics;

  private readonly transport: Transport;
  private readonly logger: Logger;
  private readonly assembler: FrameAssembler;
  private readonly lineFramer: LineFramer;
  private readonly modeController: ProtocolModeController;
  private readonly textFraming: TextFraming;
  private readonly maxPayloadSize: number;
  private readonly pollIntervalMs: number;
  private readonly autoReconnect: boolean;
  private readonly reconnectDelayMs: number;
  private readonly statsIntervalMs: number;
  private readonly clock: () => number;

  private state: SessionState = 'disconnected';
  private controller: AbortController | null = null;
  private loops: Promise<void>[] = [];

  constructor(options: TransportSessionOptions) {
    super();
    this.transport = options.transport;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? Date.now;
    this.statistics = options.statistics ?? new ProtocolStatistics(this.clock);
    this.registry = options.registry ?? new MessageRegistry(this.logger.child('registry'), this.statistics);
    this.textFraming = options.textFraming ?? 'newline';
    this.maxPayloadSize = options.maxPayloadSize ?? DEFAULT_MAX_PAYLOAD_SIZE;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.autoReconnect = options.autoReconnect ?? true;
    this.reconnectDelayMs = options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS;
    this.statsIntervalMs = options.statsIntervalMs ?? 0;

    this.assembler = new FrameAssembler({
      statistics: this.statistics,
      maxPayloadSize: this.maxPayloadSize,
      frameTimeoutMs: options.frameTimeoutMs ?? DEFAULT_FRAME_TIMEOUT_MS,
      logger: this.logger.child('assembler'),
      clock: this.clock,
    });
    this.lineFramer = new LineFramer({
      mode: this.textFraming,
      statistics: this.statistics,
      maxLineLength: this.maxPayloadSize,
      logger: this.logger.child('text'),
    });
    this.modeController = new ProtocolModeController({
      binaryEnabled: options.binaryProtocol ?? true,
      fallbackThreshold: options.fallbackThreshold,
      logger: this.logger,
    });
    this.modeController.onModeChange((mode, previous) => {
      this.logger.info(`🔀 Protocol mode: ${previous} -> ${mode}`);
      this.notify('modeChange', mode, previous);
    });
  }

  get status(): SessionState {
    return this.state;
  }

  get mode(): ModeState {
    return this.modeController.mode;
  }

  get isRunning(): boolean {
    return this.controller !== null;
  }

  /**
   * Open the transport and start the read loop.
   * @throws TransportError when the first open fails and auto-reconnect is off
   */
  async start(): Promise<void> {
    if (this.controller) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;

    try {
      await this.connect();
    } catch (err) {
      if (!this.autoReconnect) {
        this.controller = null;
        this.setState('disconnected');
        throw err;
      }
      this.statistics.transportError();
      this.logger.warn(`⚠️  Initial connection failed, will retry: ${describeError(err)}`);
      this.setState('reconnecting');
    }

    const readLoop = this.runReadLoop(controller.signal)
      .catch((err: unknown) => {
        this.logger.error('❌ Read loop stopped', { error: describeError(err) });
        this.reportError(err);
      })
      .then(async () => {
        if (!controller.signal.aborted) {
          await this.endRun(controller);
        }
      });
    const statsLoop = runStatisticsReporter(
      {
        statistics: this.statistics,
        intervalMs: this.statsIntervalMs,
        logger: this.logger,
        onSnapshot: (snapshot) => this.notify('statistics', snapshot),
      },
      controller.signal,
    ).catch((err: unknown) => {
      this.logger.error('❌ Statistics reporter stopped', { error: describeError(err) });
    });
    this.loops = [readLoop, statsLoop];
  }

  /**
   * Cancel both loops and close the transport. Writes still in flight are not
   * flushed.
   */
  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) {
      return;
    }

    controller.abort();
    await Promise.all(this.loops);
    this.loops = [];
    this.controller = null;

    try {
      await this.transport.close();
    } catch (err) {
      this.logger.warn(`⚠️  Error while closing ${this.transport.name}: ${describeError(err)}`);
      this.reportError(err);
    }
    this.setState('disconnected');
  }

  /**
   * Serialize `payload` with its `messageType` field and write it framed for
   * the current protocol mode.
   *
   * @returns false when not connected or the write failed
   * @throws PayloadTooLargeError
   */
  async send(type: MessageType, payload: Record<string, unknown>): Promise<boolean> {
    const json = JSON.stringify({ ...payload, messageType: type });
    const body = Buffer.from(json, 'utf8');
    if (body.length > this.maxPayloadSize) {
      throw new PayloadTooLargeError(body.length, this.maxPayloadSize);
    }

    if (this.state !== 'connected' || !this.transport.isOpen()) {
      this.logger.debug(`Not connected, dropping ${MessageType[type]}`);
      return false;
    }

    const wire = this.modeController.isBinary ? encodeFrame(type, body) : frameLine(json, this.textFraming);
    try {
      await this.transport.write(wire);
    } catch (err) {
      this.statistics.transportError();
      this.logger.warn(`⚠️  Failed to send ${MessageType[type]}: ${describeError(err)}`);
      this.reportError(err);
      return false;
    }

    this.statistics.messageSent(wire.length);
    this.logger.debug(`📤 Sent ${MessageType[type]} (${wire.length} bytes)`);
    return true;
  }

  private async connect(): Promise<void> {
    this.setState('connecting');
    try {
      await this.transport.open();
    } catch (err) {
      throw err instanceof TransportError
        ? err
        : new TransportError(this.transport.name, describeError(err), { cause: err });
    }
    this.assembler.reset();
    this.lineFramer.reset();
    this.setState('connected');
  }

  private async runReadLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      if (this.state !== 'connected') {
        if (!this.autoReconnect) {
          break;
        }
        await this.reconnect(signal);
        continue;
      }

      let chunk: Buffer;
      try {
        if (!this.transport.isOpen()) {
          throw new TransportError(this.transport.name, 'connection closed');
        }
        chunk = this.transport.read();
      } catch (err) {
        await this.handleTransportFailure(err);
        continue;
      }

      if (chunk.length === 0) {
        this.checkStalePartial();
        await delay(this.pollIntervalMs, signal);
        continue;
      }

      await this.processChunk(chunk);
    }
  }

  private async reconnect(signal: AbortSignal): Promise<void> {
    this.setState('reconnecting');
    this.logger.info(`🔄 Reconnecting to ${this.transport.name} in ${this.reconnectDelayMs}ms`);
    await delay(this.reconnectDelayMs, signal);
    if (signal.aborted) {
      return;
    }

    try {
      await this.connect();
    } catch (err) {
      this.statistics.transportError();
      this.logger.warn(`⚠️  Reconnect failed: ${describeError(err)}`);
      this.setState('reconnecting');
    }
  }

  private async handleTransportFailure(err: unknown): Promise<void> {
    this.statistics.transportError();
    this.logger.error(`❌ ${this.transport.name} transport failed: ${describeError(err)}`);
    this.reportError(err);

    try {
      await this.transport.close();
    } catch (closeErr) {
      this.logger.debug(`Close after failure also failed: ${describeError(closeErr)}`);
    }
    this.setState(this.autoReconnect ? 'reconnecting' : 'disconnected');
  }

  private async processChunk(chunk: Buffer): Promise<void> {
    if (!this.modeController.isBinary) {
      await this.processText(chunk);
      return;
    }

    const { frames, failures } = this.assembler.feed(chunk);
    if (frames.length > 0) {
      this.modeController.recordSuccess();
    }
    const fellBack = this.recordFailures(failures);

    for (const frame of frames) {
      await this.handleMessage(frame.payload.toString('utf8'), frame.messageType);
    }

    if (fellBack) {
      // Re-read the triggering chunk as text.
      this.assembler.reset();
      await this.processText(chunk);
    }
  }

  private async processText(chunk: Buffer): Promise<void> {
    for (const line of this.lineFramer.feed(chunk)) {
      this.statistics.messageReceived(Buffer.byteLength(line, 'utf8'));
      await this.handleMessage(line);
    }
  }

  private checkStalePartial(): void {
    if (!this.modeController.isBinary) {
      return;
    }
    const expired = this.assembler.expireStale();
    if (expired && this.recordFailures([expired])) {
      this.assembler.reset();
    }
  }

  /** @returns true when one of the failures switched the session to text */
  private recordFailures(failures: FrameError[]): boolean {
    for (const failure of failures) {
      if (this.modeController.recordFailure(failure)) {
        return true;
      }
    }
    return false;
  }

  private async handleMessage(text: string, frameType?: number): Promise<void> {
    const parsed = parseMessage(text, this.transport.name, frameType, this.clock());
    if (!parsed.ok) {
      if (parsed.error.kind === 'unknown-type') {
        this.statistics.unknownMessageType();
      } else {
        this.statistics.parseError();
      }
      this.logger.debug(`Dropped message from ${this.transport.name}: ${parsed.error.reason}`);
      return;
    }

    this.logger.debug(`📥 ${MessageType[parsed.message.messageType]} from ${this.transport.name}`, {
      source: this.transport.name,
      json: text,
    });
    const handled = await this.registry.dispatch(parsed.message);
    this.notify('message', parsed.message, handled);
  }

  private setState(next: SessionState): void {
    const previous = this.state;
    if (previous === next) {
      return;
    }
    this.state = next;
    this.logger.debug(`Session ${previous} -> ${next}`);
    this.notify('status', next, previous);
  }

  /** EventEmitter throws on an 'error' event nobody listens to. */
  private reportError(err: unknown): void {
    if (this.listenerCount('error') > 0) {
      this.notify('error', err instanceof Error ? err : new Error(describeError(err)));
    }
  }

  /** Listener failures are logged and never reach the loops. */
  private notify<E extends keyof TransportSessionEvents>(event: E, ...args: Parameters<TransportSessionEvents[E]>): void {
    try {
      this.emit(event, ...args);
    } catch (err) {
      this.logger.warn(`⚠️  '${event}' listener failed: ${describeError(err)}`);
    }
  }

  /**
   * The read loop ended on its own (auto-reconnect off, or a crash). Release
   * the run so start() can open the link again.
   */
  private async endRun(controller: AbortController): Promise<void> {
    if (this.controller !== controller) {
      return;
    }
    controller.abort();
    this.controller = null;
    this.loops = [];

    try {
      await this.transport.close();
    } catch (err) {
      this.logger.debug(`Close after the read loop ended failed: ${describeError(err)}`);
    }
    this.setState('disconnected');
    this.logger.info(`🛑 Session on ${this.transport.name} stopped`);
  }
}
