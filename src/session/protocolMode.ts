import type { FrameError } from '../protocol/frameCodec';
import { silentLogger, type Logger } from '../logging/logger';

export type ModeState = 'undetermined' | 'binary' | 'text';

export type ModeChangeListener = (mode: ModeState, previous: ModeState) => void;

export interface ProtocolModeOptions {
  binaryEnabled: boolean;
  /** Failures tolerated before the first successful binary frame */
  fallbackThreshold?: number;
  logger?: Logger;
}

export const DEFAULT_FALLBACK_THRESHOLD = 3;

/**
 * Binary-or-text decision for one session.
 *
 * A link that has never produced a valid binary frame is assumed to be
 * running text firmware once enough decode failures pile up. After the first
 * good frame the binary link is trusted for the rest of the session.
 */
export class ProtocolModeController {
  private state: ModeState = 'undetermined';
  private binaryConfirmed = false;
  private failures = 0;
  private readonly threshold: number;
  private readonly listeners: ModeChangeListener[] = [];
  private readonly logger: Logger;

  constructor(options: ProtocolModeOptions) {
    this.threshold = Math.max(1, options.fallbackThreshold ?? DEFAULT_FALLBACK_THRESHOLD);
    this.logger = options.logger ?? silentLogger;
    this.transition(options.binaryEnabled ? 'binary' : 'text');
  }

  get mode(): ModeState {
    return this.state;
  }

  get isBinary(): boolean {
    return this.state === 'binary';
  }

  get confirmed(): boolean {
    return this.binaryConfirmed;
  }

  get failureCount(): number {
    return this.failures;
  }

  onModeChange(listener: ModeChangeListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index !== -1) this.listeners.splice(index, 1);
    };
  }

  recordSuccess(): void {
    if (this.state === 'binary' && !this.binaryConfirmed) {
      this.binaryConfirmed = true;
      this.logger.info('✅ Binary protocol confirmed');
    }
  }

  /**
   * @returns true when this failure switched the session to text mode
   */
  recordFailure(error: FrameError): boolean {
    if (this.state !== 'binary') {
      return false;
    }

    this.failures++;
    if (this.binaryConfirmed || this.failures < this.threshold) {
      return false;
    }

    this.logger.warn(`⚠️  No valid binary frame after ${this.failures} failures, falling back to text protocol`, {
      lastError: error.kind,
      reason: error.reason,
    });
    this.transition('text');
    return true;
  }

  private transition(next: ModeState): void {
    const previous = this.state;
    this.state = next;
    for (const listener of [...this.listeners]) {
      listener(next, previous);
    }
  }
}
