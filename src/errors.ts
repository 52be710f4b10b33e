/**
 * Errors that cross a component boundary as exceptions.
 *
 * Frame and message level problems are returned as values (see FrameError and
 * ParseResult); only these conditions are thrown.
 */

export class BridgeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BridgeError';
  }
}

/** I/O failure on the underlying link. Drives the reconnect state machine. */
export class TransportError extends BridgeError {
  readonly transport: string;

  constructor(transport: string, message: string, options?: { cause?: unknown }) {
    super(`${transport}: ${message}`);
    this.name = 'TransportError';
    this.transport = transport;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class PayloadTooLargeError extends BridgeError {
  constructor(size: number, limit: number) {
    super(`Payload of ${size} bytes exceeds maximum size of ${limit} bytes`);
    this.name = 'PayloadTooLargeError';
  }
}

export class ConfigError extends BridgeError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** Formats an unknown thrown value for log output. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
