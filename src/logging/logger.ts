import createDebug from 'debug';

/**
 * Logger handle passed to every component at construction.
 *
 * Components never reach for a global logger; whoever builds them decides
 * where output goes.
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

const NAMESPACE = 'serial-bridge';

function formatMeta(meta?: Record<string, unknown>): string {
  return meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
}

/**
 * Console output for info and above, `debug` namespaces for trace output.
 *
 * Debug lines are visible with `DEBUG=serial-bridge:*`, or always when the
 * logger is created in debug mode.
 */
export class ConsoleLogger implements Logger {
  private readonly trace: createDebug.Debugger;

  constructor(
    private readonly scope: string = 'bridge',
    private readonly debugMode: boolean = false,
  ) {
    this.trace = createDebug(`${NAMESPACE}:${scope}`);
    if (debugMode) {
      this.trace.enabled = true;
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.trace(`${message}${formatMeta(meta)}`);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    console.log(`[${this.scope}] ${message}${formatMeta(meta)}`);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    console.warn(`[${this.scope}] ${message}${formatMeta(meta)}`);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    console.error(`[${this.scope}] ${message}${formatMeta(meta)}`);
  }

  child(scope: string): Logger {
    return new ConsoleLogger(`${this.scope}:${scope}`, this.debugMode);
  }
}

class SilentLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(): Logger {
    return this;
  }
}

export const silentLogger: Logger = new SilentLogger();
