/**
 * Byte-level link the session drives. Implementations queue inbound bytes
 * until the read loop drains them.
 */
export interface Transport {
  /** Identity used in logs and as a message's sourceInfo */
  readonly name: string;
  isOpen(): boolean;
  open(): Promise<void>;
  close(): Promise<void>;
  /**
   * Bytes received since the previous call, empty when there are none.
   * @throws TransportError once the link has failed
   */
  read(): Buffer;
  write(data: Buffer): Promise<void>;
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts. Never rejects, so loops
 * check `signal.aborted` themselves after waking.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
