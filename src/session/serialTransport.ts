import { SerialPort } from 'serialport';
import type { Transport } from './transport';
import { TransportError, describeError } from '../errors';
import { formatBytes } from '../protocol/frameCodec';
import { silentLogger, type Logger } from '../logging/logger';

export type SerialParity = 'none' | 'even' | 'odd' | 'mark' | 'space';

export interface SerialPortSettings {
  path: string;
  baudRate: number;
  dataBits?: 5 | 6 | 7 | 8;
  parity?: SerialParity;
  stopBits?: 1 | 1.5 | 2;
}

/**
 * The slice of the `serialport` stream API this transport relies on.
 * `SerialPort` and `SerialPortMock` both satisfy it.
 */
export interface SerialDevice {
  readonly isOpen: boolean;
  open(callback: (err: Error | null) => void): void;
  close(callback: (err: Error | null) => void): void;
  write(data: Buffer, callback: (err: Error | null | undefined) => void): boolean;
  drain(callback: (err: Error | null) => void): void;
  on(event: 'data', listener: (chunk: Buffer) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  removeAllListeners(): unknown;
}

export type SerialDeviceFactory = (settings: Required<SerialPortSettings>) => SerialDevice;

export interface SerialTransportOptions extends SerialPortSettings {
  logger?: Logger;
  /** Replaces the real port, e.g. with `SerialPortMock` */
  createPort?: SerialDeviceFactory;
}

const createSerialPort: SerialDeviceFactory = (settings) =>
  new SerialPort({
    path: settings.path,
    baudRate: settings.baudRate,
    dataBits: settings.dataBits,
    parity: settings.parity,
    stopBits: settings.stopBits,
    autoOpen: false,
  });

/**
 * Transport over a serial port. Inbound `data` events are queued until the
 * session's read loop drains them; an `error` or unexpected `close` marks the
 * link failed so the next read() throws.
 */
export class SerialTransport implements Transport {
  readonly name = 'Serial';

  private port: SerialDevice | null = null;
  private received: Buffer[] = [];
  private failure: Error | null = null;

  private readonly settings: Required<SerialPortSettings>;
  private readonly createPort: SerialDeviceFactory;
  private readonly logger: Logger;

  constructor(options: SerialTransportOptions) {
    this.settings = {
      path: options.path,
      baudRate: options.baudRate,
      dataBits: options.dataBits ?? 8,
      parity: options.parity ?? 'none',
      stopBits: options.stopBits ?? 1,
    };
    this.createPort = options.createPort ?? createSerialPort;
    this.logger = options.logger ?? silentLogger;
  }

  get path(): string {
    return this.settings.path;
  }

  isOpen(): boolean {
    return this.port !== null && this.port.isOpen && this.failure === null;
  }

  async open(): Promise<void> {
    if (this.isOpen()) {
      return;
    }
    this.detach();

    const { path, baudRate, dataBits, parity, stopBits } = this.settings;
    this.logger.info(`🔌 Connecting to serial port: ${path}`);
    this.logger.debug(`⚙️  Configuration: ${baudRate} baud, ${parity} parity, ${dataBits} data bits, ${stopBits} stop bit`);

    let port: SerialDevice;
    try {
      port = this.createPort(this.settings);
    } catch (err) {
      throw new TransportError(this.name, `failed to create port ${path}: ${describeError(err)}`, { cause: err });
    }

    port.on('data', (chunk: Buffer) => {
      if (this.port !== port) return;
      this.received.push(chunk);
      this.logger.debug(`📥 Raw data received: ${formatBytes(chunk)}`);
    });
    port.on('error', (err: Error) => {
      if (this.port !== port) return;
      this.logger.error('🚨 Serial port error', { error: err.message });
      this.failure = err;
    });
    port.on('close', () => {
      if (this.port !== port) return;
      this.logger.warn('🔐 Serial port closed unexpectedly');
      this.failure = new Error('port closed');
    });

    await new Promise<void>((resolve, reject) => {
      port.open((err) => {
        if (err) {
          port.removeAllListeners();
          reject(new TransportError(this.name, `failed to open ${path}: ${err.message}`, { cause: err }));
          return;
        }
        resolve();
      });
    });

    this.port = port;
    this.failure = null;
    this.received = [];
    this.logger.info(`✅ Serial connection established on ${path}`);
  }

  async close(): Promise<void> {
    const port = this.port;
    this.detach();
    if (!port || !port.isOpen) {
      return;
    }

    port.removeAllListeners();
    await new Promise<void>((resolve, reject) => {
      port.close((err) => {
        if (err) {
          reject(new TransportError(this.name, `failed to close ${this.path}: ${err.message}`, { cause: err }));
          return;
        }
        resolve();
      });
    });
    this.logger.info('✅ Serial connection closed gracefully');
  }

  read(): Buffer {
    if (this.failure) {
      throw new TransportError(this.name, this.failure.message, { cause: this.failure });
    }
    if (!this.port) {
      throw new TransportError(this.name, 'port is not open');
    }
    if (this.received.length === 0) {
      return Buffer.alloc(0);
    }

    const chunks = this.received;
    this.received = [];
    return chunks.length === 1 ? chunks[0] : Buffer.concat(chunks);
  }

  async write(data: Buffer): Promise<void> {
    const port = this.port;
    if (!port || !this.isOpen()) {
      throw new TransportError(this.name, 'port is not open');
    }

    this.logger.debug(`📤 Sending: ${formatBytes(data)}`);
    await new Promise<void>((resolve, reject) => {
      port.write(data, (err) => {
        if (err) {
          reject(new TransportError(this.name, `write failed: ${err.message}`, { cause: err }));
          return;
        }
        port.drain((drainErr) => {
          if (drainErr) {
            reject(new TransportError(this.name, `drain failed: ${drainErr.message}`, { cause: drainErr }));
            return;
          }
          resolve();
        });
      });
    });
  }

  private detach(): void {
    this.port = null;
    this.received = [];
    this.failure = null;
  }
}

export type SerialPortInfo = Awaited<ReturnType<typeof SerialPort.list>>[number];

export interface ListedPort {
  info: SerialPortInfo;
  /** USB-serial bridge chip or a USB CDC device node */
  likelyAdapter: boolean;
}

/** Vendor ids of common USB-serial bridges (FTDI, Silicon Labs, WCH, Prolific, Espressif) */
const ADAPTER_VENDOR_IDS = new Set(['0403', '10c4', '1a86', '067b', '303a']);
const ADAPTER_PATH = /ttyUSB|ttyACM|usbserial|usbmodem/i;

export function isLikelyAdapter(info: SerialPortInfo): boolean {
  const vendorId = info.vendorId?.toLowerCase();
  return (vendorId !== undefined && ADAPTER_VENDOR_IDS.has(vendorId)) || ADAPTER_PATH.test(info.path);
}

export async function listSerialPorts(): Promise<ListedPort[]> {
  const ports = await SerialPort.list();
  return ports.map((info) => ({ info, likelyAdapter: isLikelyAdapter(info) }));
}

export function formatPortList(ports: ListedPort[]): string[] {
  if (ports.length === 0) {
    return ['📡 Available Serial Ports:', '   ⚠️  No serial ports found'];
  }

  const lines = ['📡 Available Serial Ports:'];
  ports.forEach(({ info, likelyAdapter }, index) => {
    lines.push(`   ${index + 1}. ${info.path}${likelyAdapter ? '  ⭐ likely USB-serial adapter' : ''}`);
    if (info.manufacturer) lines.push(`      📱 Manufacturer: ${info.manufacturer}`);
    if (info.serialNumber) lines.push(`      🔢 Serial Number: ${info.serialNumber}`);
    if (info.vendorId && info.productId) lines.push(`      🏷️  VID:PID: ${info.vendorId}:${info.productId}`);
  });
  return lines;
}
