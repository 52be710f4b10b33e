import { existsSync, readFileSync } from 'fs';
import { hostname } from 'os';
import { z } from 'zod';
import { ConfigError } from './errors';
import type { SerialParity } from './session/serialTransport';
import type { TextFraming } from './protocol/lineFramer';

export interface BridgeConfig {
  serial: {
    path: string;
    baudRate: number;
    dataBits: 5 | 6 | 7 | 8;
    parity: SerialParity;
    stopBits: 1 | 1.5 | 2;
  };
  protocol: {
    binary: boolean;
    textFraming: TextFraming;
    maxPayloadSize: number;
    frameTimeoutMs: number;
    fallbackThreshold: number;
  };
  session: {
    pollIntervalMs: number;
    autoReconnect: boolean;
    reconnectDelayMs: number;
    statsIntervalMs: number;
    statusIntervalMs: number;
  };
  deviceId: string;
  debug: boolean;
}

const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['0', 'false', 'no', 'off'];

const flag = (fallback: boolean) =>
  z
    .string()
    .transform((value) => value.toLowerCase())
    .refine((value) => TRUE_VALUES.includes(value) || FALSE_VALUES.includes(value), {
      message: `expected one of ${[...TRUE_VALUES, ...FALSE_VALUES].join(', ')}`,
    })
    .transform((value) => TRUE_VALUES.includes(value))
    .optional()
    .transform((value) => value ?? fallback);

const count = (fallback: number, min: number) => z.coerce.number().int().min(min).default(fallback);

const DATA_BITS = { '5': 5, '6': 6, '7': 7, '8': 8 } as const;
const STOP_BITS = { '1': 1, '1.5': 1.5, '2': 2 } as const;

const envSchema = z.object({
  SERIAL_PORT: z.string().default('/dev/ttyUSB0'),
  SERIAL_BAUD_RATE: count(115200, 1),
  SERIAL_DATA_BITS: z
    .enum(['5', '6', '7', '8'])
    .default('8')
    .transform((value) => DATA_BITS[value]),
  SERIAL_PARITY: z.enum(['none', 'even', 'odd', 'mark', 'space']).default('none'),
  SERIAL_STOP_BITS: z
    .enum(['1', '1.5', '2'])
    .default('1')
    .transform((value) => STOP_BITS[value]),
  BINARY_PROTOCOL: flag(true),
  TEXT_FRAMING: z.enum(['newline', 'wrapped']).default('newline'),
  MAX_PAYLOAD_SIZE: count(4096, 1),
  FRAME_TIMEOUT_MS: count(1000, 1),
  FALLBACK_THRESHOLD: count(3, 1),
  POLL_INTERVAL_MS: count(10, 1),
  AUTO_RECONNECT: flag(true),
  RECONNECT_DELAY_MS: count(5000, 0),
  STATS_INTERVAL_MS: count(30000, 0),
  STATUS_BROADCAST_INTERVAL_MS: count(10000, 0),
  DEVICE_ID: z.string().optional(),
  BRIDGE_DEBUG: flag(false),
});

export type ConfigEnv = Record<string, string | undefined>;

/**
 * Read bridge settings from environment variables. Unset or blank variables
 * take their defaults.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: ConfigEnv = process.env): BridgeConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key]?.trim();
    if (value) {
      present[key] = value;
    }
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const e = parsed.data;
  return {
    serial: {
      path: e.SERIAL_PORT,
      baudRate: e.SERIAL_BAUD_RATE,
      dataBits: e.SERIAL_DATA_BITS,
      parity: e.SERIAL_PARITY,
      stopBits: e.SERIAL_STOP_BITS,
    },
    protocol: {
      binary: e.BINARY_PROTOCOL,
      textFraming: e.TEXT_FRAMING,
      maxPayloadSize: e.MAX_PAYLOAD_SIZE,
      frameTimeoutMs: e.FRAME_TIMEOUT_MS,
      fallbackThreshold: e.FALLBACK_THRESHOLD,
    },
    session: {
      pollIntervalMs: e.POLL_INTERVAL_MS,
      autoReconnect: e.AUTO_RECONNECT,
      reconnectDelayMs: e.RECONNECT_DELAY_MS,
      statsIntervalMs: e.STATS_INTERVAL_MS,
      statusIntervalMs: e.STATUS_BROADCAST_INTERVAL_MS,
    },
    deviceId: e.DEVICE_ID ?? hostname(),
    debug: e.BRIDGE_DEBUG,
  };
}

/**
 * Load `KEY=value` lines from a dotenv file. Variables already present in
 * `env` win over the file.
 *
 * @returns names of the variables that were set
 */
export function loadEnvFile(path: string = '.env', env: ConfigEnv = process.env): string[] {
  if (!existsSync(path)) {
    return [];
  }

  const loaded: string[] = [];
  for (const rawLine of readFileSync(path, 'utf8').split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith('#')) {
      continue;
    }

    const separator = line.indexOf('=');
    if (separator <= 0) {
      continue;
    }

    const key = line.slice(0, separator).replace(/^export\s+/, '').trim();
    const value = unquote(line.slice(separator + 1).trim());
    if (key.length === 0 || env[key] !== undefined) {
      continue;
    }

    env[key] = value;
    loaded.push(key);
  }
  return loaded;
}

function unquote(value: string): string {
  const first = value[0];
  if (value.length >= 2 && (first === '"' || first === "'") && value[value.length - 1] === first) {
    return value.slice(1, -1);
  }
  return value;
}
