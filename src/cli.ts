#!/usr/bin/env node
import { loadConfig, loadEnvFile, type BridgeConfig } from './config';
import { ConfigError, describeError } from './errors';
import { ConsoleLogger, type Logger } from './logging/logger';
import { encodeFrame, formatBytes } from './protocol/frameCodec';
import { ProtocolStatistics } from './protocol/statistics';
import { MessageType, resolveMessageType } from './messages/messageType';
import { SerialTransport, listSerialPorts, formatPortList } from './session/serialTransport';
import { TransportSession } from './session/transportSession';
import { SerialBridge } from './bridge';
import { InMemoryAssetProvider, InMemoryAudioBackend } from './collaborators';
import {
  analyzeFrame,
  analyzeCapture,
  formatAnalysis,
  formatCaptureReport,
  formatCrcVariations,
  parseHex,
} from './tools/binaryDebugger';

export type Print = (line: string) => void;

const USAGE = [
  'Usage: serial-bridge [option]',
  '',
  '  (no option)               run the bridge on the port configured in .env / environment',
  '  --debug-binary <hex>...   analyse captured bytes; each argument is one captured read',
  '  --create-frame <json>     encode a JSON message (with messageType) and analyse the frame',
  '  --crc-variations <text>   print CRC variants of a payload',
  '  --list-ports              list serial ports',
  '  --help                    show this help',
];

/**
 * Entry point shared by the binary and the tests.
 * @returns process exit code
 */
export async function runCli(argv: string[], print: Print = console.log): Promise<number> {
  const [command, ...rest] = argv;

  try {
    switch (command) {
      case undefined:
        return await runFromEnvironment(print);
      case '--debug-binary':
        return debugBinary(rest, print);
      case '--create-frame':
        return createFrame(rest.join(' '), print);
      case '--crc-variations':
        if (rest.length === 0) return usageError('--crc-variations needs a payload', print);
        formatCrcVariations(Buffer.from(rest.join(' '), 'utf8')).forEach((line) => print(line));
        return 0;
      case '--list-ports':
        formatPortList(await listSerialPorts()).forEach((line) => print(line));
        return 0;
      case '--help':
      case '-h':
        USAGE.forEach((line) => print(line));
        return 0;
      default:
        return usageError(`Unknown option: ${command}`, print);
    }
  } catch (error) {
    print(`❌ ${describeError(error)}`);
    return 1;
  }
}

function usageError(message: string, print: Print): number {
  print(`❌ ${message}`);
  USAGE.forEach((line) => print(line));
  return 2;
}

function debugBinary(hexChunks: string[], print: Print): number {
  if (hexChunks.length === 0) {
    return usageError('--debug-binary needs captured bytes', print);
  }

  const chunks = hexChunks.map(parseHex);
  const analysis = analyzeFrame(Buffer.concat(chunks));
  formatAnalysis(analysis).forEach((line) => print(line));
  print('');
  const report = analyzeCapture(chunks);
  formatCaptureReport(report).forEach((line) => print(line));

  return analysis.valid || report.frames.length > 0 ? 0 : 1;
}

function createFrame(json: string, print: Print): number {
  if (json.trim().length === 0) {
    return usageError('--create-frame needs a JSON message', print);
  }

  const document: unknown = JSON.parse(json);
  const declared = typeof document === 'object' && document !== null && 'messageType' in document ? document.messageType : undefined;
  const type = resolveMessageType(declared);
  if (type === MessageType.INVALID) {
    print(`❌ JSON message needs a valid messageType, got ${JSON.stringify(declared)}`);
    return 1;
  }

  print(`Creating test frame for: ${json}`);
  const frame = encodeFrame(type, Buffer.from(json, 'utf8'));
  print(`Generated frame: ${formatBytes(frame)}`);
  formatAnalysis(analyzeFrame(frame)).forEach((line) => print(line));
  return 0;
}

async function runFromEnvironment(print: Print): Promise<number> {
  loadEnvFile();

  let config: BridgeConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      print(`❌ ${error.message}`);
      return 1;
    }
    throw error;
  }

  await runBridge(config, new ConsoleLogger('bridge', config.debug));
  return 0;
}

/**
 * Run the bridge until SIGINT or SIGTERM. The in-memory audio and asset
 * back ends stand in for the platform services.
 */
export async function runBridge(config: BridgeConfig, logger: Logger): Promise<void> {
  const statistics = new ProtocolStatistics();
  const transport = new SerialTransport({ ...config.serial, logger: logger.child('serial') });
  const session = new TransportSession({
    transport,
    statistics,
    logger: logger.child('session'),
    binaryProtocol: config.protocol.binary,
    textFraming: config.protocol.textFraming,
    maxPayloadSize: config.protocol.maxPayloadSize,
    frameTimeoutMs: config.protocol.frameTimeoutMs,
    fallbackThreshold: config.protocol.fallbackThreshold,
    pollIntervalMs: config.session.pollIntervalMs,
    autoReconnect: config.session.autoReconnect,
    reconnectDelayMs: config.session.reconnectDelayMs,
    statsIntervalMs: config.session.statsIntervalMs,
  });
  const bridge = new SerialBridge({
    registry: session.registry,
    sender: session,
    audio: new InMemoryAudioBackend(),
    assets: new InMemoryAssetProvider(),
    deviceId: config.deviceId,
    logger: logger.child('app'),
  });
  bridge.attach();

  session.on('status', (state) => {
    if (state !== 'connected') return;
    bridge.broadcastStatus('Startup').catch((error: unknown) => {
      logger.warn(`⚠️  Startup status broadcast failed: ${describeError(error)}`);
    });
  });
  session.on('error', (error) => logger.debug(`Session error: ${error.message}`));

  logger.info(`🖥️  Serial bridge starting on ${config.serial.path} (${config.protocol.binary ? 'binary' : 'text'} protocol)`);
  await session.start();

  const broadcasts = new AbortController();
  const periodic = bridge.runPeriodicStatus(config.session.statusIntervalMs, broadcasts.signal).catch((error: unknown) => {
    logger.error('❌ Periodic status broadcast stopped', { error: describeError(error) });
  });

  await new Promise<void>((resolve) => {
    process.once('SIGINT', () => resolve());
    process.once('SIGTERM', () => resolve());
  });

  logger.info('🛑 Stopping serial bridge...');
  broadcasts.abort();
  await periodic;
  await session.stop();
  logger.info(`📊 Final Statistics: ${statistics.summary()}`);
}

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

// Run if this file is executed directly
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('💥 Main error:', error);
    process.exit(1);
  });
}
