import { loadConfig, loadEnvFile } from '../src/config';
import { ConsoleLogger } from '../src/logging/logger';
import { toWireName } from '../src/messages/messageType';
import { SerialTransport } from '../src/session/serialTransport';
import { TransportSession } from '../src/session/transportSession';

async function monitorLink() {
  loadEnvFile();
  const config = loadConfig();
  const logger = new ConsoleLogger('monitor', config.debug);

  const session = new TransportSession({
    transport: new SerialTransport({ ...config.serial, logger: logger.child('serial') }),
    logger,
    binaryProtocol: config.protocol.binary,
    textFraming: config.protocol.textFraming,
    maxPayloadSize: config.protocol.maxPayloadSize,
    frameTimeoutMs: config.protocol.frameTimeoutMs,
    fallbackThreshold: config.protocol.fallbackThreshold,
    reconnectDelayMs: config.session.reconnectDelayMs,
    statsIntervalMs: 5000,
  });

  session.on('message', (message, handled) => {
    console.log(`📥 ${toWireName(message.messageType)} from ${message.sourceInfo}${handled ? '' : ' (no handler)'}`);
    console.log(`   ${JSON.stringify(message.payload)}`);
  });
  session.on('status', (state, previous) => console.log(`🔌 Link ${previous} -> ${state}`));
  session.on('modeChange', (mode) => console.log(`🔀 Now using ${mode} protocol`));
  session.on('error', (error) => console.error(`🚨 ${error.message}`));

  console.log('🖥️  Serial Link Monitor\n');
  await session.start();

  const shutdown = async () => {
    console.log('\n🛑 Stopping link monitor...');
    await session.stop();
    console.log(`📊 Final Statistics: ${session.statistics.summary()}`);
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      console.error('❌ Shutdown failed:', error);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

monitorLink().catch((error: unknown) => {
  console.error('❌ Monitor failed:', error);
  process.exit(1);
});
