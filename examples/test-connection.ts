import { loadConfig, loadEnvFile } from '../src/config';
import { ConsoleLogger } from '../src/logging/logger';
import { MessageType, toWireName } from '../src/messages/messageType';
import type { ParsedMessage } from '../src/messages/messageParser';
import { SerialTransport } from '../src/session/serialTransport';
import { TransportSession } from '../src/session/transportSession';

const REPLY_TIMEOUT_MS = 5000;

async function testConnection() {
  loadEnvFile();
  const config = loadConfig();
  const logger = new ConsoleLogger('test', config.debug);

  const session = new TransportSession({
    transport: new SerialTransport({ ...config.serial, logger: logger.child('serial') }),
    logger,
    binaryProtocol: config.protocol.binary,
    textFraming: config.protocol.textFraming,
    fallbackThreshold: config.protocol.fallbackThreshold,
    autoReconnect: false,
  });

  try {
    console.log('🧪 Testing device link...\n');
    await session.start();

    const reply = new Promise<ParsedMessage | null>((resolve) => {
      const timer = setTimeout(() => resolve(null), REPLY_TIMEOUT_MS);
      session.once('message', (message) => {
        clearTimeout(timer);
        resolve(message);
      });
    });

    console.log(`📤 Sending ${toWireName(MessageType.STATUS_MESSAGE)}, waiting ${REPLY_TIMEOUT_MS}ms for the device...\n`);
    await session.send(MessageType.STATUS_MESSAGE, {
      deviceId: config.deviceId,
      timestamp: Date.now(),
      reason: 'Request',
      activeSessionCount: 0,
      sessions: [],
    });

    const message = await reply;
    if (message) {
      console.log('✅ Device answered:');
      console.log('='.repeat(40));
      console.log(`Message Type: ${toWireName(message.messageType)}`);
      console.log(`Protocol: ${session.mode}`);
      console.log(`Payload: ${JSON.stringify(message.payload)}`);
    } else {
      console.log('❌ No message from the device');
      console.log('💡 Check:');
      console.log('   • SERIAL_PORT and SERIAL_BAUD_RATE match the firmware');
      console.log('   • The firmware speaks the same protocol (BINARY_PROTOCOL)');
      console.log('   • Device power and USB cable');
    }
    console.log(`\n📊 ${session.statistics.summary()}`);
  } catch (error) {
    console.error('❌ Connection test failed:', error);
    console.log('\n💡 Troubleshooting tips:');
    console.log('   • Check if the serial port exists and has proper permissions');
    console.log('   • Check if another application is using the port');
  } finally {
    await session.stop();
  }
}

testConnection().catch((error: unknown) => {
  console.error('💥 Connection test crashed:', error);
  process.exit(1);
});
