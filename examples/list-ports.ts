import { listSerialPorts, formatPortList } from '../src/session/serialTransport';

async function listPorts() {
  try {
    console.log('🔍 Scanning for available serial ports...\n');
    const ports = await listSerialPorts();
    formatPortList(ports).forEach((line) => console.log(line));

    const adapters = ports.filter((port) => port.likelyAdapter);
    if (adapters.length > 0) {
      console.log('\n🎯 Likely device ports (set SERIAL_PORT to one of these):');
      adapters.forEach(({ info }) => {
        console.log(`   • ${info.path} (${info.manufacturer ?? 'unknown manufacturer'})`);
      });
    }
  } catch (error) {
    console.error('❌ Error listing ports:', error);
    process.exitCode = 1;
  }
}

void listPorts();
