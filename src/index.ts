export * from './protocol/constants';
export { crc16, crc16Range, formatCrc, CRC16_POLYNOMIAL, CRC16_INITIAL } from './protocol/crc16';
export {
  encodeFrame,
  decodeFrame,
  escapePayload,
  unescapePayload,
  isReservedByte,
  formatBytes,
  type DecodedFrame,
  type DecodeResult,
  type FrameError,
  type FrameErrorKind,
} from './protocol/frameCodec';
export { FrameAssembler, type FrameAssemblerOptions, type FeedResult } from './protocol/frameAssembler';
export { LineFramer, frameLine, type TextFraming, type LineFramerOptions } from './protocol/lineFramer';
export { ProtocolStatistics, formatUptime, type StatisticsSnapshot } from './protocol/statistics';

export { MessageType, resolveMessageType, toWireName } from './messages/messageType';
export { parseMessage, type ParsedMessage, type ParseResult, type MessageParseError } from './messages/messageParser';
export { MessageRegistry, type MessageHandler, type PayloadSchema } from './messages/messageRegistry';

export { ProtocolModeController, DEFAULT_FALLBACK_THRESHOLD, type ModeState, type ProtocolModeOptions } from './session/protocolMode';
export { delay, type Transport } from './session/transport';
export {
  SerialTransport,
  listSerialPorts,
  formatPortList,
  isLikelyAdapter,
  type SerialTransportOptions,
  type SerialDevice,
  type SerialDeviceFactory,
  type SerialPortSettings,
  type ListedPort,
} from './session/serialTransport';
export {
  TransportSession,
  type TransportSessionOptions,
  type TransportSessionEvents,
  type SessionState,
} from './session/transportSession';
export { runStatisticsReporter } from './session/statisticsReporter';

export * from './tools/binaryDebugger';
export * from './bridge';
export * from './collaborators';
export { loadConfig, loadEnvFile, type BridgeConfig } from './config';
export * from './errors';
export { ConsoleLogger, silentLogger, type Logger } from './logging/logger';
