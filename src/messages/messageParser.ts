import { MessageType, resolveMessageType } from './messageType';

export interface ParsedMessage<T = unknown> {
  messageType: MessageType;
  payload: T;
  /** Transport identity, e.g. "Serial" */
  sourceInfo: string;
  receivedAt: number;
}

export interface MessageParseError {
  kind: 'parse' | 'unknown-type';
  reason: string;
}

export type ParseResult = { ok: true; message: ParsedMessage<Record<string, unknown>> } | { ok: false; error: MessageParseError };

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Turn one JSON text into a ParsedMessage.
 *
 * The document's `messageType` field decides the type. Binary frames also
 * carry a type byte, used when the field is absent.
 */
export function parseMessage(text: string, sourceInfo: string, frameType?: number, receivedAt: number = Date.now()): ParseResult {
  if (text.trim().length === 0) {
    return { ok: false, error: { kind: 'parse', reason: 'Empty message' } };
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    return { ok: false, error: { kind: 'parse', reason: `Invalid JSON: ${err instanceof Error ? err.message : String(err)}` } };
  }

  if (!isJsonObject(document)) {
    return { ok: false, error: { kind: 'parse', reason: 'JSON message is not an object' } };
  }

  const raw = 'messageType' in document ? document.messageType : frameType;
  if (raw === undefined) {
    return { ok: false, error: { kind: 'unknown-type', reason: 'No messageType property' } };
  }

  const messageType = resolveMessageType(raw);
  if (messageType === MessageType.INVALID) {
    return { ok: false, error: { kind: 'unknown-type', reason: `Invalid messageType ${JSON.stringify(raw)}` } };
  }

  return { ok: true, message: { messageType, payload: document, sourceInfo, receivedAt } };
}
