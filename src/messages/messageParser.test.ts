import { describe, it, expect } from 'vitest';
import { parseMessage } from './messageParser';
import { MessageType } from './messageType';

describe('parseMessage', () => {
  it('parses an object with a numeric messageType', () => {
    const result = parseMessage('{"messageType":3,"requestId":"r1"}', 'Serial', undefined, 42);

    expect(result).toEqual({
      ok: true,
      message: {
        messageType: MessageType.GET_STATUS,
        payload: { messageType: 3, requestId: 'r1' },
        sourceInfo: 'Serial',
        receivedAt: 42,
      },
    });
  });

  it('accepts the legacy string names', () => {
    const result = parseMessage('{"messageType":"SessionUpdate"}', 'Serial');
    expect(result.ok && result.message.messageType).toBe(MessageType.SESSION_UPDATE);
  });

  it('falls back to the frame type byte when the field is absent', () => {
    const result = parseMessage('{"requestId":"b1"}', 'Serial', 3);
    expect(result.ok && result.message.messageType).toBe(MessageType.GET_STATUS);
  });

  it('prefers the document field over the frame type byte', () => {
    const result = parseMessage('{"messageType":4}', 'Serial', 3);
    expect(result.ok && result.message.messageType).toBe(MessageType.GET_ASSETS);
  });

  it('rejects empty text', () => {
    expect(parseMessage('   ', 'Serial')).toEqual({ ok: false, error: { kind: 'parse', reason: 'Empty message' } });
  });

  it('rejects malformed JSON', () => {
    const result = parseMessage('{"messageType":', 'Serial');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('parse');
      expect(result.error.reason).toMatch(/^Invalid JSON: /);
    }
  });

  it('rejects documents that are not objects', () => {
    expect(parseMessage('[1,2]', 'Serial')).toEqual({
      ok: false,
      error: { kind: 'parse', reason: 'JSON message is not an object' },
    });
    expect(parseMessage('"text"', 'Serial').ok).toBe(false);
  });

  it('reports a missing type', () => {
    expect(parseMessage('{"a":1}', 'Serial')).toEqual({
      ok: false,
      error: { kind: 'unknown-type', reason: 'No messageType property' },
    });
  });

  it('reports an unrecognized type', () => {
    expect(parseMessage('{"messageType":"Reboot"}', 'Serial')).toEqual({
      ok: false,
      error: { kind: 'unknown-type', reason: 'Invalid messageType "Reboot"' },
    });
    expect(parseMessage('{"messageType":0}', 'Serial', 3)).toEqual({
      ok: false,
      error: { kind: 'unknown-type', reason: 'Invalid messageType 0' },
    });
  });
});
