import { describe, it, expect } from 'vitest';
import { MessageType, resolveMessageType, toWireName } from './messageType';

describe('resolveMessageType', () => {
  it('accepts numeric ids', () => {
    expect(resolveMessageType(1)).toBe(MessageType.STATUS_UPDATE);
    expect(resolveMessageType(6)).toBe(MessageType.SESSION_UPDATE);
  });

  it('accepts enum names and legacy wire names in any case', () => {
    expect(resolveMessageType('GET_STATUS')).toBe(MessageType.GET_STATUS);
    expect(resolveMessageType('get_assets')).toBe(MessageType.GET_ASSETS);
    expect(resolveMessageType('GetStatus')).toBe(MessageType.GET_STATUS);
    expect(resolveMessageType(' sessionupdate ')).toBe(MessageType.SESSION_UPDATE);
  });

  it('accepts numeric ids written as strings', () => {
    expect(resolveMessageType('3')).toBe(MessageType.GET_STATUS);
    expect(resolveMessageType(' 6 ')).toBe(MessageType.SESSION_UPDATE);
    expect(resolveMessageType('0')).toBe(MessageType.INVALID);
    expect(resolveMessageType('42')).toBe(MessageType.INVALID);
  });

  it('maps everything else to INVALID', () => {
    expect(resolveMessageType(0)).toBe(MessageType.INVALID);
    expect(resolveMessageType(7)).toBe(MessageType.INVALID);
    expect(resolveMessageType(1.5)).toBe(MessageType.INVALID);
    expect(resolveMessageType('Invalid')).toBe(MessageType.INVALID);
    expect(resolveMessageType('')).toBe(MessageType.INVALID);
    expect(resolveMessageType(null)).toBe(MessageType.INVALID);
    expect(resolveMessageType({ type: 1 })).toBe(MessageType.INVALID);
  });
});

describe('toWireName', () => {
  it('returns the legacy name', () => {
    expect(toWireName(MessageType.ASSET_RESPONSE)).toBe('AssetResponse');
    expect(toWireName(MessageType.INVALID)).toBe('Invalid');
  });
});
