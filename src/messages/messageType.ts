/**
 * Message identifiers shared with the device firmware. Numeric values are
 * the preferred wire form; the string names are accepted for older firmware.
 */
export enum MessageType {
  INVALID = 0,
  STATUS_UPDATE = 1,
  STATUS_MESSAGE = 2,
  GET_STATUS = 3,
  GET_ASSETS = 4,
  ASSET_RESPONSE = 5,
  SESSION_UPDATE = 6,
}

const WIRE_NAMES: Record<MessageType, string> = {
  [MessageType.INVALID]: 'Invalid',
  [MessageType.STATUS_UPDATE]: 'StatusUpdate',
  [MessageType.STATUS_MESSAGE]: 'StatusMessage',
  [MessageType.GET_STATUS]: 'GetStatus',
  [MessageType.GET_ASSETS]: 'GetAssets',
  [MessageType.ASSET_RESPONSE]: 'AssetResponse',
  [MessageType.SESSION_UPDATE]: 'SessionUpdate',
};

const BY_NUMBER = new Map<number, MessageType>();
const BY_NAME = new Map<string, MessageType>();

for (const type of Object.values(MessageType)) {
  if (typeof type !== 'number' || type === MessageType.INVALID) continue;
  BY_NUMBER.set(type, type);
  BY_NAME.set(MessageType[type].toLowerCase(), type);
  BY_NAME.set(WIRE_NAMES[type].toLowerCase(), type);
}

export function toWireName(type: MessageType): string {
  return WIRE_NAMES[type] ?? 'Unknown';
}

/**
 * Normalize a numeric id (number or digit string), an enum name
 * (`GET_STATUS`, any case) or a legacy wire name (`GetStatus`) to a
 * MessageType. Unrecognized values are INVALID.
 */
export function resolveMessageType(value: unknown): MessageType {
  if (typeof value === 'number') {
    return BY_NUMBER.get(value) ?? MessageType.INVALID;
  }
  if (typeof value === 'string') {
    const name = value.trim();
    if (/^\d+$/.test(name)) {
      return BY_NUMBER.get(Number(name)) ?? MessageType.INVALID;
    }
    return BY_NAME.get(name.toLowerCase()) ?? MessageType.INVALID;
  }
  return MessageType.INVALID;
}
