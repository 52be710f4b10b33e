import type { ZodType, ZodTypeDef } from 'zod';
import { MessageType } from './messageType';
import type { ParsedMessage } from './messageParser';
import type { ProtocolStatistics } from '../protocol/statistics';
import { silentLogger, type Logger } from '../logging/logger';

/** Schema whose parsed output is T. Its input side may differ (defaults, transforms). */
export type PayloadSchema<T> = ZodType<T, ZodTypeDef, unknown>;

export type MessageHandler<T = unknown> = (message: ParsedMessage<T>) => Promise<void> | void;

/** Type-erased entry; the schema and handler types meet only inside register(). */
type RegisteredHandler = (message: ParsedMessage) => Promise<boolean>;

/**
 * O(1) message type to handler table.
 *
 * dispatch() absorbs every per-message failure so one bad message never stops
 * the read loop.
 */
export class MessageRegistry {
  private readonly handlers = new Map<MessageType, RegisteredHandler>();
  private readonly logger: Logger;

  constructor(
    logger: Logger = silentLogger,
    private readonly statistics?: ProtocolStatistics,
  ) {
    this.logger = logger;
  }

  /**
   * Register (or replace) the handler for a message type. With a schema the
   * payload is validated first and the handler receives the parsed value.
   */
  register<T>(type: MessageType, handler: MessageHandler<T>, schema: PayloadSchema<T>): void;
  register(type: MessageType, handler: MessageHandler): void;
  register<T>(type: MessageType, ...args: [MessageHandler] | [MessageHandler<T>, PayloadSchema<T>]): void {
    if (type === MessageType.INVALID) {
      throw new Error('Cannot register handler for INVALID message type');
    }

    const name = MessageType[type];
    let entry: RegisteredHandler;

    if (args.length === 2) {
      const [handler, schema] = args;
      entry = async (message) => {
        const parsed = schema.safeParse(message.payload);
        if (!parsed.success) {
          this.statistics?.parseError();
          this.logger.debug(`Payload for ${name} from ${message.sourceInfo} does not match schema`, {
            issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
          });
          return false;
        }
        await handler({ ...message, payload: parsed.data });
        return true;
      };
    } else {
      const [handler] = args;
      entry = async (message) => {
        await handler(message);
        return true;
      };
    }

    this.handlers.set(type, entry);
    this.logger.debug(`Registered handler for message type: ${name} (${type})`);
  }

  unregister(type: MessageType): boolean {
    return this.handlers.delete(type);
  }

  has(type: MessageType): boolean {
    return this.handlers.has(type);
  }

  get size(): number {
    return this.handlers.size;
  }

  /**
   * Run the handler registered for the message type.
   * @returns false when unhandled, rejected by the schema, or the handler failed
   */
  async dispatch(message: ParsedMessage): Promise<boolean> {
    const entry = this.handlers.get(message.messageType);
    if (!entry) {
      this.statistics?.unknownMessageType();
      this.logger.debug(
        `No handler registered for message type '${MessageType[message.messageType] ?? message.messageType}' from ${message.sourceInfo}`,
      );
      return false;
    }

    try {
      return await entry(message);
    } catch (err) {
      this.logger.debug(`Handler for ${MessageType[message.messageType]} from ${message.sourceInfo} failed`, {
        error: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }
}
