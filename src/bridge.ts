import { z } from 'zod';
import { MessageType } from './messages/messageType';
import type { MessageRegistry } from './messages/messageRegistry';
import type { ParsedMessage } from './messages/messageParser';
import type { AssetProvider, AudioBackend, AudioSessionInfo } from './collaborators';
import { describeError } from './errors';
import { delay } from './session/transport';
import { silentLogger, type Logger } from './logging/logger';

export const sessionUpdateSchema = z.object({
  processName: z.string().min(1),
  volume: z.number().min(0).max(1).optional(),
  isMuted: z.boolean().optional(),
});

export const statusUpdateSchema = z.object({
  requestId: z.string().optional(),
  deviceId: z.string().optional(),
  sessions: z.array(sessionUpdateSchema).default([]),
});

export const statusRequestSchema = z.object({
  requestId: z.string().optional(),
  deviceId: z.string().optional(),
});

export const assetRequestSchema = z.object({
  requestId: z.string().optional(),
  deviceId: z.string().optional(),
  processName: z.string().min(1),
});

export type SessionUpdate = z.infer<typeof sessionUpdateSchema>;
export type StatusUpdate = z.infer<typeof statusUpdateSchema>;
export type StatusRequest = z.infer<typeof statusRequestSchema>;
export type AssetRequest = z.infer<typeof assetRequestSchema>;

export type StatusReason = 'Unknown' | 'Startup' | 'Request' | 'Update' | 'Periodic';

export interface StatusUpdateResult {
  changesApplied: number;
  changesSkipped: number;
  failedUpdates: number;
}

/** Anything that can put a message on the link, normally a TransportSession. */
export interface MessageSender {
  send(type: MessageType, payload: Record<string, unknown>): Promise<boolean>;
}

export interface SerialBridgeOptions {
  registry: MessageRegistry;
  sender: MessageSender;
  audio: AudioBackend;
  assets: AssetProvider;
  deviceId: string;
  logger?: Logger;
  clock?: () => number;
}

const VOLUME_TOLERANCE = 0.01;

/**
 * Application side of the link: answers status and asset requests and
 * applies volume and mute changes coming from the device.
 */
export class SerialBridge {
  private readonly registry: MessageRegistry;
  private readonly sender: MessageSender;
  private readonly audio: AudioBackend;
  private readonly assets: AssetProvider;
  private readonly deviceId: string;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(options: SerialBridgeOptions) {
    this.registry = options.registry;
    this.sender = options.sender;
    this.audio = options.audio;
    this.assets = options.assets;
    this.deviceId = options.deviceId;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? Date.now;
  }

  /** Register the bridge's handlers on the registry. */
  attach(): void {
    this.registry.register(MessageType.GET_STATUS, (message) => this.handleStatusRequest(message), statusRequestSchema);
    this.registry.register(MessageType.STATUS_UPDATE, (message) => this.handleStatusUpdate(message), statusUpdateSchema);
    this.registry.register(MessageType.SESSION_UPDATE, (message) => this.handleSessionUpdate(message), sessionUpdateSchema);
    this.registry.register(MessageType.GET_ASSETS, (message) => this.handleAssetRequest(message), assetRequestSchema);
  }

  detach(): void {
    for (const type of [MessageType.GET_STATUS, MessageType.STATUS_UPDATE, MessageType.SESSION_UPDATE, MessageType.GET_ASSETS]) {
      this.registry.unregister(type);
    }
  }

  /**
   * Broadcast status every `intervalMs` until the signal aborts. 0 disables.
   * A failed broadcast is logged and the next one still goes out.
   */
  async runPeriodicStatus(intervalMs: number, signal: AbortSignal): Promise<void> {
    if (intervalMs <= 0) {
      return;
    }

    while (!signal.aborted) {
      await delay(intervalMs, signal);
      if (signal.aborted) {
        break;
      }

      try {
        await this.broadcastStatus('Periodic');
      } catch (err) {
        this.logger.warn(`⚠️  Periodic status broadcast failed: ${describeError(err)}`);
      }
    }
  }

  /** Send an unsolicited status message. */
  async broadcastStatus(reason: StatusReason = 'Unknown', requestId?: string): Promise<boolean> {
    const sessions = await this.audio.listSessions();
    return this.sender.send(MessageType.STATUS_MESSAGE, {
      deviceId: this.deviceId,
      timestamp: this.clock(),
      reason,
      requestId,
      activeSessionCount: sessions.length,
      sessions: sessions.map(toSessionStatus),
    });
  }

  async applySessionUpdates(updates: SessionUpdate[]): Promise<StatusUpdateResult> {
    const result: StatusUpdateResult = { changesApplied: 0, changesSkipped: 0, failedUpdates: 0 };
    const current = await this.audio.listSessions();

    for (const update of updates) {
      const name = update.processName.toLowerCase();
      const session = current.find((candidate) => candidate.processName.toLowerCase() === name);
      if (!session) {
        this.logger.debug(`Process ${update.processName} not found in current sessions, skipping update`);
        continue;
      }

      const volume = update.volume;
      if (volume !== undefined) {
        if (Math.abs(session.volume - volume) > VOLUME_TOLERANCE) {
          await this.apply(result, () => this.audio.setVolume(update.processName, volume), {
            target: update.processName,
            change: 'volume',
          });
        } else {
          result.changesSkipped++;
        }
      }

      const muted = update.isMuted;
      if (muted !== undefined) {
        if (session.isMuted !== muted) {
          await this.apply(result, () => this.audio.setMute(update.processName, muted), {
            target: update.processName,
            change: 'mute',
          });
        } else {
          result.changesSkipped++;
        }
      }
    }

    this.logger.info(
      `🔄 Status update processed: ${result.changesApplied} applied, ${result.changesSkipped} already in sync, ${result.failedUpdates} failed`,
    );
    return result;
  }

  private async apply(
    result: StatusUpdateResult,
    action: () => Promise<boolean>,
    context: { target: string; change: string },
  ): Promise<void> {
    try {
      if (await action()) {
        result.changesApplied++;
        return;
      }
      this.logger.warn(`⚠️  ${context.change} update for ${context.target} was not applied`);
    } catch (err) {
      this.logger.warn(`⚠️  ${context.change} update for ${context.target} failed: ${describeError(err)}`);
    }
    result.failedUpdates++;
  }

  private async handleStatusRequest(message: ParsedMessage<StatusRequest>): Promise<void> {
    this.logger.debug(`📥 Status request from ${message.sourceInfo}`, { requestId: message.payload.requestId });
    await this.broadcastStatus('Request', message.payload.requestId);
  }

  private async handleStatusUpdate(message: ParsedMessage<StatusUpdate>): Promise<void> {
    await this.applyAndAnnounce(message.payload.sessions, message.payload.requestId);
  }

  private async handleSessionUpdate(message: ParsedMessage<SessionUpdate>): Promise<void> {
    await this.applyAndAnnounce([message.payload]);
  }

  /** Changes made on the device's behalf are echoed back as an 'Update' status. */
  private async applyAndAnnounce(updates: SessionUpdate[], requestId?: string): Promise<void> {
    const result = await this.applySessionUpdates(updates);
    if (result.changesApplied > 0) {
      await this.broadcastStatus('Update', requestId);
    }
  }

  private async handleAssetRequest(message: ParsedMessage<AssetRequest>): Promise<void> {
    const { requestId, processName } = message.payload;
    const response: Record<string, unknown> = { requestId, deviceId: this.deviceId, processName };

    const asset = await this.assets.getAsset(processName);
    if (asset) {
      Object.assign(response, {
        success: true,
        assetData: asset.data.toString('base64'),
        width: asset.width,
        height: asset.height,
        format: asset.format,
      });
    } else {
      Object.assign(response, { success: false, errorMessage: `No asset for ${processName}` });
    }

    await this.sender.send(MessageType.ASSET_RESPONSE, response);
  }
}

function toSessionStatus(session: AudioSessionInfo): Record<string, unknown> {
  return {
    processId: session.processId,
    processName: session.processName,
    displayName: session.displayName,
    volume: session.volume,
    isMuted: session.isMuted,
    state: session.state,
  };
}
