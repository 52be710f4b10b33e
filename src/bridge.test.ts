import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SerialBridge, type MessageSender } from './bridge';
import { InMemoryAssetProvider, InMemoryAudioBackend, type AudioSessionInfo } from './collaborators';
import { MessageRegistry } from './messages/messageRegistry';
import { MessageType } from './messages/messageType';
import type { ParsedMessage } from './messages/messageParser';
import { RecordingLogger } from './testing/recordingLogger';

class RecordingSender implements MessageSender {
  readonly sent: Array<{ type: MessageType; payload: Record<string, unknown> }> = [];

  async send(type: MessageType, payload: Record<string, unknown>): Promise<boolean> {
    this.sent.push({ type, payload });
    return true;
  }
}

class FlakySender extends RecordingSender {
  private failed = false;

  async send(type: MessageType, payload: Record<string, unknown>): Promise<boolean> {
    if (!this.failed) {
      this.failed = true;
      throw new Error('link down');
    }
    return super.send(type, payload);
  }
}

class RefusingAudioBackend extends InMemoryAudioBackend {
  async setVolume(): Promise<boolean> {
    throw new Error('mixer unavailable');
  }

  async setMute(): Promise<boolean> {
    return false;
  }
}

function session(processName: string, volume: number, isMuted = false): AudioSessionInfo {
  return { processId: 100, processName, displayName: processName, volume, isMuted, state: 'Active' };
}

function message(messageType: MessageType, payload: Record<string, unknown>): ParsedMessage {
  return { messageType, payload: { ...payload, messageType }, sourceInfo: 'Serial', receivedAt: 0 };
}

describe('SerialBridge', () => {
  let registry: MessageRegistry;
  let sender: RecordingSender;
  let audio: InMemoryAudioBackend;
  let assets: InMemoryAssetProvider;
  let bridge: SerialBridge;

  beforeEach(() => {
    registry = new MessageRegistry();
    sender = new RecordingSender();
    audio = new InMemoryAudioBackend([session('player', 0.8), session('chat', 0.3, true)]);
    assets = new InMemoryAssetProvider();
    bridge = new SerialBridge({ registry, sender, audio, assets, deviceId: 'desk-01', clock: () => 1000 });
    bridge.attach();
  });

  it('registers and removes its handlers', () => {
    expect(registry.size).toBe(4);
    bridge.detach();
    expect(registry.size).toBe(0);
  });

  it('answers a status request with the current sessions', async () => {
    expect(await registry.dispatch(message(MessageType.GET_STATUS, { requestId: 'r1' }))).toBe(true);

    expect(sender.sent).toEqual([
      {
        type: MessageType.STATUS_MESSAGE,
        payload: {
          deviceId: 'desk-01',
          timestamp: 1000,
          reason: 'Request',
          requestId: 'r1',
          activeSessionCount: 2,
          sessions: [
            { processId: 100, processName: 'player', displayName: 'player', volume: 0.8, isMuted: false, state: 'Active' },
            { processId: 100, processName: 'chat', displayName: 'chat', volume: 0.3, isMuted: true, state: 'Active' },
          ],
        },
      },
    ]);
  });

  it('applies a session update from the device', async () => {
    expect(await registry.dispatch(message(MessageType.SESSION_UPDATE, { processName: 'Player', volume: 0.5 }))).toBe(true);

    const [player] = await audio.listSessions();
    expect(player.volume).toBe(0.5);
  });

  it('applies every session in a status update', async () => {
    await registry.dispatch(
      message(MessageType.STATUS_UPDATE, {
        sessions: [
          { processName: 'player', isMuted: true },
          { processName: 'chat', volume: 0.9, isMuted: false },
        ],
      }),
    );

    expect((await audio.listSessions()).map(({ volume, isMuted }) => ({ volume, isMuted }))).toEqual([
      { volume: 0.8, isMuted: true },
      { volume: 0.9, isMuted: false },
    ]);
  });

  it('rejects updates outside the volume range', async () => {
    expect(await registry.dispatch(message(MessageType.SESSION_UPDATE, { processName: 'player', volume: 2 }))).toBe(false);

    const [player] = await audio.listSessions();
    expect(player.volume).toBe(0.8);
  });

  it('counts applied, skipped and unknown changes', async () => {
    const logger = new RecordingLogger();
    bridge = new SerialBridge({ registry, sender, audio, assets, deviceId: 'desk-01', logger });

    const result = await bridge.applySessionUpdates([
      { processName: 'player', volume: 0.805, isMuted: true },
      { processName: 'browser', volume: 0.1 },
    ]);

    expect(result).toEqual({ changesApplied: 1, changesSkipped: 1, failedUpdates: 0 });
    expect(logger.messages('info')).toEqual(['🔄 Status update processed: 1 applied, 1 already in sync, 0 failed']);
  });

  it('counts changes the backend refuses or fails', async () => {
    const logger = new RecordingLogger();
    bridge = new SerialBridge({
      registry,
      sender,
      audio: new RefusingAudioBackend([session('player', 0.8)]),
      assets,
      deviceId: 'desk-01',
      logger,
    });

    const result = await bridge.applySessionUpdates([{ processName: 'player', volume: 0.2, isMuted: true }]);

    expect(result).toEqual({ changesApplied: 0, changesSkipped: 0, failedUpdates: 2 });
    expect(logger.messages('warn')).toEqual([
      '⚠️  volume update for player failed: mixer unavailable',
      '⚠️  mute update for player was not applied',
    ]);
  });

  it('sends a known asset as base64', async () => {
    assets.set('Player', { data: Buffer.from([1, 2, 3]), width: 32, height: 32, format: 'png' });

    await registry.dispatch(message(MessageType.GET_ASSETS, { requestId: 'a1', processName: 'player' }));

    expect(sender.sent).toEqual([
      {
        type: MessageType.ASSET_RESPONSE,
        payload: {
          requestId: 'a1',
          deviceId: 'desk-01',
          processName: 'player',
          success: true,
          assetData: 'AQID',
          width: 32,
          height: 32,
          format: 'png',
        },
      },
    ]);
  });

  it('reports a missing asset', async () => {
    await registry.dispatch(message(MessageType.GET_ASSETS, { processName: 'chat' }));

    expect(sender.sent[0].payload).toEqual({
      requestId: undefined,
      deviceId: 'desk-01',
      processName: 'chat',
      success: false,
      errorMessage: 'No asset for chat',
    });
  });

  it('broadcasts unsolicited status with a reason', async () => {
    await bridge.broadcastStatus('Startup');

    expect(sender.sent[0].payload).toMatchObject({ reason: 'Startup', requestId: undefined, activeSessionCount: 2 });
  });

  it('echoes applied device changes as an update status', async () => {
    await registry.dispatch(
      message(MessageType.STATUS_UPDATE, { requestId: 'u1', sessions: [{ processName: 'chat', isMuted: false }] }),
    );

    expect(sender.sent).toHaveLength(1);
    expect(sender.sent[0].type).toBe(MessageType.STATUS_MESSAGE);
    expect(sender.sent[0].payload).toMatchObject({
      reason: 'Update',
      requestId: 'u1',
      sessions: [
        { processName: 'player', isMuted: false },
        { processName: 'chat', isMuted: false },
      ],
    });
  });

  it('stays quiet when an update changes nothing', async () => {
    await registry.dispatch(message(MessageType.SESSION_UPDATE, { processName: 'player', volume: 0.8 }));

    expect(sender.sent).toEqual([]);
  });

  it('broadcasts periodic status until aborted', async () => {
    const controller = new AbortController();
    const running = bridge.runPeriodicStatus(5, controller.signal);

    await vi.waitFor(() => expect(sender.sent.length).toBeGreaterThanOrEqual(2));
    controller.abort();
    await running;

    const count = sender.sent.length;
    expect(sender.sent.map(({ payload }) => payload.reason)).toEqual(new Array<string>(count).fill('Periodic'));
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(sender.sent).toHaveLength(count);
  });

  it('keeps the periodic broadcast going after a failed send', async () => {
    const logger = new RecordingLogger();
    const flaky = new FlakySender();
    bridge = new SerialBridge({ registry: new MessageRegistry(), sender: flaky, audio, assets, deviceId: 'desk-01', logger });
    const controller = new AbortController();
    const running = bridge.runPeriodicStatus(5, controller.signal);

    await vi.waitFor(() => expect(flaky.sent.length).toBeGreaterThanOrEqual(1));
    controller.abort();
    await running;

    expect(logger.messages('warn')).toEqual(['⚠️  Periodic status broadcast failed: link down']);
  });

  it('does not broadcast periodically when the interval is zero', async () => {
    await bridge.runPeriodicStatus(0, new AbortController().signal);

    expect(sender.sent).toEqual([]);
  });
});
