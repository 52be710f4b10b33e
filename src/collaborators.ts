/**
 * Host-side services the bridge drives. Real implementations are platform
 * specific and live outside this package.
 */

export interface AudioSessionInfo {
  processId: number;
  processName: string;
  displayName: string;
  /** 0.0 - 1.0 */
  volume: number;
  isMuted: boolean;
  state: string;
}

export interface AudioBackend {
  listSessions(): Promise<AudioSessionInfo[]>;
  /** @returns false when no session matched or the change was refused */
  setVolume(processName: string, volume: number): Promise<boolean>;
  setMute(processName: string, muted: boolean): Promise<boolean>;
}

export interface AssetData {
  data: Buffer;
  width: number;
  height: number;
  format: string;
}

export interface AssetProvider {
  getAsset(processName: string): Promise<AssetData | null>;
}

function sameProcess(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export class InMemoryAudioBackend implements AudioBackend {
  private readonly sessions: AudioSessionInfo[];

  constructor(sessions: AudioSessionInfo[] = []) {
    this.sessions = sessions.map((session) => ({ ...session }));
  }

  async listSessions(): Promise<AudioSessionInfo[]> {
    return this.sessions.map((session) => ({ ...session }));
  }

  async setVolume(processName: string, volume: number): Promise<boolean> {
    const matches = this.find(processName);
    for (const session of matches) {
      session.volume = Math.min(1, Math.max(0, volume));
    }
    return matches.length > 0;
  }

  async setMute(processName: string, muted: boolean): Promise<boolean> {
    const matches = this.find(processName);
    for (const session of matches) {
      session.isMuted = muted;
    }
    return matches.length > 0;
  }

  private find(processName: string): AudioSessionInfo[] {
    return this.sessions.filter((session) => sameProcess(session.processName, processName));
  }
}

export class InMemoryAssetProvider implements AssetProvider {
  private readonly assets = new Map<string, AssetData>();

  set(processName: string, asset: AssetData): void {
    this.assets.set(processName.toLowerCase(), asset);
  }

  async getAsset(processName: string): Promise<AssetData | null> {
    return this.assets.get(processName.toLowerCase()) ?? null;
  }
}
