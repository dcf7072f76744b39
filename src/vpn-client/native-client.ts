import type { VpnProfile } from '../config/profile.js';
import { createLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import type { EngineCounters, EngineEvent, TunHandle, TunnelEngineClient } from './types.js';

export type BridgeEventName = 'engineCrashed' | 'engineStateChange';

export interface BridgeEventData {
  message?: string;
  running?: boolean;
}

export interface BridgeListenerHandle {
  remove: () => Promise<void>;
}

/**
 * Host-provided binding to an in-process engine (mobile or desktop shell).
 * The profile crosses the boundary as JSON.
 */
export interface TunnelBridge {
  start(options: { config: string; tunFd?: number; tunName?: string }): Promise<{ ok: boolean; error?: string }>;
  stop(): Promise<{ ok: boolean; error?: string }>;
  getStatus(): Promise<{ running: boolean; error?: string }>;
  getStatistics(): Promise<{ stats?: EngineCounters }>;
  addListener(
    eventName: BridgeEventName,
    handler: (data: BridgeEventData) => void
  ): Promise<BridgeListenerHandle>;
}

export class NativeTunnelEngine implements TunnelEngineClient {
  readonly platform = 'native' as const;
  private listeners = new Set<(event: EngineEvent) => void>();
  private bridgeListeners: BridgeListenerHandle[] = [];
  private bridgeListenersInitialized = false;
  private lastError: string | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly bridge: TunnelBridge,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('NativeEngine');
  }

  async start(profile: VpnProfile, tun: TunHandle): Promise<boolean> {
    const options: { config: string; tunFd?: number; tunName?: string } = {
      config: JSON.stringify(profile),
    };
    if (tun.kind === 'fd') {
      options.tunFd = tun.fd;
    } else {
      options.tunName = tun.name;
    }
    const result = await this.bridge.start(options);
    this.lastError = result.ok ? null : (result.error ?? 'engine refused to start');
    return result.ok;
  }

  async stop(): Promise<boolean> {
    const result = await this.bridge.stop();
    this.lastError = result.ok ? null : (result.error ?? 'engine refused to stop');
    return result.ok;
  }

  async isRunning(): Promise<boolean> {
    const { running } = await this.bridge.getStatus();
    return running;
  }

  async getStatistics(): Promise<EngineCounters | null> {
    const { stats } = await this.bridge.getStatistics();
    return stats ?? null;
  }

  getLastError(): string | null {
    return this.lastError;
  }

  subscribe(listener: (event: EngineEvent) => void): () => void {
    this.listeners.add(listener);

    if (!this.bridgeListenersInitialized) {
      this.bridgeListenersInitialized = true;
      this.listen('engineCrashed', (data) => {
        this.emit({ type: 'crashed', message: data.message ?? 'engine crashed' });
      });
      this.listen('engineStateChange', (data) => {
        if (typeof data.running === 'boolean') {
          this.emit({ type: 'state_change', running: data.running });
        }
      });
    }

    return () => {
      this.listeners.delete(listener);
      if (this.listeners.size === 0) {
        this.removeBridgeListeners();
      }
    };
  }

  destroy(): void {
    this.listeners.clear();
    this.removeBridgeListeners();
  }

  private listen(eventName: BridgeEventName, handler: (data: BridgeEventData) => void): void {
    this.bridge
      .addListener(eventName, handler)
      .then((handle) => {
        // Everyone unsubscribed before the bridge answered
        if (!this.bridgeListenersInitialized) {
          handle.remove().catch((err: unknown) => {
            this.logger.warn('listener remove failed:', err instanceof Error ? err.message : err);
          });
          return;
        }
        this.bridgeListeners.push(handle);
      })
      .catch((err: unknown) => {
        this.logger.warn(`addListener(${eventName}) failed:`, err instanceof Error ? err.message : err);
      });
  }

  private removeBridgeListeners(): void {
    for (const handle of this.bridgeListeners) {
      handle.remove().catch((err: unknown) => {
        this.logger.warn('listener remove failed:', err instanceof Error ? err.message : err);
      });
    }
    this.bridgeListeners = [];
    this.bridgeListenersInitialized = false;
  }

  private emit(event: EngineEvent): void {
    this.listeners.forEach((l) => l(event));
  }
}
