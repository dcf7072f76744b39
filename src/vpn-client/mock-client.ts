import type { VpnProfile } from '../config/profile.js';
import { ZERO_COUNTERS } from './types.js';
import type { EngineCounters, EngineEvent, TunHandle, TunnelEngineClient } from './types.js';

export class MockTunnelEngine implements TunnelEngineClient {
  readonly platform = 'mock' as const;
  startCalls: Array<{ profile: VpnProfile; tun: TunHandle }> = [];
  stopCalls = 0;

  private running = false;
  private counters: EngineCounters | null = { ...ZERO_COUNTERS };
  private startResults: boolean[] = [];
  private defaultStartResult = true;
  private startError: Error | null = null;
  private startDelayMs = 0;
  private stopResult = true;
  private stopError: Error | null = null;
  private lastError: string | null = null;
  private listeners: Set<(event: EngineEvent) => void> = new Set();

  get isStarted(): boolean {
    return this.running;
  }

  /** Results for the next start() calls, in order; afterwards the default applies. */
  queueStartResults(...results: boolean[]): void {
    this.startResults.push(...results);
  }

  setDefaultStartResult(result: boolean): void {
    this.defaultStartResult = result;
  }

  setStartError(error: Error | null): void {
    this.startError = error;
  }

  /** Makes start() settle only after the given delay (fake timers friendly). */
  setStartDelay(ms: number): void {
    this.startDelayMs = ms;
  }

  setStopResult(result: boolean): void {
    this.stopResult = result;
  }

  setStopError(error: Error | null): void {
    this.stopError = error;
  }

  setCounters(counters: EngineCounters): void {
    this.counters = { ...counters };
  }

  /** null makes getStatistics() report nothing, as a dead engine does. */
  setStatistics(counters: EngineCounters | null): void {
    this.counters = counters ? { ...counters } : null;
  }

  simulateCrash(message = 'engine crashed'): void {
    this.running = false;
    this.simulateEvent({ type: 'crashed', message });
  }

  simulateEvent(event: EngineEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  async start(profile: VpnProfile, tun: TunHandle): Promise<boolean> {
    this.startCalls.push({ profile, tun });
    if (this.startDelayMs > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, this.startDelayMs));
    }
    if (this.startError) {
      this.lastError = this.startError.message;
      throw this.startError;
    }
    const result = this.startResults.length > 0 ? this.startResults.shift() : undefined;
    const ok = result ?? this.defaultStartResult;
    this.running = ok;
    this.lastError = ok ? null : 'mock start failure';
    return ok;
  }

  async stop(): Promise<boolean> {
    this.stopCalls++;
    if (this.stopError) {
      throw this.stopError;
    }
    if (this.stopResult) {
      this.running = false;
    }
    return this.stopResult;
  }

  async isRunning(): Promise<boolean> {
    return this.running;
  }

  async getStatistics(): Promise<EngineCounters | null> {
    return this.counters ? { ...this.counters } : null;
  }

  getLastError(): string | null {
    return this.lastError;
  }

  subscribe(listener: (event: EngineEvent) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  destroy(): void {
    this.listeners.clear();
  }
}
