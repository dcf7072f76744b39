import type { VpnProfile } from '../config/profile.js';

/** Cumulative counters reported by the engine since it last started. */
export interface EngineCounters {
  bytesReceived: number;
  bytesSent: number;
  packetsReceived: number;
  packetsSent: number;
}

/** OS virtual interface handed to the engine; opened by the platform layer. */
export type TunHandle =
  | { kind: 'fd'; fd: number }
  | { kind: 'device'; name: string };

export type EngineEvent =
  | { type: 'crashed'; message: string }
  | { type: 'state_change'; running: boolean };

export type EnginePlatform = 'http' | 'native' | 'mock';

/**
 * Control surface of the external tunnel engine. Only the connection
 * coordinator calls start/stop while it exists.
 */
export interface TunnelEngineClient {
  readonly platform: EnginePlatform;
  start(profile: VpnProfile, tun: TunHandle): Promise<boolean>;
  stop(): Promise<boolean>;
  isRunning(): Promise<boolean>;
  getStatistics(): Promise<EngineCounters | null>;
  /** Reason for the last failed start/stop, when the engine reports one. */
  getLastError?(): string | null;
  /** Crash and state notifications, where the platform can push them. */
  subscribe?(listener: (event: EngineEvent) => void): () => void;
  destroy(): void;
}

export const ZERO_COUNTERS: EngineCounters = Object.freeze({
  bytesReceived: 0,
  bytesSent: 0,
  packetsReceived: 0,
  packetsSent: 0,
});
