// Type definitions shared by the coordinator and its observers

import type { NetworkState } from '../resilience/network-monitor.js';
import type { KillSwitchState } from '../resilience/kill-switch.js';
import type { SessionStatisticsSummary, StatisticsSnapshot } from '../stats/statistics-tracker.js';
import type { EngineCounters } from '../vpn-client/types.js';

// ==================== Error codes ====================

// Network (100-109)
export const ErrCodeNetworkLost = 101;          // connectivity lost while connected

// Client (400 series, aligned with HTTP)
export const ErrCodeConfigInvalid = 400;        // profile failed validation; engine untouched
export const ErrCodeBusy = 409;                 // another connect/disconnect is in flight

// Engine (510-519)
export const ErrCodeEngineStopFailed = 510;
export const ErrCodeEngineStartFailed = 511;
export const ErrCodeReconnectExhausted = 512;   // max reconnection attempts reached
export const ErrCodeEngineTimeout = 513;        // start did not complete within startTimeoutMs

// Kill switch (520-529)
export const ErrCodeKillSwitchUnavailable = 520;

// Fatal (570-579)
export const ErrCodeEngineCrashed = 570;

/** Name of a control error code, for logs and status lines. */
export function errorCodeName(code: number): string {
  const names: Record<number, string> = {
    [ErrCodeNetworkLost]: 'NetworkLost',
    [ErrCodeConfigInvalid]: 'ConfigurationInvalid',
    [ErrCodeBusy]: 'Busy',
    [ErrCodeEngineStopFailed]: 'EngineStopFailed',
    [ErrCodeEngineStartFailed]: 'EngineStartFailed',
    [ErrCodeReconnectExhausted]: 'ReconnectionExhausted',
    [ErrCodeEngineTimeout]: 'EngineTimeout',
    [ErrCodeKillSwitchUnavailable]: 'KillSwitchPrimitiveUnavailable',
    [ErrCodeEngineCrashed]: 'EngineCrashed',
  };
  return names[code] ?? 'Unknown';
}

// ==================== Control ====================

export type ServiceState =
  | 'disconnected'
  | 'connecting'
  | 'connected'
  | 'reconnecting'
  | 'disconnecting'
  | 'error';

/**
 * ControlError carried in status snapshots. Observers decide what to show from
 * the code:
 * - 400 = profile rejected, user must fix it
 * - 512 = gave up reconnecting, user must connect again
 * - 511/513 = first connect failed
 */
export interface ControlError {
  code: number;
  message: string;
}

export class CoordinatorError extends Error {
  constructor(
    public readonly code: number,
    message: string
  ) {
    super(message);
    this.name = 'CoordinatorError';
    Object.setPrototypeOf(this, CoordinatorError.prototype);
  }
}

export interface ReconnectionStatus {
  attempt: number;
  maxAttempts: number;
  nextDelayMs: number | null;
  nextRetryAt: number | null; // epoch ms, null while an attempt is in flight
  /** Stable confirmations still needed before the attempt count resets. */
  settlePending: number;
}

export interface Session {
  id: string;
  profileId: string;
  serverName: string;
  startedAt: number;
  endedAt: number | null;
  countersAtOpen: EngineCounters;
  success: boolean | null;
  disconnectReason: string | null;
  /** Successful reconnections folded into this session. */
  reconnections: number;
  statistics: SessionStatisticsSummary | null;
}

export interface StatusSnapshot {
  state: ServiceState;
  sessionId: string | null;
  serverName: string | null;
  connectedSince: number | null;
  elapsedMs: number;
  statistics: StatisticsSnapshot | null;
  lastError: ControlError | null;
  reconnection: ReconnectionStatus | null;
  killSwitch: KillSwitchState;
  network: NetworkState;
  /** Degraded-security notice, e.g. the kill switch could not block traffic. */
  warning: ControlError | null;
  /** Monotonic sequence number, one per emitted snapshot. */
  seq: number;
}

export type StatusListener = (snapshot: StatusSnapshot) => void;
