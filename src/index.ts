export { ConnectionCoordinator, REASON_RECONNECT_EXHAUSTED, REASON_USER_DISCONNECT } from './coordinator/connection-coordinator.js';
export type { ConnectionCoordinatorDeps } from './coordinator/connection-coordinator.js';
export * from './coordinator/control-types.js';
export { StatusStream, computeDerivedStatus, createStatusStore } from './coordinator/status-store.js';
export type { StatusStore } from './coordinator/status-store.js';

export { ProfileValidator, parseProfile, vpnProfileSchema, VPN_PROTOCOLS, AUTH_METHODS } from './config/profile.js';
export type { VpnProfile, VpnProtocol, AuthMethod, ConfigValidator, ValidationResult } from './config/profile.js';
export { loadSettings, resolveSettings, defaultSettings, DEFAULT_CONFIG_PATH } from './config/settings.js';
export type { Settings, ReconnectionSettings, EngineSettings } from './config/settings.js';

export { createLogger, silentLogger } from './core/logger.js';
export type { Logger, LogLevel } from './core/logger.js';

export { ReconnectionPolicy, EXPONENTIAL_POLICY, LINEAR_POLICY, defaultPolicyFor } from './resilience/reconnection-policy.js';
export type { BackoffProfile, ReconnectionPolicySettings } from './resilience/reconnection-policy.js';
export { KillSwitchController, unavailablePrimitive } from './resilience/kill-switch.js';
export type { KillSwitchState, KillSwitchPrimitive, KillSwitchWarning, PrimitiveResult } from './resilience/kill-switch.js';
export { NetworkMonitorAdapter, DEFAULT_DEBOUNCE_MS } from './resilience/network-monitor.js';
export type { NetworkMonitor, NetworkState, Transport, ConnectivitySource, ConnectivityCallback } from './resilience/network-monitor.js';
export { InterfaceConnectivitySource, classifyTransport, stateFromInterfaces } from './resilience/interface-connectivity.js';

export { StatisticsSessionTracker } from './stats/statistics-tracker.js';
export type { StatisticsSample, StatisticsSnapshot, SessionStatisticsSummary, StatisticsSource } from './stats/statistics-tracker.js';
export { ConnectionHistory } from './stats/connection-history.js';
export type { UsageSummary } from './stats/connection-history.js';

export * from './vpn-client/index.js';
export { formatBytes, formatRate, formatDuration, describeSnapshot } from './utils/format.js';
