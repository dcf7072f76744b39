/**
 * Connection coordinator.
 *
 * Owns the connection state, the open session and the engine handle. Every
 * input (API calls, network changes, retry and settle timers, engine results,
 * statistics samples, crash reports) becomes an event on one queue, drained by
 * a synchronous handler, so no two transitions ever interleave. Engine calls
 * run outside the handler and come back as result events tagged with the
 * operation generation they were started under; results from an older
 * generation are stale.
 *
 * State machine:
 *
 *   disconnected --connect--> connecting --start ok--> connected
 *                                        \--start fail/timeout--> error
 *   connected --network lost / crash--> reconnecting --retry ok--> connected
 *                                                     \--exhausted--> error
 *   connected | reconnecting | connecting --disconnect--> disconnecting --> disconnected
 *   error --connect--> connecting, error --disconnect--> disconnected
 */

import { randomUUID } from 'node:crypto';

import { ProfileValidator } from '../config/profile.js';
import type { ConfigValidator, VpnProfile } from '../config/profile.js';
import { defaultSettings } from '../config/settings.js';
import type { Settings } from '../config/settings.js';
import { createLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import { KillSwitchController } from '../resilience/kill-switch.js';
import type { KillSwitchPrimitive, KillSwitchWarning } from '../resilience/kill-switch.js';
import type { NetworkMonitor, NetworkState, Transport } from '../resilience/network-monitor.js';
import { ReconnectionPolicy } from '../resilience/reconnection-policy.js';
import { ConnectionHistory } from '../stats/connection-history.js';
import type { UsageSummary } from '../stats/connection-history.js';
import { StatisticsSessionTracker } from '../stats/statistics-tracker.js';
import type { StatisticsSample } from '../stats/statistics-tracker.js';
import { ZERO_COUNTERS } from '../vpn-client/types.js';
import type { EngineCounters, EngineEvent, TunHandle, TunnelEngineClient } from '../vpn-client/types.js';
import {
  CoordinatorError,
  ErrCodeBusy,
  ErrCodeConfigInvalid,
  ErrCodeEngineCrashed,
  ErrCodeEngineStartFailed,
  ErrCodeEngineStopFailed,
  ErrCodeEngineTimeout,
  ErrCodeNetworkLost,
  ErrCodeReconnectExhausted,
} from './control-types.js';
import type {
  ControlError,
  ReconnectionStatus,
  ServiceState,
  Session,
  StatusListener,
  StatusSnapshot,
} from './control-types.js';
import { StatusStream, createStatusStore, subscribeSnapshots, subscribeStateChanges } from './status-store.js';
import type { StatusStore } from './status-store.js';

export const REASON_USER_DISCONNECT = 'user disconnect';
export const REASON_RECONNECT_EXHAUSTED = 'max reconnection attempts reached';

export interface ConnectionCoordinatorDeps {
  engine: TunnelEngineClient;
  monitor: NetworkMonitor;
  killSwitchPrimitive: KillSwitchPrimitive;
  /** Virtual interface handed to every engine start. */
  tun: TunHandle;
  validator?: ConfigValidator;
  settings?: Settings;
  history?: ConnectionHistory;
  logger?: Logger;
  now?: () => number;
  idFactory?: () => string;
}

// ============ Events ============

interface StartOutcome {
  ok: boolean;
  code?: number;
  error?: string;
  counters?: EngineCounters;
}

interface StopOutcome {
  ok: boolean;
  error?: string;
}

type CoordinatorEvent =
  | { type: 'connect'; profile: VpnProfile; resolve: (s: StatusSnapshot) => void; reject: (e: Error) => void }
  | { type: 'disconnect'; resolve: (s: StatusSnapshot) => void }
  | { type: 'start_result'; generation: number; outcome: StartOutcome }
  | { type: 'stop_result'; generation: number; outcome: StopOutcome }
  | { type: 'network'; available: boolean; transport: Transport }
  | { type: 'retry_fire'; token: number }
  | { type: 'settle_tick'; token: number }
  | { type: 'stats_sample'; sample: StatisticsSample }
  | { type: 'engine_crash'; reason: string }
  | { type: 'engine_event'; event: EngineEvent }
  | { type: 'kill_switch_warning'; warning: KillSwitchWarning }
  | { type: 'set_kill_switch'; enabled: boolean }
  | { type: 'reconnect_now' };

interface AttemptRecord {
  attempt: number;
  nextDelayMs: number | null;
  nextRetryAt: number | null;
  /** Stable confirmations still needed; 0 while retrying. */
  settlePending: number;
}

// ============ Coordinator ============

export class ConnectionCoordinator {
  private readonly engine: TunnelEngineClient;
  private readonly monitor: NetworkMonitor;
  private readonly tun: TunHandle;
  private readonly validator: ConfigValidator;
  private readonly settings: Settings;
  private readonly policy: ReconnectionPolicy;
  private readonly history: ConnectionHistory;
  private readonly killSwitch: KillSwitchController;
  private readonly tracker: StatisticsSessionTracker;
  private readonly store: StatusStore;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly idFactory: () => string;

  private state: ServiceState = 'disconnected';
  private profile: VpnProfile | null = null;
  private session: Session | null = null;
  private attempt: AttemptRecord | null = null;
  private lastError: ControlError | null = null;
  private warning: ControlError | null = null;
  private network: NetworkState;
  private seq = 0;

  private queue: CoordinatorEvent[] = [];
  private draining = false;
  private disposed = false;

  /** Bumped whenever an engine operation starts or in-flight work is abandoned. */
  private generation = 0;
  private startInFlight = false;
  private cancelRequested = false;
  private pendingConnect: ((s: StatusSnapshot) => void) | null = null;
  private pendingDisconnects: Array<(s: StatusSnapshot) => void> = [];

  private retryTimer: ReturnType<typeof setTimeout> | null = null;
  /** Start/stop timeouts of in-flight engine operations. */
  private operationTimers = new Set<ReturnType<typeof setTimeout>>();
  private settleTimer: ReturnType<typeof setTimeout> | null = null;
  private timerToken = 0;
  private monitoring = false;
  private engineUnsubscribe: (() => void) | null = null;
  private streams = new Set<StatusStream>();

  constructor(deps: ConnectionCoordinatorDeps) {
    this.engine = deps.engine;
    this.monitor = deps.monitor;
    this.tun = deps.tun;
    this.validator = deps.validator ?? new ProfileValidator();
    this.settings = deps.settings ?? defaultSettings();
    this.policy = new ReconnectionPolicy(this.settings.reconnection);
    this.logger = deps.logger ?? createLogger('Coordinator');
    this.now = deps.now ?? Date.now;
    this.idFactory = deps.idFactory ?? randomUUID;
    this.history = deps.history ?? new ConnectionHistory({ now: this.now });
    this.network = this.monitor.getState();

    this.killSwitch = new KillSwitchController({
      primitive: deps.killSwitchPrimitive,
      enabled: this.settings.killSwitch.enabled,
      onWarning: (warning) => this.post({ type: 'kill_switch_warning', warning }),
      logger: this.logger,
    });
    this.tracker = new StatisticsSessionTracker({
      source: this.engine,
      onSample: (sample) => this.post({ type: 'stats_sample', sample }),
      intervalMs: this.settings.statistics.sampleIntervalMs,
      now: this.now,
      logger: this.logger,
    });
    this.store = createStatusStore(this.buildSnapshot());
  }

  // ============ Public API ============

  /**
   * Starts a connection. Resolves with the snapshot the attempt ended in:
   * `connected`, `error`, or `disconnected` when cancelled by `disconnect()`.
   * @throws {CoordinatorError} code 409 when a session is active or in flight
   */
  connect(profile: VpnProfile): Promise<StatusSnapshot> {
    return new Promise((resolve, reject) => {
      this.post({ type: 'connect', profile, resolve, reject });
    });
  }

  /** Idempotent; resolves with the snapshot the disconnect ended in. */
  disconnect(): Promise<StatusSnapshot> {
    return new Promise((resolve) => {
      this.post({ type: 'disconnect', resolve });
    });
  }

  getStatus(): StatusSnapshot {
    return this.store.getState().snapshot;
  }

  subscribe(listener: StatusListener): () => void {
    return subscribeSnapshots(this.store, listener);
  }

  onStateChange(listener: (state: ServiceState, previous: ServiceState) => void): () => void {
    return subscribeStateChanges(this.store, listener);
  }

  /** Every snapshot from now on, starting with the current one. */
  statusStream(): StatusStream {
    const stream = new StatusStream(this.store, (s) => this.streams.delete(s));
    if (this.disposed) {
      stream.close();
      return stream;
    }
    this.streams.add(stream);
    return stream;
  }

  /** Crash notification from a platform layer that cannot push engine events. */
  reportEngineCrash(reason: string): void {
    this.post({ type: 'engine_crash', reason });
  }

  /** Fires the pending retry at once; ignored unless waiting to reconnect. */
  reconnectNow(): void {
    this.post({ type: 'reconnect_now' });
  }

  setKillSwitchEnabled(enabled: boolean): void {
    this.post({ type: 'set_kill_switch', enabled });
  }

  getHistory(): ReadonlyArray<Readonly<Session>> {
    return this.history.list();
  }

  getUsageSummary(range?: { from?: number; to?: number }): UsageSummary {
    return this.history.usageSummary(range);
  }

  /** Resolves once queued kill switch primitive calls have completed. */
  whenKillSwitchIdle(): Promise<void> {
    return this.killSwitch.whenIdle();
  }

  /**
   * Stops timers and subscriptions and ends all status streams. The engine is
   * left as it is; pending connect/disconnect calls resolve with the current
   * snapshot.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.generation++;
    this.queue = [];
    this.clearRetryTimer();
    this.clearSettleTimer();
    for (const timer of this.operationTimers) {
      clearTimeout(timer);
    }
    this.operationTimers.clear();
    this.tracker.dispose();
    this.stopMonitoring();
    this.unsubscribeEngine();
    this.killSwitch.disarm();

    const snapshot = this.getStatus();
    this.pendingConnect?.(snapshot);
    this.pendingConnect = null;
    this.resolveDisconnects(snapshot);
    for (const stream of [...this.streams]) {
      stream.close();
    }
    this.streams.clear();
    this.logger.info('disposed');
  }

  // ============ Event loop ============

  private post(event: CoordinatorEvent): void {
    if (this.disposed) {
      if (event.type === 'connect') {
        event.reject(new Error('Coordinator has been disposed'));
      } else if (event.type === 'disconnect') {
        event.resolve(this.getStatus());
      }
      return;
    }
    this.queue.push(event);
    if (this.draining) return;

    this.draining = true;
    try {
      let next = this.queue.shift();
      while (next) {
        try {
          this.handle(next);
        } catch (err) {
          this.logger.error(`handler for '${next.type}' failed:`, err);
        }
        next = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private handle(event: CoordinatorEvent): void {
    switch (event.type) {
      case 'connect':
        return this.onConnect(event.profile, event.resolve, event.reject);
      case 'disconnect':
        return this.onDisconnect(event.resolve);
      case 'start_result':
        return this.onStartResult(event.generation, event.outcome);
      case 'stop_result':
        return this.onStopResult(event.generation, event.outcome);
      case 'network':
        return this.onNetwork({ available: event.available, transport: event.transport });
      case 'retry_fire':
        return this.onRetryFire(event.token);
      case 'settle_tick':
        return this.onSettleTick(event.token);
      case 'stats_sample':
        return this.onStatsSample(event.sample);
      case 'engine_crash':
        return this.onEngineCrash(event.reason);
      case 'engine_event':
        return this.onEngineEvent(event.event);
      case 'kill_switch_warning':
        this.warning = { code: event.warning.code, message: event.warning.message };
        return this.publish();
      case 'set_kill_switch':
        return this.onSetKillSwitch(event.enabled);
      case 'reconnect_now':
        return this.onReconnectNow();
    }
  }

  // ============ Handlers ============

  private onConnect(
    profile: VpnProfile,
    resolve: (s: StatusSnapshot) => void,
    reject: (e: Error) => void
  ): void {
    if (this.state !== 'disconnected' && this.state !== 'error') {
      reject(new CoordinatorError(ErrCodeBusy, `Cannot connect while ${this.state}`));
      return;
    }

    this.resetFlow();
    this.warning = null;

    const validation = this.validator.validate(profile);
    if (!validation.ok) {
      const message = `Configuration invalid: ${validation.errors.join('; ')}`;
      this.logger.warn(message);
      this.lastError = { code: ErrCodeConfigInvalid, message };
      this.profile = null;
      this.setState('error');
      resolve(this.getStatus());
      return;
    }

    this.profile = profile;
    this.lastError = null;
    this.pendingConnect = resolve;
    this.logger.info(`connecting to ${profile.name}`);
    this.setState('connecting');
    this.runStart(false);
  }

  private onDisconnect(resolve: (s: StatusSnapshot) => void): void {
    switch (this.state) {
      case 'disconnected':
        resolve(this.getStatus());
        return;
      case 'disconnecting':
        this.pendingDisconnects.push(resolve);
        return;
      case 'error':
        this.lastError = null;
        this.warning = null;
        this.resetFlow();
        this.setState('disconnected');
        resolve(this.getStatus());
        return;
      case 'connecting':
        this.logger.info('disconnect requested while connecting, cancelling');
        this.pendingDisconnects.push(resolve);
        this.cancelRequested = true;
        this.setState('disconnecting');
        return;
      case 'connected':
      case 'reconnecting':
        this.logger.info('disconnecting');
        this.pendingDisconnects.push(resolve);
        this.clearRetryTimer();
        this.clearSettleTimer();
        this.tracker.suspend();
        // Leaving reconnecting: stop blocking, tunnel goes down on request
        this.killSwitch.arm();
        if (this.startInFlight) {
          this.cancelRequested = true;
          this.setState('disconnecting');
          return;
        }
        this.setState('disconnecting');
        this.runStop();
        return;
    }
  }

  private onStartResult(generation: number, outcome: StartOutcome): void {
    if (generation !== this.generation) {
      this.logger.debug(`stale start result (generation ${generation})`);
      if (outcome.ok && (this.state === 'disconnected' || this.state === 'error')) {
        this.stopQuietly();
      }
      return;
    }
    this.startInFlight = false;

    switch (this.state) {
      case 'connecting':
        if (outcome.ok) {
          this.onFirstConnectSucceeded(outcome.counters ?? ZERO_COUNTERS);
        } else {
          const code = outcome.code ?? ErrCodeEngineStartFailed;
          const message = outcome.error ?? 'Engine failed to start';
          this.logger.error(`connect failed: ${message}`);
          this.lastError = { code, message };
          this.profile = null;
          this.setState('error');
          this.settleConnect();
        }
        return;

      case 'reconnecting':
        if (outcome.ok) {
          this.onReconnectSucceeded(outcome.counters ?? ZERO_COUNTERS);
        } else {
          this.onReconnectFailed(outcome.error ?? 'Engine failed to start');
        }
        return;

      case 'disconnecting':
        if (this.cancelRequested && outcome.ok) {
          this.runStop();
        } else {
          this.finishDisconnect({ ok: true });
        }
        return;

      default:
        this.logger.debug(`start result ignored in ${this.state}`);
    }
  }

  private onStopResult(generation: number, outcome: StopOutcome): void {
    if (generation !== this.generation) {
      this.logger.debug(`stale stop result (generation ${generation})`);
      return;
    }
    if (this.state !== 'disconnecting') {
      this.logger.debug(`stop result ignored in ${this.state}`);
      return;
    }
    this.finishDisconnect(outcome);
  }

  private onNetwork(next: NetworkState): void {
    const previous = this.network;
    this.network = next;
    if (previous.available === next.available && previous.transport === next.transport) return;

    if (this.state === 'connected' && !next.available) {
      this.logger.warn('network lost while connected');
      this.onConnectionLost(ErrCodeNetworkLost, 'Network connectivity lost');
      return;
    }

    if (
      this.state === 'reconnecting' &&
      next.available &&
      !previous.available &&
      this.retryTimer &&
      this.settings.reconnection.retryOnNetworkRestore
    ) {
      this.logger.info('network restored, retrying now');
      this.clearRetryTimer();
      this.beginRetryAttempt();
      return;
    }

    this.publish();
  }

  private onRetryFire(token: number): void {
    if (token !== this.timerToken || this.state !== 'reconnecting') return;
    this.retryTimer = null;
    this.beginRetryAttempt();
  }

  private onReconnectNow(): void {
    if (this.state !== 'reconnecting' || !this.retryTimer) {
      this.logger.debug(`reconnect request ignored in ${this.state}`);
      return;
    }
    this.logger.info('reconnect requested, retrying now');
    this.clearRetryTimer();
    this.beginRetryAttempt();
  }

  private onSettleTick(token: number): void {
    if (token !== this.timerToken || this.state !== 'connected' || !this.attempt) return;
    this.settleTimer = null;
    const required = this.settings.reconnection.settleConfirmations;

    if (!this.network.available) {
      this.attempt.settlePending = required;
    } else {
      this.attempt.settlePending--;
    }

    if (this.attempt.settlePending <= 0) {
      this.logger.info(`connection stable, resetting reconnection attempts (was ${this.attempt.attempt})`);
      this.attempt = null;
      this.publish();
      return;
    }
    this.publish();
    this.scheduleSettleTick();
  }

  private onStatsSample(sample: StatisticsSample): void {
    if (this.state !== 'connected' || !this.session || sample.sessionId !== this.session.id) return;

    if (sample.counters === null && !sample.running) {
      this.logger.warn('statistics sample found the engine stopped');
      this.onEngineCrash('Engine is no longer running');
      return;
    }

    const snapshot = this.tracker.ingest(sample);
    if (snapshot) {
      this.publish();
    }
  }

  private onEngineEvent(event: EngineEvent): void {
    if (event.type === 'crashed') {
      this.onEngineCrash(event.message);
      return;
    }
    this.logger.debug(`engine reports running=${event.running}`);
  }

  private onEngineCrash(reason: string): void {
    switch (this.state) {
      case 'connected':
        this.logger.error(`engine crashed: ${reason}`);
        this.onConnectionLost(ErrCodeEngineCrashed, `Engine crashed: ${reason}`);
        return;
      case 'connecting':
        this.logger.error(`engine crashed while connecting: ${reason}`);
        // Abandon the in-flight start; a late success is stopped as stale
        this.generation++;
        this.startInFlight = false;
        this.lastError = { code: ErrCodeEngineCrashed, message: `Engine crashed: ${reason}` };
        this.profile = null;
        this.setState('error');
        this.settleConnect();
        return;
      default:
        this.logger.debug(`crash report ignored in ${this.state}: ${reason}`);
    }
  }

  private onSetKillSwitch(enabled: boolean): void {
    this.killSwitch.setEnabled(enabled);
    if (this.state === 'connected' || this.state === 'disconnecting') {
      this.killSwitch.arm();
    } else if (this.state === 'reconnecting') {
      this.killSwitch.engage();
    }
    this.publish();
  }

  // ============ Transitions ============

  private onFirstConnectSucceeded(countersAtOpen: EngineCounters): void {
    const profile = this.profile;
    if (!profile) return;
    const startedAt = this.now();
    this.session = {
      id: this.idFactory(),
      profileId: profile.id,
      serverName: profile.name,
      startedAt,
      endedAt: null,
      countersAtOpen: { ...countersAtOpen },
      success: null,
      disconnectReason: null,
      reconnections: 0,
      statistics: null,
    };
    this.attempt = null;
    this.lastError = null;

    this.killSwitch.arm();
    this.startMonitoring();
    this.subscribeEngine();
    this.tracker.open(this.session.id, countersAtOpen, startedAt);
    this.tracker.startSampling();

    this.logger.info(`connected to ${profile.name} (session ${this.session.id})`);
    this.setState('connected');
    this.settleConnect();
  }

  private onConnectionLost(code: number, message: string): void {
    this.clearSettleTimer();

    if (!this.settings.reconnection.autoReconnect) {
      this.failSession(code, message);
      return;
    }

    // Inside the settle window the previous attempt count still applies
    const kept = this.attempt?.attempt ?? 0;
    if (kept > 0 && this.policy.shouldGiveUp(kept)) {
      this.failSession(ErrCodeReconnectExhausted, REASON_RECONNECT_EXHAUSTED);
      return;
    }

    this.killSwitch.engage();
    this.tracker.suspend();
    this.attempt = { attempt: kept + 1, nextDelayMs: null, nextRetryAt: null, settlePending: 0 };
    this.scheduleRetry();
    this.setState('reconnecting');
  }

  /** The engine was restarted; its counters start a new run of the session. */
  private onReconnectSucceeded(restartedWith: EngineCounters): void {
    const session = this.session;
    const attempt = this.attempt;
    if (!session || !attempt) return;
    session.reconnections++;
    attempt.nextDelayMs = null;
    attempt.nextRetryAt = null;
    attempt.settlePending = this.settings.reconnection.settleConfirmations;

    this.killSwitch.arm();
    this.tracker.resume(restartedWith);
    this.scheduleSettleTick();
    this.logger.info(`reconnected on attempt ${attempt.attempt} (session ${session.id})`);
    this.setState('connected');
  }

  private onReconnectFailed(reason: string): void {
    const attempt = this.attempt;
    if (!attempt) return;
    this.logger.warn(`reconnection attempt ${attempt.attempt} failed: ${reason}`);

    if (this.policy.shouldGiveUp(attempt.attempt)) {
      this.logger.error(`giving up after ${attempt.attempt} attempts`);
      this.failSession(ErrCodeReconnectExhausted, REASON_RECONNECT_EXHAUSTED);
      return;
    }
    attempt.attempt++;
    this.scheduleRetry();
    this.publish();
  }

  private beginRetryAttempt(): void {
    const attempt = this.attempt;
    if (!attempt) return;
    attempt.nextDelayMs = null;
    attempt.nextRetryAt = null;
    this.logger.info(`reconnection attempt ${attempt.attempt}/${this.policy.maxAttempts}`);
    this.publish();
    this.runStart(true);
  }

  /** Ends the open session as failed and lands in `error`. */
  private failSession(code: number, message: string): void {
    this.clearRetryTimer();
    this.clearSettleTimer();
    this.closeSession(false, message);
    this.attempt = null;
    this.profile = null;
    this.lastError = { code, message };
    this.killSwitch.disarm();
    this.stopMonitoring();
    this.unsubscribeEngine();
    this.stopQuietly();
    this.setState('error');
  }

  private finishDisconnect(outcome: StopOutcome): void {
    this.clearRetryTimer();
    this.clearSettleTimer();
    this.closeSession(true, REASON_USER_DISCONNECT);
    this.attempt = null;
    this.profile = null;
    this.cancelRequested = false;
    this.killSwitch.disarm();
    this.stopMonitoring();
    this.unsubscribeEngine();

    if (outcome.ok) {
      this.lastError = null;
      this.logger.info('disconnected');
      this.setState('disconnected');
    } else {
      const message = outcome.error ?? 'Engine failed to stop';
      this.logger.error(`disconnect failed: ${message}`);
      this.lastError = { code: ErrCodeEngineStopFailed, message };
      this.setState('error');
    }
    this.settleConnect();
    this.resolveDisconnects(this.getStatus());
  }

  private closeSession(success: boolean, reason: string): void {
    const session = this.session;
    if (!session) {
      this.tracker.close(this.now());
      return;
    }
    const endedAt = this.now();
    session.endedAt = endedAt;
    session.success = success;
    session.disconnectReason = reason;
    session.statistics = this.tracker.close(endedAt);
    this.history.record(session);
    this.session = null;
    this.logger.info(`session ${session.id} closed (${reason})`);
  }

  // ============ Engine operations ============

  private runStart(restart: boolean): void {
    const profile = this.profile;
    if (!profile) return;
    const generation = ++this.generation;
    const timeoutMs = this.settings.engine.startTimeoutMs;
    this.startInFlight = true;
    let settled = false;

    const timer = setTimeout(() => {
      this.operationTimers.delete(timer);
      if (settled) return;
      settled = true;
      this.post({
        type: 'start_result',
        generation,
        outcome: { ok: false, code: ErrCodeEngineTimeout, error: `Engine start timed out after ${timeoutMs} ms` },
      });
    }, timeoutMs);
    this.operationTimers.add(timer);

    const attempt = async (): Promise<StartOutcome> => {
      try {
        if (restart) {
          await this.stopEngineForRestart();
        }
        const ok = await this.engine.start(profile, this.tun);
        if (!ok) {
          return { ok: false, error: this.engine.getLastError?.() ?? 'Engine failed to start' };
        }
        return { ok: true, counters: await this.readCounters() };
      } catch (err) {
        return { ok: false, error: err instanceof Error ? err.message : String(err) };
      }
    };

    void attempt().then((outcome) => {
      clearTimeout(timer);
      this.operationTimers.delete(timer);
      if (settled) {
        if (outcome.ok && generation === this.generation) {
          this.logger.warn('engine started after its timeout, stopping it');
          this.stopQuietly();
        }
        return;
      }
      settled = true;
      this.post({ type: 'start_result', generation, outcome });
    });
  }

  private runStop(): void {
    const generation = ++this.generation;
    const timeoutMs = this.settings.engine.stopTimeoutMs;
    let settled = false;

    const timer = setTimeout(() => {
      this.operationTimers.delete(timer);
      if (settled) return;
      settled = true;
      this.post({
        type: 'stop_result',
        generation,
        outcome: { ok: false, error: `Engine stop timed out after ${timeoutMs} ms` },
      });
    }, timeoutMs);
    this.operationTimers.add(timer);

    const attempt = async (): Promise<StopOutcome> => {
      try {
        const ok = await this.engine.stop();
        return ok ? { ok } : { ok, error: this.engine.getLastError?.() ?? 'Engine failed to stop' };
      } catch (err) {
        return { ok: false, error: err instanceof Error ? err.message : String(err) };
      }
    };

    void attempt().then((outcome) => {
      clearTimeout(timer);
      this.operationTimers.delete(timer);
      if (settled) return;
      settled = true;
      this.post({ type: 'stop_result', generation, outcome });
    });
  }

  private async stopEngineForRestart(): Promise<void> {
    try {
      await this.engine.stop();
    } catch (err) {
      this.logger.debug('stop before restart failed:', err instanceof Error ? err.message : err);
    }
  }

  private async readCounters(): Promise<EngineCounters> {
    try {
      return (await this.engine.getStatistics()) ?? ZERO_COUNTERS;
    } catch {
      return ZERO_COUNTERS;
    }
  }

  /** Best-effort stop whose result no transition waits for. */
  private stopQuietly(): void {
    this.engine.stop().then(
      (ok) => {
        if (!ok) this.logger.warn('background engine stop reported failure');
      },
      (err: unknown) => {
        this.logger.warn('background engine stop failed:', err instanceof Error ? err.message : err);
      }
    );
  }

  // ============ Timers & subscriptions ============

  private scheduleRetry(): void {
    const attempt = this.attempt;
    if (!attempt) return;
    this.clearRetryTimer();
    const delay = this.policy.delay(attempt.attempt);
    const token = ++this.timerToken;
    attempt.nextDelayMs = delay;
    attempt.nextRetryAt = this.now() + delay;
    this.logger.info(`retry ${attempt.attempt} in ${delay} ms`);
    this.retryTimer = setTimeout(() => this.post({ type: 'retry_fire', token }), delay);
  }

  private scheduleSettleTick(): void {
    this.clearSettleTimer();
    const token = ++this.timerToken;
    this.settleTimer = setTimeout(
      () => this.post({ type: 'settle_tick', token }),
      this.settings.reconnection.settleIntervalMs
    );
  }

  private clearRetryTimer(): void {
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
  }

  private clearSettleTimer(): void {
    if (this.settleTimer) {
      clearTimeout(this.settleTimer);
      this.settleTimer = null;
    }
  }

  private startMonitoring(): void {
    if (this.monitoring) return;
    this.monitoring = true;
    this.monitor.subscribe((available, transport) => this.post({ type: 'network', available, transport }));
    this.network = this.monitor.getState();
  }

  private stopMonitoring(): void {
    if (!this.monitoring) return;
    this.monitoring = false;
    this.monitor.unsubscribe();
  }

  private subscribeEngine(): void {
    if (this.engineUnsubscribe || !this.engine.subscribe) return;
    this.engineUnsubscribe = this.engine.subscribe((event) => this.post({ type: 'engine_event', event }));
  }

  private unsubscribeEngine(): void {
    this.engineUnsubscribe?.();
    this.engineUnsubscribe = null;
  }

  // ============ Snapshots ============

  /** Clears leftovers of a previous flow before a new connect or a reset. */
  private resetFlow(): void {
    this.clearRetryTimer();
    this.clearSettleTimer();
    this.attempt = null;
    this.cancelRequested = false;
    this.startInFlight = false;
  }

  private settleConnect(): void {
    const resolve = this.pendingConnect;
    this.pendingConnect = null;
    resolve?.(this.getStatus());
  }

  private resolveDisconnects(snapshot: StatusSnapshot): void {
    const waiting = this.pendingDisconnects;
    this.pendingDisconnects = [];
    for (const resolve of waiting) {
      resolve(snapshot);
    }
  }

  private setState(next: ServiceState): void {
    if (this.state !== next) {
      this.logger.debug(`${this.state} -> ${next}`);
    }
    this.state = next;
    this.publish();
  }

  private publish(): void {
    this.store.getState().publish(this.buildSnapshot());
  }

  private buildSnapshot(): StatusSnapshot {
    const session = this.session;
    const now = this.now();
    return Object.freeze({
      state: this.state,
      sessionId: session?.id ?? null,
      serverName: session?.serverName ?? this.profile?.name ?? null,
      connectedSince: session?.startedAt ?? null,
      elapsedMs: session ? Math.max(0, now - session.startedAt) : 0,
      statistics: session ? this.tracker.latest() : null,
      lastError: this.lastError,
      reconnection: this.reconnectionStatus(),
      killSwitch: this.killSwitch.state,
      network: { ...this.network },
      warning: this.warning,
      seq: ++this.seq,
    });
  }

  private reconnectionStatus(): ReconnectionStatus | null {
    const attempt = this.attempt;
    if (!attempt) return null;
    return {
      attempt: attempt.attempt,
      maxAttempts: this.policy.maxAttempts,
      nextDelayMs: attempt.nextDelayMs,
      nextRetryAt: attempt.nextRetryAt,
      settlePending: attempt.settlePending,
    };
  }
}
