/**
 * Network monitor adapter.
 *
 * Wraps a platform connectivity source and normalises it to a single
 * `connectivityChanged(isAvailable, transport)` callback. A loss is held for
 * `debounceMs`; if connectivity comes back inside that window the flap is
 * swallowed and the subscriber never sees it. Duplicate reports are dropped.
 */

import { createLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';

export type Transport = 'wifi' | 'mobile' | 'ethernet' | 'unknown';

export interface NetworkState {
  available: boolean;
  transport: Transport;
}

export type ConnectivityCallback = (isAvailable: boolean, transport: Transport) => void;

/** Contract the coordinator consumes. */
export interface NetworkMonitor {
  subscribe(callback: ConnectivityCallback): void;
  unsubscribe(): void;
  getState(): NetworkState;
}

/** Raw platform connectivity API. */
export interface ConnectivitySource {
  current(): NetworkState;
  start(onChange: (state: NetworkState) => void): void;
  stop(): void;
}

export const DEFAULT_DEBOUNCE_MS = 500;

export interface NetworkMonitorOptions {
  source: ConnectivitySource;
  debounceMs?: number;
  logger?: Logger;
}

export class NetworkMonitorAdapter implements NetworkMonitor {
  private readonly source: ConnectivitySource;
  private readonly debounceMs: number;
  private readonly logger: Logger;
  private callback: ConnectivityCallback | null = null;
  private emitted: NetworkState;
  private pendingLoss: ReturnType<typeof setTimeout> | null = null;
  private started = false;

  constructor(options: NetworkMonitorOptions) {
    this.source = options.source;
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.logger = options.logger ?? createLogger('NetworkMonitor');
    this.emitted = { ...this.source.current() };
  }

  getState(): NetworkState {
    return { ...this.emitted };
  }

  /** Only one subscriber; a second call replaces the first. */
  subscribe(callback: ConnectivityCallback): void {
    this.callback = callback;
    if (this.started) return;
    this.started = true;
    this.emitted = { ...this.source.current() };
    this.source.start((state) => this.handleRaw(state));
    this.logger.debug('subscribed', this.emitted);
  }

  unsubscribe(): void {
    this.callback = null;
    this.clearPendingLoss();
    if (!this.started) return;
    this.started = false;
    this.source.stop();
    this.logger.debug('unsubscribed');
  }

  private handleRaw(raw: NetworkState): void {
    if (!raw.available) {
      if (!this.emitted.available || this.pendingLoss) return;
      this.pendingLoss = setTimeout(() => {
        this.pendingLoss = null;
        this.emit({ available: false, transport: raw.transport });
      }, this.debounceMs);
      return;
    }

    if (this.pendingLoss) {
      this.clearPendingLoss();
      this.logger.debug('connectivity flap ignored');
      if (raw.transport !== this.emitted.transport) {
        this.emit(raw);
      }
      return;
    }

    if (!this.emitted.available || raw.transport !== this.emitted.transport) {
      this.emit(raw);
    }
  }

  private emit(state: NetworkState): void {
    this.emitted = { ...state };
    this.logger.info(
      state.available ? `connectivity available (${state.transport})` : 'connectivity lost'
    );
    this.callback?.(state.available, state.transport);
  }

  private clearPendingLoss(): void {
    if (this.pendingLoss) {
      clearTimeout(this.pendingLoss);
      this.pendingLoss = null;
    }
  }
}
