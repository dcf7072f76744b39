/**
 * Status Store - broadcast of coordinator snapshots
 *
 * The coordinator is the only writer (`publish`). Every publish notifies all
 * subscribers synchronously and in order, so observers see each transition;
 * coalescing is left to the observer.
 */

import { createStore } from 'zustand/vanilla';
import { subscribeWithSelector } from 'zustand/middleware';

import type { ServiceState, StatusListener, StatusSnapshot } from './control-types.js';

// ============ Types ============

interface StatusState {
  snapshot: StatusSnapshot;
}

interface StatusActions {
  publish: (snapshot: StatusSnapshot) => void;
}

export type StatusStoreState = StatusState & StatusActions;

// ============ Store ============

export function createStatusStore(initial: StatusSnapshot) {
  return createStore<StatusStoreState>()(
    subscribeWithSelector((set) => ({
      snapshot: initial,
      publish: (snapshot) => set({ snapshot }),
    }))
  );
}

export type StatusStore = ReturnType<typeof createStatusStore>;

export function subscribeSnapshots(store: StatusStore, listener: StatusListener): () => void {
  return store.subscribe(
    (state) => state.snapshot,
    (snapshot) => listener(snapshot)
  );
}

/** Fires only when the connection state itself changes. */
export function subscribeStateChanges(
  store: StatusStore,
  listener: (state: ServiceState, previous: ServiceState) => void
): () => void {
  return store.subscribe((state) => state.snapshot.state, listener);
}

// ============ Derived state ============

export function computeDerivedStatus(snapshot: StatusSnapshot) {
  const { state } = snapshot;
  return {
    isConnected: state === 'connected',
    isDisconnected: state === 'disconnected',
    isConnecting: state === 'connecting',
    isReconnecting: state === 'reconnecting',
    isDisconnecting: state === 'disconnecting',
    isError: state === 'error',
    isTransitioning: state === 'connecting' || state === 'reconnecting' || state === 'disconnecting',
    /** A tunnel is up or expected up. */
    isSessionActive: snapshot.sessionId !== null,
    isTrafficBlocked: snapshot.killSwitch === 'armed-blocking',
    hasWarning: snapshot.warning !== null,
  };
}

// ============ Stream ============

/**
 * Async iterator over snapshots. Starts with the snapshot current at creation,
 * then yields every published one. Unread snapshots are buffered, never dropped.
 */
export class StatusStream implements AsyncIterableIterator<StatusSnapshot> {
  private buffer: StatusSnapshot[] = [];
  private waiting: ((result: IteratorResult<StatusSnapshot>) => void) | null = null;
  private closed = false;
  private readonly unsubscribe: () => void;
  private readonly onClose?: (stream: StatusStream) => void;

  constructor(store: StatusStore, onClose?: (stream: StatusStream) => void) {
    this.onClose = onClose;
    this.buffer.push(store.getState().snapshot);
    this.unsubscribe = subscribeSnapshots(store, (snapshot) => this.push(snapshot));
  }

  get isClosed(): boolean {
    return this.closed;
  }

  next(): Promise<IteratorResult<StatusSnapshot>> {
    const snapshot = this.buffer.shift();
    if (snapshot) {
      return Promise.resolve({ value: snapshot, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  return(): Promise<IteratorResult<StatusSnapshot>> {
    this.close();
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<StatusSnapshot> {
    return this;
  }

  /** Ends the stream; buffered snapshots are discarded. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.buffer = [];
    this.unsubscribe();
    const waiting = this.waiting;
    this.waiting = null;
    waiting?.({ value: undefined, done: true });
    this.onClose?.(this);
  }

  private push(snapshot: StatusSnapshot): void {
    if (this.closed) return;
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = null;
      waiting({ value: snapshot, done: false });
      return;
    }
    this.buffer.push(snapshot);
  }
}
