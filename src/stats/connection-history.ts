/**
 * In-memory record of closed sessions with a usage summary.
 *
 * Bounded by entry count and age; persisting it is up to the host.
 */

import type { Session } from '../coordinator/control-types.js';

const MAX_ENTRIES = 1000;
const RETENTION_MS = 90 * 24 * 60 * 60 * 1000; // 90 days

export interface UsageSummary {
  totalBytesDownloaded: number;
  totalBytesUploaded: number;
  totalConnectionMs: number;
  successfulConnections: number;
  failedConnections: number;
  averageSessionMs: number;
  mostUsedServer: string | null;
  from: number;
  to: number;
}

export interface ConnectionHistoryOptions {
  maxEntries?: number;
  retentionMs?: number;
  now?: () => number;
}

export class ConnectionHistory {
  private entries: Readonly<Session>[] = [];
  private readonly maxEntries: number;
  private readonly retentionMs: number;
  private readonly now: () => number;

  constructor(options: ConnectionHistoryOptions = {}) {
    this.maxEntries = options.maxEntries ?? MAX_ENTRIES;
    this.retentionMs = options.retentionMs ?? RETENTION_MS;
    this.now = options.now ?? Date.now;
  }

  /** Stores a closed session. Open sessions are rejected. */
  record(session: Session): void {
    if (session.endedAt === null) {
      throw new Error(`Session ${session.id} is still open`);
    }
    this.entries.unshift(Object.freeze({ ...session }));
    this.prune();
  }

  /** Newest first. */
  list(): ReadonlyArray<Readonly<Session>> {
    this.prune();
    return [...this.entries];
  }

  usageSummary(range: { from?: number; to?: number } = {}): UsageSummary {
    const to = range.to ?? this.now();
    const from = range.from ?? to - 30 * 24 * 60 * 60 * 1000;
    const inRange = this.list().filter((s) => s.startedAt >= from && s.startedAt <= to);

    let totalBytesDownloaded = 0;
    let totalBytesUploaded = 0;
    let totalConnectionMs = 0;
    let successfulConnections = 0;
    const serverUse = new Map<string, number>();

    for (const session of inRange) {
      totalBytesDownloaded += session.statistics?.bytesReceived ?? 0;
      totalBytesUploaded += session.statistics?.bytesSent ?? 0;
      totalConnectionMs += (session.endedAt ?? session.startedAt) - session.startedAt;
      if (session.success) successfulConnections++;
      serverUse.set(session.serverName, (serverUse.get(session.serverName) ?? 0) + 1);
    }

    let mostUsedServer: string | null = null;
    let mostUses = 0;
    for (const [server, uses] of serverUse) {
      if (uses > mostUses) {
        mostUsedServer = server;
        mostUses = uses;
      }
    }

    return {
      totalBytesDownloaded,
      totalBytesUploaded,
      totalConnectionMs,
      successfulConnections,
      failedConnections: inRange.length - successfulConnections,
      averageSessionMs: inRange.length > 0 ? Math.round(totalConnectionMs / inRange.length) : 0,
      mostUsedServer,
      from,
      to,
    };
  }

  clear(): void {
    this.entries = [];
  }

  private prune(): void {
    const cutoff = this.now() - this.retentionMs;
    this.entries = this.entries
      .filter((s) => (s.endedAt ?? s.startedAt) >= cutoff)
      .slice(0, this.maxEntries);
  }
}
