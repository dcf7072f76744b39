/**
 * Statistics session tracker.
 *
 * Samples the engine's cumulative counters on a fixed period and turns them
 * into per-session totals and instantaneous rates. The sampler never touches
 * coordinator state: every sample goes to `onSample`, and the coordinator feeds
 * it back through `ingest()` from its own event loop.
 *
 * Rates compare a sample with the previous sample of the same session. A
 * counter that goes backwards means the engine restarted: the counts seen so
 * far are carried into the session totals and the new values become a fresh
 * baseline, with a rate of 0 for that sample.
 */

import { createLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import type { EngineCounters } from '../vpn-client/types.js';

export const DEFAULT_SAMPLE_INTERVAL_MS = 1000;

export interface StatisticsSample {
  sessionId: string;
  /** null when the engine returned nothing (stopped, crashed or unreachable). */
  counters: EngineCounters | null;
  running: boolean;
  sampledAt: number;
}

export interface StatisticsSnapshot {
  sessionId: string;
  bytesReceived: number;
  bytesSent: number;
  packetsReceived: number;
  packetsSent: number;
  /** bytes per second */
  downloadRate: number;
  uploadRate: number;
  sampledAt: number;
}

export interface SessionStatisticsSummary {
  sessionId: string;
  bytesReceived: number;
  bytesSent: number;
  packetsReceived: number;
  packetsSent: number;
  durationMs: number;
  averageDownloadRate: number;
  averageUploadRate: number;
  peakDownloadRate: number;
  peakUploadRate: number;
  samples: number;
}

export interface StatisticsSource {
  getStatistics(): Promise<EngineCounters | null>;
  isRunning(): Promise<boolean>;
}

export interface StatisticsTrackerOptions {
  source: StatisticsSource;
  onSample: (sample: StatisticsSample) => void;
  intervalMs?: number;
  now?: () => number;
  logger?: Logger;
}

interface OpenSession {
  id: string;
  openedAt: number;
  /** Counters the current engine run is measured from. */
  segmentBase: EngineCounters;
  /** Totals of engine runs that ended in a counter reset. */
  carried: EngineCounters;
  previous: { counters: EngineCounters; at: number };
  latest: StatisticsSnapshot | null;
  peakDownloadRate: number;
  peakUploadRate: number;
  samples: number;
}

const COUNTER_KEYS = ['bytesReceived', 'bytesSent', 'packetsReceived', 'packetsSent'] as const;

function add(a: EngineCounters, b: EngineCounters): EngineCounters {
  return {
    bytesReceived: a.bytesReceived + b.bytesReceived,
    bytesSent: a.bytesSent + b.bytesSent,
    packetsReceived: a.packetsReceived + b.packetsReceived,
    packetsSent: a.packetsSent + b.packetsSent,
  };
}

function subtract(a: EngineCounters, b: EngineCounters): EngineCounters {
  return {
    bytesReceived: a.bytesReceived - b.bytesReceived,
    bytesSent: a.bytesSent - b.bytesSent,
    packetsReceived: a.packetsReceived - b.packetsReceived,
    packetsSent: a.packetsSent - b.packetsSent,
  };
}

function regressed(current: EngineCounters, previous: EngineCounters): boolean {
  return COUNTER_KEYS.some((key) => current[key] < previous[key]);
}

function rate(current: number, previous: number, elapsedSeconds: number): number {
  if (elapsedSeconds <= 0) return 0;
  return Math.max(0, (current - previous) / elapsedSeconds);
}

export class StatisticsSessionTracker {
  private readonly source: StatisticsSource;
  private readonly onSample: (sample: StatisticsSample) => void;
  private readonly intervalMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private session: OpenSession | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private sampling = false;
  private inFlight = false;

  constructor(options: StatisticsTrackerOptions) {
    this.source = options.source;
    this.onSample = options.onSample;
    this.intervalMs = options.intervalMs ?? DEFAULT_SAMPLE_INTERVAL_MS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger('Statistics');
  }

  get sessionId(): string | null {
    return this.session?.id ?? null;
  }

  get isSampling(): boolean {
    return this.sampling;
  }

  latest(): StatisticsSnapshot | null {
    return this.session?.latest ?? null;
  }

  /** Binds the tracker to a new session. Any previous session is discarded. */
  open(sessionId: string, countersAtOpen: EngineCounters, openedAt: number): void {
    this.stopTimer();
    this.sampling = false;
    this.session = {
      id: sessionId,
      openedAt,
      segmentBase: { ...countersAtOpen },
      carried: { bytesReceived: 0, bytesSent: 0, packetsReceived: 0, packetsSent: 0 },
      previous: { counters: { ...countersAtOpen }, at: openedAt },
      latest: null,
      peakDownloadRate: 0,
      peakUploadRate: 0,
      samples: 0,
    };
  }

  startSampling(): void {
    if (!this.session || this.sampling) return;
    this.sampling = true;
    this.startTimer();
  }

  /** Stops the timer but keeps the session and its last sample as baseline. */
  suspend(): void {
    if (!this.sampling) return;
    this.sampling = false;
    this.stopTimer();
    this.logger.debug('sampling suspended');
  }

  /**
   * Restarts the timer. Pass the counters of a restarted engine run: the totals
   * so far are carried and that run becomes the new baseline, so the first
   * rate is measured within one run.
   */
  resume(restartedWith?: EngineCounters): void {
    const session = this.session;
    if (!session || this.sampling) return;
    if (restartedWith) {
      session.carried = add(session.carried, subtract(session.previous.counters, session.segmentBase));
      session.segmentBase = { ...restartedWith };
      session.previous = { counters: { ...restartedWith }, at: this.now() };
    }
    this.sampling = true;
    this.startTimer();
    this.logger.debug('sampling resumed');
  }

  /**
   * Folds a sample into the open session. Samples for another session, samples
   * arriving while suspended and empty samples are ignored (null is returned).
   */
  ingest(sample: StatisticsSample): StatisticsSnapshot | null {
    const session = this.session;
    if (!session || !this.sampling || sample.sessionId !== session.id || !sample.counters) {
      return null;
    }

    const current = sample.counters;
    const previous = session.previous;
    let downloadRate = 0;
    let uploadRate = 0;

    if (regressed(current, previous.counters)) {
      this.logger.info('engine counters reset, starting a fresh baseline');
      session.carried = add(session.carried, subtract(previous.counters, session.segmentBase));
      session.segmentBase = { ...current };
    } else {
      const elapsedSeconds = (sample.sampledAt - previous.at) / 1000;
      downloadRate = rate(current.bytesReceived, previous.counters.bytesReceived, elapsedSeconds);
      uploadRate = rate(current.bytesSent, previous.counters.bytesSent, elapsedSeconds);
    }

    session.previous = { counters: { ...current }, at: sample.sampledAt };
    session.peakDownloadRate = Math.max(session.peakDownloadRate, downloadRate);
    session.peakUploadRate = Math.max(session.peakUploadRate, uploadRate);
    session.samples++;

    const totals = add(session.carried, subtract(current, session.segmentBase));
    const snapshot: StatisticsSnapshot = Object.freeze({
      sessionId: session.id,
      ...totals,
      downloadRate,
      uploadRate,
      sampledAt: sample.sampledAt,
    });
    session.latest = snapshot;
    return snapshot;
  }

  /** Ends the session and returns its immutable summary. */
  close(closedAt: number): SessionStatisticsSummary | null {
    const session = this.session;
    this.stopTimer();
    this.sampling = false;
    this.session = null;
    if (!session) return null;

    const durationMs = Math.max(0, closedAt - session.openedAt);
    const seconds = durationMs / 1000;
    const latest = session.latest;
    const totals: EngineCounters = latest
      ? {
          bytesReceived: latest.bytesReceived,
          bytesSent: latest.bytesSent,
          packetsReceived: latest.packetsReceived,
          packetsSent: latest.packetsSent,
        }
      : { bytesReceived: 0, bytesSent: 0, packetsReceived: 0, packetsSent: 0 };

    return Object.freeze({
      sessionId: session.id,
      ...totals,
      durationMs,
      averageDownloadRate: seconds > 0 ? totals.bytesReceived / seconds : 0,
      averageUploadRate: seconds > 0 ? totals.bytesSent / seconds : 0,
      peakDownloadRate: session.peakDownloadRate,
      peakUploadRate: session.peakUploadRate,
      samples: session.samples,
    });
  }

  dispose(): void {
    this.stopTimer();
    this.sampling = false;
    this.session = null;
  }

  private startTimer(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.sample();
    }, this.intervalMs);
  }

  private stopTimer(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async sample(): Promise<void> {
    const session = this.session;
    if (!session || this.inFlight) return;
    this.inFlight = true;
    try {
      let counters: EngineCounters | null = null;
      try {
        counters = await this.source.getStatistics();
      } catch (err) {
        this.logger.warn('getStatistics failed:', err instanceof Error ? err.message : err);
      }
      let running = counters !== null;
      if (!running) {
        try {
          running = await this.source.isRunning();
        } catch {
          running = false;
        }
      }
      this.onSample({ sessionId: session.id, counters, running, sampledAt: this.now() });
    } finally {
      this.inFlight = false;
    }
  }
}
