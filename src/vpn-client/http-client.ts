import { z } from 'zod';
import type { VpnProfile } from '../config/profile.js';
import { createLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import type { EngineCounters, EngineEvent, TunHandle, TunnelEngineClient } from './types.js';

const envelopeSchema = z.object({
  code: z.number(),
  message: z.string().default(''),
  data: z.unknown().optional(),
});

type ApiResponse = z.infer<typeof envelopeSchema>;

const countersSchema = z.object({
  bytesReceived: z.number().nonnegative(),
  bytesSent: z.number().nonnegative(),
  packetsReceived: z.number().nonnegative(),
  packetsSent: z.number().nonnegative(),
});

const statusSchema = z.object({
  running: z.boolean(),
  error: z.string().optional(),
});

export interface HttpTunnelEngineOptions {
  baseUrl: string;
  /** Status poll period while someone is subscribed. */
  pollIntervalMs?: number;
  logger?: Logger;
}

/**
 * Engine running as a local daemon, controlled over its HTTP API
 * (POST <baseUrl>/api/core with { action, params }).
 */
export class HttpTunnelEngine implements TunnelEngineClient {
  readonly platform = 'http' as const;
  private readonly baseUrl: string;
  private readonly pollIntervalMs: number;
  private readonly logger: Logger;
  private listeners: Set<(event: EngineEvent) => void> = new Set();
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private pollInFlight = false;
  private lastRunning: boolean | null = null;
  private stopRequested = false;
  private lastError: string | null = null;

  constructor(options: HttpTunnelEngineOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.pollIntervalMs = options.pollIntervalMs ?? 2000;
    this.logger = options.logger ?? createLogger('HttpEngine');
  }

  async start(profile: VpnProfile, tun: TunHandle): Promise<boolean> {
    this.stopRequested = false;
    const resp = await this.coreRequest('up', { profile, tun });
    if (resp.code !== 0) {
      this.lastError = resp.message || `engine returned code ${resp.code}`;
      return false;
    }
    this.lastError = null;
    this.lastRunning = true;
    return true;
  }

  async stop(): Promise<boolean> {
    this.stopRequested = true;
    const resp = await this.coreRequest('down');
    if (resp.code !== 0) {
      this.lastError = resp.message || `engine returned code ${resp.code}`;
      return false;
    }
    this.lastRunning = false;
    return true;
  }

  async isRunning(): Promise<boolean> {
    const resp = await this.coreRequest('status');
    const parsed = statusSchema.safeParse(resp.data);
    return parsed.success ? parsed.data.running : false;
  }

  async getStatistics(): Promise<EngineCounters | null> {
    const resp = await this.coreRequest('stats');
    if (resp.code !== 0) return null;
    const parsed = countersSchema.safeParse(resp.data);
    return parsed.success ? parsed.data : null;
  }

  getLastError(): string | null {
    return this.lastError;
  }

  subscribe(listener: (event: EngineEvent) => void): () => void {
    this.listeners.add(listener);
    this.startPolling();

    return () => {
      this.listeners.delete(listener);
      if (this.listeners.size === 0) {
        this.stopPolling();
      }
    };
  }

  destroy(): void {
    this.stopPolling();
    this.listeners.clear();
    this.lastRunning = null;
  }

  private startPolling(): void {
    if (this.pollTimer) return;

    const poll = async () => {
      if (this.pollInFlight) return;
      this.pollInFlight = true;
      try {
        const resp = await this.coreRequest('status');
        const parsed = statusSchema.safeParse(resp.data);
        if (!parsed.success) return;
        const { running, error } = parsed.data;
        if (running === this.lastRunning) return;
        const wasRunning = this.lastRunning;
        this.lastRunning = running;
        this.emit({ type: 'state_change', running });
        // Stopped without anyone asking: the daemon lost its engine
        if (wasRunning && !running && !this.stopRequested) {
          this.emit({ type: 'crashed', message: error ?? 'engine stopped unexpectedly' });
        }
      } catch (e) {
        this.logger.warn('status poll failed:', e instanceof Error ? e.message : e);
      } finally {
        this.pollInFlight = false;
      }
    };

    this.pollTimer = setInterval(() => {
      void poll();
    }, this.pollIntervalMs);
  }

  private stopPolling(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
  }

  private emit(event: EngineEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  private async coreRequest(action: string, params?: Record<string, unknown>): Promise<ApiResponse> {
    const body: Record<string, unknown> = { action };
    if (params) {
      body.params = params;
    }

    const resp = await fetch(`${this.baseUrl}/api/core`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

    if (!resp.ok) {
      throw new Error(`Engine API error: ${resp.status} ${resp.statusText}`);
    }

    const parsed = envelopeSchema.safeParse(await resp.json());
    if (!parsed.success) {
      throw new Error(`Engine API error: malformed response to '${action}'`);
    }
    return parsed.data;
  }
}
