import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { VpnProfile } from '../../config/profile.js';
import { MockTunnelEngine } from '../mock-client.js';
import type { EngineEvent } from '../types.js';

const profile: VpnProfile = {
  id: 'profile-1',
  name: 'Tokyo 1',
  server: { address: 'vpn.example.com', port: 443 },
  protocol: 'shadowsocks',
  authMethod: 'password',
  credentials: { password: 'test-secret' },
  protocolOptions: {},
};

describe('MockTunnelEngine', () => {
  let engine: MockTunnelEngine;

  beforeEach(() => {
    engine = new MockTunnelEngine();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('records start calls and runs', async () => {
    expect(await engine.start(profile, { kind: 'fd', fd: 3 })).toBe(true);
    expect(engine.startCalls).toEqual([{ profile, tun: { kind: 'fd', fd: 3 } }]);
    expect(await engine.isRunning()).toBe(true);
  });

  it('plays queued start results before the default', async () => {
    engine.queueStartResults(false, true);
    engine.setDefaultStartResult(false);
    const tun = { kind: 'fd', fd: 3 } as const;

    expect(await engine.start(profile, tun)).toBe(false);
    expect(engine.getLastError()).toBe('mock start failure');
    expect(await engine.start(profile, tun)).toBe(true);
    expect(engine.getLastError()).toBeNull();
    expect(await engine.start(profile, tun)).toBe(false);
  });

  it('throws the configured start error', async () => {
    engine.setStartError(new Error('tun busy'));
    await expect(engine.start(profile, { kind: 'fd', fd: 3 })).rejects.toThrow('tun busy');
    expect(engine.getLastError()).toBe('tun busy');
  });

  it('delays start when asked', async () => {
    vi.useFakeTimers();
    engine.setStartDelay(1000);
    let done = false;
    void engine.start(profile, { kind: 'fd', fd: 3 }).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    expect(done).toBe(true);
  });

  it('counts stops and honours the stop result', async () => {
    await engine.start(profile, { kind: 'fd', fd: 3 });
    engine.setStopResult(false);
    expect(await engine.stop()).toBe(false);
    expect(await engine.isRunning()).toBe(true);

    engine.setStopResult(true);
    expect(await engine.stop()).toBe(true);
    expect(engine.stopCalls).toBe(2);
    expect(engine.isStarted).toBe(false);
  });

  it('reports scripted statistics', async () => {
    expect(await engine.getStatistics()).toEqual({
      bytesReceived: 0,
      bytesSent: 0,
      packetsReceived: 0,
      packetsSent: 0,
    });
    engine.setCounters({ bytesReceived: 5, bytesSent: 6, packetsReceived: 1, packetsSent: 2 });
    expect(await engine.getStatistics()).toEqual({ bytesReceived: 5, bytesSent: 6, packetsReceived: 1, packetsSent: 2 });
    engine.setStatistics(null);
    expect(await engine.getStatistics()).toBeNull();
  });

  it('simulateCrash stops the engine and notifies subscribers', async () => {
    await engine.start(profile, { kind: 'fd', fd: 3 });
    const events: EngineEvent[] = [];
    const unsubscribe = engine.subscribe((e) => events.push(e));

    engine.simulateCrash('boom');
    unsubscribe();
    engine.simulateCrash('ignored');

    expect(events).toEqual([{ type: 'crashed', message: 'boom' }]);
    expect(await engine.isRunning()).toBe(false);
  });
});
