import { describe, it, expect, vi, beforeEach } from 'vitest';
import { silentLogger } from '../../core/logger.js';
import type { VpnProfile } from '../../config/profile.js';
import { NativeTunnelEngine } from '../native-client.js';
import type { BridgeEventData, BridgeEventName, TunnelBridge } from '../native-client.js';
import type { EngineEvent } from '../types.js';

const profile: VpnProfile = {
  id: 'profile-1',
  name: 'Tokyo 1',
  server: { address: 'vpn.example.com', port: 443 },
  protocol: 'vless',
  authMethod: 'token',
  credentials: { token: 'test-token' },
  protocolOptions: {},
};

function createMockBridge() {
  const handlers = new Map<BridgeEventName, (data: BridgeEventData) => void>();
  const removeHandle = vi.fn(async () => {});
  const bridge = {
    start: vi.fn<TunnelBridge['start']>(async () => ({ ok: true })),
    stop: vi.fn<TunnelBridge['stop']>(async () => ({ ok: true })),
    getStatus: vi.fn<TunnelBridge['getStatus']>(async () => ({ running: true })),
    getStatistics: vi.fn<TunnelBridge['getStatistics']>(async () => ({
      stats: { bytesReceived: 10, bytesSent: 5, packetsReceived: 1, packetsSent: 1 },
    })),
    addListener: vi.fn<TunnelBridge['addListener']>(async (eventName, handler) => {
      handlers.set(eventName, handler);
      return { remove: removeHandle };
    }),
  };

  return {
    bridge,
    removeHandle,
    emit(eventName: BridgeEventName, data: BridgeEventData) {
      handlers.get(eventName)?.(data);
    },
  };
}

describe('NativeTunnelEngine', () => {
  let mock: ReturnType<typeof createMockBridge>;
  let engine: NativeTunnelEngine;

  beforeEach(() => {
    mock = createMockBridge();
    engine = new NativeTunnelEngine(mock.bridge, silentLogger);
  });

  it('passes the profile as JSON and a tun fd', async () => {
    expect(await engine.start(profile, { kind: 'fd', fd: 42 })).toBe(true);
    expect(mock.bridge.start).toHaveBeenCalledWith({ config: JSON.stringify(profile), tunFd: 42 });
  });

  it('passes a tun device name', async () => {
    await engine.start(profile, { kind: 'device', name: 'utun4' });
    expect(mock.bridge.start).toHaveBeenCalledWith({ config: JSON.stringify(profile), tunName: 'utun4' });
  });

  it('keeps the bridge error on a refused start', async () => {
    mock.bridge.start.mockResolvedValueOnce({ ok: false, error: 'permission denied' });
    expect(await engine.start(profile, { kind: 'fd', fd: 42 })).toBe(false);
    expect(engine.getLastError()).toBe('permission denied');
  });

  it('maps stop, status and statistics', async () => {
    expect(await engine.stop()).toBe(true);
    expect(await engine.isRunning()).toBe(true);
    expect(await engine.getStatistics()).toEqual({
      bytesReceived: 10,
      bytesSent: 5,
      packetsReceived: 1,
      packetsSent: 1,
    });

    mock.bridge.getStatistics.mockResolvedValueOnce({});
    expect(await engine.getStatistics()).toBeNull();
  });

  it('forwards bridge events to subscribers', async () => {
    const events: EngineEvent[] = [];
    engine.subscribe((e) => events.push(e));

    mock.emit('engineStateChange', { running: false });
    mock.emit('engineCrashed', { message: 'segfault in tunnel core' });
    mock.emit('engineCrashed', {});

    expect(events).toEqual([
      { type: 'state_change', running: false },
      { type: 'crashed', message: 'segfault in tunnel core' },
      { type: 'crashed', message: 'engine crashed' },
    ]);
  });

  it('registers bridge listeners once and removes them with the last subscriber', async () => {
    const first = engine.subscribe(() => {});
    const second = engine.subscribe(() => {});
    expect(mock.bridge.addListener).toHaveBeenCalledTimes(2);
    // let the listener handles arrive
    await new Promise((resolve) => setTimeout(resolve, 0));

    first();
    expect(mock.removeHandle).not.toHaveBeenCalled();
    second();
    expect(mock.removeHandle).toHaveBeenCalledTimes(2);
  });
});
