import { describe, it, expect, vi } from 'vitest';
import { silentLogger } from '../../core/logger.js';
import { HttpTunnelEngine, MockTunnelEngine, NativeTunnelEngine, createTunnelEngine } from '../index.js';
import type { TunnelBridge } from '../index.js';

function createBridge(): TunnelBridge {
  return {
    start: vi.fn(async () => ({ ok: true })),
    stop: vi.fn(async () => ({ ok: true })),
    getStatus: vi.fn(async () => ({ running: false })),
    getStatistics: vi.fn(async () => ({})),
    addListener: vi.fn(async () => ({ remove: async () => {} })),
  };
}

describe('createTunnelEngine', () => {
  it('creates the http engine for a daemon URL', () => {
    const engine = createTunnelEngine({ platform: 'http', baseUrl: 'http://127.0.0.1:9090', logger: silentLogger });
    expect(engine).toBeInstanceOf(HttpTunnelEngine);
    expect(engine.platform).toBe('http');
    engine.destroy();
  });

  it('requires a baseUrl for http', () => {
    expect(() => createTunnelEngine({ platform: 'http' })).toThrow('baseUrl is required for the http engine');
  });

  it('wraps a host bridge for native', () => {
    const engine = createTunnelEngine({ platform: 'native', bridge: createBridge(), logger: silentLogger });
    expect(engine).toBeInstanceOf(NativeTunnelEngine);
    expect(engine.platform).toBe('native');
  });

  it('requires a bridge for native', () => {
    expect(() => createTunnelEngine({ platform: 'native' })).toThrow(
      'A TunnelBridge is required for the native engine'
    );
  });

  it('returns a fresh mock engine each time', () => {
    const a = createTunnelEngine({ platform: 'mock' });
    const b = createTunnelEngine({ platform: 'mock' });
    expect(a).toBeInstanceOf(MockTunnelEngine);
    expect(a).not.toBe(b);
  });
});
