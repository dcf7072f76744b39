import type { Logger } from '../core/logger.js';
import { HttpTunnelEngine } from './http-client.js';
import { MockTunnelEngine } from './mock-client.js';
import { NativeTunnelEngine } from './native-client.js';
import type { TunnelBridge } from './native-client.js';
import type { EnginePlatform, TunnelEngineClient } from './types.js';

export interface CreateTunnelEngineOptions {
  platform: EnginePlatform;
  /** Daemon control endpoint; required for 'http'. */
  baseUrl?: string;
  /** Host binding; required for 'native'. */
  bridge?: TunnelBridge;
  logger?: Logger;
}

export function createTunnelEngine(options: CreateTunnelEngineOptions): TunnelEngineClient {
  switch (options.platform) {
    case 'http':
      if (!options.baseUrl) {
        throw new Error('baseUrl is required for the http engine');
      }
      return new HttpTunnelEngine({ baseUrl: options.baseUrl, logger: options.logger });
    case 'native':
      if (!options.bridge) {
        throw new Error('A TunnelBridge is required for the native engine');
      }
      return new NativeTunnelEngine(options.bridge, options.logger);
    case 'mock':
      return new MockTunnelEngine();
  }
}

export { HttpTunnelEngine } from './http-client.js';
export { NativeTunnelEngine } from './native-client.js';
export { MockTunnelEngine } from './mock-client.js';
export type { TunnelBridge, BridgeEventName, BridgeEventData, BridgeListenerHandle } from './native-client.js';
export type { TunnelEngineClient, EngineCounters, EngineEvent, EnginePlatform, TunHandle } from './types.js';
export { ZERO_COUNTERS } from './types.js';
