/**
 * Connectivity source for plain Node hosts.
 *
 * Polls `os.networkInterfaces()` and reports the network as available when a
 * non-internal, non-tunnel interface has a routable address. The transport is
 * guessed from the interface name.
 */

import * as os from 'node:os';
import type { ConnectivitySource, NetworkState, Transport } from './network-monitor.js';

const POLL_INTERVAL_MS = 2000;

// Our own tunnel (and other VPNs) must not count as upstream connectivity
const TUNNEL_INTERFACE = /^(tun|utun|tap|wg|ppp|ipsec|gif|stf|awdl|llw|docker|veth|br-|virbr|lo)/i;

const TRANSPORT_PATTERNS: ReadonlyArray<{ pattern: RegExp; transport: Transport }> = [
  { pattern: /^(wl|wlan|wifi|ath|ra\d)/i, transport: 'wifi' },
  { pattern: /^(wwan|rmnet|ccmni|pdp_ip|usb|cdc)/i, transport: 'mobile' },
  { pattern: /^(en|eth|em\d|eno|ens|enp)/i, transport: 'ethernet' },
];

export type InterfaceTable = NodeJS.Dict<os.NetworkInterfaceInfo[]>;

export function classifyTransport(name: string): Transport {
  for (const { pattern, transport } of TRANSPORT_PATTERNS) {
    if (pattern.test(name)) return transport;
  }
  return 'unknown';
}

function isRoutable(info: os.NetworkInterfaceInfo): boolean {
  if (info.internal) return false;
  if (info.family === 'IPv4') return !info.address.startsWith('169.254.');
  return !info.address.toLowerCase().startsWith('fe80:');
}

/** Derives connectivity from an interface table; first usable interface wins. */
export function stateFromInterfaces(table: InterfaceTable): NetworkState {
  for (const [name, infos] of Object.entries(table)) {
    if (!infos || TUNNEL_INTERFACE.test(name)) continue;
    if (infos.some(isRoutable)) {
      return { available: true, transport: classifyTransport(name) };
    }
  }
  return { available: false, transport: 'unknown' };
}

export interface InterfaceConnectivityOptions {
  pollIntervalMs?: number;
  readInterfaces?: () => InterfaceTable;
}

export class InterfaceConnectivitySource implements ConnectivitySource {
  private readonly pollIntervalMs: number;
  private readonly readInterfaces: () => InterfaceTable;
  private timer: ReturnType<typeof setInterval> | null = null;
  private last: NetworkState | null = null;

  constructor(options: InterfaceConnectivityOptions = {}) {
    this.pollIntervalMs = options.pollIntervalMs ?? POLL_INTERVAL_MS;
    this.readInterfaces = options.readInterfaces ?? os.networkInterfaces;
  }

  current(): NetworkState {
    return stateFromInterfaces(this.readInterfaces());
  }

  start(onChange: (state: NetworkState) => void): void {
    if (this.timer) return;
    this.last = this.current();
    this.timer = setInterval(() => {
      const next = this.current();
      const previous = this.last;
      this.last = next;
      if (
        previous === null ||
        previous.available !== next.available ||
        previous.transport !== next.transport
      ) {
        onChange(next);
      }
    }, this.pollIntervalMs);
    // Polling alone must not keep the process alive
    this.timer.unref?.();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.last = null;
  }
}
