import type { NetworkInterfaceInfo } from 'node:os';
import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  InterfaceConnectivitySource,
  classifyTransport,
  stateFromInterfaces,
} from '../interface-connectivity.js';
import type { InterfaceTable } from '../interface-connectivity.js';

function ipv4(address: string, internal = false): NetworkInterfaceInfo {
  return {
    address,
    netmask: '255.255.255.0',
    family: 'IPv4',
    mac: '00:00:00:00:00:00',
    internal,
    cidr: `${address}/24`,
  };
}

describe('classifyTransport', () => {
  it.each([
    ['wlan0', 'wifi'],
    ['wlp3s0', 'wifi'],
    ['eth0', 'ethernet'],
    ['en0', 'ethernet'],
    ['enp0s31f6', 'ethernet'],
    ['rmnet_data0', 'mobile'],
    ['pdp_ip0', 'mobile'],
    ['foo1', 'unknown'],
  ])('%s -> %s', (name, expected) => {
    expect(classifyTransport(name)).toBe(expected);
  });
});

describe('stateFromInterfaces', () => {
  it('is unavailable with only loopback and tunnels', () => {
    const table: InterfaceTable = {
      lo: [ipv4('127.0.0.1', true)],
      tun0: [ipv4('10.8.0.2')],
      utun3: [ipv4('10.9.0.2')],
    };
    expect(stateFromInterfaces(table)).toEqual({ available: false, transport: 'unknown' });
  });

  it('ignores link-local addresses', () => {
    expect(stateFromInterfaces({ eth0: [ipv4('169.254.10.3')] })).toEqual({
      available: false,
      transport: 'unknown',
    });
  });

  it('picks the first usable interface', () => {
    const table: InterfaceTable = {
      tun0: [ipv4('10.8.0.2')],
      wlan0: [ipv4('192.168.1.20')],
      eth0: [ipv4('192.168.2.20')],
    };
    expect(stateFromInterfaces(table)).toEqual({ available: true, transport: 'wifi' });
  });
});

describe('InterfaceConnectivitySource', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('polls and reports changes only', () => {
    vi.useFakeTimers();
    let table: InterfaceTable = { eth0: [ipv4('192.168.2.20')] };
    const source = new InterfaceConnectivitySource({ pollIntervalMs: 1000, readInterfaces: () => table });
    const onChange = vi.fn();

    source.start(onChange);
    expect(source.current()).toEqual({ available: true, transport: 'ethernet' });

    vi.advanceTimersByTime(1000);
    expect(onChange).not.toHaveBeenCalled();

    table = {};
    vi.advanceTimersByTime(1000);
    expect(onChange).toHaveBeenCalledWith({ available: false, transport: 'unknown' });

    table = { wlan0: [ipv4('192.168.1.20')] };
    vi.advanceTimersByTime(1000);
    expect(onChange).toHaveBeenLastCalledWith({ available: true, transport: 'wifi' });
    expect(onChange).toHaveBeenCalledTimes(2);

    source.stop();
    table = {};
    vi.advanceTimersByTime(5000);
    expect(onChange).toHaveBeenCalledTimes(2);
  });
});
