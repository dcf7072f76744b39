#!/usr/bin/env node
/**
 * tunnelward CLI entry point.
 *
 * Loads settings, reads a profile file, wires engine, network monitor and kill
 * switch into a coordinator, connects and keeps the tunnel up until SIGINT or
 * SIGTERM.
 *
 *   tunnelward [--config <file>] [--tun <device>] <profile.json>
 */

import * as fs from 'node:fs';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';

import { parseProfile } from './config/profile.js';
import { DEFAULT_CONFIG_PATH, loadSettings } from './config/settings.js';
import type { Settings } from './config/settings.js';
import { ConnectionCoordinator } from './coordinator/connection-coordinator.js';
import { createLogger } from './core/logger.js';
import type { Logger } from './core/logger.js';
import { InterfaceConnectivitySource } from './resilience/interface-connectivity.js';
import { unavailablePrimitive } from './resilience/kill-switch.js';
import type { KillSwitchPrimitive } from './resilience/kill-switch.js';
import { NetworkMonitorAdapter } from './resilience/network-monitor.js';
import type { ConnectivitySource } from './resilience/network-monitor.js';
import { describeSnapshot } from './utils/format.js';
import { createTunnelEngine } from './vpn-client/index.js';
import type { TunHandle, TunnelEngineClient } from './vpn-client/types.js';

export const DEFAULT_TUN_DEVICE = 'tun0';

export interface AppOverrides {
  engine?: TunnelEngineClient;
  connectivity?: ConnectivitySource;
  killSwitchPrimitive?: KillSwitchPrimitive;
  tun?: TunHandle;
  logger?: Logger;
}

export interface App {
  coordinator: ConnectionCoordinator;
  engine: TunnelEngineClient;
  monitor: NetworkMonitorAdapter;
}

/**
 * Builds the object graph for the given settings.
 *
 * Extracted from main() so tests can wire the app with fakes and without
 * touching the process.
 */
export function createApp(settings: Settings, overrides: AppOverrides = {}): App {
  const engine =
    overrides.engine ??
    createTunnelEngine({ platform: settings.engine.platform, baseUrl: settings.engine.baseUrl });
  const monitor = new NetworkMonitorAdapter({
    source:
      overrides.connectivity ??
      new InterfaceConnectivitySource({ pollIntervalMs: settings.network.pollIntervalMs }),
    debounceMs: settings.network.debounceMs,
    logger: overrides.logger,
  });
  const coordinator = new ConnectionCoordinator({
    engine,
    monitor,
    killSwitchPrimitive: overrides.killSwitchPrimitive ?? unavailablePrimitive,
    tun: overrides.tun ?? { kind: 'device', name: DEFAULT_TUN_DEVICE },
    settings,
    logger: overrides.logger,
  });
  return { coordinator, engine, monitor };
}

export interface CliArgs {
  configPath: string;
  profilePath: string;
  tun: TunHandle;
}

/** @throws {Error} when the profile path is missing or an option is unknown */
export function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      config: { type: 'string', short: 'c' },
      tun: { type: 'string', short: 't' },
    },
    allowPositionals: true,
  });
  const profilePath = positionals[0];
  if (!profilePath) {
    throw new Error('Usage: tunnelward [--config <file>] [--tun <device>] <profile.json>');
  }
  return {
    configPath: values.config ?? DEFAULT_CONFIG_PATH,
    profilePath,
    tun: { kind: 'device', name: values.tun ?? DEFAULT_TUN_DEVICE },
  };
}

async function main(): Promise<void> {
  const logger = createLogger('tunnelward');
  const args = parseCliArgs(process.argv.slice(2));
  const settings = await loadSettings(args.configPath);
  const profile = parseProfile(fs.readFileSync(args.profilePath, 'utf-8'));

  const { coordinator, engine } = createApp(settings, { tun: args.tun });
  coordinator.onStateChange(() => logger.info(describeSnapshot(coordinator.getStatus())));
  coordinator.subscribe((snapshot) => {
    if (snapshot.statistics) logger.debug(describeSnapshot(snapshot));
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, disconnecting`);
    coordinator
      .disconnect()
      .then((snapshot) => {
        coordinator.dispose();
        engine.destroy();
        process.exit(snapshot.state === 'disconnected' ? 0 : 1);
      })
      .catch((err: unknown) => {
        logger.error('shutdown failed:', err);
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  const result = await coordinator.connect(profile);
  if (result.state !== 'connected' && !shuttingDown) {
    coordinator.dispose();
    engine.destroy();
    process.exit(1);
  }
}

/**
 * Whether the module at `moduleUrl` is the script node was started with.
 * npm links `bin` entries, so the script path is resolved through symlinks.
 */
export function isEntryPoint(moduleUrl: string, scriptPath: string | undefined): boolean {
  if (scriptPath === undefined) return false;
  try {
    return moduleUrl === pathToFileURL(fs.realpathSync(scriptPath)).href;
  } catch {
    return false;
  }
}

// Only run main() when this file is the entry point, not when imported by tests
if (isEntryPoint(import.meta.url, process.argv[1])) {
  main().catch((err: unknown) => {
    console.error('tunnelward failed:', err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
