import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { defaultSettings, loadSettings, resolveSettings } from '../settings.js';

const tempDirs: string[] = [];

// Helper: create a temp TOML file with given content
function writeTempToml(content: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tunnelward-test-'));
  tempDirs.push(dir);
  const filePath = path.join(dir, 'config.toml');
  fs.writeFileSync(filePath, content);
  return filePath;
}

const FULL_TOML = `
[reconnection]
profile = "linear"
max_attempts = 3
auto_reconnect = false
settle_confirmations = 4

[kill_switch]
enabled = false

[statistics]
sample_interval_ms = 2000

[network]
debounce_ms = 250

[engine]
platform = "mock"
start_timeout_ms = 5000
`;

describe('settings', () => {
  afterEach(() => {
    for (const dir of tempDirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  describe('defaultSettings', () => {
    it('uses the exponential profile and built-in defaults', () => {
      expect(defaultSettings()).toEqual({
        reconnection: {
          profile: 'exponential',
          baseDelayMs: 2000,
          maxDelayMs: 300000,
          multiplier: 1.5,
          maxAttempts: 10,
          autoReconnect: true,
          settleConfirmations: 2,
          settleIntervalMs: 1000,
          retryOnNetworkRestore: true,
        },
        killSwitch: { enabled: true },
        statistics: { sampleIntervalMs: 1000 },
        network: { debounceMs: 500, pollIntervalMs: 2000 },
        engine: {
          platform: 'http',
          baseUrl: 'http://127.0.0.1:9090',
          startTimeoutMs: 30000,
          stopTimeoutMs: 10000,
        },
      });
    });
  });

  describe('resolveSettings', () => {
    it('fills unset policy numbers from the chosen profile', () => {
      const settings = resolveSettings({ reconnection: { profile: 'linear', max_attempts: 8 } });
      expect(settings.reconnection).toMatchObject({
        profile: 'linear',
        baseDelayMs: 2000,
        maxDelayMs: 30000,
        multiplier: 1,
        maxAttempts: 8,
      });
    });

    it('lists every invalid field', () => {
      expect(() =>
        resolveSettings({ reconnection: { max_attempts: 0 }, engine: { platform: 'carrier-pigeon' } })
      ).toThrow(/Configuration invalid:\n {2}- reconnection\.max_attempts: .*\n {2}- engine\.platform: /);
    });

    it('rejects a max delay below the base delay', () => {
      expect(() => resolveSettings({ reconnection: { base_delay_ms: 5000, max_delay_ms: 1000 } })).toThrow(
        'Configuration invalid:\n  - reconnection.max_delay_ms: must be >= base_delay_ms'
      );
    });
  });

  describe('loadSettings', () => {
    it('loads values from a TOML file', async () => {
      const settings = await loadSettings(writeTempToml(FULL_TOML), {});

      expect(settings.reconnection).toEqual({
        profile: 'linear',
        baseDelayMs: 2000,
        maxDelayMs: 30000,
        multiplier: 1,
        maxAttempts: 3,
        autoReconnect: false,
        settleConfirmations: 4,
        settleIntervalMs: 1000,
        retryOnNetworkRestore: true,
      });
      expect(settings.killSwitch.enabled).toBe(false);
      expect(settings.statistics.sampleIntervalMs).toBe(2000);
      expect(settings.network).toEqual({ debounceMs: 250, pollIntervalMs: 2000 });
      expect(settings.engine.platform).toBe('mock');
      expect(settings.engine.startTimeoutMs).toBe(5000);
    });

    it('env vars override TOML values', async () => {
      const settings = await loadSettings(writeTempToml(FULL_TOML), {
        TUNNELWARD_RECONNECT_PROFILE: 'exponential',
        TUNNELWARD_MAX_ATTEMPTS: '6',
        TUNNELWARD_AUTO_RECONNECT: 'true',
        TUNNELWARD_KILL_SWITCH: '1',
        TUNNELWARD_ENGINE: 'http',
        TUNNELWARD_ENGINE_URL: 'http://127.0.0.1:7000',
      });

      expect(settings.reconnection.profile).toBe('exponential');
      expect(settings.reconnection.maxDelayMs).toBe(300000);
      expect(settings.reconnection.maxAttempts).toBe(6);
      expect(settings.reconnection.autoReconnect).toBe(true);
      expect(settings.killSwitch.enabled).toBe(true);
      expect(settings.engine.platform).toBe('http');
      expect(settings.engine.baseUrl).toBe('http://127.0.0.1:7000');
      // Untouched TOML values survive
      expect(settings.reconnection.settleConfirmations).toBe(4);
    });

    it('falls back to defaults when the file does not exist', async () => {
      const missing = path.join(os.tmpdir(), 'tunnelward-missing', 'nope.toml');
      const settings = await loadSettings(missing, {});
      expect(settings).toEqual(defaultSettings());
    });

    it('applies env vars without a file', async () => {
      const missing = path.join(os.tmpdir(), 'tunnelward-missing', 'nope.toml');
      const settings = await loadSettings(missing, { TUNNELWARD_KILL_SWITCH: 'false' });
      expect(settings.killSwitch.enabled).toBe(false);
    });

    it('reports a malformed file with its path', async () => {
      const filePath = writeTempToml('[reconnection\nprofile = ');
      await expect(loadSettings(filePath, {})).rejects.toThrow(`Failed to parse config file at ${filePath}`);
    });

    it('rejects an env value of the wrong kind', async () => {
      const missing = path.join(os.tmpdir(), 'tunnelward-missing', 'nope.toml');
      await expect(loadSettings(missing, { TUNNELWARD_MAX_ATTEMPTS: 'many' })).rejects.toThrow(
        /reconnection\.max_attempts/
      );
    });
  });
});
