import { describe, it, expect, vi } from 'vitest';
import { silentLogger } from '../../core/logger.js';
import { KillSwitchController, unavailablePrimitive } from '../kill-switch.js';
import type { KillSwitchPrimitive, KillSwitchWarning } from '../kill-switch.js';

function createPrimitive(overrides: Partial<KillSwitchPrimitive> = {}) {
  const block: KillSwitchPrimitive['block'] = overrides.block ?? (async () => ({ ok: true }));
  const unblock: KillSwitchPrimitive['unblock'] = overrides.unblock ?? (async () => ({ ok: true }));
  return { block: vi.fn(block), unblock: vi.fn(unblock) };
}

describe('KillSwitchController', () => {
  it('starts disabled', () => {
    const ks = new KillSwitchController({ primitive: createPrimitive(), enabled: true, logger: silentLogger });
    expect(ks.state).toBe('disabled');
    expect(ks.isEnforced).toBe(false);
  });

  it('arm -> engage -> arm blocks then unblocks', async () => {
    const primitive = createPrimitive();
    const ks = new KillSwitchController({ primitive, enabled: true, logger: silentLogger });

    ks.arm();
    expect(ks.state).toBe('armed-idle');
    expect(primitive.block).not.toHaveBeenCalled();

    ks.engage();
    expect(ks.state).toBe('armed-blocking');
    await ks.whenIdle();
    expect(primitive.block).toHaveBeenCalledTimes(1);
    expect(ks.isEnforced).toBe(true);

    ks.arm();
    expect(ks.state).toBe('armed-idle');
    await ks.whenIdle();
    expect(primitive.unblock).toHaveBeenCalledTimes(1);
    expect(ks.isEnforced).toBe(false);
  });

  it('never blocks when disabled by configuration', async () => {
    const primitive = createPrimitive();
    const ks = new KillSwitchController({ primitive, enabled: false, logger: silentLogger });

    ks.arm();
    expect(ks.state).toBe('disabled');
    ks.engage();
    expect(ks.state).toBe('disabled');
    await ks.whenIdle();
    expect(primitive.block).not.toHaveBeenCalled();
  });

  it('disarm releases a block', async () => {
    const primitive = createPrimitive();
    const ks = new KillSwitchController({ primitive, enabled: true, logger: silentLogger });
    ks.engage();
    ks.disarm();
    expect(ks.state).toBe('disabled');
    await ks.whenIdle();
    expect(primitive.block).toHaveBeenCalledTimes(1);
    expect(primitive.unblock).toHaveBeenCalledTimes(1);
  });

  it('runs primitive calls one at a time in request order', async () => {
    const calls: string[] = [];
    let releaseBlock: () => void = () => {};
    const primitive = createPrimitive({
      block: () =>
        new Promise((resolve) => {
          calls.push('block:start');
          releaseBlock = () => {
            calls.push('block:end');
            resolve({ ok: true });
          };
        }),
      unblock: async () => {
        calls.push('unblock');
        return { ok: true };
      },
    });
    const ks = new KillSwitchController({ primitive, enabled: true, logger: silentLogger });

    ks.engage();
    ks.disarm();
    await Promise.resolve();
    await Promise.resolve();
    expect(calls).toEqual(['block:start']);

    releaseBlock();
    await ks.whenIdle();
    expect(calls).toEqual(['block:start', 'block:end', 'unblock']);
  });

  it('reports a failed block as a warning without throwing', async () => {
    const warnings: KillSwitchWarning[] = [];
    const ks = new KillSwitchController({
      primitive: unavailablePrimitive,
      enabled: true,
      onWarning: (w) => warnings.push(w),
      logger: silentLogger,
    });

    ks.engage();
    await ks.whenIdle();

    expect(ks.state).toBe('armed-blocking');
    expect(ks.isEnforced).toBe(false);
    expect(warnings).toEqual([
      {
        code: 520,
        operation: 'block',
        message: 'Kill switch block failed: kill switch is not supported on this platform',
      },
    ]);
  });

  it('converts a throwing primitive into a warning', async () => {
    const onWarning = vi.fn();
    const primitive = createPrimitive({
      block: async () => {
        throw new Error('firewall unavailable');
      },
    });
    const ks = new KillSwitchController({ primitive, enabled: true, onWarning, logger: silentLogger });

    ks.engage();
    await ks.whenIdle();

    expect(onWarning).toHaveBeenCalledWith({
      code: 520,
      operation: 'block',
      message: 'Kill switch block failed: firewall unavailable',
    });
  });

  it('keeps reporting enforcement when unblock fails', async () => {
    const onWarning = vi.fn();
    const primitive = createPrimitive({ unblock: async () => ({ ok: false, reason: 'rule busy' }) });
    const ks = new KillSwitchController({ primitive, enabled: true, onWarning, logger: silentLogger });

    ks.engage();
    ks.disarm();
    await ks.whenIdle();

    expect(ks.isEnforced).toBe(true);
    expect(onWarning).toHaveBeenCalledWith(
      expect.objectContaining({ operation: 'unblock', message: 'Kill switch unblock failed: rule busy' })
    );
  });

  it('setEnabled(false) drops to disabled and releases the block', async () => {
    const primitive = createPrimitive();
    const ks = new KillSwitchController({ primitive, enabled: true, logger: silentLogger });
    ks.engage();
    ks.setEnabled(false);
    expect(ks.enabled).toBe(false);
    expect(ks.state).toBe('disabled');
    await ks.whenIdle();
    expect(primitive.unblock).toHaveBeenCalledTimes(1);

    ks.setEnabled(true);
    expect(ks.state).toBe('disabled');
    ks.engage();
    expect(ks.state).toBe('armed-blocking');
  });
});
