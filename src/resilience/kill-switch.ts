/**
 * Kill switch controller.
 *
 * Tracks the intended kill switch state and drives an OS-level primitive that
 * blocks all non-tunnel traffic. State changes are synchronous; primitive calls
 * run afterwards, one at a time, in the order they were requested. A failing
 * primitive never blocks the caller: it is logged and reported through
 * `onWarning` as a degraded-security notice.
 */

import { ErrCodeKillSwitchUnavailable } from '../coordinator/control-types.js';
import type { ControlError } from '../coordinator/control-types.js';
import { createLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';

export type KillSwitchState = 'disabled' | 'armed-idle' | 'armed-blocking';

export type PrimitiveResult = { ok: true } | { ok: false; reason: string };

/** Platform mechanism that blocks / unblocks non-tunnel traffic. */
export interface KillSwitchPrimitive {
  block(): Promise<PrimitiveResult>;
  unblock(): Promise<PrimitiveResult>;
}

export interface KillSwitchWarning extends ControlError {
  operation: 'block' | 'unblock';
}

export interface KillSwitchControllerOptions {
  primitive: KillSwitchPrimitive;
  enabled: boolean;
  onWarning?: (warning: KillSwitchWarning) => void;
  logger?: Logger;
}

/** Primitive for platforms without a traffic-blocking mechanism. */
export const unavailablePrimitive: KillSwitchPrimitive = {
  block: async () => ({ ok: false, reason: 'kill switch is not supported on this platform' }),
  unblock: async () => ({ ok: true }),
};

export class KillSwitchController {
  private current: KillSwitchState = 'disabled';
  private isEnabled: boolean;
  private blocked = false;
  private chain: Promise<void> = Promise.resolve();
  private readonly primitive: KillSwitchPrimitive;
  private readonly onWarning?: (warning: KillSwitchWarning) => void;
  private readonly logger: Logger;

  constructor(options: KillSwitchControllerOptions) {
    this.primitive = options.primitive;
    this.isEnabled = options.enabled;
    this.onWarning = options.onWarning;
    this.logger = options.logger ?? createLogger('KillSwitch');
  }

  get state(): KillSwitchState {
    return this.current;
  }

  get enabled(): boolean {
    return this.isEnabled;
  }

  /** Whether the primitive confirmed the last block request. */
  get isEnforced(): boolean {
    return this.blocked;
  }

  /**
   * Turns the feature on or off. Turning it off releases any block; turning it
   * on leaves the state `disabled` until the owner arms or engages it.
   */
  setEnabled(enabled: boolean): void {
    if (this.isEnabled === enabled) return;
    this.logger.info(enabled ? 'enabled' : 'disabled');
    this.isEnabled = enabled;
    if (!enabled) {
      this.transition('disabled');
    }
  }

  /** Tunnel is up: ready to block, not blocking. */
  arm(): void {
    this.transition(this.isEnabled ? 'armed-idle' : 'disabled');
  }

  /** Tunnel is expected up but is down: block if enabled. */
  engage(): void {
    this.transition(this.isEnabled ? 'armed-blocking' : 'disabled');
  }

  /** Tunnel intentionally down: release everything. */
  disarm(): void {
    this.transition('disabled');
  }

  /** Resolves once every queued primitive call has completed. */
  whenIdle(): Promise<void> {
    return this.chain;
  }

  private transition(next: KillSwitchState): void {
    const previous = this.current;
    if (previous === next) return;
    this.current = next;
    this.logger.debug(`${previous} -> ${next}`);

    if (next === 'armed-blocking') {
      this.enqueue('block');
    } else if (previous === 'armed-blocking') {
      this.enqueue('unblock');
    }
  }

  private enqueue(operation: 'block' | 'unblock'): void {
    this.chain = this.chain.then(() => this.invoke(operation));
  }

  private async invoke(operation: 'block' | 'unblock'): Promise<void> {
    let result: PrimitiveResult;
    try {
      result =
        operation === 'block' ? await this.primitive.block() : await this.primitive.unblock();
    } catch (err) {
      result = { ok: false, reason: err instanceof Error ? err.message : String(err) };
    }

    if (result.ok) {
      this.blocked = operation === 'block';
      return;
    }

    if (operation === 'unblock') {
      // Traffic may still be blocked; keep reporting it as enforced
      this.blocked = true;
    }
    const warning: KillSwitchWarning = {
      code: ErrCodeKillSwitchUnavailable,
      operation,
      message: `Kill switch ${operation} failed: ${result.reason}`,
    };
    this.logger.warn(warning.message);
    this.onWarning?.(warning);
  }
}
