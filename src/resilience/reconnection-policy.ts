/**
 * Reconnection backoff.
 *
 * Pure computation over the attempt number (1-based) and the policy settings;
 * no timers live here. Both profiles are capped:
 * - linear:      min(baseDelay * attempt, maxDelay)
 * - exponential: min(baseDelay * multiplier^(attempt - 1), maxDelay)
 */

export type BackoffProfile = 'linear' | 'exponential';

export interface ReconnectionPolicySettings {
  profile: BackoffProfile;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Only used by the exponential profile. */
  multiplier: number;
  maxAttempts: number;
}

export const EXPONENTIAL_POLICY: Readonly<ReconnectionPolicySettings> = Object.freeze({
  profile: 'exponential',
  baseDelayMs: 2_000,
  maxDelayMs: 5 * 60_000,
  multiplier: 1.5,
  maxAttempts: 10,
});

export const LINEAR_POLICY: Readonly<ReconnectionPolicySettings> = Object.freeze({
  profile: 'linear',
  baseDelayMs: 2_000,
  maxDelayMs: 30_000,
  multiplier: 1,
  maxAttempts: 5,
});

export function defaultPolicyFor(profile: BackoffProfile): ReconnectionPolicySettings {
  return { ...(profile === 'linear' ? LINEAR_POLICY : EXPONENTIAL_POLICY) };
}

export class ReconnectionPolicy {
  readonly settings: Readonly<ReconnectionPolicySettings>;

  constructor(settings: ReconnectionPolicySettings = EXPONENTIAL_POLICY) {
    if (settings.baseDelayMs <= 0) {
      throw new RangeError('baseDelayMs must be positive');
    }
    if (settings.maxDelayMs < settings.baseDelayMs) {
      throw new RangeError('maxDelayMs must be >= baseDelayMs');
    }
    if (settings.profile === 'exponential' && settings.multiplier < 1) {
      throw new RangeError('multiplier must be >= 1');
    }
    if (!Number.isInteger(settings.maxAttempts) || settings.maxAttempts < 1) {
      throw new RangeError('maxAttempts must be a positive integer');
    }
    this.settings = Object.freeze({ ...settings });
  }

  get maxAttempts(): number {
    return this.settings.maxAttempts;
  }

  /** Delay before the given attempt. Attempts below 1 count as attempt 1. */
  delay(attempt: number): number {
    const n = Math.max(1, Math.floor(attempt));
    const { profile, baseDelayMs, maxDelayMs, multiplier } = this.settings;
    const raw =
      profile === 'linear'
        ? baseDelayMs * n
        : baseDelayMs * Math.pow(multiplier, n - 1);
    // Math.pow overflows to Infinity for large n; min() still caps it
    return Math.round(Math.min(raw, maxDelayMs));
  }

  shouldGiveUp(attempt: number): boolean {
    return attempt >= this.settings.maxAttempts;
  }
}
