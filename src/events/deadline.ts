import { ConfigurationError } from '../errors.js';

export function assertPositiveSeconds(seconds: number, name: string): void {
  if (typeof seconds !== 'number' || !Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigurationError(`${name} must be a positive number of seconds, got ${String(seconds)}`);
  }
}

/**
 * One-shot timer. `expired` resolves exactly once when the duration elapses,
 * and never resolves if `cancel()` ran first.
 */
export class Deadline {
  readonly expiresAt: number;
  readonly expired: Promise<void>;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private state: 'pending' | 'fired' | 'cancelled' = 'pending';

  private constructor(durationMs: number) {
    this.expiresAt = Date.now() + durationMs;
    this.expired = new Promise<void>((resolve) => {
      this.timer = setTimeout(() => {
        this.timer = null;
        if (this.state !== 'pending') return;
        this.state = 'fired';
        resolve();
      }, durationMs);
    });
  }

  /** Throws `ConfigurationError` for zero, negative or non-finite durations. */
  static after(seconds: number, name = 'timeoutSeconds'): Deadline {
    assertPositiveSeconds(seconds, name);
    return new Deadline(seconds * 1000);
  }

  get hasFired(): boolean {
    return this.state === 'fired';
  }

  get isCancelled(): boolean {
    return this.state === 'cancelled';
  }

  remainingMs(now = Date.now()): number {
    if (this.state !== 'pending') return 0;
    return Math.max(0, this.expiresAt - now);
  }

  /** Idempotent; a no-op after the deadline fired. */
  cancel(): void {
    if (this.state !== 'pending') return;
    this.state = 'cancelled';
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
