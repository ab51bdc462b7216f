import { Clock, systemClock } from '../domain-types';

const DAY_MS = 24 * 60 * 60 * 1000;

export type SweepFn = (now: Date) => Promise<number>;

export interface SweepSchedulerOptions {
  hourUtc?: number;
  minuteUtc?: number;
  clock?: Clock;
}

// Delay until the next hour:minute UTC strictly after `now`.
export function msUntilNextRun(now: Date, hourUtc: number, minuteUtc: number): number {
  const next = new Date(
    Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate(), hourUtc, minuteUtc, 0, 0)
  );
  if (next.getTime() <= now.getTime()) {
    next.setTime(next.getTime() + DAY_MS);
  }
  return next.getTime() - now.getTime();
}

/**
 * Runs the expiration sweep once a day. Errors are logged and never escape a
 * tick; a tick that starts while another is still running is skipped.
 */
export class SweepScheduler {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private active = false;
  private readonly hourUtc: number;
  private readonly minuteUtc: number;
  private readonly clock: Clock;

  constructor(private sweep: SweepFn, options: SweepSchedulerOptions = {}) {
    this.hourUtc = options.hourUtc ?? 0;
    this.minuteUtc = options.minuteUtc ?? 0;
    this.clock = options.clock ?? systemClock;
    if (!Number.isInteger(this.hourUtc) || this.hourUtc < 0 || this.hourUtc > 23) {
      throw new Error(`SWEEP_HOUR_OUT_OF_RANGE:${this.hourUtc}`);
    }
    if (!Number.isInteger(this.minuteUtc) || this.minuteUtc < 0 || this.minuteUtc > 59) {
      throw new Error(`SWEEP_MINUTE_OUT_OF_RANGE:${this.minuteUtc}`);
    }
  }

  get isStarted(): boolean {
    return this.active;
  }

  start(): void {
    if (this.active) return;
    this.active = true;
    this.arm();
    console.log('[SweepScheduler] Started', { hourUtc: this.hourUtc, minuteUtc: this.minuteUtc });
  }

  stop(): void {
    this.active = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    console.log('[SweepScheduler] Stopped');
  }

  /**
   * One guarded sweep. Resolves to the number of expired propositions, or
   * null when the tick was skipped or failed.
   */
  async runNow(): Promise<number | null> {
    if (this.running) {
      console.log('[SweepScheduler] Sweep already running, skipping tick');
      return null;
    }
    this.running = true;
    try {
      const count = await this.sweep(this.clock());
      console.log('[SweepScheduler] Sweep completed', { expired: count });
      return count;
    } catch (error) {
      console.error('[SweepScheduler] Sweep failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    } finally {
      this.running = false;
    }
  }

  private arm(): void {
    const delay = msUntilNextRun(this.clock(), this.hourUtc, this.minuteUtc);
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, delay);
    this.timer.unref();
  }

  private async tick(): Promise<void> {
    await this.runNow();
    if (this.active) {
      this.arm();
    }
  }
}
