import { Clock } from './clock';

const MINUTE_MS = 60 * 1000;

/**
 * Settable clock for deterministic window and future-timestamp tests.
 * Returns a fresh Date on every call so callers cannot mutate its state.
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start: Date | string = '2024-01-15T12:00:00.000Z') {
    this.current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advanceMinutes(minutes: number): void {
    this.current += minutes * MINUTE_MS;
  }

  /** Instant `minutes` before the current time */
  minutesAgo(minutes: number): Date {
    return new Date(this.current - minutes * MINUTE_MS);
  }
}
