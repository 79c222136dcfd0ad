import type { Clock } from '../../src/auth/clock';

/** 2026-01-15T09:00:00Z */
export const TEST_EPOCH = Date.UTC(2026, 0, 15, 9, 0, 0);

/** A clock that only moves when told to. */
export class ManualClock {
  constructor(private current = TEST_EPOCH) {}

  readonly read: Clock = () => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

export const MINUTE = 60_000;
