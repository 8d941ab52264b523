export interface Clock {
  now: () => number; // milliseconds epoch
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Manually advanced clock for tests and replays.
 */
export class ManualClock implements Clock {
  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  set(ms: number): void {
    this.current = ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}
