// Time source for the turn-taking state machine. Injected so tests can drive
// pause tiers and silence bounds without real time passing.

export interface Clock {
  /** Milliseconds; only differences between readings are meaningful. */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/** A clock that only moves when told to. */
export class ManualClock implements Clock {
  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): number {
    this.current += ms;
    return this.current;
  }

  set(ms: number): void {
    this.current = ms;
  }
}
