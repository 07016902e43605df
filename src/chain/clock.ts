// Unix time in seconds.
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

export class ManualClock implements Clock {
  constructor(private current: number = 1_700_000_000) {}

  now(): number {
    return this.current;
  }

  set(seconds: number): void {
    this.current = seconds;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }
}
