// ---------------------------------------------------------------------------
// Clock. Every deadline in the gateway is evaluated against an injected
// clock so expiry can be driven from tests.
// ---------------------------------------------------------------------------

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/** A clock that only moves when told to. */
export function createManualClock(start: Date) {
  let current = new Date(start.getTime());
  return {
    now: (): Date => new Date(current.getTime()),
    set(at: Date): void {
      current = new Date(at.getTime());
    },
    advance(ms: number): void {
      current = new Date(current.getTime() + ms);
    },
  };
}

export type ManualClock = ReturnType<typeof createManualClock>;
