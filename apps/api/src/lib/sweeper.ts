// ---------------------------------------------------------------------------
// Housekeeping sweep.
// Applies the same deadline transitions the services apply lazily on read,
// for entities nobody reads. Never performs outbound I/O.
// ---------------------------------------------------------------------------

import type { Clock } from './clock.js';
import type { Logger } from './logger.js';

export interface SweepTargets {
  link: { sweepExpired(now: Date): Promise<number> };
  consent: { sweepExpired(now: Date): Promise<number> };
  transfer: { sweepTimeouts(now: Date): Promise<number> };
}

export interface SweepResult {
  expiredLinks: number;
  expiredConsents: number;
  timedOutTransfers: number;
}

export interface SweeperOptions {
  intervalMs: number;
  clock: Clock;
  logger: Logger;
}

export interface Sweeper {
  start(): void;
  stop(): void;
  runOnce(): Promise<SweepResult>;
}

export function createSweeper(targets: SweepTargets, opts: SweeperOptions): Sweeper {
  const { intervalMs, clock, logger } = opts;
  let timer: NodeJS.Timeout | null = null;
  let inFlight: Promise<SweepResult> | null = null;

  async function sweep(): Promise<SweepResult> {
    const now = clock.now();
    const result: SweepResult = {
      expiredLinks: await targets.link.sweepExpired(now),
      expiredConsents: await targets.consent.sweepExpired(now),
      timedOutTransfers: await targets.transfer.sweepTimeouts(now),
    };
    if (result.expiredLinks + result.expiredConsents + result.timedOutTransfers > 0) {
      logger.info(result, 'sweep applied deadline transitions');
    }
    return result;
  }

  function runOnce(): Promise<SweepResult> {
    // A tick that fires while the previous sweep is still running joins it.
    if (!inFlight) {
      inFlight = sweep().finally(() => {
        inFlight = null;
      });
    }
    return inFlight;
  }

  return {
    start() {
      if (timer || intervalMs <= 0) return;
      timer = setInterval(() => {
        runOnce().catch((err: unknown) => {
          logger.error({ err }, 'sweep failed');
        });
      }, intervalMs);
      timer.unref();
    },

    stop() {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
    },

    runOnce,
  };
}
