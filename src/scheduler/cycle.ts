import type { AvailabilityStore, DomainAvailability } from '../aggregate/store';
import type { ProbeOptions } from '../monitor/http';
import type { Endpoint, ProbeOutcome } from '../monitor/types';
import { dispatchRound, type RoundSummary } from './dispatch';

export type SchedulerState = 'idle' | 'dispatching' | 'reporting' | 'sleeping' | 'stopped';

export type CycleReport = {
  cycleNumber: number;
  snapshot: DomainAvailability[];
  summary: RoundSummary;
};

export type CycleSchedulerConfig = {
  catalog: readonly Endpoint[];
  store: AvailabilityStore;
  maxConcurrency: number;
  cycleLengthMs: number;
  verbose?: boolean;
  colorize?: boolean;
  onReport?: (report: CycleReport) => void;
  now?: () => number;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  probe?: (endpoint: Endpoint, options: ProbeOptions) => Promise<ProbeOutcome>;
};

export function computeSleepMs(cycleLengthMs: number, elapsedMs: number): number {
  return Math.max(0, cycleLengthMs - elapsedMs);
}

// Longest delay a single setTimeout honours; longer ones fire immediately.
export const MAX_TIMER_MS = 2 ** 31 - 1;

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }

    let remaining = ms;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const arm = () => {
      const step = Math.min(remaining, MAX_TIMER_MS);
      remaining -= step;
      timer = setTimeout(remaining > 0 ? arm : done, step);
    };
    signal.addEventListener('abort', done, { once: true });
    arm();
  });
}

export class CycleScheduler {
  private currentState: SchedulerState = 'idle';
  private cycles = 0;
  private running = false;

  constructor(private readonly config: CycleSchedulerConfig) {}

  get state(): SchedulerState {
    return this.currentState;
  }

  get cycleNumber(): number {
    return this.cycles;
  }

  /**
   * Runs rounds back to back until `signal` aborts.
   *
   * The signal is honoured after a round's in-flight probes have drained and
   * during the sleep between rounds. An interrupted round is not reported.
   */
  async run(signal: AbortSignal): Promise<void> {
    if (this.running) {
      throw new Error('scheduler is already running');
    }
    this.running = true;

    const cfg = this.config;
    const now = cfg.now ?? (() => performance.now());
    const pause = cfg.sleep ?? sleep;
    let firstStartedAt: number | null = null;

    try {
      while (!signal.aborted) {
        this.cycles += 1;
        const startedAt = now();
        firstStartedAt ??= startedAt;
        this.currentState = 'dispatching';

        if (cfg.verbose) {
          const offsetSec = Math.trunc((startedAt - firstStartedAt) / 1000);
          console.log(`\nTest cycle #${this.cycles} begins at time = ${offsetSec} seconds:`);
        }

        const { summary } = await dispatchRound(cfg.catalog, {
          store: cfg.store,
          maxConcurrency: cfg.maxConcurrency,
          cycleNumber: this.cycles,
          verbose: cfg.verbose,
          colorize: cfg.colorize,
          now: cfg.now,
          probe: cfg.probe,
          signal,
        });

        if (signal.aborted) break;

        this.currentState = 'reporting';
        cfg.onReport?.({ cycleNumber: this.cycles, snapshot: cfg.store.snapshot(), summary });

        const sleepMs = computeSleepMs(cfg.cycleLengthMs, now() - startedAt);
        this.currentState = 'sleeping';
        if (cfg.verbose) {
          const cycleLengthSec = cfg.cycleLengthMs / 1000;
          console.log(
            `\nWaiting for ${(sleepMs / 1000).toFixed(2)} seconds to complete ${cycleLengthSec}s cycle before the next iteration...`,
          );
        }
        await pause(sleepMs, signal);
        this.currentState = 'idle';
      }
    } finally {
      this.currentState = 'stopped';
      this.running = false;
    }
  }
}
