import { toErrorMessage } from '../middleware/errors';
import { runProbe, type ProbeOptions } from '../monitor/http';
import type { Endpoint, ProbeOutcome, ProbeResult } from '../monitor/types';

export type Settled<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown }
  | { status: 'skipped' };

export type RoundSummary = {
  cycleNumber: number;
  probed: number;
  skipped: number;
  up: number;
  down: number;
  failed: number;
  elapsedMs: number;
};

export type DispatchOptions = ProbeOptions & {
  maxConcurrency: number;
  cycleNumber?: number;
  /** Once aborted, queued probes are skipped; probes already running finish. */
  signal?: AbortSignal;
  probe?: (endpoint: Endpoint, options: ProbeOptions) => Promise<ProbeOutcome>;
};

export const DEFAULT_MAX_CONCURRENCY = 10;

function normalizeConcurrency(limit: number): number {
  if (!Number.isFinite(limit) || limit < 1) return DEFAULT_MAX_CONCURRENCY;
  return Math.floor(limit);
}

/**
 * Runs `worker` over `items` with at most `limit` calls pending at once and
 * resolves when every started call has settled. Results keep input order.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<Array<Settled<R>>> {
  const results: Array<Settled<R>> = [];
  const queue = items.entries();

  // Each lane pulls from the shared iterator until it is drained.
  async function lane(): Promise<void> {
    for (const [index, item] of queue) {
      if (signal?.aborted) {
        results[index] = { status: 'skipped' };
        continue;
      }
      try {
        results[index] = { status: 'fulfilled', value: await worker(item, index) };
      } catch (err) {
        results[index] = { status: 'rejected', reason: err };
      }
    }
  }

  const lanes = Math.max(1, Math.min(normalizeConcurrency(limit), items.length));
  await Promise.all(Array.from({ length: lanes }, () => lane()));
  return results;
}

export async function dispatchRound(
  catalog: readonly Endpoint[],
  options: DispatchOptions,
): Promise<{ results: ProbeResult[]; summary: RoundSummary }> {
  const now = options.now ?? (() => performance.now());
  const probe = options.probe ?? runProbe;
  const probeOptions: ProbeOptions = {
    store: options.store,
    verbose: options.verbose,
    colorize: options.colorize,
    now: options.now,
  };

  const started = now();
  const settled = await runBounded(
    catalog,
    options.maxConcurrency,
    (endpoint) => probe(endpoint, probeOptions),
    options.signal,
  );

  const results: ProbeResult[] = [];
  const summary: RoundSummary = {
    cycleNumber: options.cycleNumber ?? 0,
    probed: 0,
    skipped: 0,
    up: 0,
    down: 0,
    failed: 0,
    elapsedMs: 0,
  };

  settled.forEach((entry, index) => {
    if (entry.status === 'skipped') {
      summary.skipped += 1;
      return;
    }

    summary.probed += 1;
    if (entry.status === 'fulfilled') {
      results.push({ ok: true, outcome: entry.value });
      if (entry.value.status === 'up') summary.up += 1;
      else summary.down += 1;
      return;
    }

    const error = toErrorMessage(entry.reason);
    summary.failed += 1;
    const endpoint = catalog[index];
    if (endpoint) {
      results.push({ ok: false, endpoint, error });
    }
    if (options.verbose) {
      console.log(`Exception: ${error}`);
    }
  });

  summary.elapsedMs = now() - started;
  return { results, summary };
}
