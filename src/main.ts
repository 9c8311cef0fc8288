import { CommanderError } from 'commander';

import { AvailabilityStore } from './aggregate/store';
import { loadCatalog } from './catalog';
import { parseMonitorConfig, type MonitorConfig } from './config';
import { printAvailabilityReport } from './report';
import { CycleScheduler } from './scheduler/cycle';
import { closeStatusServer, createStatusApp, startStatusServer } from './server';

export type MainOptions = {
  /** Extra stop signal alongside SIGINT/SIGTERM. */
  signal?: AbortSignal;
};

/**
 * Runs the monitor until stopped and returns the process exit code.
 * Startup failures (bad options, unreadable catalog) reject.
 */
export async function main(args: readonly string[], opts: MainOptions = {}): Promise<number> {
  let config: MonitorConfig;
  try {
    config = parseMonitorConfig(args);
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }

  const catalog = await loadCatalog(config.file);
  const store = new AvailabilityStore();
  const scheduler = new CycleScheduler({
    catalog,
    store,
    maxConcurrency: config.maxThreads,
    cycleLengthMs: config.cycleLengthSec * 1000,
    verbose: config.verbose,
    colorize: config.colorize,
    onReport: ({ snapshot }) =>
      printAvailabilityReport(snapshot, { colorize: config.colorize, verbose: config.verbose }),
  });

  const server =
    config.statusPort === null
      ? null
      : startStatusServer(
          createStatusApp({ store, cycleNumber: () => scheduler.cycleNumber }),
          config.statusPort,
        );

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    if (config.verbose) console.log(`\nshutdown: signal=${signal} draining in-flight probes`);
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
  if (opts.signal?.aborted) controller.abort();
  opts.signal?.addEventListener('abort', () => controller.abort(), { once: true });

  try {
    await scheduler.run(controller.signal);
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
    if (server) await closeStatusServer(server);
  }

  printAvailabilityReport(store.snapshot(), { colorize: config.colorize, verbose: config.verbose });
  return 0;
}
