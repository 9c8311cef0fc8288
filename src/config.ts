import { Command } from 'commander';

import { AppError, formatZodError } from './middleware/errors';
import { monitorOptionsSchema } from './schemas/options';

export type MonitorConfig = {
  file: string;
  maxThreads: number;
  cycleLengthSec: number;
  colorize: boolean;
  verbose: boolean;
  statusPort: number | null;
};

export function buildProgram(): Command {
  return new Command()
    .name('probewatch')
    .description('Probe HTTP endpoints on a fixed cycle and report per-domain availability')
    .requiredOption('-f, --file <path>', 'path to YAML file with endpoints')
    .option('-t, --threads <n>', 'maximum number of parallel requests', '10')
    .option('-l, --cycle-length <seconds>', 'target length of one health check cycle', '15')
    .option('-c, --colorize <bool>', 'colorize output', 'true')
    .option('-v, --verbose <bool>', 'log every probe and cycle', 'false')
    .option('-p, --status-port <port>', 'serve the availability snapshot as JSON on this port');
}

export function parseMonitorOptions(raw: unknown): MonitorConfig {
  const r = monitorOptionsSchema.safeParse(raw);
  if (!r.success) {
    throw new AppError(400, 'INVALID_ARGUMENT', formatZodError(r.error));
  }

  return {
    file: r.data.file,
    maxThreads: r.data.threads,
    cycleLengthSec: r.data.cycleLength,
    colorize: r.data.colorize,
    verbose: r.data.verbose,
    statusPort: r.data.statusPort ?? null,
  };
}

/**
 * Parses user arguments (without the node/script prefix).
 *
 * Commander reports usage problems itself and throws a `CommanderError`;
 * value problems surface as an `INVALID_ARGUMENT` AppError.
 */
export function parseMonitorConfig(args: readonly string[], program = buildProgram()): MonitorConfig {
  program.exitOverride();
  program.parse([...args], { from: 'user' });
  return parseMonitorOptions(program.opts());
}
