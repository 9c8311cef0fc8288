import pc from 'picocolors';

import type { DomainAvailability, DomainStats } from './aggregate/store';

// Honour --colorize even when stdout is not a TTY.
const colors = pc.createColors(true);

export type ReportOptions = {
  colorize?: boolean;
  verbose?: boolean;
};

/** Rounds to the nearest integer, sending exact halves to the even neighbour (12.5 -> 12, 13.5 -> 14). */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  if (value - floor !== 0.5) return Math.round(value);
  return floor % 2 === 0 ? floor : floor + 1;
}

export function availabilityPercent(stats: DomainStats): number {
  if (stats.totalCount <= 0) return 0;
  return roundHalfEven((stats.successCount / stats.totalCount) * 100);
}

export function formatAvailabilityLine(entry: DomainAvailability, colorize = false): string {
  const percent = availabilityPercent(entry);
  const line = `${entry.domain} has ${percent}% availability`;
  if (!colorize) return line;
  return percent === 100 ? colors.green(line) : colors.red(line);
}

export function formatAvailabilityReport(
  snapshot: readonly DomainAvailability[],
  opts: ReportOptions = {},
): string[] {
  const lines = snapshot.map((entry) => formatAvailabilityLine(entry, opts.colorize ?? false));
  if (opts.verbose) {
    return ['\nAvailability Report:', ...lines];
  }
  return lines;
}

export function printAvailabilityReport(
  snapshot: readonly DomainAvailability[],
  opts: ReportOptions = {},
): void {
  for (const line of formatAvailabilityReport(snapshot, opts)) {
    console.log(line);
  }
}
