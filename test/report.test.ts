import { afterEach, describe, expect, it, vi } from 'vitest';

import {
  availabilityPercent,
  formatAvailabilityLine,
  formatAvailabilityReport,
  printAvailabilityReport,
  roundHalfEven,
} from '../src/report';

describe('report', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('rounds the success ratio to a whole percentage', () => {
    expect(availabilityPercent({ successCount: 0, totalCount: 0 })).toBe(0);
    expect(availabilityPercent({ successCount: 3, totalCount: 3 })).toBe(100);
    expect(availabilityPercent({ successCount: 2, totalCount: 3 })).toBe(67);
    expect(availabilityPercent({ successCount: 1, totalCount: 3 })).toBe(33);
  });

  it('rounds exact halves to the even neighbour', () => {
    expect([1, 3, 5, 7].map((s) => availabilityPercent({ successCount: s, totalCount: 8 }))).toEqual([12, 38, 62, 88]);
    expect(roundHalfEven(0.5)).toBe(0);
    expect(roundHalfEven(1.5)).toBe(2);
    expect(roundHalfEven(2.4999)).toBe(2);
    expect(roundHalfEven(2.6)).toBe(3);
  });

  it('renders one plain line per domain', () => {
    const lines = formatAvailabilityReport([
      { domain: 'a.example.com', successCount: 2, totalCount: 2 },
      { domain: 'b.example.com:8080', successCount: 1, totalCount: 4 },
      { domain: '', successCount: 0, totalCount: 1 },
    ]);

    expect(lines).toEqual([
      'a.example.com has 100% availability',
      'b.example.com:8080 has 25% availability',
      ' has 0% availability',
    ]);
  });

  it('prefixes a header in verbose mode', () => {
    expect(
      formatAvailabilityReport([{ domain: 'a.example.com', successCount: 1, totalCount: 2 }], {
        verbose: true,
      }),
    ).toEqual(['\nAvailability Report:', 'a.example.com has 50% availability']);
  });

  it('paints full availability green and anything lower red', () => {
    expect(formatAvailabilityLine({ domain: 'a.example.com', successCount: 5, totalCount: 5 }, true)).toBe(
      '\x1b[32ma.example.com has 100% availability\x1b[39m',
    );
    expect(formatAvailabilityLine({ domain: 'b.example.com', successCount: 4, totalCount: 5 }, true)).toBe(
      '\x1b[31mb.example.com has 80% availability\x1b[39m',
    );
  });

  it('prints each line to the console', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    printAvailabilityReport([
      { domain: 'a.example.com', successCount: 1, totalCount: 1 },
      { domain: 'b.example.com', successCount: 0, totalCount: 1 },
    ]);

    expect(logSpy.mock.calls).toEqual([
      ['a.example.com has 100% availability'],
      ['b.example.com has 0% availability'],
    ]);
  });
});
