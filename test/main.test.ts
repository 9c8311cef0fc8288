import { join } from 'node:path';

import { afterEach, describe, expect, it, vi } from 'vitest';

import { main } from '../src/main';
import { createFakeFetch } from './helpers/fake-fetch';

const fixturePath = join(__dirname, 'fixtures', 'endpoints.yaml');

describe('main', () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.restoreAllMocks();
  });

  it('probes the catalog, drains on stop and prints a final report', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const sigintListeners = process.listenerCount('SIGINT');
    const controller = new AbortController();
    let calls = 0;
    const countCall = () => {
      calls += 1;
      if (calls === 3) controller.abort();
    };

    globalThis.fetch = createFakeFetch([
      {
        match: 'status.example.test',
        respond: () => {
          countCall();
          return new Response('unavailable', { status: 503 });
        },
      },
      {
        match: 'api.example.test',
        respond: () => {
          countCall();
          return new Response('ok');
        },
      },
    ]).fetch;

    const code = await main(['-f', fixturePath, '-c', 'false'], { signal: controller.signal });

    expect(code).toBe(0);
    expect(calls).toBe(3);
    expect(logSpy.mock.calls).toEqual([
      ['api.example.test has 100% availability'],
      ['status.example.test has 0% availability'],
    ]);
    expect(process.listenerCount('SIGINT')).toBe(sigintListeners);
  });

  it('returns the usage exit code when the catalog option is missing', async () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    await expect(main([])).resolves.toBe(1);
    expect(stderr).toHaveBeenCalled();
  });

  it('rejects when the catalog cannot be read', async () => {
    await expect(
      main(['-f', join(__dirname, 'fixtures', 'missing.yaml')], {
        signal: AbortSignal.abort(),
      }),
    ).rejects.toMatchObject({ code: 'INVALID_CATALOG' });
  });
});
