import { join } from 'node:path';

import { describe, expect, it } from 'vitest';

import { loadCatalog, parseCatalog } from '../src/catalog';
import { AppError } from '../src/middleware/errors';

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}

describe('catalog', () => {
  it('applies defaults and normalizes the method', () => {
    const catalog = parseCatalog(`
- url: https://example.com/
- name: Create order
  url: https://api.example.com/orders
  method: post
  headers:
    x-trace: abc
  body: '{"probe":true}'
`);

    expect(catalog).toEqual([
      { name: 'Unnamed Request', url: 'https://example.com/', method: 'GET', headers: {} },
      {
        name: 'Create order',
        url: 'https://api.example.com/orders',
        method: 'POST',
        headers: { 'x-trace': 'abc' },
        body: '{"probe":true}',
      },
    ]);
  });

  it('keeps structured bodies and unparseable urls as given', () => {
    const catalog = parseCatalog(`
- url: not a url
  method: Put
  body:
    items: [1, 2]
`);

    expect(catalog).toEqual([
      {
        name: 'Unnamed Request',
        url: 'not a url',
        method: 'PUT',
        headers: {},
        body: { items: [1, 2] },
      },
    ]);
  });

  it('rejects invalid YAML', () => {
    const err = catchError(() => parseCatalog('- url: [unterminated', { source: 'endpoints.yaml' }));

    expect(err).toBeInstanceOf(AppError);
    expect(err).toMatchObject({
      code: 'INVALID_CATALOG',
      message: expect.stringMatching(/^Invalid YAML in endpoints\.yaml: /),
    });
  });

  it('rejects documents that are not a list', () => {
    expect(() => parseCatalog('url: https://example.com/')).toThrow(
      'Invalid value in catalog: expected a list of endpoints',
    );
    expect(() => parseCatalog('')).toThrow('Invalid value in catalog: expected a list of endpoints');
  });

  it('names the offending field of an invalid entry', () => {
    expect(() => parseCatalog('- name: no url here')).toThrow('Invalid value in catalog: 0.url: Required');
    expect(() => parseCatalog('- url: https://example.com/\n  headers:\n    x-retry: 3')).toThrow(
      'Invalid value in catalog: 0.headers.x-retry: Expected string, received number',
    );
  });

  it('loads a catalog file from disk', async () => {
    const catalog = await loadCatalog(join(__dirname, 'fixtures', 'endpoints.yaml'));

    expect(catalog.map((e) => `${e.method} ${e.url}`)).toEqual([
      'GET https://api.example.test/',
      'POST https://api.example.test/v1/orders',
      'GET https://status.example.test/health',
    ]);
    expect(catalog[1]?.body).toEqual({ probe: true });
  });

  it('reports unreadable files as catalog errors', async () => {
    const path = join(__dirname, 'fixtures', 'missing.yaml');

    await expect(loadCatalog(path)).rejects.toMatchObject({
      code: 'INVALID_CATALOG',
      message: expect.stringMatching(/^Cannot read .*missing\.yaml: ENOENT/),
    });
  });
});
