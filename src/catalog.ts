// Endpoint catalog loading.
//
// - Source: a YAML document holding a sequence of endpoint definitions.
// - Every failure here is fatal; the scheduler never starts without a catalog.

import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { AppError, formatZodError, toErrorMessage } from './middleware/errors';
import type { Endpoint } from './monitor/types';
import { endpointCatalogSchema } from './schemas/endpoints';

export function parseCatalog(text: string, opts: { source?: string } = {}): Endpoint[] {
  const source = opts.source ?? 'catalog';

  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (err) {
    throw new AppError(400, 'INVALID_CATALOG', `Invalid YAML in ${source}: ${toErrorMessage(err)}`);
  }

  if (!Array.isArray(parsed)) {
    throw new AppError(400, 'INVALID_CATALOG', `Invalid value in ${source}: expected a list of endpoints`);
  }

  const r = endpointCatalogSchema.safeParse(parsed);
  if (!r.success) {
    throw new AppError(400, 'INVALID_CATALOG', `Invalid value in ${source}: ${formatZodError(r.error)}`);
  }
  return r.data;
}

export async function loadCatalog(path: string): Promise<Endpoint[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new AppError(400, 'INVALID_CATALOG', `Cannot read ${path}: ${toErrorMessage(err)}`);
  }
  return parseCatalog(text, { source: path });
}
