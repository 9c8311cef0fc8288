import { serve, type ServerType } from '@hono/node-server';
import { Hono } from 'hono';

import type { AvailabilityStore } from './aggregate/store';
import { handleError, handleNotFound } from './middleware/errors';
import { availabilityPercent } from './report';

export type StatusAppDeps = {
  store: AvailabilityStore;
  cycleNumber: () => number;
};

export function createStatusApp(deps: StatusAppDeps): Hono {
  const app = new Hono();

  app.onError(handleError);
  app.notFound(handleNotFound);

  app.get('/', (c) => c.text('ok'));

  app.get('/api/v1/availability', (c) => {
    const domains = deps.store.snapshot().map((entry) => ({
      domain: entry.domain,
      success_count: entry.successCount,
      total_count: entry.totalCount,
      availability: availabilityPercent(entry),
    }));
    return c.json({ cycle_number: deps.cycleNumber(), domains });
  });

  return app;
}

export function startStatusServer(app: Hono, port: number): ServerType {
  return serve({ fetch: app.fetch, port }, (info) => {
    console.log(`status: listening port=${info.port}`);
  });
}

export function closeStatusServer(server: ServerType): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
