import { z } from 'zod';

const DEFAULT_ENDPOINT_NAME = 'Unnamed Request';

const httpHeadersSchema = z.record(z.string());

export const endpointBodySchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.array(z.unknown()),
  z.record(z.unknown()),
]);
export type EndpointBody = z.infer<typeof endpointBodySchema>;

export const endpointInputSchema = z.object({
  name: z.string().default(DEFAULT_ENDPOINT_NAME),
  // Not validated as a URL: unparseable targets are probed and reported as DOWN.
  url: z.string(),
  method: z
    .string()
    .trim()
    .min(1)
    .default('GET')
    .transform((m) => m.toUpperCase()),
  headers: httpHeadersSchema.default({}),
  body: endpointBodySchema.nullish(),
});

export const endpointCatalogSchema = z.array(endpointInputSchema);
