import type { EndpointBody } from '../schemas/endpoints';

export type Endpoint = {
  name: string;
  url: string;
  method: string;
  headers: Record<string, string>;
  body?: EndpointBody | null;
};

export type ProbeStatus = 'up' | 'down';

export type DownReason = 'status_out_of_range' | 'latency_too_high' | 'transport_error';

export type ProbeOutcome = {
  name: string;
  domain: string;
  status: ProbeStatus;
  reason: 'ok' | DownReason;
  httpStatus: number | null;
  latencyMs: number | null;
  error: string | null;
};

// Failures inside a probe task travel as values, never as rejections.
export type ProbeResult =
  | { ok: true; outcome: ProbeOutcome }
  | { ok: false; endpoint: Endpoint; error: string };
