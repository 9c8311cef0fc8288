import pc from 'picocolors';
import { request } from 'undici';

import type { AvailabilityStore } from '../aggregate/store';
import { toErrorMessage } from '../middleware/errors';
import { roundHalfEven } from '../report';
import type { EndpointBody } from '../schemas/endpoints';
import type { DownReason, Endpoint, ProbeOutcome, ProbeStatus } from './types';

const colors = pc.createColors(true);

export type ProbeOptions = {
  store: AvailabilityStore;
  verbose?: boolean;
  colorize?: boolean;
  /** Millisecond clock used for latency; defaults to `performance.now()`. */
  now?: () => number;
};

const USER_AGENT = 'probewatch/0.1';

// A 2xx answer at or above this latency still counts as DOWN.
export const MAX_UP_LATENCY_MS = 500;

const DOWN_REASON_TEXT: Record<Exclude<DownReason, 'transport_error'>, string> = {
  status_out_of_range: '(response code not in range 200–299)',
  latency_too_high: `(latency >= ${MAX_UP_LATENCY_MS} ms)`,
};

export function extractDomain(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return '';
  }
}

export function classifyResponse(
  httpStatus: number,
  latencyMs: number,
): { status: ProbeStatus; reason: 'ok' | DownReason } {
  if (httpStatus < 200 || httpStatus >= 300) {
    return { status: 'down', reason: 'status_out_of_range' };
  }
  if (latencyMs >= MAX_UP_LATENCY_MS) {
    return { status: 'down', reason: 'latency_too_high' };
  }
  return { status: 'up', reason: 'ok' };
}

function downError(reason: 'ok' | DownReason, httpStatus: number, latencyMs: number): string | null {
  switch (reason) {
    case 'status_out_of_range':
      return `Unexpected HTTP status: ${httpStatus}`;
    case 'latency_too_high':
      return `Latency ${roundHalfEven(latencyMs)}ms is not below ${MAX_UP_LATENCY_MS}ms`;
    default:
      return null;
  }
}

function describeFetchError(err: unknown): string {
  // undici wraps socket/DNS failures as `TypeError: fetch failed` with the detail in `cause`.
  if (err instanceof Error && err.cause instanceof Error) {
    return `${err.message}: ${err.cause.message}`;
  }
  return toErrorMessage(err);
}

function isEmptyBody(body: EndpointBody): boolean {
  if (body === '' || body === 0 || body === false) return true;
  if (Array.isArray(body)) return body.length === 0;
  return typeof body === 'object' && Object.keys(body).length === 0;
}

function formValue(value: unknown): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
}

function appendFormField(params: URLSearchParams, key: string, value: unknown): void {
  if (value === null || value === undefined) return;
  if (Array.isArray(value)) {
    for (const item of value) appendFormField(params, key, item);
    return;
  }
  params.append(key, formValue(value));
}

function isKeyValuePair(item: unknown): item is [unknown, unknown] {
  return Array.isArray(item) && item.length === 2;
}

/**
 * Encodes a catalog body for the wire, or returns null when there is nothing to send.
 *
 * Strings go out verbatim. Mappings and lists of key/value pairs are form-encoded,
 * with list values repeating their key. Other scalars are sent as their text and
 * any other list as JSON.
 */
export function encodeBody(body: EndpointBody | null | undefined): { payload: string; form: boolean } | null {
  if (body === undefined || body === null || isEmptyBody(body)) return null;
  if (typeof body === 'string') return { payload: body, form: false };
  if (typeof body === 'number' || typeof body === 'boolean') return { payload: String(body), form: false };

  if (Array.isArray(body)) {
    if (body.every(isKeyValuePair)) {
      const params = new URLSearchParams();
      for (const [key, value] of body) appendFormField(params, formValue(key), value);
      return { payload: params.toString(), form: true };
    }
    return { payload: JSON.stringify(body), form: false };
  }

  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(body)) appendFormField(params, key, value);
  return { payload: params.toString(), form: true };
}

function buildHeaders(endpoint: Endpoint, encoded: { form: boolean } | null): Headers {
  const headers = new Headers(endpoint.headers);
  if (!headers.has('user-agent')) {
    headers.set('User-Agent', USER_AGENT);
  }
  if (encoded?.form && !headers.has('content-type')) {
    headers.set('Content-Type', 'application/x-www-form-urlencoded');
  }
  return headers;
}

/** Sends the request, drains the response body and returns the status code. */
async function sendRequest(endpoint: Endpoint): Promise<number> {
  const encoded = encodeBody(endpoint.body);
  const headers = buildHeaders(endpoint, encoded);
  const method = endpoint.method;

  // fetch refuses a body on GET/HEAD; undici's lower-level request sends it.
  if (encoded && (method === 'GET' || method === 'HEAD')) {
    const res = await request(endpoint.url, {
      method,
      headers: Object.fromEntries(headers),
      body: encoded.payload,
    });
    await res.body.arrayBuffer();
    return res.statusCode;
  }

  const res = await fetch(endpoint.url, { method, headers, body: encoded?.payload });
  await res.arrayBuffer();
  return res.status;
}

function logOutcome(outcome: ProbeOutcome, colorize: boolean): void {
  const name = colorize ? colors.green(outcome.name) : outcome.name;

  if (outcome.reason === 'transport_error') {
    console.log(` - Endpoint with name ${name} encountered an error => DOWN (${outcome.error ?? 'unknown error'})`);
    return;
  }

  const latency = roundHalfEven(outcome.latencyMs ?? 0);
  const head = ` - Endpoint with name ${name} has HTTP response code ${outcome.httpStatus ?? '-'} and latency ${latency} ms`;
  if (outcome.reason === 'ok') {
    console.log(`${head} => UP`);
  } else {
    console.log(`${head} => DOWN ${DOWN_REASON_TEXT[outcome.reason]}`);
  }
}

/**
 * Issues exactly one request for `endpoint` and records it in the store.
 *
 * The attempt is counted before the request goes out, so a request that never
 * settles still shows up in the domain's total. No timeout is applied here.
 */
export async function runProbe(endpoint: Endpoint, options: ProbeOptions): Promise<ProbeOutcome> {
  const now = options.now ?? (() => performance.now());
  const domain = extractDomain(endpoint.url);

  options.store.incrementTotal(domain);

  let httpStatus: number;
  let latencyMs: number;
  const started = now();
  try {
    httpStatus = await sendRequest(endpoint);
    latencyMs = now() - started;
  } catch (err) {
    const outcome: ProbeOutcome = {
      name: endpoint.name,
      domain,
      status: 'down',
      reason: 'transport_error',
      httpStatus: null,
      latencyMs: null,
      error: describeFetchError(err),
    };
    if (options.verbose) logOutcome(outcome, options.colorize ?? false);
    return outcome;
  }

  const { status, reason } = classifyResponse(httpStatus, latencyMs);
  if (status === 'up') {
    options.store.incrementSuccess(domain);
  }

  const outcome: ProbeOutcome = {
    name: endpoint.name,
    domain,
    status,
    reason,
    httpStatus,
    latencyMs,
    error: downError(reason, httpStatus, latencyMs),
  };
  if (options.verbose) logOutcome(outcome, options.colorize ?? false);
  return outcome;
}
