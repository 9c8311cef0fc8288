export { AvailabilityStore, type DomainAvailability, type DomainStats } from './aggregate/store';
export { loadCatalog, parseCatalog } from './catalog';
export { parseMonitorConfig, parseMonitorOptions, type MonitorConfig } from './config';
export { AppError, handleError, handleNotFound, type ErrorResponse } from './middleware/errors';
export { classifyResponse, encodeBody, extractDomain, runProbe, MAX_UP_LATENCY_MS, type ProbeOptions } from './monitor/http';
export type { DownReason, Endpoint, ProbeOutcome, ProbeResult, ProbeStatus } from './monitor/types';
export { availabilityPercent, formatAvailabilityLine, formatAvailabilityReport, roundHalfEven } from './report';
export {
  CycleScheduler,
  computeSleepMs,
  sleep,
  type CycleReport,
  type CycleSchedulerConfig,
  type SchedulerState,
} from './scheduler/cycle';
export { dispatchRound, runBounded, type RoundSummary, type Settled } from './scheduler/dispatch';
export { createStatusApp } from './server';
