import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export type AllocationOutcome = 'assigned' | 'dedup_hit' | 'exhausted' | 'failed' | 'cancelled';

const registry = new Registry();

if (process.env.NODE_ENV !== 'test') {
  collectDefaultMetrics({ register: registry });
}

const httpRequestDuration = new Histogram({
  name: 'keymint_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status'],
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [registry],
});

const allocationsTotal = new Counter({
  name: 'keymint_allocations_total',
  help: 'Allocation requests by outcome',
  labelNames: ['outcome'],
  registers: [registry],
});

const identifierCollisionsTotal = new Counter({
  name: 'keymint_identifier_collisions_total',
  help: 'Candidate identifiers rejected by an existing identifier',
  labelNames: ['length'],
  registers: [registry],
});

const reservedRejectionsTotal = new Counter({
  name: 'keymint_reserved_rejections_total',
  help: 'Candidate identifiers rejected by the reserved-word filter',
  registers: [registry],
});

const keyspaceEscalationsTotal = new Counter({
  name: 'keymint_keyspace_escalations_total',
  help: 'Escalations away from an identifier length',
  labelNames: ['from_length', 'reason'],
  registers: [registry],
});

const dbCheckoutTimeoutsTotal = new Counter({
  name: 'keymint_db_checkout_timeouts_total',
  help: 'Database connection checkouts that timed out',
  registers: [registry],
});

const retryAttemptsTotal = new Counter({
  name: 'keymint_retry_attempts_total',
  help: 'Retry attempts by service',
  labelNames: ['service'],
  registers: [registry],
});

const retryOutcomesTotal = new Counter({
  name: 'keymint_retry_outcomes_total',
  help: 'Retry outcomes by service',
  labelNames: ['service', 'outcome'],
  registers: [registry],
});

export function recordHttpRequest(params: { method: string; route: string; status: number; durationSeconds: number }) {
  httpRequestDuration.observe(
    { method: params.method, route: params.route, status: String(params.status) },
    params.durationSeconds
  );
}

export function recordAllocation(outcome: AllocationOutcome) {
  allocationsTotal.inc({ outcome });
}

export function recordIdentifierCollision(length: number) {
  identifierCollisionsTotal.inc({ length: String(length) });
}

export function recordReservedRejection() {
  reservedRejectionsTotal.inc();
}

export function recordKeyspaceEscalation(params: { fromLength: number; reason: 'exhausted' | 'attempt_budget' }) {
  keyspaceEscalationsTotal.inc({ from_length: String(params.fromLength), reason: params.reason });
}

export function recordDbCheckoutTimeout() {
  dbCheckoutTimeoutsTotal.inc();
}

export function recordRetryAttempt(service: string) {
  retryAttemptsTotal.inc({ service });
}

export function recordRetryOutcome(params: { service: string; outcome: 'success' | 'failure' }) {
  retryOutcomesTotal.inc({ service: params.service, outcome: params.outcome });
}

export function metricsRegistry(): Registry {
  return registry;
}
