import client from 'prom-client';

export const registry = new client.Registry();

let defaultMetricsEnabled = false;

/** Process-level metrics; registered once, on demand, so tests stay free of collectors */
export function enableDefaultMetrics(): void {
  if (defaultMetricsEnabled) return;
  client.collectDefaultMetrics({ register: registry, prefix: 'care_' });
  defaultMetricsEnabled = true;
}

// ───── HTTP ─────

export const httpRequestDuration = new client.Histogram({
  name: 'care_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [registry],
});

export const rateLimitRejections = new client.Counter({
  name: 'care_rate_limit_rejections_total',
  help: 'Requests rejected by the per-client rate limiter',
  registers: [registry],
});

// ───── Pipeline ─────

export const interactionsProcessed = new client.Counter({
  name: 'care_interactions_total',
  help: 'Interactions handled by the pipeline coordinator',
  labelNames: ['channel', 'outcome'] as const,
  registers: [registry],
});

export const pipelineDuration = new client.Histogram({
  name: 'care_pipeline_duration_seconds',
  help: 'Synchronous pipeline duration in seconds',
  labelNames: ['channel'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

export const agentInvocations = new client.Counter({
  name: 'care_agent_invocations_total',
  help: 'Agent invocations by outcome',
  labelNames: ['agent', 'outcome'] as const,
  registers: [registry],
});

export const agentDuration = new client.Histogram({
  name: 'care_agent_duration_seconds',
  help: 'Agent invocation duration in seconds',
  labelNames: ['agent'] as const,
  buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1, 2.5, 5],
  registers: [registry],
});

export const escalations = new client.Counter({
  name: 'care_escalations_total',
  help: 'Escalation triggers fired',
  labelNames: ['trigger', 'channel'] as const,
  registers: [registry],
});

export const contextUpdateMisses = new client.Counter({
  name: 'care_context_update_misses_total',
  help: 'Context updates for conversations that were not found',
  registers: [registry],
});

export const deferredJobs = new client.Counter({
  name: 'care_deferred_jobs_total',
  help: 'Deferred jobs by name and status',
  labelNames: ['job', 'status'] as const,
  registers: [registry],
});

export const escalationQueueDepth = new client.Gauge({
  name: 'care_escalation_queue_depth',
  help: 'Escalation payloads waiting for a human agent',
  registers: [registry],
});

export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

export function getContentType(): string {
  return registry.contentType;
}
