// src/plugins/metrics.ts
import type { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import { register, collectDefaultMetrics, Gauge, Counter, Histogram } from 'prom-client';

export interface CommandMetrics {
  /** Commands handled, by resolved action and outcome */
  commandsTotal: Counter<'action' | 'outcome'>;
  /** LLM replies that could not be turned into an intent */
  intentParseFailures: Counter<string>;
}

declare module 'fastify' {
  interface FastifyInstance {
    metrics?: CommandMetrics;
  }
}

/**
 * Metrics Plugin
 * Exposes Prometheus metrics at /metrics: default Node.js metrics,
 * HTTP timings and command pipeline counters
 */
async function metricsPlugin(fastify: FastifyInstance) {
  collectDefaultMetrics({
    register,
    prefix: 'calendar_assistant_',
  });

  const heapGauge = new Gauge({
    name: 'calendar_assistant_heap_usage_bytes',
    help: 'Current heap memory usage in bytes',
    registers: [register],
  });

  const httpRequestDuration = new Histogram({
    name: 'calendar_assistant_http_request_duration_seconds',
    help: 'HTTP request duration in seconds',
    labelNames: ['method', 'route', 'status_code'],
    registers: [register],
  });

  const httpRequestsTotal = new Counter({
    name: 'calendar_assistant_http_requests_total',
    help: 'Total number of HTTP requests',
    labelNames: ['method', 'route', 'status_code'],
    registers: [register],
  });

  const commandsTotal = new Counter({
    name: 'calendar_assistant_commands_total',
    help: 'Total number of calendar commands handled',
    labelNames: ['action', 'outcome'] as const,
    registers: [register],
  });

  const intentParseFailures = new Counter({
    name: 'calendar_assistant_intent_parse_failures_total',
    help: 'Total number of model replies that failed intent validation',
    registers: [register],
  });

  heapGauge.set(process.memoryUsage().heapUsed);

  const heapInterval = setInterval(() => {
    heapGauge.set(process.memoryUsage().heapUsed);
  }, 10000);
  heapInterval.unref();

  fastify.addHook('onResponse', async (request, reply) => {
    const labels = {
      method: request.method,
      route: request.routeOptions.url || request.url,
      status_code: reply.statusCode.toString(),
    };

    httpRequestDuration.observe(labels, reply.elapsedTime / 1000);
    httpRequestsTotal.inc(labels);
  });

  fastify.get('/metrics', async (_request, reply) => {
    reply.header('Content-Type', register.contentType);
    return register.metrics();
  });

  fastify.decorate('metrics', {
    commandsTotal,
    intentParseFailures,
  });

  fastify.addHook('onClose', async () => {
    clearInterval(heapInterval);
  });

  fastify.log.info('Metrics plugin registered - /metrics endpoint available');
}

export default fp(metricsPlugin, {
  name: 'metrics-plugin',
});
