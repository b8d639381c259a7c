// src/plugins/metrics.ts
import type { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import { register, collectDefaultMetrics, Gauge, Counter, Histogram } from 'prom-client';
import type { SyncMetrics } from '../services/syncOrchestrator.js';

declare module 'fastify' {
  interface FastifyInstance {
    syncMetrics: SyncMetrics;
  }
  interface FastifyRequest {
    startTime: number;
  }
}

/**
 * Metrics Plugin
 * Exposes Prometheus metrics at /metrics endpoint
 * Includes default Node.js metrics, HTTP timings and reconciliation counters
 */
async function metricsPlugin(fastify: FastifyInstance) {
  // Enable default metrics (heap, CPU, event loop, etc.)
  collectDefaultMetrics({
    register,
    prefix: 'busy_sync_',
  });

  const heapGauge = new Gauge({
    name: 'busy_sync_heap_usage_bytes',
    help: 'Current heap memory usage in bytes',
    registers: [register],
  });

  const httpRequestDuration = new Histogram({
    name: 'busy_sync_http_request_duration_seconds',
    help: 'HTTP request duration in seconds',
    labelNames: ['method', 'route', 'status_code'],
    registers: [register],
  });

  const httpRequestsTotal = new Counter({
    name: 'busy_sync_http_requests_total',
    help: 'Total number of HTTP requests',
    labelNames: ['method', 'route', 'status_code'],
    registers: [register],
  });

  const syncOutcomes = new Counter({
    name: 'busy_sync_outcomes_total',
    help: 'Applied changes by destination and result',
    labelNames: ['target', 'result'],
    registers: [register],
  });

  const approvalRequests = new Counter({
    name: 'busy_sync_approval_requests_total',
    help: 'Reconciliation passes by approval status',
    labelNames: ['status'],
    registers: [register],
  });

  heapGauge.set(process.memoryUsage().heapUsed);

  const heapInterval = setInterval(() => {
    heapGauge.set(process.memoryUsage().heapUsed);
  }, 10000);
  heapInterval.unref();

  fastify.decorateRequest('startTime', 0);

  fastify.addHook('onRequest', async (request) => {
    request.startTime = Date.now();
  });

  fastify.addHook('onResponse', async (request, reply) => {
    const duration = (Date.now() - request.startTime) / 1000;
    const labels = {
      method: request.method,
      route: request.routeOptions.url || request.url,
      status_code: reply.statusCode.toString(),
    };

    httpRequestDuration.observe(labels, duration);
    httpRequestsTotal.inc(labels);
  });

  fastify.get('/metrics', async (_request, reply) => {
    reply.header('Content-Type', register.contentType);
    return register.metrics();
  });

  // Counters the orchestrator feeds
  fastify.decorate('syncMetrics', {
    recordOutcome(outcome) {
      syncOutcomes.inc({ target: outcome.target, result: outcome.result });
    },
    recordApproval(status) {
      approvalRequests.inc({ status });
    },
  } satisfies SyncMetrics);

  fastify.addHook('onClose', async () => {
    clearInterval(heapInterval);
  });

  fastify.log.info('Metrics plugin registered - /metrics endpoint available');
}

export default fp(metricsPlugin, {
  name: 'metrics-plugin',
});
