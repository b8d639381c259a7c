// src/app.ts
import Fastify from 'fastify';
import fastifyEnv from '@fastify/env';
import { syncRoutes } from './routes/syncRoutes.js';
import metricsPlugin from './plugins/metrics.js';
import { fastifyEnvOptions, loadConfig, type EnvConfig } from './config/env.js';
import { loggerOptions } from './lib/logger.js';
import { createSyncContext, type SyncContext, type SyncContextDeps } from './lib/syncContext.js';

export interface BuildAppOptions {
  config?: EnvConfig;
  /** Replaces the credential-backed context (tests inject fakes here) */
  createContext?: (deps: SyncContextDeps) => SyncContext;
}

/**
 * Build and configure Fastify application
 *
 * @returns Configured Fastify instance
 */
export async function buildApp(options: BuildAppOptions = {}) {
  const cfg = options.config ?? loadConfig();

  const fastify = Fastify({
    logger: loggerOptions(cfg),
  });

  // Register environment variables plugin
  await fastify.register(fastifyEnv, fastifyEnvOptions);

  fastify.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  await fastify.register(metricsPlugin);

  const createContext =
    options.createContext ?? ((deps: SyncContextDeps) => createSyncContext(cfg, deps));
  let context: SyncContext | null = null;

  await fastify.register(syncRoutes, {
    getContext: () => {
      context ??= createContext({ logger: fastify.log, metrics: fastify.syncMetrics });
      return context;
    },
  });

  return fastify;
}

/**
 * Start the application server
 */
async function start() {
  try {
    const cfg = loadConfig();
    const fastify = await buildApp({ config: cfg });
    await fastify.listen({ port: cfg.PORT, host: cfg.HOST });
    fastify.log.info(`Server listening on ${cfg.HOST}:${cfg.PORT}`);
  } catch (err) {
    console.error('Error starting server:', err);
    process.exit(1);
  }
}

// Start server if this is the main module
if (import.meta.url === `file://${process.argv[1]}`) {
  void start();
}
