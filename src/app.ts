// src/app.ts
import { loadConfig, fastifyEnvOptions } from './config/env.js';
import Fastify from 'fastify';
import fastifyEnv from '@fastify/env';
import cookie from '@fastify/cookie';
import { messageRoutes, type MessageRouteOptions } from './routes/messageRoutes.js';
import { calendarRoutes } from './routes/calendarRoutes.js';
import metricsPlugin from './plugins/metrics.js';
import pendingCleanupPlugin from './plugins/pendingCleanup.js';
import { sessionMiddleware } from './middleware/session.js';

export type AppOptions = MessageRouteOptions;

/**
 * Build and configure Fastify application
 *
 * @param options - Overrides for the command pipeline (tests inject parser and calendar here)
 * @returns Configured Fastify instance
 */
export async function buildApp(options: AppOptions = {}) {
  const config = loadConfig();

  const fastify = Fastify({
    logger:
      config.NODE_ENV === 'development'
        ? {
            level: config.LOG_LEVEL,
            transport: {
              target: 'pino-pretty',
              options: {
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
              },
            },
          }
        : {
            level: config.LOG_LEVEL,
          },
  });

  await fastify.register(fastifyEnv, fastifyEnvOptions);

  await fastify.register(cookie, {
    secret: config.ENCRYPTION_SECRET,
    parseOptions: {
      httpOnly: true,
      secure: config.NODE_ENV === 'production',
      sameSite: 'lax',
      maxAge: 30 * 24 * 60 * 60, // 30 days
    },
  });

  // Session middleware (global - runs on every request)
  fastify.addHook('onRequest', sessionMiddleware);

  fastify.get('/api/health', async () => {
    return { status: 'healthy', timestamp: new Date().toISOString() };
  });

  await fastify.register(metricsPlugin);
  await fastify.register(pendingCleanupPlugin);

  await fastify.register(messageRoutes, options);
  await fastify.register(calendarRoutes, {
    calendarAccess: options.calendarAccess,
    defaultTimeZone: options.defaultTimeZone,
  });

  return fastify;
}

/**
 * Start the application server
 */
async function start() {
  try {
    const fastify = await buildApp();
    const { PORT: port, HOST: host } = loadConfig();

    await fastify.listen({ port, host });

    fastify.log.info(`Server listening on ${host}:${port}`);
  } catch (err) {
    console.error('Error starting server:', err);
    process.exit(1);
  }
}

// Start server if this is the main module
if (import.meta.url === `file://${process.argv[1]}`) {
  void start();
}
