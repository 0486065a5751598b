// src/plugins/pendingCleanup.ts
import type { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import { cleanupExpiredPendingActions } from '../db/pendingActionDb.js';
import { cleanupExpiredSessions } from '../db/sessionDb.js';

export interface PendingCleanupOptions {
  intervalMs?: number;
}

const DEFAULT_INTERVAL_MS = 5 * 60 * 1000;

/**
 * Periodically deletes expired pending confirmations and sessions.
 * Reads already ignore expired rows; this only keeps the tables small.
 */
async function pendingCleanupPlugin(fastify: FastifyInstance, options: PendingCleanupOptions) {
  const runCleanup = (): void => {
    try {
      const pending = cleanupExpiredPendingActions();
      const sessions = cleanupExpiredSessions();
      if (pending > 0 || sessions > 0) {
        fastify.log.info({ pending, sessions }, 'Expired rows cleaned up');
      }
    } catch (err) {
      fastify.log.error({ err }, 'Cleanup of expired rows failed');
    }
  };

  const cleanupInterval = setInterval(runCleanup, options.intervalMs ?? DEFAULT_INTERVAL_MS);
  cleanupInterval.unref();

  fastify.addHook('onClose', async () => {
    clearInterval(cleanupInterval);
  });
}

export default fp(pendingCleanupPlugin, {
  name: 'pending-cleanup-plugin',
});
