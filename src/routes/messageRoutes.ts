// src/routes/messageRoutes.ts
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { loadConfig } from '../config/env.js';
import { getSessionId, getUserId } from '../lib/userContext.js';
import { requireAuth } from '../middleware/session.js';
import { createIntentParser, IntentParseError, type IntentParser } from '../parsers/intentParser.js';
import { ActionExecutor } from '../services/actionExecutor.js';
import { googleCalendarAccess, type CalendarAccessFactory } from '../services/calendarAccess.js';
import { handleCommand, outcomeLabel } from '../services/commandPipeline.js';
import { resolveUserTimeZone } from '../services/timezoneCache.js';

/**
 * Zod schema for the command body
 */
const MessageBodySchema = z.object({
  message: z.string(),
});

export interface MessageRouteOptions {
  /** Defaults to the parser configured by AI_PROVIDER, built on first use */
  parser?: IntentParser;
  calendarAccess?: CalendarAccessFactory;
  maxCommandLength?: number;
  pendingTtlSeconds?: number;
  defaultTimeZone?: string;
  /** Clock, injectable for tests */
  now?: () => Date;
}

/**
 * Register the conversational command endpoint
 */
export async function messageRoutes(
  fastify: FastifyInstance,
  options: MessageRouteOptions
): Promise<void> {
  const config = loadConfig();
  const calendarAccess = options.calendarAccess ?? googleCalendarAccess;
  const maxCommandLength = options.maxCommandLength ?? config.MAX_COMMAND_LENGTH;
  const pendingTtlSeconds = options.pendingTtlSeconds ?? config.PENDING_CONFIRMATION_TTL_SECONDS;
  const defaultTimeZone = options.defaultTimeZone ?? config.DEFAULT_TIMEZONE;
  const clock = options.now ?? (() => new Date());

  let parser = options.parser;
  const getParser = (): IntentParser => {
    if (!parser) {
      parser = createIntentParser(config);
    }
    return parser;
  };

  /**
   * POST /api/message
   * Parse a natural-language command, run it against the user's calendar
   * and reply conversationally. A short numeric reply resolves a pending
   * multiple-match question instead.
   */
  fastify.post('/api/message', { preHandler: requireAuth }, async (request, reply) => {
    const bodyResult = MessageBodySchema.safeParse(request.body);
    if (!bodyResult.success) {
      return reply.code(400).send({
        success: false,
        error: 'Message field is required',
      });
    }

    const message = bodyResult.data.message.trim();
    if (!message) {
      return reply.code(400).send({
        success: false,
        error: 'Message field is required',
      });
    }

    if (message.length > maxCommandLength) {
      return reply.code(400).send({
        success: false,
        error: `Your message is too long. Please keep commands under ${maxCommandLength} characters.`,
      });
    }

    try {
      const userId = getUserId(request);
      const sessionId = getSessionId(request);
      const store = await calendarAccess(userId, request.log);
      const timeZone = await resolveUserTimeZone(userId, store, defaultTimeZone, request.log);
      const now = clock();

      const outcome = await handleCommand({
        sessionId,
        message,
        parser: getParser(),
        executor: new ActionExecutor({ store, timeZone, log: request.log, now: clock }),
        log: request.log,
        timeZone,
        pendingTtlSeconds,
        now,
      });

      if (outcome.status === 'invalid_selection') {
        return reply.code(400).send({
          success: false,
          message: outcome.message,
        });
      }

      fastify.metrics?.commandsTotal.inc({
        action: outcome.action,
        outcome: outcomeLabel(outcome.reply.result),
      });

      return reply.code(200).send(outcome.reply);
    } catch (err) {
      if (err instanceof IntentParseError) {
        fastify.metrics?.intentParseFailures.inc();
        request.log.error({ err, raw: err.raw }, 'Failed to parse AI response');
        return reply.code(500).send({
          success: false,
          error: 'Failed to parse AI response',
        });
      }

      request.log.error({ err }, 'Error processing message');
      return reply.code(500).send({
        success: false,
        error: 'An error occurred processing your message',
      });
    }
  });
}
