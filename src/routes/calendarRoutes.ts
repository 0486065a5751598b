// src/routes/calendarRoutes.ts
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { isValid, parseISO } from 'date-fns';
import { fromZonedTime } from 'date-fns-tz';
import { loadConfig } from '../config/env.js';
import { getUserId } from '../lib/userContext.js';
import { requireAuth } from '../middleware/session.js';
import { googleCalendarAccess, type CalendarAccessFactory } from '../services/calendarAccess.js';
import { resolveUserTimeZone } from '../services/timezoneCache.js';
import { hasTimeComponent } from '../utils/timeResolver.js';

const OFFSET_PATTERN = /(?:[zZ]|[+-]\d{2}:?\d{2})$/;

const isoBound = z
  .string()
  .trim()
  .refine((value) => isValid(parseISO(value)), 'Invalid date format');

/**
 * Zod schema for the calendar view range
 */
const EventsQuerySchema = z.object({
  start: isoBound,
  end: isoBound,
});

export interface CalendarRouteOptions {
  calendarAccess?: CalendarAccessFactory;
  defaultTimeZone?: string;
}

/**
 * RFC3339 instant for a query bound; bounds without an offset are read in the user's zone
 */
function toInstant(bound: string, timeZone: string): string {
  if (OFFSET_PATTERN.test(bound)) return parseISO(bound).toISOString();
  const naive = hasTimeComponent(bound) ? bound : `${bound}T00:00:00`;
  return fromZonedTime(naive, timeZone).toISOString();
}

/**
 * Register calendar view routes
 */
export async function calendarRoutes(
  fastify: FastifyInstance,
  options: CalendarRouteOptions
): Promise<void> {
  const calendarAccess = options.calendarAccess ?? googleCalendarAccess;
  const defaultTimeZone = options.defaultTimeZone ?? loadConfig().DEFAULT_TIMEZONE;

  /**
   * GET /api/calendar/events?start=...&end=...
   * Events in a range, shaped for a calendar grid
   */
  fastify.get('/api/calendar/events', { preHandler: requireAuth }, async (request, reply) => {
    const queryResult = EventsQuerySchema.safeParse(request.query);
    if (!queryResult.success) {
      const missing = queryResult.error.issues.some((issue) => issue.code === 'invalid_type');
      return reply.code(400).send({
        success: false,
        error: missing ? 'Both start and end parameters are required' : 'Invalid date format',
      });
    }

    try {
      const userId = getUserId(request);
      const store = await calendarAccess(userId, request.log);
      const timeZone = await resolveUserTimeZone(userId, store, defaultTimeZone, request.log);

      const events = await store.listEvents({
        timeMin: toInstant(queryResult.data.start, timeZone),
        timeMax: toInstant(queryResult.data.end, timeZone),
      });

      return reply.code(200).send({
        success: true,
        events: events.map((event) => ({
          id: event.id,
          title: event.title,
          start: event.start,
          end: event.end,
          allDay: !hasTimeComponent(event.start),
        })),
      });
    } catch (err) {
      request.log.error({ err }, 'Failed to fetch calendar events');
      return reply.code(500).send({
        success: false,
        error: 'Failed to fetch calendar events',
      });
    }
  });
}
