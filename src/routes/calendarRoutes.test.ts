// src/routes/calendarRoutes.test.ts
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { register } from 'prom-client';
import { buildApp } from '../app.js';
import { createSession } from '../db/sessionDb.js';
import { clearTimeZoneCache } from '../services/timezoneCache.js';
import { InMemoryCalendarStore } from '../../tests/helpers/inMemoryCalendarStore.js';

describe('GET /api/calendar/events', () => {
  let app: FastifyInstance;
  let store: InMemoryCalendarStore;
  let cookies: { session_id: string };

  beforeEach(async () => {
    register.clear();
    clearTimeZoneCache();

    store = new InMemoryCalendarStore([
      { id: 'e1', title: 'Team Meeting', start: '2026-10-20T14:00:00-07:00', end: '2026-10-20T15:00:00-07:00' },
      { id: 'e3', title: 'Project meeting', start: '2026-10-20T10:00:00-07:00', end: '2026-10-20T11:00:00-07:00' },
      { id: 'e4', title: 'Offsite', start: '2026-10-20', end: '2026-10-21' },
    ]);

    app = await buildApp({ calendarAccess: async () => store });

    const sessionId = createSession('user-1', new Date(Date.now() + 24 * 60 * 60 * 1000));
    cookies = { session_id: app.signCookie(sessionId) };
  });

  afterEach(async () => {
    await app.close();
  });

  it('should require a session', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/api/calendar/events',
      query: { start: '2026-10-20', end: '2026-10-21' },
    });

    expect(response.statusCode).toBe(401);
  });

  it('should require both bounds', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/api/calendar/events',
      cookies,
      query: { start: '2026-10-20' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ success: false, error: 'Both start and end parameters are required' });
  });

  it('should reject bounds that are not ISO dates', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/api/calendar/events',
      cookies,
      query: { start: 'next week', end: '2026-10-21' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ success: false, error: 'Invalid date format' });
  });

  it('should read bare dates in the calendar timezone', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/api/calendar/events',
      cookies,
      query: { start: '2026-10-20', end: '2026-10-21' },
    });

    expect(response.statusCode).toBe(200);
    expect(store.listCalls).toEqual([
      { timeMin: '2026-10-20T07:00:00.000Z', timeMax: '2026-10-21T07:00:00.000Z' },
    ]);
    expect(response.json()).toEqual({
      success: true,
      events: [
        { id: 'e4', title: 'Offsite', start: '2026-10-20', end: '2026-10-21', allDay: true },
        {
          id: 'e3',
          title: 'Project meeting',
          start: '2026-10-20T10:00:00-07:00',
          end: '2026-10-20T11:00:00-07:00',
          allDay: false,
        },
        {
          id: 'e1',
          title: 'Team Meeting',
          start: '2026-10-20T14:00:00-07:00',
          end: '2026-10-20T15:00:00-07:00',
          allDay: false,
        },
      ],
    });
  });

  it('should pass offset bounds through as instants', async () => {
    await app.inject({
      method: 'GET',
      url: '/api/calendar/events',
      cookies,
      query: { start: '2026-10-20T00:00:00Z', end: '2026-10-20T12:00:00Z' },
    });

    expect(store.listCalls).toEqual([
      { timeMin: '2026-10-20T00:00:00.000Z', timeMax: '2026-10-20T12:00:00.000Z' },
    ]);
  });

  it('should report a calendar failure', async () => {
    store.failing.add('listEvents');

    const response = await app.inject({
      method: 'GET',
      url: '/api/calendar/events',
      cookies,
      query: { start: '2026-10-20', end: '2026-10-21' },
    });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ success: false, error: 'Failed to fetch calendar events' });
  });
});
