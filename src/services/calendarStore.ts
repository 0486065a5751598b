// src/services/calendarStore.ts
import { google, type calendar_v3 } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';
import type { CalendarEvent, EventTimes, NewEvent, TimeWindow } from '../types/calendar.js';

/**
 * Remote event store the pipeline reads and mutates.
 * Implementations throw on transport or API errors; callers decide how to report them.
 */
export interface CalendarStore {
  listEvents(window: TimeWindow): Promise<CalendarEvent[]>;
  insertEvent(input: NewEvent): Promise<CalendarEvent>;
  getEvent(eventId: string): Promise<CalendarEvent>;
  updateEvent(eventId: string, times: EventTimes): Promise<CalendarEvent>;
  deleteEvent(eventId: string): Promise<void>;
  getTimeZone(): Promise<string>;
}

const CALENDAR_ID = 'primary';

/**
 * Flatten a Google event into a CalendarEvent.
 * All-day events keep their bare `date`; untitled events get "(No title)".
 */
export function toCalendarEvent(event: calendar_v3.Schema$Event): CalendarEvent | null {
  if (!event.id) return null;

  const converted: CalendarEvent = {
    id: event.id,
    title: event.summary || '(No title)',
    start: event.start?.dateTime || event.start?.date || '',
    end: event.end?.dateTime || event.end?.date || '',
  };

  if (event.location) {
    converted.location = event.location;
  }

  if (event.htmlLink) {
    converted.link = event.htmlLink;
  }

  return converted;
}

function requireEvent(event: calendar_v3.Schema$Event, operation: string): CalendarEvent {
  const converted = toCalendarEvent(event);
  if (!converted) {
    throw new Error(`Calendar ${operation} returned an event without an id`);
  }
  return converted;
}

/**
 * CalendarStore over the user's primary Google Calendar
 */
export class GoogleCalendarStore implements CalendarStore {
  private readonly calendar: calendar_v3.Calendar;

  constructor(auth: OAuth2Client) {
    this.calendar = google.calendar({ version: 'v3', auth });
  }

  async listEvents(window: TimeWindow): Promise<CalendarEvent[]> {
    const response = await this.calendar.events.list({
      calendarId: CALENDAR_ID,
      timeMin: window.timeMin,
      timeMax: window.timeMax,
      singleEvents: true,
      orderBy: 'startTime',
    });

    const events: CalendarEvent[] = [];
    for (const item of response.data.items || []) {
      const converted = toCalendarEvent(item);
      if (converted) events.push(converted);
    }
    return events;
  }

  async insertEvent(input: NewEvent): Promise<CalendarEvent> {
    const response = await this.calendar.events.insert({
      calendarId: CALENDAR_ID,
      requestBody: {
        summary: input.title,
        start: { dateTime: input.start, timeZone: input.timeZone },
        end: { dateTime: input.end, timeZone: input.timeZone },
      },
    });

    return requireEvent(response.data, 'insert');
  }

  async getEvent(eventId: string): Promise<CalendarEvent> {
    const response = await this.calendar.events.get({
      calendarId: CALENDAR_ID,
      eventId,
    });

    return requireEvent(response.data, 'get');
  }

  async updateEvent(eventId: string, times: EventTimes): Promise<CalendarEvent> {
    // patch, so attendees, description and reminders stay as they are
    const response = await this.calendar.events.patch({
      calendarId: CALENDAR_ID,
      eventId,
      requestBody: {
        start: { dateTime: times.start, timeZone: times.timeZone },
        end: { dateTime: times.end, timeZone: times.timeZone },
      },
    });

    return requireEvent(response.data, 'update');
  }

  async deleteEvent(eventId: string): Promise<void> {
    await this.calendar.events.delete({
      calendarId: CALENDAR_ID,
      eventId,
    });
  }

  async getTimeZone(): Promise<string> {
    const response = await this.calendar.settings.get({ setting: 'timezone' });
    const value = response.data.value;
    if (!value) {
      throw new Error('Calendar settings returned no timezone');
    }
    return value;
  }
}
