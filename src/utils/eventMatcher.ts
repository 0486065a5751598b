// src/utils/eventMatcher.ts
import type { CalendarEvent, MatchCandidate, TimeWindow } from '../types/calendar.js';
import type { CalendarStore } from '../services/calendarStore.js';
import type { Logger } from '../types/logger.js';
import { dayWindow, localStartOf, parseTimeOfDay, rollingWindow, startInstant, type TimeOfDay } from './timeResolver.js';
import { formatRange } from './presentation.js';

export const SEARCH_WINDOW_DAYS = 30;
export const LIST_WINDOW_DAYS = 7;

export interface EventCriteria {
  title?: string | undefined;
  date?: string | undefined;
  time?: string | undefined;
}

export interface SearchOptions {
  now?: Date;
  log?: Logger;
}

/**
 * The local day named by `date`, or now through `days` days ahead
 */
export function searchWindow(
  date: string | undefined,
  timeZone: string,
  now: Date,
  days: number = SEARCH_WINDOW_DAYS
): TimeWindow {
  return date ? dayWindow(date, timeZone, now) : rollingWindow(days, now);
}

function tokens(text: string): string[] {
  return text.toLowerCase().split(/\s+/).filter(Boolean);
}

/**
 * Loose title match: some query word is contained in some title word, or the other way round.
 * "standup" matches "Daily Standup"; "meet" matches "Meeting".
 */
export function titleMatches(query: string, title: string): boolean {
  const titleWords = tokens(title);
  return tokens(query).some((queryWord) =>
    titleWords.some((titleWord) => titleWord.includes(queryWord) || queryWord.includes(titleWord))
  );
}

/**
 * Exact hour and minute match on the event's local start. All-day events never match.
 */
export function matchesTime(event: CalendarEvent, target: TimeOfDay, timeZone: string): boolean {
  const start = localStartOf(event.start, timeZone);
  return start !== null && start.hour === target.hour && start.minute === target.minute;
}

export function toCandidate(event: CalendarEvent): MatchCandidate {
  return {
    id: event.id,
    title: event.title,
    start: event.start,
    end: event.end,
    time: formatRange(event.start, event.end),
  };
}

function byStart(a: CalendarEvent, b: CalendarEvent, timeZone: string): number {
  const diff = startInstant(a.start, timeZone) - startInstant(b.start, timeZone);
  return Number.isNaN(diff) ? a.start.localeCompare(b.start) : diff;
}

/**
 * Events matching every given criterion, earliest first.
 * A store failure is logged and reads as no matches, as does a time that cannot be parsed.
 */
export async function searchEvents(
  store: CalendarStore,
  timeZone: string,
  criteria: EventCriteria,
  options: SearchOptions = {}
): Promise<MatchCandidate[]> {
  const now = options.now ?? new Date();
  const window = searchWindow(criteria.date, timeZone, now);

  let events: CalendarEvent[];
  try {
    events = await store.listEvents(window);
  } catch (err) {
    options.log?.error({ err, window }, 'Event search failed');
    return [];
  }

  const target = criteria.time ? parseTimeOfDay(criteria.time) : null;
  if (criteria.time && !target) return [];
  const title = criteria.title?.trim();

  return events
    .filter((event) => !title || titleMatches(title, event.title))
    .filter((event) => !target || matchesTime(event, target, timeZone))
    .sort((a, b) => byStart(a, b, timeZone))
    .map(toCandidate);
}
