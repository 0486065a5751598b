// src/services/actionExecutor.ts
import type { CalendarStore } from './calendarStore.js';
import type { CalendarEvent, EventSummary, ListedEvent } from '../types/calendar.js';
import type { EventQuery, ExecutionResult, MoveTarget, ParsedIntent } from '../types/intent.js';
import type { Logger } from '../types/logger.js';
import {
  addToNaive,
  datePart,
  durationMs,
  parseTimeOfDay,
  resolveDateTime,
  type ResolveOptions,
} from '../utils/timeResolver.js';
import {
  LIST_WINDOW_DAYS,
  matchesTime,
  searchEvents,
  searchWindow,
  toCandidate,
} from '../utils/eventMatcher.js';

const DAY_MS = 24 * 60 * 60 * 1000;

// "2 hour", "90 minute", "30 min", "1.5 hours", "for 2-hour"
const DURATION_PHRASE = /(?:\bfor\s+)?\b(\d+(?:\.\d+)?)\s*-?\s*(hours?|hrs?|minutes?|mins?)\b/i;

export interface ActionExecutorOptions {
  store: CalendarStore;
  /** IANA zone events are created in and matched against */
  timeZone: string;
  log: Logger;
  /** Clock, injectable for tests */
  now?: () => Date;
}

interface TitleParts {
  title: string;
  durationMs: number | null;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toSummary(event: CalendarEvent): EventSummary {
  const summary: EventSummary = {
    id: event.id,
    title: event.title,
    start: event.start,
    end: event.end,
  };
  if (event.link) {
    summary.link = event.link;
  }
  return summary;
}

function titleCase(text: string): string {
  return text
    .split(/\s+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

/**
 * Pull a duration phrase out of a title: "team sync 90 minutes" becomes
 * "Team Sync" lasting 90 minutes.
 */
export function splitTitle(rawTitle: string | undefined): TitleParts {
  const text = rawTitle ?? '';
  const match = DURATION_PHRASE.exec(text);

  let duration: number | null = null;
  let remaining = text;

  if (match) {
    const amount = Number(match[1]);
    const unitMs = match[2].toLowerCase().startsWith('h') ? 60 * 60 * 1000 : 60 * 1000;
    if (amount > 0) {
      duration = Math.round(amount * unitMs);
      remaining = text.slice(0, match.index) + text.slice(match.index + match[0].length);
    }
  }

  return {
    title: titleCase(remaining) || 'Untitled Event',
    durationMs: duration,
  };
}

function notFoundMessage(query: EventQuery): string {
  if (query.time) {
    return `No events found at ${query.time}` + (query.date ? ` on ${query.date}` : '');
  }
  return 'No matching events found';
}

/**
 * Applies create/delete/move/list intents to one user's calendar.
 * Remote failures never escape: they come back as `success: false` results.
 */
export class ActionExecutor {
  private readonly store: CalendarStore;
  private readonly timeZone: string;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(options: ActionExecutorOptions) {
    this.store = options.store;
    this.timeZone = options.timeZone;
    this.log = options.log;
    this.now = options.now ?? (() => new Date());
  }

  private resolveOptions(): ResolveOptions {
    return { now: this.now(), timeZone: this.timeZone };
  }

  /**
   * Dispatch a parsed intent to the matching operation
   */
  async execute(intent: ParsedIntent): Promise<ExecutionResult> {
    const query: EventQuery = { title: intent.title, date: intent.date, time: intent.time };

    switch (intent.action) {
      case 'create':
        return this.createEvent(intent);
      case 'delete':
        return this.deleteEvent(query);
      case 'move':
        return this.moveEvent(query, {
          new_date: intent.new_date,
          new_time: intent.new_time,
          new_end_time: intent.new_end_time,
        });
      case 'list':
        return this.listEvents(intent.date, intent.time);
      default:
        return {
          success: false,
          message: `Unknown action: ${String(intent.action)}`,
          needs_confirmation: false,
        };
    }
  }

  async createEvent(intent: ParsedIntent): Promise<ExecutionResult> {
    const date = intent.date || 'today';
    const { title, durationMs: phraseDuration } = splitTitle(intent.title);
    const { start, end: defaultEnd } = resolveDateTime(date, intent.time, this.resolveOptions());

    let end = defaultEnd;
    if (intent.end_time && parseTimeOfDay(intent.end_time)) {
      end = this.explicitEnd(start, date, intent.end_time);
    } else if (phraseDuration !== null) {
      end = addToNaive(start, phraseDuration);
    }

    try {
      const created = await this.store.insertEvent({ title, start, end, timeZone: this.timeZone });
      this.log.info({ eventId: created.id, start, end }, 'Event created');

      return {
        success: true,
        message: `Event "${title}" created successfully`,
        event: toSummary(created),
        needs_confirmation: false,
      };
    } catch (err) {
      this.log.error({ err }, 'Failed to create event');
      return {
        success: false,
        message: `Failed to create event: ${errorMessage(err)}`,
        needs_confirmation: false,
      };
    }
  }

  async deleteEvent(query: EventQuery): Promise<ExecutionResult> {
    if (query.event_id) {
      try {
        await this.store.deleteEvent(query.event_id);
        this.log.info({ eventId: query.event_id }, 'Event deleted');
        return { success: true, message: 'Event deleted successfully', needs_confirmation: false };
      } catch (err) {
        this.log.error({ err, eventId: query.event_id }, 'Failed to delete event');
        return {
          success: false,
          message: `Failed to delete event: ${errorMessage(err)}`,
          needs_confirmation: false,
        };
      }
    }

    try {
      const matches = await searchEvents(this.store, this.timeZone, query, {
        now: this.now(),
        log: this.log,
      });

      if (matches.length === 0) {
        return { success: false, message: notFoundMessage(query), needs_confirmation: false };
      }

      if (matches.length > 1) {
        return {
          success: false,
          message: `Found ${matches.length} matching events. Please specify which one:`,
          multiple_matches: matches,
          needs_confirmation: true,
        };
      }

      const [match] = matches;
      await this.store.deleteEvent(match.id);
      this.log.info({ eventId: match.id }, 'Event deleted');

      return {
        success: true,
        message: `Event "${match.title}" deleted successfully`,
        event: { id: match.id, title: match.title, start: match.start, end: match.end },
        needs_confirmation: false,
      };
    } catch (err) {
      this.log.error({ err }, 'Failed to delete event');
      return {
        success: false,
        message: `Error searching for events: ${errorMessage(err)}`,
        needs_confirmation: false,
      };
    }
  }

  async moveEvent(query: EventQuery, target: MoveTarget): Promise<ExecutionResult> {
    if (query.event_id) {
      try {
        return await this.reschedule(query.event_id, target);
      } catch (err) {
        this.log.error({ err, eventId: query.event_id }, 'Failed to move event');
        return {
          success: false,
          message: `Failed to move event: ${errorMessage(err)}`,
          needs_confirmation: false,
        };
      }
    }

    try {
      const matches = await searchEvents(this.store, this.timeZone, query, {
        now: this.now(),
        log: this.log,
      });

      if (matches.length === 0) {
        return { success: false, message: notFoundMessage(query), needs_confirmation: false };
      }

      if (matches.length > 1) {
        return {
          success: false,
          message: `Found ${matches.length} matching events. Please specify which one:`,
          multiple_matches: matches,
          needs_confirmation: true,
        };
      }

      return await this.reschedule(matches[0].id, target);
    } catch (err) {
      this.log.error({ err }, 'Failed to move event');
      return {
        success: false,
        message: `Error searching for events: ${errorMessage(err)}`,
        needs_confirmation: false,
      };
    }
  }

  async listEvents(date?: string, time?: string): Promise<ExecutionResult> {
    try {
      const window = searchWindow(date, this.timeZone, this.now(), LIST_WINDOW_DAYS);
      const events = await this.store.listEvents(window);
      const target = time ? parseTimeOfDay(time) : null;

      const listed: ListedEvent[] = events
        .filter((event) => !time || (target !== null && matchesTime(event, target, this.timeZone)))
        .map((event) => ({ ...toCandidate(event), location: event.location ?? '' }));

      if (listed.length === 0) {
        const message = time
          ? `No events found at ${time}` + (date ? ` on ${date}` : '')
          : `No events found for ${date || 'the next 7 days'}`;
        return { success: true, message, events: [], needs_confirmation: false };
      }

      return {
        success: true,
        message: `Found ${listed.length} event(s)`,
        events: listed,
        needs_confirmation: false,
      };
    } catch (err) {
      this.log.error({ err }, 'Failed to list events');
      return {
        success: false,
        message: `Error fetching events: ${errorMessage(err)}`,
        events: [],
        needs_confirmation: false,
      };
    }
  }

  /**
   * Fetch the event, work out its new start and end, and write them back.
   * Throws on remote failure.
   */
  private async reschedule(eventId: string, target: MoveTarget): Promise<ExecutionResult> {
    const original = await this.store.getEvent(eventId);

    // A bare new time keeps the event on its current day
    const newDate = target.new_date || datePart(original.start) || undefined;
    const { start, end: defaultEnd } = resolveDateTime(newDate, target.new_time, this.resolveOptions());

    let end = defaultEnd;
    if (target.new_end_time && parseTimeOfDay(target.new_end_time)) {
      end = this.explicitEnd(start, newDate, target.new_end_time);
    } else {
      const originalDuration = durationMs(original.start, original.end);
      if (originalDuration !== null && originalDuration > 0) {
        end = addToNaive(start, originalDuration);
      }
    }

    const updated = await this.store.updateEvent(eventId, { start, end, timeZone: this.timeZone });
    this.log.info({ eventId, start, end }, 'Event moved');

    return {
      success: true,
      message: `Event "${updated.title}" moved successfully`,
      event: toSummary(updated),
      needs_confirmation: false,
    };
  }

  /**
   * End time on the start's day; an end at or before the start is taken to be past midnight
   */
  private explicitEnd(start: string, date: string | undefined, endTime: string): string {
    const { start: end } = resolveDateTime(date, endTime, this.resolveOptions());
    return end > start ? end : addToNaive(end, DAY_MS);
  }
}
