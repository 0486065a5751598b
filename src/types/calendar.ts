// src/types/calendar.ts

/**
 * Event as read back from the remote calendar.
 *
 * `start`/`end` are ISO date-times with an offset (`2026-10-20T15:00:00-07:00`)
 * or, for all-day events, a bare date (`2026-10-20`). Consumers must check for
 * the time component before formatting or filtering by hour.
 */
export interface CalendarEvent {
  id: string;
  title: string;
  start: string;
  end: string;
  location?: string;
  link?: string;
}

/**
 * Event to insert. Times are timezone-naive wall-clock strings
 * (`YYYY-MM-DDTHH:mm:ss`) interpreted in `timeZone`.
 */
export interface NewEvent {
  title: string;
  start: string;
  end: string;
  timeZone: string;
}

/**
 * Replacement start/end for an existing event (same conventions as NewEvent)
 */
export interface EventTimes {
  start: string;
  end: string;
  timeZone: string;
}

/**
 * RFC3339 bounds passed to the remote list call
 */
export interface TimeWindow {
  timeMin: string;
  timeMax: string;
}

/**
 * Event matched by a search, with its display time range ("3:00 PM - 4:00 PM")
 */
export interface MatchCandidate {
  id: string;
  title: string;
  start: string;
  end: string;
  time: string;
}

export interface ListedEvent extends MatchCandidate {
  location: string;
}

/**
 * Created or updated event returned to the caller
 */
export interface EventSummary {
  id: string;
  title: string;
  start: string;
  end: string;
  link?: string;
}
