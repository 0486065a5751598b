// src/utils/timeResolver.ts
import * as chrono from 'chrono-node';
import { addDays, format, isValid, parseISO } from 'date-fns';
import { formatInTimeZone, fromZonedTime, toZonedTime } from 'date-fns-tz';
import type { TimeWindow } from '../types/calendar.js';

export const DEFAULT_DURATION_MS = 60 * 60 * 1000;
const DAY_MS = 24 * 60 * 60 * 1000;

// Noon, so a dateless command never lands on an ambiguous midnight
const DEFAULT_TIME: TimeOfDay = { hour: 12, minute: 0 };

const WEEKDAYS = new Map<string, number>([
  ['sunday', 0], ['sun', 0],
  ['monday', 1], ['mon', 1],
  ['tuesday', 2], ['tue', 2], ['tues', 2],
  ['wednesday', 3], ['wed', 3],
  ['thursday', 4], ['thu', 4], ['thur', 4], ['thurs', 4],
  ['friday', 5], ['fri', 5],
  ['saturday', 6], ['sat', 6],
]);

const TIME_PATTERN = /^(\d{1,2})(?::(\d{2}))?\s*(am|pm)?/;
const ISO_DATE_PATTERN = /^(\d{4}-\d{2}-\d{2})/;
const DATE_TIME_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}/;
const OFFSET_PATTERN = /(?:[zZ]|[+-]\d{2}:?\d{2})$/;

export interface ResolveOptions {
  /** Reference instant; defaults to the current time */
  now?: Date;
  /** IANA zone whose calendar day counts as "today"; defaults to the process zone */
  timeZone?: string;
}

export interface TimeOfDay {
  hour: number;
  minute: number;
}

export interface ResolvedRange {
  start: string;
  end: string;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function todayIn(now: Date, timeZone?: string): string {
  return timeZone ? formatInTimeZone(now, timeZone, 'yyyy-MM-dd') : format(now, 'yyyy-MM-dd');
}

// Calendar-day arithmetic happens at local noon to stay clear of DST edges
function atNoon(isoDate: string): Date {
  return parseISO(`${isoDate}T12:00:00`);
}

/**
 * Resolve a natural-language or ISO date to `YYYY-MM-DD`, or null when the
 * expression is not recognised.
 *
 * Precedence: today/tomorrow/yesterday, then weekday names (next occurrence
 * strictly after today), then a literal ISO date, then chrono-node.
 */
export function recognizeDate(dateExpr: string, options: ResolveOptions = {}): string | null {
  const now = options.now ?? new Date();
  const today = todayIn(now, options.timeZone);
  const anchor = atNoon(today);
  const expr = dateExpr.toLowerCase().trim();

  if (expr === 'today') return today;
  if (expr === 'tomorrow') return format(addDays(anchor, 1), 'yyyy-MM-dd');
  if (expr === 'yesterday') return format(addDays(anchor, -1), 'yyyy-MM-dd');

  const weekday = WEEKDAYS.get(expr);
  if (weekday !== undefined) {
    const daysAhead = (weekday - anchor.getDay() + 7) % 7 || 7;
    return format(addDays(anchor, daysAhead), 'yyyy-MM-dd');
  }

  const isoMatch = ISO_DATE_PATTERN.exec(expr);
  if (isoMatch && isValid(parseISO(isoMatch[1]))) {
    return isoMatch[1];
  }

  if (!expr) return null;

  const parsed = chrono.parseDate(dateExpr, anchor, { forwardDate: true });
  if (parsed && isValid(parsed)) {
    return format(parsed, 'yyyy-MM-dd');
  }

  return null;
}

/**
 * Like recognizeDate, but falls back to today. Never throws.
 */
export function resolveDate(dateExpr: string | undefined, options: ResolveOptions = {}): string {
  const resolved = dateExpr ? recognizeDate(dateExpr, options) : null;
  return resolved ?? todayIn(options.now ?? new Date(), options.timeZone);
}

/**
 * Parse "3pm", "3:30 pm", "15:00" or "9" into a 24-hour time of day.
 * No meridiem means 24-hour. Returns null when nothing usable is found.
 */
export function parseTimeOfDay(timeExpr: string): TimeOfDay | null {
  const match = TIME_PATTERN.exec(timeExpr.toLowerCase().trim());
  if (!match) return null;

  let hour = Number(match[1]);
  const minute = match[2] ? Number(match[2]) : 0;
  const meridiem = match[3];

  if (meridiem === 'pm' && hour !== 12) {
    hour += 12;
  } else if (meridiem === 'am' && hour === 12) {
    hour = 0;
  }

  if (hour > 23 || minute > 59) return null;

  return { hour, minute };
}

/**
 * Resolve a date and optional time into a naive `YYYY-MM-DDTHH:mm:ss` pair,
 * the end being one hour after the start. Unparseable parts fall back to
 * today and noon; this never throws.
 *
 * @example
 * resolveDateTime('tomorrow', '3pm', { now }) // { start: '2026-10-20T15:00:00', end: '2026-10-20T16:00:00' }
 */
export function resolveDateTime(
  dateExpr: string | undefined,
  timeExpr?: string,
  options: ResolveOptions = {}
): ResolvedRange {
  const day = resolveDate(dateExpr, options);
  const time = (timeExpr ? parseTimeOfDay(timeExpr) : null) ?? DEFAULT_TIME;
  const start = `${day}T${pad(time.hour)}:${pad(time.minute)}:00`;

  return { start, end: addToNaive(start, DEFAULT_DURATION_MS) };
}

/**
 * True when the timestamp carries a time of day (all-day events do not)
 */
export function hasTimeComponent(timestamp: string | undefined | null): boolean {
  return typeof timestamp === 'string' && DATE_TIME_PATTERN.test(timestamp.trim());
}

/**
 * Shift a naive wall-clock timestamp by `ms`, treating it as zone-free
 */
export function addToNaive(naive: string, ms: number): string {
  const base = new Date(`${naive.slice(0, 19)}Z`);
  return new Date(base.getTime() + ms).toISOString().slice(0, 19);
}

/**
 * Length of an event in milliseconds, or null when either end is all-day or unparseable
 */
export function durationMs(start: string, end: string): number | null {
  if (!hasTimeComponent(start) || !hasTimeComponent(end)) return null;

  const startDate = parseISO(start);
  const endDate = parseISO(end);
  if (!isValid(startDate) || !isValid(endDate)) return null;

  return endDate.getTime() - startDate.getTime();
}

/**
 * Calendar date (`YYYY-MM-DD`) written in a timestamp, if any
 */
export function datePart(timestamp: string): string | null {
  const match = ISO_DATE_PATTERN.exec(timestamp.trim());
  return match ? match[1] : null;
}

/**
 * Hour and minute an event starts at in the user's zone; null for all-day events.
 * Offset-qualified timestamps are converted into `timeZone`, naive ones are read as written.
 */
export function localStartOf(timestamp: string, timeZone: string): TimeOfDay | null {
  if (!hasTimeComponent(timestamp)) return null;

  const trimmed = timestamp.trim();
  if (OFFSET_PATTERN.test(trimmed)) {
    const zoned = toZonedTime(trimmed, timeZone);
    if (!isValid(zoned)) return null;
    return { hour: zoned.getHours(), minute: zoned.getMinutes() };
  }

  return { hour: Number(trimmed.slice(11, 13)), minute: Number(trimmed.slice(14, 16)) };
}

/**
 * Epoch milliseconds an event starts at. All-day dates and naive timestamps are read in `timeZone`;
 * NaN when unparseable.
 */
export function startInstant(timestamp: string, timeZone: string): number {
  const trimmed = timestamp.trim();
  if (OFFSET_PATTERN.test(trimmed)) return Date.parse(trimmed);

  const local = hasTimeComponent(trimmed) ? trimmed.slice(0, 19) : datePart(trimmed);
  if (!local) return Number.NaN;

  const instant = fromZonedTime(local.length === 10 ? `${local}T00:00:00` : local, timeZone);
  return isValid(instant) ? instant.getTime() : Number.NaN;
}

/**
 * RFC3339 bounds of one local calendar day (00:00:00 to 23:59:59) in `timeZone`
 */
export function dayWindow(
  dateExpr: string,
  timeZone: string,
  now: Date = new Date()
): TimeWindow {
  const day = resolveDate(dateExpr, { now, timeZone });
  const rfc3339 = "yyyy-MM-dd'T'HH:mm:ssXXX";

  return {
    timeMin: formatInTimeZone(fromZonedTime(`${day}T00:00:00`, timeZone), timeZone, rfc3339),
    timeMax: formatInTimeZone(fromZonedTime(`${day}T23:59:59`, timeZone), timeZone, rfc3339),
  };
}

/**
 * Window from `now` through `days` days later
 */
export function rollingWindow(days: number, now: Date = new Date()): TimeWindow {
  return {
    timeMin: now.toISOString(),
    timeMax: new Date(now.getTime() + days * DAY_MS).toISOString(),
  };
}
