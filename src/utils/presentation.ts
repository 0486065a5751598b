// src/utils/presentation.ts
import { format } from 'date-fns';
import { hasTimeComponent, recognizeDate, type ResolveOptions } from './timeResolver.js';

const ISO_DAY_PATTERN = /^\d{4}-\d{2}-\d{2}/;
const CONVERSATIONAL_TIME_PATTERN = /^(\d{1,2})(?::(\d{2}))?\s*(am|pm)/;
const TWENTY_FOUR_HOUR_PATTERN = /^(\d{1,2}):(\d{2})$/;

/**
 * English ordinal suffix; 11th, 12th and 13th are the exceptions
 */
export function ordinalSuffix(day: number): string {
  const lastTwo = day % 100;
  if (lastTwo >= 11 && lastTwo <= 13) return 'th';

  switch (day % 10) {
    case 1:
      return 'st';
    case 2:
      return 'nd';
    case 3:
      return 'rd';
    default:
      return 'th';
  }
}

function clock(hour: number, minute: number): string {
  const meridiem = hour < 12 ? 'AM' : 'PM';
  const hour12 = hour % 12 === 0 ? 12 : hour % 12;
  return `${hour12}:${String(minute).padStart(2, '0')} ${meridiem}`;
}

function calendarDate(year: number, month: number, day: number): string | null {
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return `${format(date, 'MMMM')} ${day}${ordinalSuffix(day)}, ${year}`;
}

/**
 * "March 1st, 2026" from an ISO date-time, an ISO date or a relative
 * expression ("tomorrow", "friday"). Date-times are read at the wall clock
 * written in the string. Unrecognised input comes back unchanged.
 */
export function formatDate(value: string, options: ResolveOptions = {}): string {
  const trimmed = value.trim();
  const isoDay = ISO_DAY_PATTERN.test(trimmed) ? trimmed.slice(0, 10) : recognizeDate(trimmed, options);
  if (!isoDay) return value;

  const [year, month, day] = isoDay.split('-').map(Number);
  return calendarDate(year, month, day) ?? value;
}

/**
 * "3:00 PM" from an ISO date-time, "15:00", or "3pm"/"3:30 pm".
 * Conversational times keep the hour as written. Anything else comes back unchanged.
 */
export function formatTime(value: string): string {
  const trimmed = value.trim();

  if (hasTimeComponent(trimmed)) {
    const hour = Number(trimmed.slice(11, 13));
    const minute = Number(trimmed.slice(14, 16));
    return hour < 24 && minute < 60 ? clock(hour, minute) : value;
  }

  const conversational = CONVERSATIONAL_TIME_PATTERN.exec(trimmed.toLowerCase());
  if (conversational) {
    const minute = conversational[2] ?? '00';
    return `${Number(conversational[1])}:${minute} ${conversational[3].toUpperCase()}`;
  }

  const twentyFour = TWENTY_FOUR_HOUR_PATTERN.exec(trimmed);
  if (twentyFour) {
    const hour = Number(twentyFour[1]);
    const minute = Number(twentyFour[2]);
    if (hour < 24 && minute < 60) return clock(hour, minute);
  }

  return value;
}

/**
 * "3:00 PM - 4:00 PM", or "All day" when either end has no time of day
 */
export function formatRange(start: string, end: string): string {
  if (!hasTimeComponent(start) || !hasTimeComponent(end)) {
    return 'All day';
  }

  return `${formatTime(start)} - ${formatTime(end)}`;
}
