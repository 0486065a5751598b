// src/services/timezoneCache.ts
import type { CalendarStore } from './calendarStore.js';
import type { Logger } from '../types/logger.js';

// Process-wide, never invalidated: a changed calendar timezone is picked up on restart
const timeZoneCache = new Map<string, string>();

/**
 * The user's calendar timezone, fetched once per process.
 * Falls back to `fallback` (uncached) when the lookup fails.
 */
export async function resolveUserTimeZone(
  userId: string,
  store: CalendarStore,
  fallback: string,
  log: Logger
): Promise<string> {
  const cached = timeZoneCache.get(userId);
  if (cached) return cached;

  try {
    const timeZone = await store.getTimeZone();
    timeZoneCache.set(userId, timeZone);
    return timeZone;
  } catch (err) {
    log.warn({ err, userId, fallback }, 'Could not read calendar timezone, using fallback');
    return fallback;
  }
}

export function clearTimeZoneCache(): void {
  timeZoneCache.clear();
}
