// src/services/calendarAccess.ts
import { GoogleCalendarStore, type CalendarStore } from './calendarStore.js';
import { getValidAccessFor } from '../lib/userContext.js';
import type { Logger } from '../types/logger.js';

/**
 * Builds the calendar store for a user. Routes take one of these so tests
 * can hand in an in-memory store.
 */
export type CalendarAccessFactory = (userId: string, log: Logger) => Promise<CalendarStore>;

export const googleCalendarAccess: CalendarAccessFactory = async (userId, log) => {
  const auth = await getValidAccessFor(userId, log);
  return new GoogleCalendarStore(auth);
};
