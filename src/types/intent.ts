// src/types/intent.ts
import type { EventSummary, ListedEvent, MatchCandidate } from './calendar.js';

export type CalendarAction = 'create' | 'delete' | 'move' | 'list';

/**
 * Actions that can end in a multi-match and therefore a pending confirmation
 */
export type ConfirmableAction = Extract<CalendarAction, 'delete' | 'move'>;

/**
 * Structured command produced by the LLM.
 * Field names follow the JSON contract given to the model.
 */
export interface ParsedIntent {
  action: CalendarAction;
  title?: string | undefined;
  date?: string | undefined;
  time?: string | undefined;
  end_time?: string | undefined;
  new_date?: string | undefined;
  new_time?: string | undefined;
  new_end_time?: string | undefined;
  confidence: number;
}

/**
 * Lookup criteria for delete/move. `event_id` is set once the user has
 * picked a candidate and bypasses the search.
 */
export interface EventQuery {
  title?: string | undefined;
  date?: string | undefined;
  time?: string | undefined;
  event_id?: string | undefined;
}

export interface MoveTarget {
  new_date?: string | undefined;
  new_time?: string | undefined;
  new_end_time?: string | undefined;
}

export interface ExecutionResult {
  success: boolean;
  message: string;
  event?: EventSummary;
  multiple_matches?: MatchCandidate[];
  events?: ListedEvent[];
  needs_confirmation: boolean;
}

/**
 * Multi-match awaiting a numeric reply, scoped to one session
 */
export interface PendingDisambiguation {
  action: ConfirmableAction;
  intent: ParsedIntent;
  matches: MatchCandidate[];
}

/**
 * Body returned by POST /api/message
 */
export interface CommandReply {
  success: boolean;
  message: string;
  result: ExecutionResult;
}
