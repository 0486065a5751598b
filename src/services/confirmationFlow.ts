// src/services/confirmationFlow.ts
import type { ActionExecutor } from './actionExecutor.js';
import type {
  CalendarAction,
  ConfirmableAction,
  ExecutionResult,
  ParsedIntent,
} from '../types/intent.js';
import {
  clearPendingAction,
  getPendingAction,
  savePendingAction,
} from '../db/pendingActionDb.js';

const ORDINAL_REPLY = /^(?:option\s*)?(\d)(?:st|nd|rd|th)?$/i;
const STANDALONE_DIGIT = /\b([1-9])\b/;
const SHORT_REPLY_LENGTH = 20;

/**
 * Outcome of checking a turn against the session's pending disambiguation
 */
export type PendingTurn =
  | { kind: 'none' }
  | { kind: 'invalid'; max: number }
  | { kind: 'executed'; action: ConfirmableAction; intent: ParsedIntent; result: ExecutionResult };

export interface PendingOptions {
  ttlSeconds: number;
  now?: Date;
}

/**
 * 1-based selection from a reply like "2", "option 2", "2nd", or a short
 * message containing one standalone digit ("the 2 one").
 *
 * This is a heuristic: "move it to 3 pm" also reads as 3.
 */
export function parseSelection(message: string): number | null {
  const trimmed = message.trim();

  const ordinal = ORDINAL_REPLY.exec(trimmed);
  if (ordinal) return Number(ordinal[1]);

  if (trimmed.length < SHORT_REPLY_LENGTH) {
    const digit = STANDALONE_DIGIT.exec(trimmed);
    if (digit) return Number(digit[1]);
  }

  return null;
}

/**
 * Resolve a turn while a disambiguation may be pending.
 *
 * - nothing pending, or the message is not a selection: pending is cleared, `none`
 * - selection out of range: pending kept, `invalid`
 * - valid selection: pending cleared, then the action runs against the chosen event
 */
export async function resolvePendingTurn(
  sessionId: string,
  message: string,
  executor: ActionExecutor,
  now: Date = new Date()
): Promise<PendingTurn> {
  const pending = getPendingAction(sessionId, now);
  if (!pending) return { kind: 'none' };

  const selection = parseSelection(message);
  if (selection === null) {
    clearPendingAction(sessionId);
    return { kind: 'none' };
  }

  const max = pending.matches.length;
  if (selection < 1 || selection > max) {
    return { kind: 'invalid', max };
  }

  const selected = pending.matches[selection - 1];
  clearPendingAction(sessionId);

  const intent: ParsedIntent = { ...pending.intent, title: selected.title };
  const result =
    pending.action === 'delete'
      ? await executor.deleteEvent({ event_id: selected.id })
      : await executor.moveEvent(
          { event_id: selected.id },
          {
            new_date: pending.intent.new_date,
            new_time: pending.intent.new_time,
            new_end_time: pending.intent.new_end_time,
          }
        );

  return { kind: 'executed', action: pending.action, intent, result };
}

function isConfirmable(action: CalendarAction): action is ConfirmableAction {
  return action === 'delete' || action === 'move';
}

/**
 * Persist a multi-match for the next turn, or clear whatever was pending
 */
export function recordOutcome(
  sessionId: string,
  action: CalendarAction,
  intent: ParsedIntent,
  result: ExecutionResult,
  options: PendingOptions
): void {
  const matches = result.multiple_matches ?? [];

  if (result.needs_confirmation && matches.length >= 2 && isConfirmable(action)) {
    savePendingAction(sessionId, { action, intent, matches }, options.ttlSeconds, options.now);
    return;
  }

  clearPendingAction(sessionId);
}
