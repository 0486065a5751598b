// src/db/pendingActionDb.ts
import { z } from 'zod';
import db from './db.js';
import type { PendingDisambiguation } from '../types/intent.js';

interface PendingRow {
  session_id: string;
  action: string;
  intent_json: string;
  matches_json: string;
  expires_at: string;
}

const optionalText = z.string().optional();

// Rows are written by this module only, but are parsed back rather than trusted
const pendingSchema = z.object({
  action: z.enum(['delete', 'move']),
  intent: z.object({
    action: z.enum(['create', 'delete', 'move', 'list']),
    title: optionalText,
    date: optionalText,
    time: optionalText,
    end_time: optionalText,
    new_date: optionalText,
    new_time: optionalText,
    new_end_time: optionalText,
    confidence: z.number(),
  }),
  matches: z.array(
    z.object({
      id: z.string(),
      title: z.string(),
      start: z.string(),
      end: z.string(),
      time: z.string(),
    })
  ),
});

const upsertStmt = db.prepare<[string, string, string, string, string]>(`
  INSERT OR REPLACE INTO pending_confirmations (session_id, action, intent_json, matches_json, expires_at)
  VALUES (?, ?, ?, ?, ?)
`);

const getStmt = db.prepare<[string], PendingRow>(`
  SELECT session_id, action, intent_json, matches_json, expires_at
  FROM pending_confirmations WHERE session_id = ?
`);

const deleteStmt = db.prepare<[string]>(`
  DELETE FROM pending_confirmations WHERE session_id = ?
`);

const cleanupExpiredStmt = db.prepare<[string]>(`
  DELETE FROM pending_confirmations WHERE expires_at <= ?
`);

/**
 * Store the multi-match for a session, replacing any earlier one
 */
export function savePendingAction(
  sessionId: string,
  pending: PendingDisambiguation,
  ttlSeconds: number,
  now: Date = new Date()
): void {
  const expiresAt = new Date(now.getTime() + ttlSeconds * 1000);

  upsertStmt.run(
    sessionId,
    pending.action,
    JSON.stringify(pending.intent),
    JSON.stringify(pending.matches),
    expiresAt.toISOString()
  );
}

/**
 * Pending multi-match for a session, or null when there is none.
 * Expired or unreadable rows are deleted and read as absent.
 */
export function getPendingAction(
  sessionId: string,
  now: Date = new Date()
): PendingDisambiguation | null {
  const row = getStmt.get(sessionId);
  if (!row) return null;

  if (new Date(row.expires_at) <= now) {
    deleteStmt.run(sessionId);
    return null;
  }

  let decoded: unknown;
  try {
    decoded = {
      action: row.action,
      intent: JSON.parse(row.intent_json),
      matches: JSON.parse(row.matches_json),
    };
  } catch {
    deleteStmt.run(sessionId);
    return null;
  }

  const parsed = pendingSchema.safeParse(decoded);
  if (!parsed.success) {
    deleteStmt.run(sessionId);
    return null;
  }

  return parsed.data;
}

/**
 * @returns true if a pending entry was removed
 */
export function clearPendingAction(sessionId: string): boolean {
  return deleteStmt.run(sessionId).changes > 0;
}

/**
 * @returns Number of expired entries deleted
 */
export function cleanupExpiredPendingActions(now: Date = new Date()): number {
  return cleanupExpiredStmt.run(now.toISOString()).changes;
}
