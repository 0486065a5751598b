// src/db/sessionDb.ts
import db from './db.js';
import { randomBytes } from 'crypto';

interface SessionRow {
  session_id: string;
  user_id: string;
  expires_at: string;
}

const insertStmt = db.prepare<[string, string, string]>(`
  INSERT INTO sessions (session_id, user_id, expires_at)
  VALUES (?, ?, ?)
`);

const getStmt = db.prepare<[string], SessionRow>(`
  SELECT session_id, user_id, expires_at FROM sessions WHERE session_id = ?
`);

const deleteStmt = db.prepare<[string]>(`
  DELETE FROM sessions WHERE session_id = ?
`);

const cleanupExpiredStmt = db.prepare<[string]>(`
  DELETE FROM sessions WHERE expires_at < ?
`);

/**
 * Create a new session for a user
 *
 * @returns Generated session ID (64 hex chars)
 */
export function createSession(userId: string, expiresAt: Date): string {
  const sessionId = randomBytes(32).toString('hex');

  insertStmt.run(sessionId, userId, expiresAt.toISOString());

  return sessionId;
}

/**
 * Get session by ID and validate expiration.
 * An expired session is deleted on read.
 */
export function getSession(sessionId: string, now: Date = new Date()): { user_id: string } | null {
  const row = getStmt.get(sessionId);
  if (!row) return null;

  if (new Date(row.expires_at) < now) {
    deleteStmt.run(sessionId);
    return null;
  }

  return {
    user_id: row.user_id,
  };
}

/**
 * Clean up expired sessions
 *
 * @returns Number of expired sessions deleted
 */
export function cleanupExpiredSessions(now: Date = new Date()): number {
  const result = cleanupExpiredStmt.run(now.toISOString());
  return result.changes;
}
