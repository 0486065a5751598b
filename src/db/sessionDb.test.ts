// src/db/sessionDb.test.ts
import { describe, it, expect, beforeEach } from 'vitest';
import db from './db.js';
import { cleanupExpiredSessions, createSession, getSession } from './sessionDb.js';

const now = new Date('2026-10-19T17:00:00Z');
const tomorrow = new Date('2026-10-20T17:00:00Z');
const yesterday = new Date('2026-10-18T17:00:00Z');

describe('sessionDb', () => {
  beforeEach(() => {
    db.exec('DELETE FROM sessions');
  });

  describe('createSession', () => {
    it('should return a 64-character hex id', () => {
      const sessionId = createSession('user1', tomorrow);

      expect(sessionId).toMatch(/^[0-9a-f]{64}$/);
    });

    it('should generate unique session IDs', () => {
      expect(createSession('user1', tomorrow)).not.toBe(createSession('user1', tomorrow));
    });

    it('should store the expiry as an ISO timestamp', () => {
      const sessionId = createSession('user1', tomorrow);

      const row = db
        .prepare<[string], { expires_at: string }>('SELECT expires_at FROM sessions WHERE session_id = ?')
        .get(sessionId);
      expect(row?.expires_at).toBe('2026-10-20T17:00:00.000Z');
    });
  });

  describe('getSession', () => {
    it('should return the user of a live session', () => {
      const sessionId = createSession('user1', tomorrow);

      expect(getSession(sessionId, now)).toEqual({ user_id: 'user1' });
    });

    it('should return null for an unknown session', () => {
      expect(getSession('nope', now)).toBeNull();
    });

    it('should delete an expired session on read', () => {
      const sessionId = createSession('user1', yesterday);

      expect(getSession(sessionId, now)).toBeNull();
      const row = db
        .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM sessions WHERE session_id = ?')
        .get(sessionId);
      expect(row?.count).toBe(0);
    });
  });

  describe('cleanupExpiredSessions', () => {
    it('should delete only expired sessions', () => {
      createSession('user1', yesterday);
      createSession('user2', yesterday);
      const live = createSession('user1', tomorrow);

      expect(cleanupExpiredSessions(now)).toBe(2);
      expect(getSession(live, now)).toEqual({ user_id: 'user1' });
    });
  });
});
