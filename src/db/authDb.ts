// src/db/authDb.ts
import db from './db.js';
import type { AuthEntry } from '../types/auth.js';

interface AuthRow {
  user_id: string;
  refresh_token: string;
  access_token: string | null;
  expiry_date: string | null;
}

// user_id is the primary key, so this doubles as an upsert
const upsertStmt = db.prepare<[string, string, string | null, string | null]>(`
  INSERT OR REPLACE INTO auth (user_id, refresh_token, access_token, expiry_date)
  VALUES (?, ?, ?, ?)
`);

const getStmt = db.prepare<[string], AuthRow>(`
  SELECT user_id, refresh_token, access_token, expiry_date FROM auth WHERE user_id = ?
`);

/**
 * Store or update auth tokens for a user.
 * Tokens must already be encrypted.
 */
export function storeAuth(entry: AuthEntry): void {
  upsertStmt.run(
    entry.user_id,
    entry.refresh_token,
    entry.access_token || null,
    entry.expiry_date ? entry.expiry_date.toISOString() : null
  );
}

/**
 * Get the (still encrypted) auth tokens for a user
 */
export function getAuth(userId: string): AuthEntry | null {
  const row = getStmt.get(userId);
  if (!row) return null;

  const auth: AuthEntry = {
    user_id: row.user_id,
    refresh_token: row.refresh_token,
  };

  if (row.access_token) {
    auth.access_token = row.access_token;
  }

  if (row.expiry_date) {
    auth.expiry_date = new Date(row.expiry_date);
  }

  return auth;
}

/**
 * Replace only the access token after a refresh
 *
 * @returns true if updated, false if the user has no stored auth
 */
export function updateAccessToken(
  userId: string,
  accessToken: string,
  expiryDate?: Date
): boolean {
  const existing = getAuth(userId);
  if (!existing) return false;

  storeAuth({
    user_id: userId,
    refresh_token: existing.refresh_token,
    access_token: accessToken,
    expiry_date: expiryDate,
  });

  return true;
}
