// src/lib/userContext.test.ts
import { describe, it, expect, beforeEach } from 'vitest';
import db from '../db/db.js';
import { storeAuth } from '../db/authDb.js';
import { encryptToken } from './crypto.js';
import { getValidAccessFor, isTokenExpired } from './userContext.js';

const now = new Date('2026-10-19T17:00:00Z');

describe('isTokenExpired', () => {
  it('should treat a missing expiry as expired', () => {
    expect(isTokenExpired(undefined, now)).toBe(true);
  });

  it('should refresh within five minutes of expiry', () => {
    expect(isTokenExpired(new Date('2026-10-19T17:04:59Z'), now)).toBe(true);
    expect(isTokenExpired(new Date('2026-10-19T17:05:01Z'), now)).toBe(false);
  });
});

describe('getValidAccessFor', () => {
  beforeEach(() => {
    db.exec('DELETE FROM auth');
  });

  it('should fail for a user without stored tokens', async () => {
    await expect(getValidAccessFor('nobody')).rejects.toThrow('No auth found for user nobody');
  });

  it('should hand back decrypted credentials while the token is fresh', async () => {
    const expiry = new Date(Date.now() + 60 * 60 * 1000);
    storeAuth({
      user_id: 'user-1',
      refresh_token: encryptToken('test-refresh-token'),
      access_token: encryptToken('test-access-token'),
      expiry_date: expiry,
    });

    const client = await getValidAccessFor('user-1');

    expect(client.credentials).toEqual({
      refresh_token: 'test-refresh-token',
      access_token: 'test-access-token',
      expiry_date: expiry.getTime(),
    });
  });
});
