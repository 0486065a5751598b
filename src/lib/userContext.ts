// src/lib/userContext.ts
import type { FastifyRequest } from 'fastify';
import { OAuth2Client } from 'google-auth-library';
import { getAuth, updateAccessToken } from '../db/authDb.js';
import { decryptToken, encryptToken } from './crypto.js';
import type { Logger } from '../types/logger.js';

/**
 * Extract user ID from an authenticated request.
 * Requires the session middleware to have run first.
 *
 * @throws Error if not authenticated
 */
export function getUserId(request: FastifyRequest): string {
  const userId = request.userId;

  if (!userId) {
    throw new Error('User not authenticated - missing session');
  }

  return userId;
}

/**
 * Session ID the pending confirmation is keyed by
 *
 * @throws Error if not authenticated
 */
export function getSessionId(request: FastifyRequest): string {
  const sessionId = request.sessionId;

  if (!sessionId) {
    throw new Error('User not authenticated - missing session');
  }

  return sessionId;
}

/**
 * OAuth2Client for a user, refreshed first when the access token is
 * expired or about to expire
 *
 * @throws Error if the user has no stored auth or the refresh token was revoked
 */
export async function getValidAccessFor(userId: string, log?: Logger): Promise<OAuth2Client> {
  const authEntry = getAuth(userId);
  if (!authEntry) {
    throw new Error(`No auth found for user ${userId}`);
  }

  const refreshToken = decryptToken(authEntry.refresh_token);
  const accessToken = authEntry.access_token
    ? decryptToken(authEntry.access_token)
    : undefined;

  const oauth2Client = new OAuth2Client(
    process.env.GOOGLE_CLIENT_ID,
    process.env.GOOGLE_CLIENT_SECRET,
    process.env.GOOGLE_REDIRECT_URI
  );

  oauth2Client.setCredentials({
    refresh_token: refreshToken,
    access_token: accessToken ?? null,
    expiry_date: authEntry.expiry_date?.getTime() ?? null,
  });

  if (isTokenExpired(authEntry.expiry_date)) {
    await refreshAccessToken(oauth2Client, userId, log);
  }

  return oauth2Client;
}

/**
 * True if the token is expired or expires within five minutes
 */
export function isTokenExpired(expiryDate?: Date, now: Date = new Date()): boolean {
  if (!expiryDate) return true;

  const bufferMs = 5 * 60 * 1000;
  return expiryDate.getTime() - bufferMs < now.getTime();
}

async function refreshAccessToken(
  oauth2Client: OAuth2Client,
  userId: string,
  log?: Logger
): Promise<void> {
  try {
    const { credentials } = await oauth2Client.refreshAccessToken();

    if (credentials.access_token && credentials.expiry_date) {
      updateAccessToken(
        userId,
        encryptToken(credentials.access_token),
        new Date(credentials.expiry_date)
      );

      log?.info({ userId }, 'Access token refreshed');
    }
  } catch (error) {
    if (error instanceof Error && error.message.includes('invalid_grant')) {
      throw new Error('Token revoked - please log in again');
    }
    throw error;
  }
}
