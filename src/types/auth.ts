// src/types/auth.ts

/**
 * Stored OAuth credentials. Both tokens are encrypted at rest ("iv:tag:content").
 */
export interface AuthEntry {
  user_id: string;
  refresh_token: string;
  access_token?: string | undefined;
  expiry_date?: Date | undefined;
}
