// src/config/env.test.ts
import { describe, it, expect } from 'vitest';
import { loadConfig } from './env.js';

const required = {
  ENCRYPTION_SECRET: 'test-secret-0123456789',
  GOOGLE_CLIENT_ID: 'test-client-id',
  GOOGLE_CLIENT_SECRET: 'test-client-secret',
};

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig(required);

    expect(config).toMatchObject({
      NODE_ENV: 'development',
      PORT: 3000,
      HOST: '0.0.0.0',
      AI_PROVIDER: 'openai',
      AI_TIMEOUT_MS: 15000,
      DEFAULT_TIMEZONE: 'America/Los_Angeles',
      PENDING_CONFIRMATION_TTL_SECONDS: 600,
      MAX_COMMAND_LENGTH: 500,
    });
  });

  it('should coerce numeric variables', () => {
    const config = loadConfig({ ...required, PORT: '8080', PENDING_CONFIRMATION_TTL_SECONDS: '120' });

    expect(config.PORT).toBe(8080);
    expect(config.PENDING_CONFIRMATION_TTL_SECONDS).toBe(120);
  });

  it('should reject a short encryption secret', () => {
    expect(() => loadConfig({ ...required, ENCRYPTION_SECRET: 'short' })).toThrow(
      'ENCRYPTION_SECRET must be at least 16 characters'
    );
  });

  it('should reject an unknown AI provider', () => {
    expect(() => loadConfig({ ...required, AI_PROVIDER: 'mistral' })).toThrow();
  });

  it('should take the redirect URI only from GOOGLE_REDIRECT_URI', () => {
    const config = loadConfig({
      ...required,
      GOOGLE_REDIRECT_URI: 'https://calendar.example.com/api/auth/callback',
      GOOGLE_REDIRECT_URI_LOCAL: 'http://localhost:3000/api/auth/callback',
    });

    expect(config.GOOGLE_REDIRECT_URI).toBe('https://calendar.example.com/api/auth/callback');
    expect(config).not.toHaveProperty('GOOGLE_REDIRECT_URI_LOCAL');
  });

  it('should require the Google client credentials', () => {
    expect(() => loadConfig({ ENCRYPTION_SECRET: 'test-secret-0123456789' })).toThrow();
  });
});
