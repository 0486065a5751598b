import { describe, it, expect, afterAll, beforeEach } from 'vitest';
import { encryptToken, decryptToken, __clearCacheForTesting } from '../../src/lib/crypto.js';

const ORIGINAL_SECRET = process.env.ENCRYPTION_SECRET;

afterAll(() => {
  if (ORIGINAL_SECRET) {
    process.env.ENCRYPTION_SECRET = ORIGINAL_SECRET;
  } else {
    delete process.env.ENCRYPTION_SECRET;
  }
  __clearCacheForTesting();
});

describe('Crypto Module', () => {
  beforeEach(() => {
    process.env.ENCRYPTION_SECRET = 'test-secret-key-min-16-chars';
    __clearCacheForTesting();
  });

  describe('encryptToken() and decryptToken()', () => {
    it('should encrypt and decrypt a token', () => {
      const encrypted = encryptToken('test-refresh-token');

      expect(decryptToken(encrypted)).toBe('test-refresh-token');
    });

    it('should handle long and unusual text', () => {
      const text = 'a'.repeat(5000) + '!@#$%^&*()\n\t日本語';

      expect(decryptToken(encryptToken(text))).toBe(text);
    });

    it('should produce hex iv:tag:content', () => {
      const [iv, tag, content] = encryptToken('test').split(':');

      expect(iv).toMatch(/^[0-9a-f]{24}$/);
      expect(tag).toMatch(/^[0-9a-f]{32}$/);
      expect(content).toMatch(/^[0-9a-f]{8}$/);
    });

    it('should use a fresh IV every time', () => {
      expect(encryptToken('same')).not.toBe(encryptToken('same'));
    });

    it('should refuse an empty string', () => {
      expect(() => encryptToken('')).toThrow('Cannot encrypt empty string');
    });
  });

  describe('tampering and format', () => {
    it('should reject a malformed value', () => {
      expect(() => decryptToken('not-encrypted')).toThrow('Invalid encrypted token format');
    });

    it('should reject modified ciphertext', () => {
      const [iv, tag, content] = encryptToken('test-access-token').split(':');
      const flipped = (content[0] === '0' ? '1' : '0') + content.slice(1);

      expect(() => decryptToken(`${iv}:${tag}:${flipped}`)).toThrow();
    });

    it('should not decrypt with a different secret', () => {
      const encrypted = encryptToken('test-access-token');

      process.env.ENCRYPTION_SECRET = 'another-test-secret-value';
      __clearCacheForTesting();

      expect(() => decryptToken(encrypted)).toThrow();
    });
  });

  describe('secret validation', () => {
    it('should require a secret', () => {
      delete process.env.ENCRYPTION_SECRET;

      expect(() => encryptToken('test')).toThrow('ENCRYPTION_SECRET environment variable is required');
    });

    it('should require at least 16 characters', () => {
      process.env.ENCRYPTION_SECRET = 'short';

      expect(() => encryptToken('test')).toThrow('ENCRYPTION_SECRET must be at least 16 characters');
    });
  });
});
