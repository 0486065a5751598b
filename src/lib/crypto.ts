import crypto from 'node:crypto';

const ALGORITHM = 'aes-256-gcm';
const KEY_LENGTH = 32; // 256 bits
const IV_LENGTH = 12; // 96 bits, the GCM standard nonce
const KEY_SALT = 'calendar-command-assistant:oauth-tokens';

let cachedKey: Buffer | null = null;
let cachedSecret: string | null = null;

/**
 * Derive the token key from ENCRYPTION_SECRET with scrypt.
 * The derived key is cached until the secret changes.
 */
function getEncryptionKey(): Buffer {
  const secret = process.env.ENCRYPTION_SECRET;

  if (!secret) {
    throw new Error('ENCRYPTION_SECRET environment variable is required');
  }

  if (secret.length < 16) {
    throw new Error('ENCRYPTION_SECRET must be at least 16 characters');
  }

  if (cachedKey && cachedSecret === secret) {
    return cachedKey;
  }

  cachedKey = crypto.scryptSync(secret, KEY_SALT, KEY_LENGTH);
  cachedSecret = secret;

  return cachedKey;
}

/**
 * Encrypt a token for storage.
 *
 * @returns Hex-encoded "iv:tag:content"
 */
export function encryptToken(text: string): string {
  if (text.length === 0) {
    throw new Error('Cannot encrypt empty string');
  }

  const key = getEncryptionKey();
  const iv = crypto.randomBytes(IV_LENGTH);
  const cipher = crypto.createCipheriv(ALGORITHM, key, iv);

  const content = Buffer.concat([cipher.update(text, 'utf8'), cipher.final()]);
  const tag = cipher.getAuthTag();

  return `${iv.toString('hex')}:${tag.toString('hex')}:${content.toString('hex')}`;
}

/**
 * Decrypt a value produced by encryptToken()
 *
 * @throws Error on a malformed value or a failed authentication check
 */
export function decryptToken(encryptedData: string): string {
  const [iv, tag, content] = encryptedData.split(':');
  if (!iv || !tag || !content) {
    throw new Error('Invalid encrypted token format');
  }

  const key = getEncryptionKey();
  const decipher = crypto.createDecipheriv(ALGORITHM, key, Buffer.from(iv, 'hex'));
  decipher.setAuthTag(Buffer.from(tag, 'hex'));

  const decrypted = Buffer.concat([
    decipher.update(Buffer.from(content, 'hex')),
    decipher.final(),
  ]);

  return decrypted.toString('utf8');
}

/**
 * Reset the derived-key cache (tests switch secrets between cases)
 */
export function __clearCacheForTesting(): void {
  cachedKey = null;
  cachedSecret = null;
}
