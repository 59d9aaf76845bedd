// At-rest encryption for subscription client-state secrets
import { createCipheriv, createDecipheriv, randomBytes } from 'crypto';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12;
const KEY_LENGTH = 32; // AES-256 requires 32 bytes

/**
 * Parse a hex encoded 32 byte key
 */
export function parseKey(hexKey: string): Buffer {
  const key = Buffer.from(hexKey.trim(), 'hex');
  if (key.length !== KEY_LENGTH) {
    throw new Error(`Storage key must be ${KEY_LENGTH} bytes of hex (got ${key.length} bytes)`);
  }
  return key;
}

/**
 * Encrypt a value
 * Format: CIPHERTEXT--IV--AUTH_TAG (base64 encoded, separated by --)
 */
export function encryptValue(plaintext: string, key: Buffer): string {
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(ALGORITHM, key, iv);

  const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf-8'), cipher.final()]);
  const authTag = cipher.getAuthTag();

  return [ciphertext, iv, authTag].map((part) => part.toString('base64')).join('--');
}

/**
 * Decrypt a value produced by encryptValue
 */
export function decryptValue(encrypted: string, key: Buffer): string {
  const parts = encrypted.split('--');
  if (parts.length !== 3) {
    throw new Error('Invalid encrypted value format (expected CIPHERTEXT--IV--AUTH_TAG)');
  }

  const [ciphertextB64, ivB64, authTagB64] = parts;

  const decipher = createDecipheriv(ALGORITHM, key, Buffer.from(ivB64, 'base64'));
  decipher.setAuthTag(Buffer.from(authTagB64, 'base64'));

  const decrypted = Buffer.concat([
    decipher.update(Buffer.from(ciphertextB64, 'base64')),
    decipher.final(),
  ]);

  return decrypted.toString('utf-8');
}

/**
 * Codec applied to secrets before they reach the database.
 * Without a key values are stored as-is.
 */
export interface SecretCodec {
  encode(value: string): string;
  decode(stored: string): string;
}

export function createSecretCodec(hexKey?: string): SecretCodec {
  if (!hexKey) {
    return {
      encode: (value) => value,
      decode: (stored) => stored,
    };
  }

  const key = parseKey(hexKey);
  return {
    encode: (value) => encryptValue(value, key),
    decode: (stored) => decryptValue(stored, key),
  };
}
