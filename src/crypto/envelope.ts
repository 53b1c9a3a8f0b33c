import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'node:crypto';
import { InvalidCredentialError } from '../utils/errors.js';

/**
 * Whole-blob authenticated encryption.
 * Format: nonce (12 bytes) + ciphertext + authTag (16 bytes)
 */
const ALGORITHM = 'aes-256-gcm';
export const NONCE_LENGTH = 12;
export const TAG_LENGTH = 16;

/**
 * Derives the 32-byte key as a single SHA-256 of the password.
 * Unsalted and un-iterated: equal passwords give equal keys. Kept for
 * compatibility with stores written by earlier versions.
 */
export function deriveKey(password: string): Buffer {
  return createHash('sha256').update(password, 'utf8').digest();
}

export function encrypt(plaintext: Buffer, password: string): Buffer {
  const nonce = randomBytes(NONCE_LENGTH);
  const cipher = createCipheriv(ALGORITHM, deriveKey(password), nonce, { authTagLength: TAG_LENGTH });

  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  return Buffer.concat([nonce, ciphertext, cipher.getAuthTag()]);
}

/** @throws InvalidCredentialError for a short blob, a wrong key or a damaged file alike */
export function decrypt(blob: Buffer, password: string): Buffer {
  if (blob.length < NONCE_LENGTH + TAG_LENGTH) {
    throw new InvalidCredentialError();
  }

  const nonce = blob.subarray(0, NONCE_LENGTH);
  const ciphertext = blob.subarray(NONCE_LENGTH, blob.length - TAG_LENGTH);
  const authTag = blob.subarray(blob.length - TAG_LENGTH);

  try {
    const decipher = createDecipheriv(ALGORITHM, deriveKey(password), nonce, {
      authTagLength: TAG_LENGTH,
    });
    decipher.setAuthTag(authTag);
    // final() throws before anything is returned when the tag does not match
    const head = decipher.update(ciphertext);
    return Buffer.concat([head, decipher.final()]);
  } catch {
    throw new InvalidCredentialError();
  }
}
