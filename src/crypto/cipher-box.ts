import * as crypto from 'crypto';
import { TextDecoder } from 'util';
import { CIPHER_ALGORITHM, CIPHER_BLOCK_SIZE, CIPHER_IV_LENGTH } from '../utils/constants';
import { ErrorFactory } from '../utils/error-factory';
import { toError } from '../utils/errors';
import { deriveKey } from '../utils/security';

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Encrypt a message with AES-256-CBC under a password-derived key.
 * A fresh IV is drawn for every call, so equal inputs encrypt differently.
 *
 * @returns base64 of IV followed by the cipher output
 */
export function encrypt(plaintext: string, password: string): string {
  const iv = crypto.randomBytes(CIPHER_IV_LENGTH);
  const cipher = crypto.createCipheriv(CIPHER_ALGORITHM, deriveKey(password), iv);
  const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
  return Buffer.concat([iv, encrypted]).toString('base64');
}

/**
 * Reverse encrypt(). Fails with DecryptionError on malformed input, a wrong
 * password or corrupted data, and when the result is not valid UTF-8.
 */
export function decrypt(encoded: string, password: string): string {
  const trimmed = encoded.trim();
  if (!BASE64.test(trimmed)) {
    throw ErrorFactory.DECRYPTION('ciphertext is not valid base64');
  }

  const raw = Buffer.from(trimmed, 'base64');
  const bodyLength = raw.length - CIPHER_IV_LENGTH;
  if (bodyLength < CIPHER_BLOCK_SIZE || bodyLength % CIPHER_BLOCK_SIZE !== 0) {
    throw ErrorFactory.DECRYPTION(`ciphertext has an invalid length (${raw.length} bytes)`);
  }

  const iv = raw.subarray(0, CIPHER_IV_LENGTH);
  const body = raw.subarray(CIPHER_IV_LENGTH);

  let decrypted: Buffer;
  try {
    const decipher = crypto.createDecipheriv(CIPHER_ALGORITHM, deriveKey(password), iv);
    decrypted = Buffer.concat([decipher.update(body), decipher.final()]);
  } catch (err) {
    throw ErrorFactory.DECRYPTION('invalid padding (wrong password or corrupted data)', toError(err));
  }

  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(decrypted);
  } catch (err) {
    throw ErrorFactory.DECRYPTION('decrypted bytes are not valid UTF-8', toError(err));
  }
}

/**
 * Length of the base64 ciphertext produced for a plaintext of the given UTF-8 byte length
 */
export function encryptedLength(plaintextBytes: number): number {
  const paddedLength = (Math.floor(plaintextBytes / CIPHER_BLOCK_SIZE) + 1) * CIPHER_BLOCK_SIZE;
  return Math.ceil((CIPHER_IV_LENGTH + paddedLength) / 3) * 4;
}
