import * as crypto from 'crypto';
import { MediaType } from '../interfaces';
import {
  KEY_HASH_ALGORITHM,
  MEDIA_FILE_EXTENSIONS,
  RANDOM_PASSWORD_LENGTH,
  SEMANTIC_FILENAME_HASH_LENGTH,
} from './constants';

/**
 * Derive a 256-bit AES key from a password.
 * Plain SHA-256 with no salt: the same password always yields the same key.
 */
export function deriveKey(password: string): Buffer {
  return crypto.createHash(KEY_HASH_ALGORITHM).update(password, 'utf8').digest();
}

/**
 * Generate a random password of 16 hex characters
 */
export function generateRandomPassword(): string {
  return crypto.randomBytes(RANDOM_PASSWORD_LENGTH / 2).toString('hex');
}

/**
 * Name a stego output file after the hash of its message, e.g. stego_1a2b3c4d5e.png
 */
export function semanticFilename(message: string, mediaType: MediaType = 'image'): string {
  const hash = crypto.createHash('sha256').update(message, 'utf8').digest('hex');
  const extension = MEDIA_FILE_EXTENSIONS[mediaType];
  return `stego_${hash.slice(0, SEMANTIC_FILENAME_HASH_LENGTH)}${extension}`;
}
