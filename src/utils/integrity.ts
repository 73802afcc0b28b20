import * as crypto from 'crypto';
import { IntegrityRecord } from '../interfaces';
import {
  INTEGRITY_HASH_ALGORITHM,
  INTEGRITY_SCORE_MATCH,
  INTEGRITY_SCORE_MISMATCH,
} from './constants';

/**
 * SHA-256 hex digest of a message's UTF-8 bytes
 */
export function hashMessage(message: string): string {
  return crypto.createHash(INTEGRITY_HASH_ALGORITHM).update(message, 'utf8').digest('hex');
}

/**
 * Compare an original message with a round-tripped one.
 * Advisory only; any differing byte scores 0.
 */
export function compareMessages(original: string, candidate: string): IntegrityRecord {
  const originalHash = hashMessage(original);
  const candidateHash = hashMessage(candidate);
  const match = originalHash === candidateHash;

  return {
    match,
    score: match ? INTEGRITY_SCORE_MATCH : INTEGRITY_SCORE_MISMATCH,
    originalHash,
    candidateHash,
    status: match ? 'VERIFIED' : 'CORRUPTED',
  };
}
