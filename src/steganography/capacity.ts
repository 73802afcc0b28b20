import { EfficiencyRating, MediaType } from '../interfaces';
import {
  AUDIO_RATING_HIGH,
  AUDIO_RATING_MEDIUM,
  BITS_PER_BYTE,
  CIPHER_BLOCK_SIZE,
  END_MARKER_LENGTH,
  IMAGE_RATING_HIGH,
  IMAGE_RATING_MEDIUM,
} from '../utils/constants';

/**
 * Payload bytes that fit once the end marker is reserved
 */
export function maxPayloadBytes(totalBits: number): number {
  return Math.max(0, Math.floor((totalBits - END_MARKER_LENGTH) / BITS_PER_BYTE));
}

/**
 * Longest plaintext, in UTF-8 bytes, whose base64 AES ciphertext still fits.
 * The ciphertext is IV + at least one padded block, rendered 4 chars per 3 bytes.
 */
export function recommendedMessageLength(totalBits: number): number {
  const base64Chars = maxPayloadBytes(totalBits);
  const rawBytes = Math.floor(base64Chars / 4) * 3;
  const blocks = Math.floor(rawBytes / CIPHER_BLOCK_SIZE);
  if (blocks < 2) {
    return 0;
  }
  // PKCS#7 always adds at least one byte of padding
  return (blocks - 1) * CIPHER_BLOCK_SIZE - 1;
}

export function efficiencyRating(mediaType: MediaType, payloadBytes: number): EfficiencyRating {
  if (mediaType === 'image') {
    if (payloadBytes > IMAGE_RATING_HIGH) {
      return 'High';
    }
    return payloadBytes > IMAGE_RATING_MEDIUM ? 'Medium' : 'Low';
  }
  if (mediaType === 'audio') {
    if (payloadBytes > AUDIO_RATING_HIGH) {
      return 'High';
    }
    return payloadBytes > AUDIO_RATING_MEDIUM ? 'Medium' : 'Low';
  }
  return 'Unsupported';
}
