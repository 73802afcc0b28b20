import { TextDecoder } from 'util';
import { BITS_PER_BYTE, END_MARKER } from './constants';
import { ErrorFactory } from './error-factory';
import { MediaType } from '../interfaces';

const BIT_STRING = /^[01]*$/;

/**
 * Convert text to a bit string, 8 bits per UTF-8 byte, most significant bit first
 */
export function encodeText(text: string): string {
  const bytes = Buffer.from(text, 'utf-8');
  let bits = '';
  for (const byte of bytes) {
    bits += byte.toString(2).padStart(BITS_PER_BYTE, '0');
  }
  return bits;
}

/**
 * Convert a bit string back to text.
 * A trailing partial byte is dropped and malformed UTF-8 is replaced, never rejected.
 */
export function decodeBits(bits: string): string {
  assertBitString(bits);
  const byteCount = Math.floor(bits.length / BITS_PER_BYTE);
  const bytes = Buffer.alloc(byteCount);
  for (let i = 0; i < byteCount; i++) {
    bytes[i] = parseInt(bits.slice(i * BITS_PER_BYTE, (i + 1) * BITS_PER_BYTE), 2);
  }
  return new TextDecoder('utf-8', { ignoreBOM: true }).decode(bytes);
}

/**
 * Append the end marker to payload bits
 */
export function frame(bits: string): string {
  assertBitString(bits);
  return bits + END_MARKER;
}

/**
 * Return the bits before the first end marker.
 * A payload that itself contains the marker pattern is cut short there.
 */
export function unframe(bits: string, mediaType: MediaType = 'image'): string {
  const markerIndex = bits.indexOf(END_MARKER);
  if (markerIndex === -1) {
    throw ErrorFactory.NOT_FOUND(mediaType);
  }
  return bits.slice(0, markerIndex);
}

/**
 * True when unframe(frame(bits)) gives back all of bits, i.e. the marker
 * pattern does not start anywhere before the appended marker
 */
export function isUnambiguousFrame(bits: string): boolean {
  return frame(bits).indexOf(END_MARKER) === bits.length;
}

/**
 * Bits needed to hide the given text, end marker included
 */
export function framedLength(text: string): number {
  return Buffer.byteLength(text, 'utf-8') * BITS_PER_BYTE + END_MARKER.length;
}

export function assertBitString(bits: string): void {
  if (!BIT_STRING.test(bits)) {
    throw ErrorFactory.INVALID_INPUT('Bit string may only contain 0 and 1');
  }
}
