import { EmbeddedFile, FileCarrier } from '../interfaces';
import { decodeBits, encodeText, frame, unframe } from '../utils/binary-codec';

export interface EmbeddedText extends EmbeddedFile {
  /** Framed payload length, end marker included */
  bits: number;
}

/**
 * Hide text in a carrier file as framed UTF-8 bits
 */
export function embedText(carrier: FileCarrier, file: Buffer, text: string): EmbeddedText {
  return embedBits(carrier, file, encodeText(text));
}

/**
 * Hide already-encoded payload bits, appending the end marker
 */
export function embedBits(carrier: FileCarrier, file: Buffer, payload: string): EmbeddedText {
  const bits = frame(payload);
  const embedded = carrier.embed(file, bits);
  return { file: embedded.file, capacity: embedded.capacity, bits: bits.length };
}

/**
 * Recover text hidden by embedText. Throws NotFoundError without an end marker.
 */
export function extractText(carrier: FileCarrier, file: Buffer, maxBits?: number): string {
  return decodeBits(unframe(carrier.extract(file, maxBits), carrier.mediaType));
}
