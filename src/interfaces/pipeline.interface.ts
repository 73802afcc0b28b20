import { MediaType } from './carrier.interface';
import { IntegrityRecord } from './integrity.interface';
import { Transcript, VerificationResult } from './voice.interface';

/**
 * Input for hiding a message
 */
export interface HideRequest {
  cover: Buffer;
  mediaType: MediaType;
  plaintext: string;
  password: string;
  /** Phrase the voice sample must match */
  passphrase: string;
  voiceSample: Buffer;
  similarityThreshold?: number;
}

export interface HideResult {
  stego: Buffer;
  mediaType: MediaType;
  bitsUsed: number;
  capacity: number;
  verification: VerificationResult;
}

/**
 * Input for revealing a message
 */
export interface RevealRequest {
  stego: Buffer;
  mediaType: MediaType;
  password: string;
  authenticationAudio: Buffer;
  /**
   * When given, the authentication audio must also match this phrase
   */
  expectedPassphrase?: string;
  similarityThreshold?: number;
  /**
   * When given, the revealed plaintext is checked against it
   */
  originalPlaintext?: string;
}

export interface RevealResult {
  plaintext: string;
  transcript: Transcript;
  verification?: VerificationResult;
  integrity?: IntegrityRecord;
}
