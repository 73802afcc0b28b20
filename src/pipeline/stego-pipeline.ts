import createDebug from 'debug';
import {
  CapacityReport,
  HideRequest,
  HideResult,
  MediaType,
  RevealRequest,
  RevealResult,
  SecurityMetrics,
  Transcript,
  VerificationResult,
} from '../interfaces';
import { decrypt, encrypt } from '../crypto/cipher-box';
import { CarrierLookup, createFileCarrier } from '../steganography/carrier-factory';
import { embedBits, extractText } from '../steganography/payload';
import { encodeText, isUnambiguousFrame } from '../utils/binary-codec';
import { MAX_ENCRYPTION_ATTEMPTS } from '../utils/constants';
import { ErrorFactory } from '../utils/error-factory';
import { AuthenticationError } from '../utils/errors';
import { compareMessages } from '../utils/integrity';
import { getSecurityMetrics } from '../utils/security-metrics';
import { VoiceGate } from '../voice/voice-gate';

const debug = createDebug('stegavox:pipeline');

export interface StegoPipelineOptions {
  /**
   * Carrier selection by media type (default: createFileCarrier)
   */
  carriers?: CarrierLookup;
}

function rejectVoice(verification: VerificationResult): AuthenticationError {
  return ErrorFactory.AUTHENTICATION({
    expectedText: verification.expectedText,
    transcribedText: verification.transcribedText,
    score: verification.score,
    threshold: verification.threshold,
    reason: verification.reason,
  });
}

/**
 * Encrypt under fresh IVs until the ciphertext bits cannot be mistaken for an
 * earlier end marker, so extraction recovers the whole ciphertext
 */
function encryptForFraming(plaintext: string, password: string): string {
  for (let attempt = 1; attempt <= MAX_ENCRYPTION_ATTEMPTS; attempt++) {
    const bits = encodeText(encrypt(plaintext, password));
    if (isUnambiguousFrame(bits)) {
      if (attempt > 1) {
        debug('Ciphertext framed cleanly after %d attempts', attempt);
      }
      return bits;
    }
  }
  throw ErrorFactory.FRAMING(MAX_ENCRYPTION_ATTEMPTS);
}

function transcriptOf(verification: VerificationResult): Transcript {
  return {
    text: verification.transcribedText,
    normalizedText: verification.transcribedNormalized,
    language: verification.language,
    confidence: verification.confidence,
  };
}

/**
 * Hide and reveal voice-gated, encrypted messages in media carriers.
 *
 * Hide verifies the voice sample before encrypting and embedding; Reveal
 * extracts, requires a successful transcription, then decrypts. Cover and
 * stego buffers passed in are never modified.
 *
 * Example usage:
 * ```typescript
 * const recognizer = new SpeechRecognizer(createWhisperModelLoader());
 * const pipeline = new StegoPipeline(new VoiceGate(recognizer));
 * const { stego } = await pipeline.hide({
 *   cover: png, mediaType: 'image', plaintext: 'meet at noon', password: 'pw',
 *   passphrase: 'open sesame', voiceSample: wav,
 * });
 * ```
 */
export class StegoPipeline {
  private readonly voiceGate: VoiceGate;
  private readonly carriers: CarrierLookup;

  constructor(voiceGate: VoiceGate, options: StegoPipelineOptions = {}) {
    this.voiceGate = voiceGate;
    this.carriers = options.carriers || createFileCarrier;
  }

  /**
   * Hide an encrypted message after the voice passphrase passes
   */
  public async hide(request: HideRequest): Promise<HideResult> {
    const threshold = request.similarityThreshold ?? this.voiceGate.similarityThreshold;
    const verification = await this.voiceGate.verify(
      request.voiceSample,
      request.passphrase,
      threshold
    );
    if (!verification.pass) {
      throw rejectVoice(verification);
    }

    const carrier = this.carriers(request.mediaType);
    const ciphertextBits = encryptForFraming(request.plaintext, request.password);
    const embedded = embedBits(carrier, request.cover, ciphertextBits);

    debug(
      'Hid %d bits in %s carrier (capacity %d bits)',
      embedded.bits,
      request.mediaType,
      embedded.capacity
    );

    return {
      stego: embedded.file,
      mediaType: request.mediaType,
      bitsUsed: embedded.bits,
      capacity: embedded.capacity,
      verification,
    };
  }

  /**
   * Extract and decrypt a hidden message.
   * The authentication audio must transcribe; with expectedPassphrase it must also match.
   */
  public async reveal(request: RevealRequest): Promise<RevealResult> {
    const carrier = this.carriers(request.mediaType);
    const ciphertext = extractText(carrier, request.stego);
    debug('Extracted %d ciphertext characters from %s carrier', ciphertext.length, request.mediaType);

    let transcript: Transcript;
    let verification: VerificationResult | undefined;

    if (request.expectedPassphrase !== undefined) {
      verification = await this.voiceGate.verify(
        request.authenticationAudio,
        request.expectedPassphrase,
        request.similarityThreshold ?? this.voiceGate.similarityThreshold
      );
      if (!verification.pass) {
        throw rejectVoice(verification);
      }
      transcript = transcriptOf(verification);
    } else {
      const transcription = await this.voiceGate.transcribe(request.authenticationAudio);
      if (!transcription.success) {
        throw ErrorFactory.AUTHENTICATION({
          expectedText: '',
          transcribedText: '',
          score: 0,
          threshold: 0,
          reason: transcription.reason,
        });
      }
      transcript = transcription.transcript;
    }

    const plaintext = decrypt(ciphertext, request.password);
    const integrity = request.originalPlaintext !== undefined
      ? compareMessages(request.originalPlaintext, plaintext)
      : undefined;

    if (integrity) {
      debug('Integrity check: %s', integrity.status);
    }

    return { plaintext, transcript, verification, integrity };
  }

  /**
   * Capacity figures for a cover file
   */
  public capacity(media: Buffer, mediaType: MediaType): CapacityReport {
    return this.carriers(mediaType).report(media);
  }

  /**
   * Advisory password and message heuristics
   */
  public securityMetrics(message: string, password: string): SecurityMetrics {
    return getSecurityMetrics(message, password);
  }
}
