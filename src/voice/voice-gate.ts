import createDebug from 'debug';
import { EventEmitter } from 'events';
import {
  TranscriptionResult,
  VerificationResult,
  VoiceGateConfig,
  VoiceGateState,
  VoiceGateStateEvent,
} from '../interfaces';
import { DEFAULT_SIMILARITY_THRESHOLD } from '../utils/constants';
import { ErrorFactory } from '../utils/error-factory';
import { SpeechRecognizer } from './speech-recognizer';
import { normalizeText, passesThreshold, similarity } from './text-similarity';

const debug = createDebug('stegavox:voice');

/**
 * Throw unless the threshold is a number in [0, 1]
 */
export function assertThreshold(threshold: number): void {
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw ErrorFactory.INVALID_INPUT(`Similarity threshold must be between 0 and 1, got ${threshold}`);
  }
}

/**
 * Spoken-passphrase gate.
 *
 * Each verify() call is one attempt moving through
 * idle -> transcribing -> scoring -> verified | rejected.
 *
 * Events:
 * - 'state': emitted on every transition with { attempt, state }
 */
export class VoiceGate extends EventEmitter {
  private readonly recognizer: SpeechRecognizer;
  private readonly defaultThreshold: number;
  private attempts = 0;

  constructor(recognizer: SpeechRecognizer, config: VoiceGateConfig = {}) {
    super();
    const threshold = config.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
    assertThreshold(threshold);
    this.recognizer = recognizer;
    this.defaultThreshold = threshold;
  }

  public get similarityThreshold(): number {
    return this.defaultThreshold;
  }

  /**
   * Transcribe without matching against any phrase
   */
  public transcribe(audio: Buffer): Promise<TranscriptionResult> {
    return this.recognizer.transcribe(audio);
  }

  /**
   * Check a voice sample against the expected passphrase.
   * Resolves with a rejected result on mismatch or failed transcription; callers
   * must not decrypt unless pass is true.
   */
  public async verify(
    audio: Buffer,
    expectedPassphrase: string,
    threshold: number = this.defaultThreshold
  ): Promise<VerificationResult> {
    assertThreshold(threshold);
    const attempt = ++this.attempts;

    this.transition(attempt, 'idle');
    this.transition(attempt, 'transcribing');
    const transcription = await this.recognizer.transcribe(audio);

    this.transition(attempt, 'scoring');
    const result = this.score(transcription, expectedPassphrase, threshold);
    this.transition(attempt, result.state);

    if (result.pass) {
      debug('Voice authentication successful. Similarity: %s', result.score.toFixed(2));
    } else {
      debug(
        'Voice authentication failed. Similarity: %s (threshold: %d)',
        result.score.toFixed(2),
        threshold
      );
    }

    return result;
  }

  private score(
    transcription: TranscriptionResult,
    expectedPassphrase: string,
    threshold: number
  ): VerificationResult {
    const { transcript } = transcription;
    const expectedNormalized = normalizeText(expectedPassphrase);
    const score = transcription.success
      ? similarity(transcript.normalizedText, expectedNormalized)
      : 0;
    const pass = transcription.success && passesThreshold(score, threshold);

    return {
      state: pass ? 'verified' : 'rejected',
      pass,
      score,
      threshold,
      expectedText: expectedPassphrase,
      expectedNormalized,
      transcribedText: transcript.text,
      transcribedNormalized: transcript.normalizedText,
      language: transcript.language,
      confidence: transcript.confidence,
      reason: transcription.success ? undefined : transcription.reason,
    };
  }

  private transition(attempt: number, state: VoiceGateState): void {
    const event: VoiceGateStateEvent = { attempt, state };
    this.emit('state', event);
  }
}
