import createDebug from 'debug';
import {
  RecognizerConfig,
  SpeechModel,
  SpeechModelLoader,
  SpeechSegment,
  Transcript,
  TranscriptionResult,
} from '../interfaces';
import { DEFAULT_TRANSCRIPTION_LANGUAGE, UNKNOWN_LANGUAGE } from '../utils/constants';
import { ErrorFactory } from '../utils/error-factory';
import { StegoError, toError } from '../utils/errors';
import { prepareForTranscription } from './audio-conversion';
import { normalizeText } from './text-similarity';

const debug = createDebug('stegavox:voice');

function meanLogprob(segments: SpeechSegment[] | undefined): number {
  if (!segments || segments.length === 0) {
    return 0;
  }
  const total = segments.reduce((sum, segment) => sum + (segment.avgLogprob ?? 0), 0);
  return total / segments.length;
}

function emptyTranscript(): Transcript {
  return { text: '', normalizedText: '', language: UNKNOWN_LANGUAGE, confidence: 0 };
}

/**
 * Owns the speech model for the lifetime of the process.
 *
 * The model is loaded on first use; concurrent first callers share the same
 * in-flight load. A failed load is forgotten so a later call can try again.
 * Transcriptions run one at a time because models are not re-entrant.
 *
 * Example usage:
 * ```typescript
 * const recognizer = new SpeechRecognizer(createWhisperModelLoader(), { language: 'en' });
 * const result = await recognizer.transcribe(wavBuffer);
 * if (result.success) {
 *   console.log(result.transcript.text);
 * }
 * ```
 */
export class SpeechRecognizer {
  private readonly loader: SpeechModelLoader;
  private readonly language: string;
  private model?: SpeechModel;
  private loading?: Promise<SpeechModel>;
  private queue: Promise<void> = Promise.resolve();

  constructor(loader: SpeechModelLoader, config: RecognizerConfig = {}) {
    this.loader = loader;
    this.language = config.language || DEFAULT_TRANSCRIPTION_LANGUAGE;
  }

  /**
   * Load the model once. Rejects with a TranscriptionError when loading fails.
   */
  public load(): Promise<SpeechModel> {
    if (this.model) {
      return Promise.resolve(this.model);
    }

    if (!this.loading) {
      debug('Loading speech model (language: %s)', this.language);
      this.loading = this.loader().then(
        (model) => {
          this.model = model;
          debug('Speech model loaded');
          return model;
        },
        (err: unknown) => {
          this.loading = undefined;
          const cause = toError(err);
          throw ErrorFactory.TRANSCRIPTION(`Failed to load speech model: ${cause.message}`, cause);
        }
      );
    }

    return this.loading;
  }

  public isLoaded(): boolean {
    return this.model !== undefined;
  }

  /**
   * Transcribe a voice sample. Never rejects: failures come back as
   * { success: false } with an empty transcript and the reason.
   */
  public transcribe(audio: Buffer): Promise<TranscriptionResult> {
    const run = this.queue.then(() => this.runTranscription(audio));
    this.queue = run.then(() => undefined);
    return run;
  }

  private async runTranscription(audio: Buffer): Promise<TranscriptionResult> {
    try {
      const prepared = prepareForTranscription(audio);
      const model = await this.load();

      debug('Transcribing %d bytes as %s', prepared.audio.length, prepared.fileName);
      const raw = await model.transcribe(prepared.audio, {
        language: this.language,
        fileName: prepared.fileName,
      });

      const text = raw.text.trim();
      const transcript: Transcript = {
        text,
        normalizedText: normalizeText(text),
        language: raw.language || UNKNOWN_LANGUAGE,
        confidence: meanLogprob(raw.segments),
      };
      debug('Transcription completed (%d characters)', text.length);

      return { success: true, transcript };
    } catch (err) {
      const error = err instanceof StegoError
        ? err
        : ErrorFactory.TRANSCRIPTION(toError(err).message, toError(err));
      debug('Transcription failed: %s', error.message);

      return { success: false, transcript: emptyTranscript(), reason: error.message };
    }
  }
}
