/**
 * Text recognised from one voice sample
 */
export interface Transcript {
  text: string;
  normalizedText: string;
  language: string;
  /** Mean segment log-probability, 0 when the model reports none */
  confidence: number;
}

/**
 * Outcome of a transcription attempt. Failures carry an empty transcript and
 * the reason instead of throwing.
 */
export type TranscriptionResult =
  | { success: true; transcript: Transcript }
  | { success: false; transcript: Transcript; reason: string };

/**
 * States a single authentication attempt moves through
 */
export type VoiceGateState = 'idle' | 'transcribing' | 'scoring' | 'verified' | 'rejected';

export interface VoiceGateStateEvent {
  attempt: number;
  state: VoiceGateState;
}

/**
 * Decision for one passphrase check
 */
export interface VerificationResult {
  state: 'verified' | 'rejected';
  pass: boolean;
  score: number;
  threshold: number;
  expectedText: string;
  expectedNormalized: string;
  transcribedText: string;
  transcribedNormalized: string;
  language: string;
  confidence: number;
  /** Why transcription failed, when it did */
  reason?: string;
}

export interface SpeechSegment {
  avgLogprob?: number;
}

/**
 * Raw output of a speech model run
 */
export interface RawTranscription {
  text: string;
  language?: string;
  segments?: SpeechSegment[];
}

export interface SpeechModelOptions {
  language: string;
  /** File name hint; the extension tells the model the container format */
  fileName: string;
}

/**
 * A loaded speech-to-text model. Not safe for concurrent calls.
 */
export interface SpeechModel {
  transcribe(audio: Buffer, options: SpeechModelOptions): Promise<RawTranscription>;
}

/**
 * Loads a speech model. May take seconds on first use.
 */
export type SpeechModelLoader = () => Promise<SpeechModel>;
