/**
 * Settings for the speech recognizer
 */
export interface RecognizerConfig {
  /**
   * Language passed to the speech model (default: 'en')
   */
  language?: string;
}

/**
 * Settings for the voice gate
 */
export interface VoiceGateConfig {
  /**
   * Minimum Jaccard similarity for a passphrase to pass (default: 0.8)
   */
  similarityThreshold?: number;
}

/**
 * Settings for the OpenAI Whisper model loader
 */
export interface WhisperModelConfig {
  /**
   * API key; the client falls back to OPENAI_API_KEY when omitted
   */
  apiKey?: string;

  /**
   * Alternative endpoint for OpenAI-compatible transcription servers
   */
  baseURL?: string;

  /**
   * Transcription model name (default: 'whisper-1')
   */
  model?: string;
}

/**
 * Process-wide configuration assembled from the environment
 */
export interface StegavoxConfig {
  recognizer: Required<RecognizerConfig>;
  voiceGate: Required<VoiceGateConfig>;
  whisper: WhisperModelConfig & { model: string };
}
