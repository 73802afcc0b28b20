// Export everything needed from the package structure
export * from './interfaces';

export { StegoPipeline, StegoPipelineOptions } from './pipeline/stego-pipeline';

export { ImageCarrierAdapter } from './steganography/image-carrier';
export { AudioCarrierAdapter } from './steganography/audio-carrier';
export { VideoCarrier } from './steganography/video-carrier';
export { bindFileCarrier, CarrierLookup, createFileCarrier } from './steganography/carrier-factory';
export { embedBits, embedText, EmbeddedText, extractText } from './steganography/payload';
export { maxPayloadBytes, recommendedMessageLength } from './steganography/capacity';

export { decodePng, encodePng } from './media/png';
export { decodeWav, encodeWav } from './media/wav';
export { AudioContainer, detectAudioContainer } from './media/container';

export { decrypt, encrypt, encryptedLength } from './crypto/cipher-box';

export { SpeechRecognizer } from './voice/speech-recognizer';
export { VoiceGate } from './voice/voice-gate';
export { createWhisperModelLoader } from './voice/whisper-model';
export { normalizeText, passesThreshold, similarity } from './voice/text-similarity';

export { decodeBits, encodeText, frame, isUnambiguousFrame, unframe } from './utils/binary-codec';
export { END_MARKER, DEFAULT_SIMILARITY_THRESHOLD } from './utils/constants';
export { loadStegavoxConfig } from './utils/config';
export { ErrorFactory } from './utils/error-factory';
export {
  AuthenticationError,
  CapacityError,
  DecryptionError,
  FramingError,
  InvalidInputError,
  NotFoundError,
  StegoError,
  TranscriptionError,
  UnsupportedMediaError,
} from './utils/errors';
export { compareMessages, hashMessage } from './utils/integrity';
export { deriveKey, generateRandomPassword, semanticFilename } from './utils/security';
export { getSecurityMetrics } from './utils/security-metrics';
