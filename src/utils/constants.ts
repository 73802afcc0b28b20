// Framing
export const END_MARKER = '1010101010101010';
export const END_MARKER_LENGTH = END_MARKER.length;
export const BITS_PER_BYTE = 8;
export const MAX_ENCRYPTION_ATTEMPTS = 1000; // fresh IVs tried per hide

// LSB masks
export const LSB_MASK = 1;
export const LSB_CLEAR_MASK = ~1;

// AES-256-CBC
export const CIPHER_ALGORITHM = 'aes-256-cbc';
export const CIPHER_IV_LENGTH = 16; // bytes
export const CIPHER_BLOCK_SIZE = 16; // bytes
export const KEY_HASH_ALGORITHM = 'sha256';
export const RANDOM_PASSWORD_LENGTH = 16; // hex characters

// Integrity
export const INTEGRITY_HASH_ALGORITHM = 'sha256';
export const INTEGRITY_SCORE_MATCH = 100;
export const INTEGRITY_SCORE_MISMATCH = 0;

// Voice gate defaults
export const DEFAULT_SIMILARITY_THRESHOLD = 0.8;
export const DEFAULT_TRANSCRIPTION_LANGUAGE = 'en';
export const DEFAULT_WHISPER_MODEL = 'whisper-1';
export const CANONICAL_SAMPLE_RATE = 16000; // Hz
export const CANONICAL_CHANNELS = 1;
export const TRANSCRIPTION_FILE_NAME = 'voice.wav';
export const UNKNOWN_LANGUAGE = 'unknown';

// WAV container
export const RIFF_HEADER_SIZE = 12; // "RIFF" + size + "WAVE"
export const CHUNK_HEADER_SIZE = 8; // id + size
export const FMT_CHUNK_SIZE = 16;
export const WAVE_FORMAT_PCM = 0x0001;
export const WAVE_FORMAT_EXTENSIBLE = 0xfffe;
export const PCM_BIT_DEPTH = 16;
export const PCM_BYTES_PER_SAMPLE = 2;

// PNG colour types written by the image carrier
export const PNG_COLOR_TYPE_RGB = 2;
export const PNG_COLOR_TYPE_RGBA = 6;
export const PNG_DECODED_CHANNELS = 4; // pngjs always decodes to RGBA

// Capacity ratings (max payload bytes)
export const IMAGE_RATING_HIGH = 10000;
export const IMAGE_RATING_MEDIUM = 1000;
export const AUDIO_RATING_HIGH = 50000;
export const AUDIO_RATING_MEDIUM = 5000;

// Security metrics
export const PASSWORD_MIN_LENGTH = 8;
export const PASSWORD_CRITERION_POINTS = 25;
export const PASSWORD_STRONG_THRESHOLD = 75;
export const MESSAGE_DIVERSITY_THRESHOLD = 0.3;
export const SECURITY_RATING_EXCELLENT = 80;
export const SECURITY_RATING_GOOD = 60;
export const SECURITY_RATING_MODERATE = 40;

// Output file extensions per media type
export const MEDIA_FILE_EXTENSIONS = {
  image: '.png',
  audio: '.wav',
  video: '.mp4',
} as const;
export const SEMANTIC_FILENAME_HASH_LENGTH = 10;
