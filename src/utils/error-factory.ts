import { MediaType } from '../interfaces';
import {
  AuthenticationDetails,
  AuthenticationError,
  CapacityError,
  DecryptionError,
  FramingError,
  InvalidInputError,
  NotFoundError,
  TranscriptionError,
  UnsupportedMediaError,
} from './errors';

/**
 * Factory for creating stegavox errors
 * Keeps messages consistent across carriers and never includes secrets
 */
export class ErrorFactory {
  /**
   * Create a capacity error reporting both sizes
   */
  static CAPACITY(required: number, capacity: number): CapacityError {
    return new CapacityError(required, capacity);
  }

  /**
   * Create an error for a payload that cannot be framed unambiguously
   */
  static FRAMING(attempts: number): FramingError {
    return new FramingError(attempts);
  }

  /**
   * Create an error for a missing end marker
   */
  static NOT_FOUND(mediaType: MediaType): NotFoundError {
    return new NotFoundError(
      `End marker not found. This may not be a valid stego ${mediaType} file.`
    );
  }

  /**
   * Create a decryption error
   */
  static DECRYPTION(message: string, cause?: Error): DecryptionError {
    return new DecryptionError(`Decryption failed: ${message}`, cause);
  }

  /**
   * Create a transcription error
   */
  static TRANSCRIPTION(message: string, cause?: Error): TranscriptionError {
    return new TranscriptionError(message, cause);
  }

  /**
   * Create an authentication error from a gate decision
   */
  static AUTHENTICATION(details: AuthenticationDetails): AuthenticationError {
    const message = details.reason
      ? `Voice authentication failed: ${details.reason}`
      : `Voice authentication failed. Similarity: ${details.score.toFixed(2)} (threshold: ${details.threshold})`;
    return new AuthenticationError(message, details);
  }

  /**
   * Create an unsupported media error
   */
  static UNSUPPORTED_MEDIA(mediaType: MediaType | string, message: string): UnsupportedMediaError {
    return new UnsupportedMediaError(mediaType, message);
  }

  /**
   * Create an invalid input error
   */
  static INVALID_INPUT(message: string, cause?: Error): InvalidInputError {
    return new InvalidInputError(message, cause);
  }
}
