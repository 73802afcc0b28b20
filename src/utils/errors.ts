import { MediaType, StegoErrorInfo, StegoErrorType } from '../interfaces';

/**
 * Base class for every error the pipeline raises
 */
export class StegoError extends Error implements StegoErrorInfo {
  public readonly type: StegoErrorType;
  public readonly cause?: Error;

  constructor(type: StegoErrorType, message: string, cause?: Error) {
    super(message);
    this.name = new.target.name;
    this.type = type;
    this.cause = cause;
  }
}

/**
 * Payload needs more bits than the carrier has samples
 */
export class CapacityError extends StegoError {
  constructor(public readonly required: number, public readonly capacity: number) {
    super(
      StegoErrorType.CAPACITY_ERROR,
      `Message too large. Max capacity: ${capacity} bits, Message: ${required} bits`
    );
  }
}

/**
 * Every ciphertext tried contained the end marker before its end
 */
export class FramingError extends StegoError {
  constructor(public readonly attempts: number) {
    super(
      StegoErrorType.FRAMING_ERROR,
      `Could not encrypt the message without an early end marker after ${attempts} attempts`
    );
  }
}

export class NotFoundError extends StegoError {
  constructor(message: string) {
    super(StegoErrorType.NOT_FOUND_ERROR, message);
  }
}

export class DecryptionError extends StegoError {
  constructor(message: string, cause?: Error) {
    super(StegoErrorType.DECRYPTION_ERROR, message, cause);
  }
}

/**
 * Only ever captured into a failed TranscriptionResult
 */
export class TranscriptionError extends StegoError {
  constructor(message: string, cause?: Error) {
    super(StegoErrorType.TRANSCRIPTION_ERROR, message, cause);
  }
}

export interface AuthenticationDetails {
  expectedText: string;
  transcribedText: string;
  score: number;
  threshold: number;
  reason?: string;
}

/**
 * Spoken passphrase did not pass the gate
 */
export class AuthenticationError extends StegoError {
  public readonly expectedText: string;
  public readonly transcribedText: string;
  public readonly score: number;
  public readonly threshold: number;
  public readonly reason?: string;

  constructor(message: string, details: AuthenticationDetails) {
    super(StegoErrorType.AUTHENTICATION_ERROR, message);
    this.expectedText = details.expectedText;
    this.transcribedText = details.transcribedText;
    this.score = details.score;
    this.threshold = details.threshold;
    this.reason = details.reason;
  }
}

export class UnsupportedMediaError extends StegoError {
  constructor(public readonly mediaType: MediaType | string, message: string) {
    super(StegoErrorType.UNSUPPORTED_MEDIA, message);
  }
}

export class InvalidInputError extends StegoError {
  constructor(message: string, cause?: Error) {
    super(StegoErrorType.INVALID_INPUT, message, cause);
  }
}

/**
 * Wrap an unknown thrown value as an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
