/**
 * Error types raised by the stegavox pipeline
 */
export enum StegoErrorType {
  CAPACITY_ERROR = 'CAPACITY_ERROR',           // Payload larger than the carrier can hold
  FRAMING_ERROR = 'FRAMING_ERROR',             // No ciphertext found that frames without an early end marker
  NOT_FOUND_ERROR = 'NOT_FOUND_ERROR',         // No end marker in the extracted bits
  DECRYPTION_ERROR = 'DECRYPTION_ERROR',       // Wrong password, corrupted ciphertext or non-UTF-8 output
  TRANSCRIPTION_ERROR = 'TRANSCRIPTION_ERROR', // Speech model or audio conversion failure
  AUTHENTICATION_ERROR = 'AUTHENTICATION_ERROR', // Voice passphrase rejected
  UNSUPPORTED_MEDIA = 'UNSUPPORTED_MEDIA',     // Container or media type cannot carry a payload
  INVALID_INPUT = 'INVALID_INPUT',             // Malformed arguments
}

/**
 * Shape shared by every stegavox error
 */
export interface StegoErrorInfo {
  type: StegoErrorType;
  message: string;
  cause?: Error;
}
