import { CapacityReport, EmbeddedFile, FileCarrier } from '../interfaces';
import { ErrorFactory } from '../utils/error-factory';
import { UnsupportedMediaError } from '../utils/errors';

const VIDEO_UNSUPPORTED = 'Video steganography is not supported';

/**
 * Placeholder for video carriers: measures nothing, embeds nothing
 */
export class VideoCarrier implements FileCarrier {
  public readonly mediaType = 'video';

  public capacity(_file: Buffer): number {
    throw this.unsupported();
  }

  public embed(_file: Buffer, _bits: string): EmbeddedFile {
    throw this.unsupported();
  }

  public extract(_file: Buffer, _maxBits?: number): string {
    throw this.unsupported();
  }

  public report(_file: Buffer): CapacityReport {
    return {
      mediaType: this.mediaType,
      supported: false,
      estimated: false,
      channels: 0,
      totalBits: 0,
      maxPayloadBytes: 0,
      recommendedMessageLength: 0,
      efficiencyRating: 'Unsupported',
      note: VIDEO_UNSUPPORTED,
    };
  }

  private unsupported(): UnsupportedMediaError {
    return ErrorFactory.UNSUPPORTED_MEDIA(this.mediaType, VIDEO_UNSUPPORTED);
  }
}
