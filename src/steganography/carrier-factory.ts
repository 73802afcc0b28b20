import { CarrierAdapter, EmbeddedFile, FileCarrier, MediaType } from '../interfaces';
import { ErrorFactory } from '../utils/error-factory';
import { AudioCarrierAdapter } from './audio-carrier';
import { ImageCarrierAdapter } from './image-carrier';
import { VideoCarrier } from './video-carrier';

/**
 * Lookup used by the pipeline to pick a carrier for a media type
 */
export type CarrierLookup = (mediaType: MediaType) => FileCarrier;

/**
 * Expose a sample-level adapter as operations over encoded file bytes.
 * Each call decodes the file into a fresh carrier, so the caller's buffer is never modified.
 *
 * @param adapter The adapter to wrap
 * @returns A carrier that reads and writes container bytes
 */
export function bindFileCarrier<TCarrier>(adapter: CarrierAdapter<TCarrier>): FileCarrier {
  return {
    mediaType: adapter.mediaType,
    capacity(file: Buffer): number {
      return adapter.capacity(adapter.read(file));
    },
    embed(file: Buffer, bits: string): EmbeddedFile {
      const cover = adapter.read(file);
      return { file: adapter.write(adapter.embed(cover, bits)), capacity: adapter.capacity(cover) };
    },
    extract(file: Buffer, maxBits?: number): string {
      return adapter.extract(adapter.read(file), maxBits);
    },
    report(file: Buffer) {
      const estimate = adapter.estimate ? adapter.estimate(file) : undefined;
      return estimate ?? adapter.report(adapter.read(file));
    },
  };
}

/**
 * Create the carrier for a media type
 *
 * @param mediaType 'image' (PNG), 'audio' (16-bit PCM WAV) or 'video' (unsupported)
 */
export function createFileCarrier(mediaType: MediaType): FileCarrier {
  switch (mediaType) {
    case 'image':
      return bindFileCarrier(new ImageCarrierAdapter());
    case 'audio':
      return bindFileCarrier(new AudioCarrierAdapter());
    case 'video':
      return new VideoCarrier();
    default:
      throw ErrorFactory.UNSUPPORTED_MEDIA(String(mediaType), `Unknown media type: ${String(mediaType)}`);
  }
}
