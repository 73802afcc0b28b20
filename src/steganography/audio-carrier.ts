import createDebug from 'debug';
import { CapacityReport, CarrierAdapter, PcmAudio } from '../interfaces';
import { detectAudioContainer, isCompressedAudio } from '../media/container';
import { decodeWav, encodeWav, frameCount } from '../media/wav';
import { BITS_PER_BYTE } from '../utils/constants';
import { ErrorFactory } from '../utils/error-factory';
import { efficiencyRating, maxPayloadBytes, recommendedMessageLength } from './capacity';
import { overwriteLsb, readLsb } from './lsb';

const debug = createDebug('stegavox:carrier');

/**
 * LSB carrier over 16-bit PCM samples in a WAV container.
 * Interleaved samples of all channels are used in file order.
 */
export class AudioCarrierAdapter implements CarrierAdapter<PcmAudio> {
  public readonly mediaType = 'audio';

  public read(file: Buffer): PcmAudio {
    const container = detectAudioContainer(file);
    if (isCompressedAudio(container)) {
      throw ErrorFactory.UNSUPPORTED_MEDIA(
        this.mediaType,
        `Compressed audio (${container}) cannot carry LSB data; convert it to 16-bit PCM WAV`
      );
    }
    return decodeWav(file);
  }

  public write(carrier: PcmAudio): Buffer {
    return encodeWav(carrier);
  }

  public capacity(carrier: PcmAudio): number {
    return carrier.samples.length;
  }

  public embed(carrier: PcmAudio, bits: string): PcmAudio {
    const samples = carrier.samples.slice();
    overwriteLsb(samples, bits);

    debug(
      'Embedded %d/%d bits in %d Hz %d-channel audio',
      bits.length,
      this.capacity(carrier),
      carrier.sampleRate,
      carrier.channels
    );

    return {
      sampleRate: carrier.sampleRate,
      channels: carrier.channels,
      bitDepth: carrier.bitDepth,
      samples,
    };
  }

  public extract(carrier: PcmAudio, maxBits?: number): string {
    return readLsb(carrier.samples, maxBits);
  }

  public report(carrier: PcmAudio): CapacityReport {
    const totalBits = this.capacity(carrier);
    const payloadBytes = maxPayloadBytes(totalBits);

    return {
      mediaType: this.mediaType,
      supported: true,
      estimated: false,
      durationSeconds: frameCount(carrier) / carrier.sampleRate,
      sampleRate: carrier.sampleRate,
      channels: carrier.channels,
      totalBits,
      maxPayloadBytes: payloadBytes,
      recommendedMessageLength: recommendedMessageLength(totalBits),
      efficiencyRating: efficiencyRating(this.mediaType, payloadBytes),
    };
  }

  /**
   * Compressed files are measured by size only, one bit per file bit
   */
  public estimate(file: Buffer): CapacityReport | undefined {
    const container = detectAudioContainer(file);
    if (!isCompressedAudio(container)) {
      return undefined;
    }

    const totalBits = file.length * BITS_PER_BYTE;
    return {
      mediaType: this.mediaType,
      supported: false,
      estimated: true,
      channels: 0,
      totalBits,
      maxPayloadBytes: maxPayloadBytes(totalBits),
      recommendedMessageLength: 0,
      efficiencyRating: 'Unsupported',
      note: `${container.toUpperCase()} (estimated). Convert to WAV for actual steganography`,
    };
  }
}
