import createDebug from 'debug';
import { CapacityReport, CarrierAdapter, RasterImage } from '../interfaces';
import { decodePng, encodePng } from '../media/png';
import { efficiencyRating, maxPayloadBytes, recommendedMessageLength } from './capacity';
import { overwriteLsb, readLsb } from './lsb';

const debug = createDebug('stegavox:carrier');

/**
 * LSB carrier over PNG pixel channels.
 * Every channel value of every pixel holds one bit, in row-major order.
 */
export class ImageCarrierAdapter implements CarrierAdapter<RasterImage> {
  public readonly mediaType = 'image';

  public read(file: Buffer): RasterImage {
    return decodePng(file);
  }

  public write(carrier: RasterImage): Buffer {
    return encodePng(carrier);
  }

  public capacity(carrier: RasterImage): number {
    return carrier.data.length;
  }

  public embed(carrier: RasterImage, bits: string): RasterImage {
    const data = carrier.data.slice();
    overwriteLsb(data, bits);

    const capacity = this.capacity(carrier);
    debug(
      'Embedded %d/%d bits in %dx%d image (%s%%)',
      bits.length,
      capacity,
      carrier.width,
      carrier.height,
      capacity === 0 ? '0.00' : ((bits.length / capacity) * 100).toFixed(2)
    );

    return { width: carrier.width, height: carrier.height, channels: carrier.channels, data };
  }

  public extract(carrier: RasterImage, maxBits?: number): string {
    return readLsb(carrier.data, maxBits);
  }

  public report(carrier: RasterImage): CapacityReport {
    const totalBits = this.capacity(carrier);
    const payloadBytes = maxPayloadBytes(totalBits);

    return {
      mediaType: this.mediaType,
      supported: true,
      estimated: false,
      dimensions: `${carrier.width}x${carrier.height}`,
      channels: carrier.channels,
      totalBits,
      maxPayloadBytes: payloadBytes,
      recommendedMessageLength: recommendedMessageLength(totalBits),
      efficiencyRating: efficiencyRating(this.mediaType, payloadBytes),
    };
  }
}
