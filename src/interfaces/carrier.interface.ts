/**
 * Media types a carrier can be selected by
 */
export type MediaType = 'image' | 'audio' | 'video';

/**
 * Decoded image: row-major pixels with interleaved 8-bit channels
 */
export interface RasterImage {
  width: number;
  height: number;
  channels: 3 | 4;
  data: Uint8Array;
}

/**
 * Decoded 16-bit PCM audio with interleaved channels
 */
export interface PcmAudio {
  sampleRate: number;
  channels: number;
  bitDepth: 16;
  samples: Int16Array;
}

export type EfficiencyRating = 'High' | 'Medium' | 'Low' | 'Unsupported';

/**
 * Capacity figures exposed to callers before hiding a message
 */
export interface CapacityReport {
  mediaType: MediaType;
  /** False when the carrier can be measured but not embedded into */
  supported: boolean;
  /** True when the figures are a size-based estimate rather than a sample count */
  estimated: boolean;
  dimensions?: string;
  durationSeconds?: number;
  sampleRate?: number;
  channels: number;
  totalBits: number;
  /** Bytes of framed payload that fit after the end marker is accounted for */
  maxPayloadBytes: number;
  /** Longest plaintext (UTF-8 bytes) that fits once encrypted and framed */
  recommendedMessageLength: number;
  efficiencyRating: EfficiencyRating;
  note?: string;
}

/**
 * Sample-level access to one kind of carrier
 */
export interface CarrierAdapter<TCarrier> {
  readonly mediaType: MediaType;

  /**
   * Decode a container into a carrier
   */
  read(file: Buffer): TCarrier;

  /**
   * Encode a carrier into a lossless container
   */
  write(carrier: TCarrier): Buffer;

  /**
   * Number of embeddable bits (one per sample)
   */
  capacity(carrier: TCarrier): number;

  /**
   * Overwrite the LSB of the first bits.length samples, returning a new carrier
   */
  embed(carrier: TCarrier, bits: string): TCarrier;

  /**
   * Read the LSB of the first maxBits samples (all samples when omitted)
   */
  extract(carrier: TCarrier, maxBits?: number): string;

  report(carrier: TCarrier): CapacityReport;

  /**
   * Size-based report for files that cannot be decoded into a carrier
   * (e.g. compressed audio). Returns undefined when the file should be read normally.
   */
  estimate?(file: Buffer): CapacityReport | undefined;
}

/**
 * Stego file written by FileCarrier.embed, with the capacity of the cover it was decoded from
 */
export interface EmbeddedFile {
  file: Buffer;
  capacity: number;
}

/**
 * Carrier operations over encoded file bytes, selected by media type
 */
export interface FileCarrier {
  readonly mediaType: MediaType;
  capacity(file: Buffer): number;
  embed(file: Buffer, bits: string): EmbeddedFile;
  extract(file: Buffer, maxBits?: number): string;
  report(file: Buffer): CapacityReport;
}
