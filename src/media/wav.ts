import { PcmAudio } from '../interfaces';
import {
  CHUNK_HEADER_SIZE,
  FMT_CHUNK_SIZE,
  PCM_BIT_DEPTH,
  PCM_BYTES_PER_SAMPLE,
  RIFF_HEADER_SIZE,
  WAVE_FORMAT_EXTENSIBLE,
  WAVE_FORMAT_PCM,
} from '../utils/constants';
import { ErrorFactory } from '../utils/error-factory';
import { detectAudioContainer } from './container';

export interface WavFormat {
  formatTag: number;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
}

function readFormatChunk(file: Buffer, offset: number, size: number): WavFormat {
  if (size < FMT_CHUNK_SIZE) {
    throw ErrorFactory.UNSUPPORTED_MEDIA('audio', 'WAV fmt chunk is truncated');
  }

  let formatTag = file.readUInt16LE(offset);
  // WAVE_FORMAT_EXTENSIBLE keeps the real format in the first two bytes of its sub-format GUID
  if (formatTag === WAVE_FORMAT_EXTENSIBLE && size >= 26) {
    formatTag = file.readUInt16LE(offset + 24);
  }

  return {
    formatTag,
    channels: file.readUInt16LE(offset + 2),
    sampleRate: file.readUInt32LE(offset + 4),
    bitsPerSample: file.readUInt16LE(offset + 14),
  };
}

interface WavLayout {
  format: WavFormat;
  data: Buffer;
}

function readWavLayout(file: Buffer): WavLayout {
  if (detectAudioContainer(file) !== 'wav') {
    throw ErrorFactory.UNSUPPORTED_MEDIA('audio', 'Not a RIFF/WAVE file');
  }

  let format: WavFormat | undefined;
  let data: Buffer | undefined;
  let offset = RIFF_HEADER_SIZE;

  while (offset + CHUNK_HEADER_SIZE <= file.length) {
    const id = file.toString('ascii', offset, offset + 4);
    const size = file.readUInt32LE(offset + 4);
    const body = offset + CHUNK_HEADER_SIZE;

    if (id === 'fmt ' && body + size <= file.length) {
      format = readFormatChunk(file, body, size);
    } else if (id === 'data') {
      data = file.subarray(body, Math.min(body + size, file.length));
    }

    // Chunks are padded to an even length
    offset = body + size + (size % 2);
  }

  if (!format || !data) {
    throw ErrorFactory.UNSUPPORTED_MEDIA('audio', 'WAV file is missing its fmt or data chunk');
  }
  return { format, data };
}

/**
 * Read the fmt chunk of a RIFF/WAVE file of any sample encoding
 */
export function readWavFormat(file: Buffer): WavFormat {
  return readWavLayout(file).format;
}

export function isPcm16(format: WavFormat): boolean {
  return format.formatTag === WAVE_FORMAT_PCM && format.bitsPerSample === PCM_BIT_DEPTH;
}

/**
 * Decode a RIFF/WAVE file holding 16-bit PCM
 */
export function decodeWav(file: Buffer): PcmAudio {
  const { format, data } = readWavLayout(file);

  if (format.formatTag !== WAVE_FORMAT_PCM) {
    throw ErrorFactory.UNSUPPORTED_MEDIA(
      'audio',
      `WAV format 0x${format.formatTag.toString(16)} is not uncompressed PCM`
    );
  }
  if (format.bitsPerSample !== PCM_BIT_DEPTH) {
    throw ErrorFactory.UNSUPPORTED_MEDIA(
      'audio',
      `Only 16-bit PCM is supported, got ${format.bitsPerSample}-bit`
    );
  }
  if (format.channels === 0 || format.sampleRate === 0) {
    throw ErrorFactory.UNSUPPORTED_MEDIA('audio', 'WAV file declares no channels or a zero sample rate');
  }

  const frameCount = Math.floor(data.length / (PCM_BYTES_PER_SAMPLE * format.channels));
  const samples = new Int16Array(frameCount * format.channels);
  for (let i = 0; i < samples.length; i++) {
    samples[i] = data.readInt16LE(i * PCM_BYTES_PER_SAMPLE);
  }

  return {
    sampleRate: format.sampleRate,
    channels: format.channels,
    bitDepth: PCM_BIT_DEPTH,
    samples,
  };
}

/**
 * Encode 16-bit PCM as a canonical 44-byte-header WAV file
 */
export function encodeWav(audio: PcmAudio): Buffer {
  const dataLength = audio.samples.length * PCM_BYTES_PER_SAMPLE;
  const headerLength = RIFF_HEADER_SIZE + CHUNK_HEADER_SIZE + FMT_CHUNK_SIZE + CHUNK_HEADER_SIZE;
  const file = Buffer.alloc(headerLength + dataLength);
  const blockAlign = audio.channels * PCM_BYTES_PER_SAMPLE;

  file.write('RIFF', 0, 'ascii');
  file.writeUInt32LE(file.length - CHUNK_HEADER_SIZE, 4);
  file.write('WAVE', 8, 'ascii');

  file.write('fmt ', 12, 'ascii');
  file.writeUInt32LE(FMT_CHUNK_SIZE, 16);
  file.writeUInt16LE(WAVE_FORMAT_PCM, 20);
  file.writeUInt16LE(audio.channels, 22);
  file.writeUInt32LE(audio.sampleRate, 24);
  file.writeUInt32LE(audio.sampleRate * blockAlign, 28);
  file.writeUInt16LE(blockAlign, 32);
  file.writeUInt16LE(PCM_BIT_DEPTH, 34);

  file.write('data', 36, 'ascii');
  file.writeUInt32LE(dataLength, 40);
  for (let i = 0; i < audio.samples.length; i++) {
    file.writeInt16LE(audio.samples[i], headerLength + i * PCM_BYTES_PER_SAMPLE);
  }

  return file;
}

/**
 * Number of frames (samples per channel)
 */
export function frameCount(audio: PcmAudio): number {
  return Math.floor(audio.samples.length / audio.channels);
}
