import {
  PcmAudio,
  RasterImage,
  RawTranscription,
  SpeechModel,
  SpeechModelOptions,
} from '../../src/interfaces';
import { encodePng } from '../../src/media/png';
import { encodeWav } from '../../src/media/wav';

/**
 * Build an image whose channel values follow the given pattern
 */
export function makeImage(
  width: number,
  height: number,
  channels: 3 | 4 = 3,
  value: (index: number) => number = (index) => (index * 7) % 256
): RasterImage {
  const data = new Uint8Array(width * height * channels);
  for (let i = 0; i < data.length; i++) {
    data[i] = value(i);
  }
  return { width, height, channels, data };
}

export function makePng(width: number, height: number, channels: 3 | 4 = 3): Buffer {
  return encodePng(makeImage(width, height, channels));
}

/**
 * Build interleaved 16-bit PCM; the default pattern stays well inside the int16 range
 */
export function makePcm(
  frames: number,
  channels = 1,
  sampleRate = 8000,
  value: (index: number) => number = (index) => ((index * 37) % 2001) - 1000
): PcmAudio {
  const samples = new Int16Array(frames * channels);
  for (let i = 0; i < samples.length; i++) {
    samples[i] = value(i);
  }
  return { sampleRate, channels, bitDepth: 16, samples };
}

export function makeWav(frames: number, channels = 1, sampleRate = 8000): Buffer {
  return encodeWav(makePcm(frames, channels, sampleRate));
}

/**
 * RIFF/WAVE pieces for hand-built files
 */
export function wavChunk(id: string, body: Buffer): Buffer {
  const header = Buffer.alloc(8);
  header.write(id, 0, 'ascii');
  header.writeUInt32LE(body.length, 4);
  const padding = Buffer.alloc(body.length % 2);
  return Buffer.concat([header, body, padding]);
}

export function riffWave(chunks: Buffer[]): Buffer {
  const body = Buffer.concat(chunks);
  const header = Buffer.alloc(12);
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(body.length + 4, 4);
  header.write('WAVE', 8, 'ascii');
  return Buffer.concat([header, body]);
}

export function fmtChunk(formatTag: number, channels: number, sampleRate: number, bitsPerSample: number): Buffer {
  const body = Buffer.alloc(16);
  const blockAlign = channels * (bitsPerSample / 8);
  body.writeUInt16LE(formatTag, 0);
  body.writeUInt16LE(channels, 2);
  body.writeUInt32LE(sampleRate, 4);
  body.writeUInt32LE(sampleRate * blockAlign, 8);
  body.writeUInt16LE(blockAlign, 12);
  body.writeUInt16LE(bitsPerSample, 14);
  return wavChunk('fmt ', body);
}

export function pcmBytes(samples: number[]): Buffer {
  const body = Buffer.alloc(samples.length * 2);
  samples.forEach((sample, i) => body.writeInt16LE(sample, i * 2));
  return body;
}

/**
 * A short mono 16 kHz voice sample (content is irrelevant to the fake model)
 */
export function makeVoiceSample(): Buffer {
  return makeWav(1600, 1, 16000);
}

/**
 * In-process stand-in for the speech model. Change `text` to control what it "hears".
 */
export class FakeSpeechModel implements SpeechModel {
  public text: string;
  public language?: string = 'english';
  public segments: RawTranscription['segments'] = [{ avgLogprob: -0.25 }, { avgLogprob: -0.75 }];
  public readonly transcribe = jest.fn(
    async (_audio: Buffer, _options: SpeechModelOptions): Promise<RawTranscription> => ({
      text: this.text,
      language: this.language,
      segments: this.segments,
    })
  );

  constructor(text = '') {
    this.text = text;
  }
}

export function fakeLoader(model: SpeechModel): jest.Mock<Promise<SpeechModel>, []> {
  return jest.fn(async () => model);
}
