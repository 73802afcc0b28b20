import { PcmAudio } from '../interfaces';
import { detectAudioContainer, isCompressedAudio } from '../media/container';
import { decodeWav, encodeWav, frameCount, isPcm16, readWavFormat, WavFormat } from '../media/wav';
import {
  CANONICAL_CHANNELS,
  CANONICAL_SAMPLE_RATE,
  PCM_BIT_DEPTH,
  TRANSCRIPTION_FILE_NAME,
} from '../utils/constants';
import { ErrorFactory } from '../utils/error-factory';
import { toError, TranscriptionError } from '../utils/errors';

const INT16_MIN = -32768;
const INT16_MAX = 32767;

/**
 * Audio ready to hand to the speech model
 */
export interface PreparedAudio {
  audio: Buffer;
  fileName: string;
}

function clampSample(value: number): number {
  return Math.max(INT16_MIN, Math.min(INT16_MAX, Math.round(value)));
}

/**
 * Average all channels of each frame into one
 */
export function downmixToMono(audio: PcmAudio): PcmAudio {
  if (audio.channels === 1) {
    return audio;
  }

  const frames = frameCount(audio);
  const mono = new Int16Array(frames);
  for (let frame = 0; frame < frames; frame++) {
    let sum = 0;
    for (let channel = 0; channel < audio.channels; channel++) {
      sum += audio.samples[frame * audio.channels + channel];
    }
    mono[frame] = clampSample(sum / audio.channels);
  }

  return { sampleRate: audio.sampleRate, channels: 1, bitDepth: PCM_BIT_DEPTH, samples: mono };
}

/**
 * Linear-interpolation resample of mono audio
 */
export function resample(audio: PcmAudio, targetRate: number): PcmAudio {
  if (audio.sampleRate === targetRate || audio.samples.length === 0) {
    return { ...audio, sampleRate: targetRate };
  }

  const source = audio.samples;
  const ratio = audio.sampleRate / targetRate;
  const length = Math.max(1, Math.round(source.length / ratio));
  const output = new Int16Array(length);

  for (let i = 0; i < length; i++) {
    const position = i * ratio;
    const index = Math.min(Math.floor(position), source.length - 1);
    const next = Math.min(index + 1, source.length - 1);
    const fraction = position - Math.floor(position);
    output[i] = clampSample(source[index] + (source[next] - source[index]) * fraction);
  }

  return { sampleRate: targetRate, channels: audio.channels, bitDepth: PCM_BIT_DEPTH, samples: output };
}

function conversionFailed(err: unknown): TranscriptionError {
  const cause = toError(err);
  return ErrorFactory.TRANSCRIPTION(`Audio conversion failed: ${cause.message}`, cause);
}

/**
 * Bring a voice sample into the form the speech model expects.
 * 16-bit PCM WAV is converted to mono 16 kHz. Other WAV encodings (float,
 * 8-bit, 24-bit) and compressed containers pass through for the model to
 * decode. Unknown data raises a TranscriptionError.
 */
export function prepareForTranscription(file: Buffer): PreparedAudio {
  const container = detectAudioContainer(file);

  if (isCompressedAudio(container)) {
    return { audio: file, fileName: `voice.${container}` };
  }
  if (container !== 'wav') {
    throw ErrorFactory.TRANSCRIPTION('Audio conversion failed: unrecognized audio format');
  }

  let format: WavFormat;
  try {
    format = readWavFormat(file);
  } catch (err) {
    throw conversionFailed(err);
  }
  if (!isPcm16(format)) {
    return { audio: file, fileName: TRANSCRIPTION_FILE_NAME };
  }

  let decoded: PcmAudio;
  try {
    decoded = decodeWav(file);
  } catch (err) {
    throw conversionFailed(err);
  }

  if (decoded.channels === CANONICAL_CHANNELS && decoded.sampleRate === CANONICAL_SAMPLE_RATE) {
    return { audio: file, fileName: TRANSCRIPTION_FILE_NAME };
  }

  const canonical = resample(downmixToMono(decoded), CANONICAL_SAMPLE_RATE);
  return { audio: encodeWav(canonical), fileName: TRANSCRIPTION_FILE_NAME };
}
