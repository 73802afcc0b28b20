import { RawTranscription } from '../src/interfaces';
import { decodeWav, encodeWav } from '../src/media/wav';
import { TranscriptionError } from '../src/utils/errors';
import { downmixToMono, resample } from '../src/voice/audio-conversion';
import { SpeechRecognizer } from '../src/voice/speech-recognizer';
import {
  FakeSpeechModel,
  fakeLoader,
  fmtChunk,
  makePcm,
  makeVoiceSample,
  riffWave,
  wavChunk,
} from './helpers/fixtures';

describe('SpeechRecognizer', () => {
  let model: FakeSpeechModel;

  beforeEach(() => {
    jest.clearAllMocks();
    model = new FakeSpeechModel('  Open Sesame  ');
  });

  test('returns the trimmed text, its normalized form, language and confidence', async () => {
    const recognizer = new SpeechRecognizer(fakeLoader(model));
    const result = await recognizer.transcribe(makeVoiceSample());

    expect(result).toEqual({
      success: true,
      transcript: {
        text: 'Open Sesame',
        normalizedText: 'open sesame',
        language: 'english',
        confidence: -0.5,
      },
    });
  });

  test('reports unknown language and zero confidence when the model gives none', async () => {
    model.language = undefined;
    model.segments = undefined;
    const recognizer = new SpeechRecognizer(fakeLoader(model));
    const result = await recognizer.transcribe(makeVoiceSample());

    expect(result.transcript.language).toBe('unknown');
    expect(result.transcript.confidence).toBe(0);
  });

  test('counts segments without a log-probability as zero', async () => {
    model.segments = [{ avgLogprob: -0.6 }, {}];
    const recognizer = new SpeechRecognizer(fakeLoader(model));
    const result = await recognizer.transcribe(makeVoiceSample());

    expect(result.transcript.confidence).toBeCloseTo(-0.3);
  });

  test('passes canonical mono 16 kHz audio through unchanged', async () => {
    const recognizer = new SpeechRecognizer(fakeLoader(model), { language: 'de' });
    const sample = makeVoiceSample();
    await recognizer.transcribe(sample);

    expect(model.transcribe).toHaveBeenCalledWith(sample, { language: 'de', fileName: 'voice.wav' });
  });

  test('converts other PCM audio to mono 16 kHz', async () => {
    const recognizer = new SpeechRecognizer(fakeLoader(model));
    await recognizer.transcribe(encodeWav(makePcm(100, 2, 32000, () => 200)));

    const converted = decodeWav(model.transcribe.mock.calls[0][0]);
    expect(converted.channels).toBe(1);
    expect(converted.sampleRate).toBe(16000);
    expect(Array.from(converted.samples)).toEqual(new Array<number>(50).fill(200));
  });

  test('hands compressed audio to the model with a matching file name', async () => {
    const recognizer = new SpeechRecognizer(fakeLoader(model));
    const mp3 = Buffer.concat([Buffer.from('ID3', 'ascii'), Buffer.alloc(61)]);
    await recognizer.transcribe(mp3);

    expect(model.transcribe).toHaveBeenCalledWith(mp3, { language: 'en', fileName: 'voice.mp3' });
  });

  test('hands floating point WAV audio to the model as it is', async () => {
    const floats = Buffer.alloc(400);
    for (let i = 0; i < 100; i++) {
      floats.writeFloatLE(Math.sin(i / 10) / 2, i * 4);
    }
    const sample = riffWave([fmtChunk(3, 1, 44100, 32), wavChunk('data', floats)]);
    const recognizer = new SpeechRecognizer(fakeLoader(model));
    const result = await recognizer.transcribe(sample);

    expect(result.success).toBe(true);
    expect(result.transcript.text).toBe('Open Sesame');
    expect(model.transcribe).toHaveBeenCalledWith(sample, { language: 'en', fileName: 'voice.wav' });
  });

  test('hands 8-bit and 24-bit WAV audio to the model as it is', async () => {
    const recognizer = new SpeechRecognizer(fakeLoader(model));
    const eightBit = riffWave([fmtChunk(1, 1, 8000, 8), wavChunk('data', Buffer.alloc(80, 128))]);
    const twentyFourBit = riffWave([fmtChunk(1, 2, 48000, 24), wavChunk('data', Buffer.alloc(60))]);

    expect((await recognizer.transcribe(eightBit)).success).toBe(true);
    expect((await recognizer.transcribe(twentyFourBit)).success).toBe(true);
    expect(model.transcribe).toHaveBeenNthCalledWith(1, eightBit, { language: 'en', fileName: 'voice.wav' });
    expect(model.transcribe).toHaveBeenNthCalledWith(2, twentyFourBit, { language: 'en', fileName: 'voice.wav' });
  });

  test('fails on unrecognized audio without loading the model', async () => {
    const loader = fakeLoader(model);
    const recognizer = new SpeechRecognizer(loader);
    const result = await recognizer.transcribe(Buffer.from('definitely not audio'));

    expect(result).toEqual({
      success: false,
      transcript: { text: '', normalizedText: '', language: 'unknown', confidence: 0 },
      reason: 'Audio conversion failed: unrecognized audio format',
    });
    expect(loader).not.toHaveBeenCalled();
  });

  test('fails on a WAV file it cannot decode', async () => {
    const header = Buffer.alloc(12);
    header.write('RIFF', 0, 'ascii');
    header.write('WAVE', 8, 'ascii');
    const recognizer = new SpeechRecognizer(fakeLoader(model));
    const result = await recognizer.transcribe(header);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.reason).toBe('Audio conversion failed: WAV file is missing its fmt or data chunk');
    }
  });

  test('captures model errors and keeps working afterwards', async () => {
    model.transcribe.mockRejectedValueOnce(new Error('service unavailable'));
    const recognizer = new SpeechRecognizer(fakeLoader(model));

    const failed = await recognizer.transcribe(makeVoiceSample());
    expect(failed.success).toBe(false);
    if (!failed.success) {
      expect(failed.reason).toBe('service unavailable');
    }

    const retried = await recognizer.transcribe(makeVoiceSample());
    expect(retried.success).toBe(true);
  });

  describe('model loading', () => {
    test('loads lazily and only once under concurrent use', async () => {
      const loader = fakeLoader(model);
      const recognizer = new SpeechRecognizer(loader);
      expect(recognizer.isLoaded()).toBe(false);
      expect(loader).not.toHaveBeenCalled();

      const results = await Promise.all([
        recognizer.transcribe(makeVoiceSample()),
        recognizer.transcribe(makeVoiceSample()),
        recognizer.load(),
      ]);

      expect(loader).toHaveBeenCalledTimes(1);
      expect(results[2]).toBe(model);
      expect(recognizer.isLoaded()).toBe(true);
    });

    test('forgets a failed load so a later call can retry', async () => {
      const loader = jest.fn()
        .mockRejectedValueOnce(new Error('bad credentials'))
        .mockResolvedValue(model);
      const recognizer = new SpeechRecognizer(loader);

      const first = await recognizer.transcribe(makeVoiceSample());
      expect(first.success).toBe(false);
      if (!first.success) {
        expect(first.reason).toBe('Failed to load speech model: bad credentials');
      }
      expect(recognizer.isLoaded()).toBe(false);

      const second = await recognizer.transcribe(makeVoiceSample());
      expect(second.success).toBe(true);
      expect(loader).toHaveBeenCalledTimes(2);
    });

    test('load rejects with a TranscriptionError', async () => {
      const recognizer = new SpeechRecognizer(jest.fn().mockRejectedValue(new Error('offline')));
      await expect(recognizer.load()).rejects.toBeInstanceOf(TranscriptionError);
    });
  });

  test('runs one transcription at a time', async () => {
    let active = 0;
    let maxActive = 0;
    model.transcribe.mockImplementation(async (): Promise<RawTranscription> => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise((resolve) => setImmediate(resolve));
      active--;
      return { text: 'done' };
    });
    const recognizer = new SpeechRecognizer(fakeLoader(model));

    const results = await Promise.all([1, 2, 3].map(() => recognizer.transcribe(makeVoiceSample())));

    expect(results.every((result) => result.success)).toBe(true);
    expect(model.transcribe).toHaveBeenCalledTimes(3);
    expect(maxActive).toBe(1);
  });
});

describe('audio conversion', () => {
  test('averages channels when downmixing', () => {
    const stereo = makePcm(2, 2, 8000, (i) => [100, 300, -5, -6][i]);
    expect(Array.from(downmixToMono(stereo).samples)).toEqual([200, -5]);
  });

  test('resamples by linear interpolation', () => {
    const mono = makePcm(4, 1, 8000, (i) => [0, 100, 200, 300][i]);
    const upsampled = resample(mono, 16000);

    expect(upsampled.sampleRate).toBe(16000);
    expect(Array.from(upsampled.samples)).toEqual([0, 50, 100, 150, 200, 250, 300, 300]);
  });
});
