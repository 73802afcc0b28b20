import * as cipherBox from '../src/crypto/cipher-box';
import { HideRequest, MediaType } from '../src/interfaces';
import { encodePng } from '../src/media/png';
import { StegoPipeline } from '../src/pipeline/stego-pipeline';
import { bindFileCarrier, CarrierLookup, createFileCarrier } from '../src/steganography/carrier-factory';
import { ImageCarrierAdapter } from '../src/steganography/image-carrier';
import {
  AuthenticationError,
  CapacityError,
  DecryptionError,
  FramingError,
  NotFoundError,
  UnsupportedMediaError,
} from '../src/utils/errors';
import { SpeechRecognizer } from '../src/voice/speech-recognizer';
import { VoiceGate } from '../src/voice/voice-gate';
import { FakeSpeechModel, fakeLoader, makeImage, makePng, makeVoiceSample, makeWav } from './helpers/fixtures';

function hideRequest(cover: Buffer, mediaType: MediaType, plaintext = 'HI'): HideRequest {
  return {
    cover,
    mediaType,
    plaintext,
    password: 'test-secret',
    passphrase: 'open sesame',
    voiceSample: makeVoiceSample(),
  };
}

describe('StegoPipeline', () => {
  let model: FakeSpeechModel;
  let carriers: jest.MockedFunction<CarrierLookup>;
  let pipeline: StegoPipeline;

  beforeEach(() => {
    model = new FakeSpeechModel('Open sesame');
    carriers = jest.fn(createFileCarrier);
    pipeline = new StegoPipeline(new VoiceGate(new SpeechRecognizer(fakeLoader(model))), { carriers });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('hide', () => {
    test('hides an encrypted message in a PNG', async () => {
      const cover = makePng(40, 40);
      const coverCopy = Buffer.from(cover);
      const result = await pipeline.hide(hideRequest(cover, 'image'));

      expect(result.mediaType).toBe('image');
      // 44 base64 characters plus the end marker
      expect(result.bitsUsed).toBe(368);
      expect(result.capacity).toBe(4800);
      expect(result.verification.pass).toBe(true);
      expect(cover.equals(coverCopy)).toBe(true);
    });

    test('decodes the cover only once', async () => {
      const adapter = new ImageCarrierAdapter();
      const read = jest.spyOn(adapter, 'read');
      carriers.mockImplementation(() => bindFileCarrier(adapter));

      const result = await pipeline.hide(hideRequest(makePng(40, 40), 'image'));
      expect(result.capacity).toBe(4800);
      expect(read).toHaveBeenCalledTimes(1);
    });

    test('re-encrypts when the ciphertext contains the end marker', async () => {
      // 'U' is 01010101, so 'UUUU' holds the marker pattern well before its end
      const encrypt = jest.spyOn(cipherBox, 'encrypt').mockReturnValueOnce('UUUU');

      const hidden = await pipeline.hide(hideRequest(makePng(40, 40), 'image'));
      expect(encrypt).toHaveBeenCalledTimes(2);

      const revealed = await pipeline.reveal({
        stego: hidden.stego,
        mediaType: 'image',
        password: 'test-secret',
        authenticationAudio: makeVoiceSample(),
      });
      expect(revealed.plaintext).toBe('HI');
    });

    test('gives up with a FramingError when every ciphertext collides', async () => {
      const encrypt = jest.spyOn(cipherBox, 'encrypt').mockReturnValue('UUUU');

      await expect(pipeline.hide(hideRequest(makePng(40, 40), 'image'))).rejects.toThrow(FramingError);
      await expect(pipeline.hide(hideRequest(makePng(40, 40), 'image'))).rejects.toThrow(
        'Could not encrypt the message without an early end marker after 1000 attempts'
      );
      expect(encrypt).toHaveBeenCalledTimes(2000);
    });

    test('refuses to hide when the voice does not match', async () => {
      model.text = 'close the door';

      await expect(pipeline.hide(hideRequest(makePng(40, 40), 'image'))).rejects.toThrow(
        AuthenticationError
      );
      expect(carriers).not.toHaveBeenCalled();
    });

    test('reports the similarity when rejecting', async () => {
      model.text = 'close the door';

      await expect(pipeline.hide(hideRequest(makePng(40, 40), 'image'))).rejects.toMatchObject({
        message: 'Voice authentication failed. Similarity: 0.00 (threshold: 0.8)',
        score: 0,
        threshold: 0.8,
        transcribedText: 'close the door',
      });
    });

    test('honours a per-request threshold', async () => {
      model.text = 'open sesame now';
      const request = { ...hideRequest(makePng(40, 40), 'image'), similarityThreshold: 0.6 };

      const result = await pipeline.hide(request);
      expect(result.verification.threshold).toBe(0.6);
    });

    test('fails when the ciphertext does not fit', async () => {
      await expect(pipeline.hide(hideRequest(makePng(4, 4), 'image'))).rejects.toThrow(CapacityError);
    });

    test('does not hide in video', async () => {
      await expect(pipeline.hide(hideRequest(Buffer.alloc(64), 'video'))).rejects.toThrow(
        UnsupportedMediaError
      );
    });
  });

  describe('reveal', () => {
    test('round-trips a message through an image', async () => {
      const hidden = await pipeline.hide(hideRequest(makePng(40, 40), 'image', 'meet at noon'));
      const revealed = await pipeline.reveal({
        stego: hidden.stego,
        mediaType: 'image',
        password: 'test-secret',
        authenticationAudio: makeVoiceSample(),
      });

      expect(revealed.plaintext).toBe('meet at noon');
      expect(revealed.transcript.text).toBe('Open sesame');
      expect(revealed.verification).toBeUndefined();
      expect(revealed.integrity).toBeUndefined();
    });

    test('round-trips long messages every time', async () => {
      const plaintext = 'x'.repeat(1000);
      const cover = makePng(100, 100);

      for (let i = 0; i < 20; i++) {
        const hidden = await pipeline.hide(hideRequest(cover, 'image', plaintext));
        // 1368 base64 characters plus the end marker
        expect(hidden.bitsUsed).toBe(10960);

        const revealed = await pipeline.reveal({
          stego: hidden.stego,
          mediaType: 'image',
          password: 'test-secret',
          authenticationAudio: makeVoiceSample(),
        });
        expect(revealed.plaintext).toBe(plaintext);
      }
    });

    test('round-trips a message through audio', async () => {
      const hidden = await pipeline.hide(hideRequest(makeWav(2000), 'audio', 'Grüße 👋'));
      const revealed = await pipeline.reveal({
        stego: hidden.stego,
        mediaType: 'audio',
        password: 'test-secret',
        authenticationAudio: makeVoiceSample(),
      });

      expect(revealed.plaintext).toBe('Grüße 👋');
    });

    test('fails with the wrong password', async () => {
      const plaintext = 'a message long enough to fill several cipher blocks';
      const hidden = await pipeline.hide(hideRequest(makePng(40, 40), 'image', plaintext));

      await expect(pipeline.reveal({
        stego: hidden.stego,
        mediaType: 'image',
        password: 'not-the-secret',
        authenticationAudio: makeVoiceSample(),
      })).rejects.toThrow(DecryptionError);
    });

    test('fails before transcribing when nothing is hidden', async () => {
      const blank = encodePng(makeImage(10, 10, 3, () => 0));

      await expect(pipeline.reveal({
        stego: blank,
        mediaType: 'image',
        password: 'test-secret',
        authenticationAudio: makeVoiceSample(),
      })).rejects.toThrow(NotFoundError);
      expect(model.transcribe).not.toHaveBeenCalled();
    });

    test('requires the authentication audio to transcribe', async () => {
      const hidden = await pipeline.hide(hideRequest(makePng(40, 40), 'image'));

      await expect(pipeline.reveal({
        stego: hidden.stego,
        mediaType: 'image',
        password: 'test-secret',
        authenticationAudio: Buffer.from('not audio'),
      })).rejects.toThrow('Voice authentication failed: Audio conversion failed: unrecognized audio format');
    });

    test('re-verifies against an expected passphrase', async () => {
      const hidden = await pipeline.hide(hideRequest(makePng(40, 40), 'image'));
      const request = {
        stego: hidden.stego,
        mediaType: 'image' as const,
        password: 'test-secret',
        authenticationAudio: makeVoiceSample(),
        expectedPassphrase: 'open sesame',
      };

      const revealed = await pipeline.reveal(request);
      expect(revealed.plaintext).toBe('HI');
      expect(revealed.verification?.pass).toBe(true);

      model.text = 'something else entirely';
      await expect(pipeline.reveal(request)).rejects.toThrow(AuthenticationError);
    });

    test('checks integrity against the original message', async () => {
      const hidden = await pipeline.hide(hideRequest(makePng(40, 40), 'image'));
      const base = {
        stego: hidden.stego,
        mediaType: 'image' as const,
        password: 'test-secret',
        authenticationAudio: makeVoiceSample(),
      };

      const verified = await pipeline.reveal({ ...base, originalPlaintext: 'HI' });
      expect(verified.integrity?.status).toBe('VERIFIED');
      expect(verified.integrity?.score).toBe(100);

      const corrupted = await pipeline.reveal({ ...base, originalPlaintext: 'HO' });
      expect(corrupted.integrity?.status).toBe('CORRUPTED');
      expect(corrupted.plaintext).toBe('HI');
    });
  });

  test('reports cover capacity', () => {
    const report = pipeline.capacity(makePng(100, 100), 'image');
    expect(report.totalBits).toBe(30000);
    expect(report.recommendedMessageLength).toBe(2783);
    expect(carriers).toHaveBeenCalledWith('image');
  });

  test('computes security metrics', () => {
    expect(pipeline.securityMetrics('Hello World!', 'TestPass123!').securityRating).toBe('EXCELLENT');
  });
});
