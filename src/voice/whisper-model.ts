import createDebug from 'debug';
import OpenAI, { toFile } from 'openai';
import {
  RawTranscription,
  SpeechModel,
  SpeechModelLoader,
  SpeechModelOptions,
  SpeechSegment,
  WhisperModelConfig,
} from '../interfaces';
import { DEFAULT_WHISPER_MODEL } from '../utils/constants';
import { ErrorFactory } from '../utils/error-factory';

const debug = createDebug('stegavox:whisper');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function parseSegments(value: unknown): SpeechSegment[] | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }
  return value.filter(isRecord).map((segment) => ({
    avgLogprob: typeof segment.avg_logprob === 'number' ? segment.avg_logprob : undefined,
  }));
}

/**
 * Read a verbose_json transcription response
 */
export function parseVerboseTranscription(response: unknown): RawTranscription {
  if (!isRecord(response) || typeof response.text !== 'string') {
    throw ErrorFactory.TRANSCRIPTION('Speech service returned no transcription text');
  }

  return {
    text: response.text,
    language: typeof response.language === 'string' ? response.language : undefined,
    segments: parseSegments(response.segments),
  };
}

/**
 * Loader for Whisper served through the OpenAI transcription API.
 * Loading creates the client and confirms the model exists, so a bad key or
 * model name surfaces on first use rather than mid-authentication.
 *
 * @param config API key, endpoint and model name
 */
export function createWhisperModelLoader(config: WhisperModelConfig = {}): SpeechModelLoader {
  const modelName = config.model || DEFAULT_WHISPER_MODEL;

  return async (): Promise<SpeechModel> => {
    const client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL });
    await client.models.retrieve(modelName);
    debug('Using transcription model %s', modelName);

    return {
      async transcribe(audio: Buffer, options: SpeechModelOptions): Promise<RawTranscription> {
        const file = await toFile(audio, options.fileName);
        const response: unknown = await client.audio.transcriptions.create({
          file,
          model: modelName,
          language: options.language,
          response_format: 'verbose_json',
        });
        return parseVerboseTranscription(response);
      },
    };
  };
}
