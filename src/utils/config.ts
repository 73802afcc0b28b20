import { StegavoxConfig } from '../interfaces';
import {
  DEFAULT_SIMILARITY_THRESHOLD,
  DEFAULT_TRANSCRIPTION_LANGUAGE,
  DEFAULT_WHISPER_MODEL,
} from './constants';
import { ErrorFactory } from './error-factory';

export function parseStringWithDefault(value: string | undefined, defaultValue: string): string {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  return value.trim();
}

/**
 * Parse a ratio in [0, 1], falling back to the default when unset
 */
export function parseRatioWithDefault(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw ErrorFactory.INVALID_INPUT(`Invalid ratio: "${value}" (must be a number between 0 and 1)`);
  }
  return parsed;
}

/**
 * Build the configuration from environment variables:
 * STEGAVOX_SIMILARITY_THRESHOLD, STEGAVOX_LANGUAGE, STEGAVOX_WHISPER_MODEL,
 * STEGAVOX_WHISPER_BASE_URL and OPENAI_API_KEY
 */
export function loadStegavoxConfig(env: NodeJS.ProcessEnv = process.env): StegavoxConfig {
  const baseURL = env.STEGAVOX_WHISPER_BASE_URL?.trim();
  const apiKey = env.OPENAI_API_KEY?.trim();

  return {
    recognizer: {
      language: parseStringWithDefault(env.STEGAVOX_LANGUAGE, DEFAULT_TRANSCRIPTION_LANGUAGE),
    },
    voiceGate: {
      similarityThreshold: parseRatioWithDefault(
        env.STEGAVOX_SIMILARITY_THRESHOLD,
        DEFAULT_SIMILARITY_THRESHOLD
      ),
    },
    whisper: {
      apiKey: apiKey ? apiKey : undefined,
      baseURL: baseURL ? baseURL : undefined,
      model: parseStringWithDefault(env.STEGAVOX_WHISPER_MODEL, DEFAULT_WHISPER_MODEL),
    },
  };
}
