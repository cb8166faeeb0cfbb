import { z } from 'zod';
import { ValidationError } from './utils/errors.ts';
import type { VoiceSettings } from './types.ts';

export const PCM_OUTPUT_FORMATS = ['pcm_16000', 'pcm_22050', 'pcm_24000', 'pcm_44100'] as const;
export type PcmOutputFormat = (typeof PCM_OUTPUT_FORMATS)[number];

export const DEFAULT_VOICE_SETTINGS: VoiceSettings = {
  stability: 0.5,
  similarityBoost: 0.8,
  style: 0.1,
};

// Pause inserted after every segment of the final podcast
export const SEGMENT_GAP_MS = 500;

export const DEFAULT_OUTPUT_PATH = 'generated_podcast.mp3';

const envSchema = z.object({
  ELEVENLABS_API_KEY: z.string().optional(),
  ELEVENLABS_BASE_URL: z.string().url().default('https://api.elevenlabs.io'),
  ELEVENLABS_MODEL_ID: z.string().default('eleven_multilingual_v2'),
  ELEVENLABS_OUTPUT_FORMAT: z.enum(PCM_OUTPUT_FORMATS).default('pcm_24000'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  PODCAST_OUTPUT_PATH: z.string().default(DEFAULT_OUTPUT_PATH),
  GEMINI_API_KEY: z.string().optional(),
  API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().default('gemini-2.5-flash'),
});

export interface AppConfig {
  elevenLabsApiKey: string;
  elevenLabsBaseUrl: string;
  modelId: string;
  outputFormat: PcmOutputFormat;
  requestTimeoutMs: number;
  outputPath: string;
  geminiApiKey: string;
  geminiModel: string;
}

/**
 * Reads settings from the environment. Empty variables count as unset.
 * Missing API keys are reported, not thrown: the wizard can still ask
 * for the ElevenLabs key interactively.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid environment configuration.',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const vars = parsed.data;

  if (!vars.ELEVENLABS_API_KEY) {
    console.error('ELEVENLABS_API_KEY is missing from environment variables.');
  }

  return {
    elevenLabsApiKey: vars.ELEVENLABS_API_KEY ?? '',
    elevenLabsBaseUrl: vars.ELEVENLABS_BASE_URL,
    modelId: vars.ELEVENLABS_MODEL_ID,
    outputFormat: vars.ELEVENLABS_OUTPUT_FORMAT,
    requestTimeoutMs: vars.REQUEST_TIMEOUT_MS,
    outputPath: vars.PODCAST_OUTPUT_PATH,
    geminiApiKey: vars.GEMINI_API_KEY ?? vars.API_KEY ?? '',
    geminiModel: vars.GEMINI_MODEL,
  };
};

export const pcmSampleRate = (format: PcmOutputFormat): number =>
  Number(format.slice('pcm_'.length));

/**
 * Shows the first and last four characters of a key.
 */
export const maskApiKey = (apiKey: string): string => {
  if (apiKey.length <= 8) return '*'.repeat(apiKey.length);
  return apiKey.slice(0, 4) + '*'.repeat(apiKey.length - 8) + apiKey.slice(-4);
};
