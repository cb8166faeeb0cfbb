import { z } from 'zod';
import { type PcmOutputFormat, pcmSampleRate } from '../config.ts';
import type { PcmAudioBuffer } from '../utils/audioBuffer.ts';
import { decodeAudioFile, decodePcm16 } from '../utils/audioUtils.ts';
import { DirectoryError, SynthesisError, ValidationError } from '../utils/errors.ts';
import type { VoiceCatalog, VoiceProfile, VoiceSample, VoiceSettings } from '../types.ts';

export type FetchLike = (input: URL, init: RequestInit) => Promise<Response>;

export interface ElevenLabsOptions {
  apiKey: string;
  baseUrl?: string;
  modelId?: string;
  outputFormat?: PcmOutputFormat;
  timeoutMs?: number;
  fetch?: FetchLike;
}

export interface SpeechSynthesizer {
  synthesize(text: string, voiceId: string, settings: VoiceSettings): Promise<PcmAudioBuffer>;
}

export interface VoiceDirectoryResult {
  voices: VoiceCatalog;
  error: DirectoryError | null;
}

export interface VoiceDirectory {
  listVoices(): Promise<VoiceDirectoryResult>;
  /** The encoded sample file as served, for saving or playback. */
  downloadSample(voiceId: string, sampleId: string): Promise<VoiceSample | null>;
  fetchSample(voiceId: string, sampleId: string): Promise<PcmAudioBuffer | null>;
  previewVoice(profile: VoiceProfile): Promise<VoiceSample | null>;
}

export type ElevenLabsClient = SpeechSynthesizer & VoiceDirectory;

const voiceListSchema = z.object({
  voices: z.array(
    z.object({
      voice_id: z.string(),
      name: z.string(),
      samples: z
        .array(
          z.object({
            sample_id: z.string(),
            file_name: z.string().nullish(),
            mime_type: z.string().nullish(),
          })
        )
        .nullish(),
    })
  ),
});

type RemoteVoice = z.infer<typeof voiceListSchema>['voices'][number];

/**
 * Indexes voices by display name. When the service lists a name twice
 * the first entry is kept.
 */
export const buildVoiceCatalog = (voices: RemoteVoice[]): VoiceCatalog => {
  const catalog: VoiceCatalog = new Map();
  for (const voice of voices) {
    const existing = catalog.get(voice.name);
    if (existing) {
      console.warn(
        `[voices] Duplicate voice name "${voice.name}": keeping ${existing.voiceId}, ignoring ${voice.voice_id}.`
      );
      continue;
    }
    catalog.set(voice.name, {
      name: voice.name,
      voiceId: voice.voice_id,
      samples: (voice.samples ?? []).map((sample) => ({
        sampleId: sample.sample_id,
        fileName: sample.file_name ?? undefined,
        mimeType: sample.mime_type ?? undefined,
      })),
    });
  }
  return catalog;
};

const describeFailure = (error: unknown, timeoutMs: number): string => {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return `request timed out after ${timeoutMs}ms`;
  }
  return error instanceof Error ? error.message : String(error);
};

// A missing header is accepted; JSON or HTML bodies are not audio
const isAudioContentType = (contentType: string | null): boolean => {
  if (contentType === null) return true;
  const type = contentType.split(';')[0].trim().toLowerCase();
  return type.startsWith('audio/') || type === 'application/octet-stream';
};

const errorBodySchema = z.object({
  detail: z.union([z.string(), z.object({ message: z.string() }).passthrough()]),
});

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

// Error bodies look like {"detail": {"status": "...", "message": "..."}} or {"detail": "..."}
const readErrorDetail = async (response: Response): Promise<string> => {
  let body: string;
  try {
    body = await response.text();
  } catch {
    return response.statusText;
  }
  const parsed = errorBodySchema.safeParse(parseJson(body));
  if (parsed.success) {
    const { detail } = parsed.data;
    return typeof detail === 'string' ? detail : detail.message;
  }
  return body.slice(0, 200) || response.statusText;
};

/**
 * Client for the ElevenLabs REST API: speech synthesis and the voice
 * directory. Every request carries the API key and a timeout.
 */
export const createElevenLabsClient = (options: ElevenLabsOptions): ElevenLabsClient => {
  const {
    apiKey,
    baseUrl = 'https://api.elevenlabs.io',
    modelId = 'eleven_multilingual_v2',
    outputFormat = 'pcm_24000',
    timeoutMs = 60_000,
  } = options;
  const fetchImpl: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));
  const sampleRate = pcmSampleRate(outputFormat);

  const synthesize = async (
    text: string,
    voiceId: string,
    settings: VoiceSettings
  ): Promise<PcmAudioBuffer> => {
    if (text.trim().length === 0) {
      throw new ValidationError('Cannot generate audio for empty text.');
    }

    const url = new URL(`/v1/text-to-speech/${encodeURIComponent(voiceId)}`, baseUrl);
    url.searchParams.set('output_format', outputFormat);
    url.searchParams.set('optimize_streaming_latency', '0');

    let response: Response;
    try {
      response = await fetchImpl(url, {
        method: 'POST',
        headers: {
          'xi-api-key': apiKey,
          'Content-Type': 'application/json',
          Accept: 'audio/*',
        },
        body: JSON.stringify({
          text,
          model_id: modelId,
          voice_settings: {
            stability: settings.stability,
            similarity_boost: settings.similarityBoost,
            style: settings.style,
          },
        }),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      throw new SynthesisError(`Text-to-speech request failed: ${describeFailure(error, timeoutMs)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      const detail = await readErrorDetail(response);
      throw new SynthesisError(`Text-to-speech request failed with status ${response.status}: ${detail}`, {
        status: response.status,
      });
    }

    const contentType = response.headers.get('content-type');
    if (!isAudioContentType(contentType)) {
      throw new SynthesisError(`Malformed audio payload: expected audio, received ${contentType}.`, {
        status: response.status,
      });
    }

    let bytes: Uint8Array;
    try {
      bytes = new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      throw new SynthesisError(`Audio stream was interrupted: ${describeFailure(error, timeoutMs)}`, {
        cause: error,
      });
    }

    if (bytes.byteLength < 2) {
      throw new SynthesisError('No audio content generated.');
    }
    return decodePcm16(bytes, sampleRate);
  };

  const listVoices = async (): Promise<VoiceDirectoryResult> => {
    try {
      let response: Response;
      try {
        response = await fetchImpl(new URL('/v1/voices', baseUrl), {
          headers: { Accept: 'application/json', 'xi-api-key': apiKey },
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (error) {
        throw new DirectoryError(`Failed to fetch voices: ${describeFailure(error, timeoutMs)}`, {
          cause: error,
        });
      }

      if (!response.ok) {
        throw new DirectoryError(`Failed to fetch voices: ${response.status}`, { status: response.status });
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        throw new DirectoryError('Failed to fetch voices: response is not JSON.', { cause: error });
      }

      const parsed = voiceListSchema.safeParse(body);
      if (!parsed.success) {
        throw new DirectoryError('Failed to fetch voices: unexpected response shape.', { cause: parsed.error });
      }
      return { voices: buildVoiceCatalog(parsed.data.voices), error: null };
    } catch (error) {
      const directoryError =
        error instanceof DirectoryError
          ? error
          : new DirectoryError(`Failed to fetch voices: ${describeFailure(error, timeoutMs)}`, { cause: error });
      console.error('[voices]', directoryError.message);
      return { voices: new Map(), error: directoryError };
    }
  };

  const downloadSample = async (voiceId: string, sampleId: string): Promise<VoiceSample | null> => {
    const url = new URL(
      `/v1/voices/${encodeURIComponent(voiceId)}/samples/${encodeURIComponent(sampleId)}/audio`,
      baseUrl
    );
    try {
      const response = await fetchImpl(url, {
        headers: { 'xi-api-key': apiKey },
        signal: AbortSignal.timeout(timeoutMs),
      });
      if (!response.ok) {
        console.warn(`[voices] Failed to get voice sample ${sampleId}: ${response.status}`);
        return null;
      }
      const data = new Uint8Array(await response.arrayBuffer());
      if (data.byteLength === 0) return null;
      return { data, mimeType: response.headers.get('content-type') ?? 'audio/mpeg' };
    } catch (error) {
      console.warn(`[voices] Failed to get voice sample ${sampleId}: ${describeFailure(error, timeoutMs)}`);
      return null;
    }
  };

  const fetchSample = async (voiceId: string, sampleId: string): Promise<PcmAudioBuffer | null> => {
    const sample = await downloadSample(voiceId, sampleId);
    if (!sample) return null;
    try {
      return await decodeAudioFile(sample.data);
    } catch (error) {
      console.warn(`[voices] Could not decode voice sample ${sampleId}: ${describeFailure(error, timeoutMs)}`);
      return null;
    }
  };

  const previewVoice = async (profile: VoiceProfile): Promise<VoiceSample | null> => {
    const [first] = profile.samples;
    if (!first) return null;
    return downloadSample(profile.voiceId, first.sampleId);
  };

  return { synthesize, listVoices, downloadSample, fetchSample, previewVoice };
};
