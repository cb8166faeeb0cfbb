import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PcmAudioBuffer } from '../utils/audioBuffer.ts';
import { audioBufferToWav } from '../utils/audioUtils.ts';
import { DirectoryError, SynthesisError, ValidationError } from '../utils/errors.ts';
import { buildVoiceCatalog, createElevenLabsClient, type FetchLike } from './elevenLabsService.ts';

const SETTINGS = { stability: 0.5, similarityBoost: 0.8, style: 0.1 };

const audioResponse = (bytes: number[] | Uint8Array, contentType = 'audio/pcm'): Response =>
  new Response(Uint8Array.from(bytes), { status: 200, headers: { 'content-type': contentType } });

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

const clientWith = (fetch: FetchLike) =>
  createElevenLabsClient({ apiKey: 'test-secret', baseUrl: 'https://tts.test', fetch, timeoutMs: 1000 });

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('synthesize', () => {
  it('posts the text and settings and decodes the PCM reply', async () => {
    const fetch = vi.fn<FetchLike>(async () => audioResponse([0x00, 0x40, 0x00, 0xc0]));

    const audio = await clientWith(fetch).synthesize('Hello there', 'voice-1', SETTINGS);

    expect(audio.sampleRate).toBe(24000);
    expect(Array.from(audio.getChannelData(0))).toEqual([0.5, -0.5]);

    const [url, init] = fetch.mock.calls[0];
    expect(url.href).toBe(
      'https://tts.test/v1/text-to-speech/voice-1?output_format=pcm_24000&optimize_streaming_latency=0'
    );
    expect(init.method).toBe('POST');
    expect(init.headers).toMatchObject({ 'xi-api-key': 'test-secret' });
    expect(JSON.parse(String(init.body))).toEqual({
      text: 'Hello there',
      model_id: 'eleven_multilingual_v2',
      voice_settings: { stability: 0.5, similarity_boost: 0.8, style: 0.1 },
    });
  });

  it('uses the sample rate of the configured format', async () => {
    const fetch = vi.fn<FetchLike>(async () => audioResponse([0x00, 0x00]));
    const client = createElevenLabsClient({ apiKey: 'test-secret', outputFormat: 'pcm_16000', fetch });

    const audio = await client.synthesize('Hi', 'voice-1', SETTINGS);

    expect(audio.sampleRate).toBe(16000);
    expect(fetch.mock.calls[0][0].searchParams.get('output_format')).toBe('pcm_16000');
  });

  it('refuses empty text without calling the service', async () => {
    const fetch = vi.fn<FetchLike>();

    await expect(clientWith(fetch).synthesize('   ', 'voice-1', SETTINGS)).rejects.toBeInstanceOf(ValidationError);
    expect(fetch).not.toHaveBeenCalled();
  });

  it('reports the status and detail of a failed request', async () => {
    const fetch = vi.fn<FetchLike>(async () =>
      jsonResponse({ detail: { status: 'quota_exceeded', message: 'Quota exceeded.' } }, 401)
    );

    const result = clientWith(fetch).synthesize('Hi', 'voice-1', SETTINGS);

    await expect(result).rejects.toBeInstanceOf(SynthesisError);
    await expect(result).rejects.toMatchObject({
      status: 401,
      message: 'Text-to-speech request failed with status 401: Quota exceeded.',
    });
  });

  it('falls back to the raw body for non-JSON errors', async () => {
    const fetch = vi.fn<FetchLike>(async () => new Response('upstream busy', { status: 503 }));

    await expect(clientWith(fetch).synthesize('Hi', 'voice-1', SETTINGS)).rejects.toThrow(
      'Text-to-speech request failed with status 503: upstream busy'
    );
  });

  it('wraps network failures', async () => {
    const fetch = vi.fn<FetchLike>(async () => {
      throw new TypeError('fetch failed');
    });

    await expect(clientWith(fetch).synthesize('Hi', 'voice-1', SETTINGS)).rejects.toThrow(
      'Text-to-speech request failed: fetch failed'
    );
  });

  it('reports timeouts', async () => {
    const fetch = vi.fn<FetchLike>(async () => {
      const timeout = new Error('The operation was aborted due to timeout');
      timeout.name = 'TimeoutError';
      throw timeout;
    });

    await expect(clientWith(fetch).synthesize('Hi', 'voice-1', SETTINGS)).rejects.toThrow(
      'Text-to-speech request failed: request timed out after 1000ms'
    );
  });

  it('rejects a successful reply that is not audio', async () => {
    const fetch = vi.fn<FetchLike>(async () => jsonResponse({ status: 'ok' }));

    const result = clientWith(fetch).synthesize('Hi', 'voice-1', SETTINGS);

    await expect(result).rejects.toBeInstanceOf(SynthesisError);
    await expect(result).rejects.toThrow('Malformed audio payload: expected audio, received application/json.');
  });

  it('accepts an octet-stream reply', async () => {
    const fetch = vi.fn<FetchLike>(async () => audioResponse([0x00, 0x40], 'application/octet-stream'));

    const audio = await clientWith(fetch).synthesize('Hi', 'voice-1', SETTINGS);

    expect(Array.from(audio.getChannelData(0))).toEqual([0.5]);
  });

  it('treats an empty reply as a failure', async () => {
    const fetch = vi.fn<FetchLike>(async () => audioResponse([]));

    await expect(clientWith(fetch).synthesize('Hi', 'voice-1', SETTINGS)).rejects.toThrow('No audio content generated.');
  });
});

describe('listVoices', () => {
  it('indexes voices by name', async () => {
    const fetch = vi.fn<FetchLike>(async () =>
      jsonResponse({
        voices: [
          { voice_id: 'v1', name: 'Rachel', samples: [{ sample_id: 's1', file_name: 'a.mp3', mime_type: 'audio/mpeg' }] },
          { voice_id: 'v2', name: 'Adam', samples: null },
        ],
      })
    );

    const { voices, error } = await clientWith(fetch).listVoices();

    expect(error).toBeNull();
    expect([...voices.keys()]).toEqual(['Rachel', 'Adam']);
    expect(voices.get('Rachel')).toEqual({
      name: 'Rachel',
      voiceId: 'v1',
      samples: [{ sampleId: 's1', fileName: 'a.mp3', mimeType: 'audio/mpeg' }],
    });
    expect(voices.get('Adam')?.samples).toEqual([]);
    expect(fetch.mock.calls[0][0].href).toBe('https://tts.test/v1/voices');
  });

  it('returns an empty directory and the error when the request fails', async () => {
    const fetch = vi.fn<FetchLike>(async () => jsonResponse({ detail: 'Invalid API key' }, 401));

    const { voices, error } = await clientWith(fetch).listVoices();

    expect(voices.size).toBe(0);
    expect(error).toBeInstanceOf(DirectoryError);
    expect(error?.message).toBe('Failed to fetch voices: 401');
    expect(error?.status).toBe(401);
    expect(console.error).toHaveBeenCalledWith('[voices]', 'Failed to fetch voices: 401');
  });

  it('rejects a reply of the wrong shape', async () => {
    const fetch = vi.fn<FetchLike>(async () => jsonResponse({ items: [] }));

    const { error } = await clientWith(fetch).listVoices();

    expect(error?.message).toBe('Failed to fetch voices: unexpected response shape.');
  });
});

describe('buildVoiceCatalog', () => {
  it('keeps the first of two voices with the same name', () => {
    const catalog = buildVoiceCatalog([
      { voice_id: 'v1', name: 'Rachel' },
      { voice_id: 'v2', name: 'Rachel' },
    ]);

    expect(catalog.get('Rachel')?.voiceId).toBe('v1');
    expect(console.warn).toHaveBeenCalledWith(
      '[voices] Duplicate voice name "Rachel": keeping v1, ignoring v2.'
    );
  });
});

describe('voice samples', () => {
  it('downloads the sample bytes and their type', async () => {
    const fetch = vi.fn<FetchLike>(async () => audioResponse([1, 2, 3], 'audio/mpeg'));

    const sample = await clientWith(fetch).downloadSample('v1', 's1');

    expect(sample).toEqual({ data: new Uint8Array([1, 2, 3]), mimeType: 'audio/mpeg' });
    expect(fetch.mock.calls[0][0].href).toBe('https://tts.test/v1/voices/v1/samples/s1/audio');
  });

  it('decodes a fetched sample', async () => {
    const wav = audioBufferToWav(new PcmAudioBuffer([Float32Array.from([0.5, -0.5])], 22050));
    const fetch = vi.fn<FetchLike>(async () => audioResponse(wav, 'audio/wav'));

    const audio = await clientWith(fetch).fetchSample('v1', 's1');

    expect(audio?.sampleRate).toBe(22050);
    expect(audio?.length).toBe(2);
    expect(audio?.getChannelData(0)[1]).toBe(-0.5);
  });

  it('returns null for a sample that cannot be decoded', async () => {
    const header = [...'RIFF\0\0\0\0WAVE'].map((char) => char.charCodeAt(0));
    const fetch = vi.fn<FetchLike>(async () => audioResponse(header, 'audio/wav'));

    expect(await clientWith(fetch).fetchSample('v1', 's1')).toBeNull();
    expect(console.warn).toHaveBeenCalledWith(
      '[voices] Could not decode voice sample s1: WAV file has no fmt or data chunk.'
    );
  });

  it('returns null when the sample cannot be fetched', async () => {
    const fetch = vi.fn<FetchLike>(async () => new Response('missing', { status: 404 }));

    expect(await clientWith(fetch).fetchSample('v1', 's1')).toBeNull();
    expect(console.warn).toHaveBeenCalledWith('[voices] Failed to get voice sample s1: 404');
  });

  it('previews a voice with its first sample', async () => {
    const fetch = vi.fn<FetchLike>(async () => audioResponse([9], 'audio/wav'));
    const profile = {
      name: 'Rachel',
      voiceId: 'v1',
      samples: [{ sampleId: 's1' }, { sampleId: 's2' }],
    };

    const sample = await clientWith(fetch).previewVoice(profile);

    expect(sample?.mimeType).toBe('audio/wav');
    expect(fetch.mock.calls[0][0].pathname).toBe('/v1/voices/v1/samples/s1/audio');
  });

  it('has no preview for a voice without samples', async () => {
    const fetch = vi.fn<FetchLike>();

    expect(await clientWith(fetch).previewVoice({ name: 'Adam', voiceId: 'v2', samples: [] })).toBeNull();
    expect(fetch).not.toHaveBeenCalled();
  });
});
