import { describe, expect, it } from 'vitest';
import { PcmAudioBuffer } from './audioBuffer.ts';
import {
  audioBufferToWav,
  concatAudioBuffers,
  createSilence,
  decodePcm16,
  decodeWav,
  matchChannels,
  outputFormatForPath,
  resampleBuffer,
} from './audioUtils.ts';
import { ValidationError } from './errors.ts';

const mono = (values: number[], sampleRate: number = 24000): PcmAudioBuffer =>
  new PcmAudioBuffer([Float32Array.from(values)], sampleRate);

const ascii = (bytes: Uint8Array, offset: number): string =>
  String.fromCharCode(...bytes.subarray(offset, offset + 4));

describe('PcmAudioBuffer', () => {
  it('reports length and duration', () => {
    const buffer = mono(new Array(12000).fill(0));
    expect(buffer.length).toBe(12000);
    expect(buffer.duration).toBe(0.5);
    expect(buffer.numberOfChannels).toBe(1);
  });

  it('rejects channels of different lengths', () => {
    expect(() => new PcmAudioBuffer([new Float32Array(2), new Float32Array(3)], 24000)).toThrow(RangeError);
  });

  it('rejects a missing channel', () => {
    expect(() => mono([0]).getChannelData(1)).toThrow('Channel 1 does not exist (buffer has 1).');
  });
});

describe('decodePcm16', () => {
  it('decodes little-endian samples and drops a trailing odd byte', () => {
    const bytes = new Uint8Array([0x00, 0x40, 0x00, 0xc0, 0xff, 0x7f, 0x12]);

    const buffer = decodePcm16(bytes, 24000);

    expect(buffer.sampleRate).toBe(24000);
    expect(Array.from(buffer.getChannelData(0))).toEqual([0.5, -0.5, 32767 / 32768]);
  });

  it('splits interleaved stereo frames', () => {
    const bytes = new Uint8Array([0x00, 0x40, 0x00, 0xc0, 0x00, 0x20, 0x00, 0xe0]);

    const buffer = decodePcm16(bytes, 44100, 2);

    expect(Array.from(buffer.getChannelData(0))).toEqual([0.5, 0.25]);
    expect(Array.from(buffer.getChannelData(1))).toEqual([-0.5, -0.25]);
  });

  it('reads from a view into a larger buffer', () => {
    const backing = new Uint8Array([0xaa, 0x00, 0x40, 0xbb]);
    const buffer = decodePcm16(backing.subarray(1, 3), 16000);
    expect(Array.from(buffer.getChannelData(0))).toEqual([0.5]);
  });
});

describe('createSilence', () => {
  it('creates zeroed frames for the duration', () => {
    const silence = createSilence(500, 24000, 2);
    expect(silence.length).toBe(12000);
    expect(silence.numberOfChannels).toBe(2);
    expect(silence.getChannelData(1).every((sample) => sample === 0)).toBe(true);
  });
});

describe('resampleBuffer', () => {
  it('interpolates between neighbouring samples', () => {
    const upsampled = resampleBuffer(mono([0, 1, 0], 12000), 24000);
    expect(upsampled.sampleRate).toBe(24000);
    expect(Array.from(upsampled.getChannelData(0))).toEqual([0, 0.5, 1, 0.5, 0, 0]);
  });

  it('returns the same buffer when the rate matches', () => {
    const buffer = mono([0.5]);
    expect(resampleBuffer(buffer, 24000)).toBe(buffer);
  });
});

describe('matchChannels', () => {
  it('copies mono into every channel', () => {
    const stereo = matchChannels(mono([0.5, -0.5]), 2);
    expect(Array.from(stereo.getChannelData(0))).toEqual([0.5, -0.5]);
    expect(Array.from(stereo.getChannelData(1))).toEqual([0.5, -0.5]);
  });
});

describe('concatAudioBuffers', () => {
  it('joins clips in order', () => {
    const joined = concatAudioBuffers([mono([0.25, 0.5]), mono([-0.25])]);
    expect(Array.from(joined.getChannelData(0))).toEqual([0.25, 0.5, -0.25]);
  });

  it('brings clips to the highest rate and channel count', () => {
    const low = mono([0.5, 0.5, 0.5], 12000);
    const stereo = new PcmAudioBuffer([Float32Array.from([0.25]), Float32Array.from([-0.25])], 24000);

    const joined = concatAudioBuffers([low, stereo]);

    expect(joined.sampleRate).toBe(24000);
    expect(joined.numberOfChannels).toBe(2);
    expect(joined.length).toBe(6 + 1);
    expect(joined.getChannelData(1)[0]).toBe(0.5);
    expect(joined.getChannelData(1)[6]).toBe(-0.25);
  });

  it('needs at least one clip', () => {
    expect(() => concatAudioBuffers([])).toThrow('Nothing to concatenate.');
  });
});

describe('audioBufferToWav', () => {
  it('writes a 16-bit PCM header', () => {
    const wav = audioBufferToWav(mono([0, 0.5, -0.5], 24000));
    const view = new DataView(wav.buffer, wav.byteOffset, wav.byteLength);

    expect(wav.byteLength).toBe(44 + 6);
    expect(ascii(wav, 0)).toBe('RIFF');
    expect(view.getUint32(4, true)).toBe(42);
    expect(ascii(wav, 8)).toBe('WAVE');
    expect(ascii(wav, 12)).toBe('fmt ');
    expect(view.getUint16(20, true)).toBe(1);
    expect(view.getUint16(22, true)).toBe(1);
    expect(view.getUint32(24, true)).toBe(24000);
    expect(view.getUint32(28, true)).toBe(48000);
    expect(view.getUint16(34, true)).toBe(16);
    expect(ascii(wav, 36)).toBe('data');
    expect(view.getUint32(40, true)).toBe(6);
    expect(view.getInt16(44, true)).toBe(0);
    expect(view.getInt16(46, true)).toBe(16383);
    expect(view.getInt16(48, true)).toBe(-16384);
  });

  it('clamps samples outside [-1, 1]', () => {
    const wav = audioBufferToWav(mono([2, -2]));
    const view = new DataView(wav.buffer, wav.byteOffset, wav.byteLength);
    expect(view.getInt16(44, true)).toBe(32767);
    expect(view.getInt16(46, true)).toBe(-32768);
  });
});

const floatWav = (samples: number[], sampleRate: number): Uint8Array => {
  const dataLength = samples.length * 4;
  const buffer = new ArrayBuffer(44 + dataLength + 10);
  const view = new DataView(buffer);
  const tag = (offset: number, value: string) =>
    [...value].forEach((char, i) => view.setUint8(offset + i, char.charCodeAt(0)));

  tag(0, 'RIFF');
  view.setUint32(4, buffer.byteLength - 8, true);
  tag(8, 'WAVE');
  // An odd-sized chunk before fmt, padded to an even length
  tag(12, 'LIST');
  view.setUint32(16, 1, true);
  tag(22, 'fmt ');
  view.setUint32(26, 16, true);
  view.setUint16(30, 3, true);
  view.setUint16(32, 1, true);
  view.setUint32(34, sampleRate, true);
  view.setUint32(38, sampleRate * 4, true);
  view.setUint16(42, 4, true);
  view.setUint16(44, 32, true);
  tag(46, 'data');
  view.setUint32(50, dataLength, true);
  samples.forEach((sample, i) => view.setFloat32(54 + i * 4, sample, true));
  return new Uint8Array(buffer);
};

describe('decodeWav', () => {
  it('reads back what audioBufferToWav wrote', () => {
    const decoded = decodeWav(audioBufferToWav(mono([0.5, -0.5], 22050)));
    expect(decoded.sampleRate).toBe(22050);
    expect(decoded.length).toBe(2);
    expect(decoded.getChannelData(0)[0]).toBeCloseTo(0.5, 4);
    expect(decoded.getChannelData(0)[1]).toBeCloseTo(-0.5, 4);
  });

  it('reads 32-bit float files and skips unknown chunks', () => {
    const decoded = decodeWav(floatWav([0.25, -0.75], 48000));
    expect(decoded.sampleRate).toBe(48000);
    expect(Array.from(decoded.getChannelData(0))).toEqual([0.25, -0.75]);
  });

  it('rejects data that is not a WAV file', () => {
    expect(() => decodeWav(new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]))).toThrow(ValidationError);
  });
});

describe('outputFormatForPath', () => {
  it('picks WAV for .wav and MP3 otherwise', () => {
    expect(outputFormatForPath('out/Episode.WAV')).toBe('wav');
    expect(outputFormatForPath('generated_podcast.mp3')).toBe('mp3');
  });
});
