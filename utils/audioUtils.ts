import { PcmAudioBuffer, createBuffer } from './audioBuffer.ts';
import { ValidationError } from './errors.ts';
import type { OutputFormat } from '../types.ts';

/**
 * Decodes raw 16-bit little-endian PCM (interleaved when multi-channel)
 * into a PcmAudioBuffer.
 */
export const decodePcm16 = (
  bytes: Uint8Array,
  sampleRate: number,
  numChannels: number = 1
): PcmAudioBuffer => {
  // Align to whole frames; a trailing partial sample is dropped
  const bytesPerFrame = 2 * numChannels;
  const frameCount = Math.floor(bytes.byteLength / bytesPerFrame);
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  const buffer = createBuffer(numChannels, frameCount, sampleRate);
  for (let channel = 0; channel < numChannels; channel++) {
    const channelData = buffer.getChannelData(channel);
    for (let i = 0; i < frameCount; i++) {
      channelData[i] = view.getInt16((i * numChannels + channel) * 2, true) / 32768.0;
    }
  }
  return buffer;
};

export const createSilence = (
  durationMs: number,
  sampleRate: number,
  numberOfChannels: number = 1
): PcmAudioBuffer => {
  const frameCount = Math.round((durationMs / 1000) * sampleRate);
  return createBuffer(numberOfChannels, frameCount, sampleRate);
};

/**
 * Linear-interpolation resampling. Returns the input untouched when the
 * rate already matches.
 */
export const resampleBuffer = (buffer: PcmAudioBuffer, targetRate: number): PcmAudioBuffer => {
  if (buffer.sampleRate === targetRate) return buffer;

  const ratio = buffer.sampleRate / targetRate;
  const newLength = Math.round((buffer.length * targetRate) / buffer.sampleRate);
  const output = createBuffer(buffer.numberOfChannels, newLength, targetRate);

  for (let channel = 0; channel < buffer.numberOfChannels; channel++) {
    const input = buffer.getChannelData(channel);
    const data = output.getChannelData(channel);
    const last = input.length - 1;
    if (last < 0) continue;
    for (let i = 0; i < newLength; i++) {
      const position = i * ratio;
      const index = Math.min(Math.floor(position), last);
      const next = Math.min(index + 1, last);
      const fraction = position - index;
      data[i] = input[index] * (1 - fraction) + input[next] * fraction;
    }
  }
  return output;
};

/**
 * Widens a buffer to `numberOfChannels`; channels the source lacks copy
 * its last channel (mono is duplicated to every channel).
 */
export const matchChannels = (buffer: PcmAudioBuffer, numberOfChannels: number): PcmAudioBuffer => {
  if (buffer.numberOfChannels === numberOfChannels) return buffer;
  const channels: Float32Array[] = [];
  for (let channel = 0; channel < numberOfChannels; channel++) {
    const source = buffer.getChannelData(Math.min(channel, buffer.numberOfChannels - 1));
    channels.push(Float32Array.from(source));
  }
  return new PcmAudioBuffer(channels, buffer.sampleRate);
};

/**
 * Joins buffers end to end. Clips that differ in format are brought to
 * the highest sample rate and channel count among them first.
 */
export const concatAudioBuffers = (buffers: PcmAudioBuffer[]): PcmAudioBuffer => {
  if (buffers.length === 0) {
    throw new RangeError('Nothing to concatenate.');
  }

  const sampleRate = Math.max(...buffers.map((b) => b.sampleRate));
  const numberOfChannels = Math.max(...buffers.map((b) => b.numberOfChannels));
  const normalized = buffers.map((b) => matchChannels(resampleBuffer(b, sampleRate), numberOfChannels));

  const totalLength = normalized.reduce((sum, b) => sum + b.length, 0);
  const output = createBuffer(numberOfChannels, totalLength, sampleRate);

  for (let channel = 0; channel < numberOfChannels; channel++) {
    const data = output.getChannelData(channel);
    let offset = 0;
    for (const part of normalized) {
      data.set(part.getChannelData(channel), offset);
      offset += part.length;
    }
  }
  return output;
};

const toInt16 = (sample: number): number => {
  const clamped = Math.max(-1, Math.min(1, sample));
  return (clamped < 0 ? clamped * 32768 : clamped * 32767) | 0;
};

/**
 * Encodes a buffer as a 16-bit PCM WAV file.
 */
export const audioBufferToWav = (buffer: PcmAudioBuffer): Uint8Array => {
  const numOfChan = buffer.numberOfChannels;
  const length = buffer.length * numOfChan * 2 + 44;
  const bufferArr = new ArrayBuffer(length);
  const view = new DataView(bufferArr);
  const channels: Float32Array[] = [];
  let pos = 0;

  const setUint16 = (data: number) => {
    view.setUint16(pos, data, true);
    pos += 2;
  };

  const setUint32 = (data: number) => {
    view.setUint32(pos, data, true);
    pos += 4;
  };

  setUint32(0x46464952); // "RIFF"
  setUint32(length - 8); // file length - 8
  setUint32(0x45564157); // "WAVE"

  setUint32(0x20746d66); // "fmt " chunk
  setUint32(16); // length = 16
  setUint16(1); // PCM (uncompressed)
  setUint16(numOfChan);
  setUint32(buffer.sampleRate);
  setUint32(buffer.sampleRate * 2 * numOfChan); // avg. bytes/sec
  setUint16(numOfChan * 2); // block-align
  setUint16(16); // 16-bit

  setUint32(0x61746164); // "data" - chunk
  setUint32(length - pos - 4); // chunk length

  for (let i = 0; i < numOfChan; i++) {
    channels.push(buffer.getChannelData(i));
  }

  let offset = 44;
  for (let frame = 0; frame < buffer.length; frame++) {
    for (let i = 0; i < numOfChan; i++) {
      view.setInt16(offset, toInt16(channels[i][frame]), true);
      offset += 2;
    }
  }

  return new Uint8Array(bufferArr);
};

const readTag = (view: DataView, offset: number): string =>
  String.fromCharCode(
    view.getUint8(offset),
    view.getUint8(offset + 1),
    view.getUint8(offset + 2),
    view.getUint8(offset + 3)
  );

const WAVE_FORMAT_PCM = 1;
const WAVE_FORMAT_IEEE_FLOAT = 3;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

/**
 * Decodes a WAV file holding 16-bit integer or 32-bit float samples.
 */
export const decodeWav = (bytes: Uint8Array): PcmAudioBuffer => {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (bytes.byteLength < 12 || readTag(view, 0) !== 'RIFF' || readTag(view, 8) !== 'WAVE') {
    throw new ValidationError('Not a WAV file (missing RIFF/WAVE header).');
  }

  let format: { audioFormat: number; channels: number; sampleRate: number; bitsPerSample: number } | null = null;
  let dataOffset = -1;
  let dataLength = 0;

  let pos = 12;
  while (pos + 8 <= bytes.byteLength) {
    const id = readTag(view, pos);
    const size = view.getUint32(pos + 4, true);
    const body = pos + 8;
    if (id === 'fmt ') {
      format = {
        audioFormat: view.getUint16(body, true),
        channels: view.getUint16(body + 2, true),
        sampleRate: view.getUint32(body + 4, true),
        bitsPerSample: view.getUint16(body + 14, true),
      };
    } else if (id === 'data') {
      dataOffset = body;
      dataLength = Math.min(size, bytes.byteLength - body);
      break;
    }
    // Chunks are word aligned
    pos = body + size + (size % 2);
  }

  if (!format || dataOffset < 0) {
    throw new ValidationError('WAV file has no fmt or data chunk.');
  }

  const { channels, sampleRate, bitsPerSample } = format;
  const isFloat =
    format.audioFormat === WAVE_FORMAT_IEEE_FLOAT ||
    (format.audioFormat === WAVE_FORMAT_EXTENSIBLE && bitsPerSample === 32);
  const isInt16 =
    bitsPerSample === 16 &&
    (format.audioFormat === WAVE_FORMAT_PCM || format.audioFormat === WAVE_FORMAT_EXTENSIBLE);

  if (channels === 0 || (!isFloat && !isInt16)) {
    throw new ValidationError(
      `Unsupported WAV encoding (format ${format.audioFormat}, ${bitsPerSample}-bit); use 16-bit PCM or 32-bit float.`
    );
  }

  if (isInt16) {
    return decodePcm16(bytes.subarray(dataOffset, dataOffset + dataLength), sampleRate, channels);
  }

  const frameCount = Math.floor(dataLength / (4 * channels));
  const buffer = createBuffer(channels, frameCount, sampleRate);
  for (let channel = 0; channel < channels; channel++) {
    const channelData = buffer.getChannelData(channel);
    for (let i = 0; i < frameCount; i++) {
      channelData[i] = view.getFloat32(dataOffset + (i * channels + channel) * 4, true);
    }
  }
  return buffer;
};

/**
 * Decodes an MP3 file with the mpg123 WebAssembly decoder.
 */
export const decodeMp3 = async (bytes: Uint8Array): Promise<PcmAudioBuffer> => {
  const { MPEGDecoder } = await import('mpg123-decoder');
  const decoder = new MPEGDecoder();
  await decoder.ready;
  try {
    const { channelData, samplesDecoded, sampleRate, errors } = decoder.decode(bytes);
    if (errors.length > 0) {
      console.warn(`[audio] MP3 decoder skipped ${errors.length} damaged frame(s).`);
    }
    if (samplesDecoded === 0 || channelData.length === 0) {
      throw new ValidationError('MP3 file contains no decodable audio.');
    }
    return new PcmAudioBuffer(
      channelData.map((data) => data.slice(0, samplesDecoded)),
      sampleRate
    );
  } finally {
    decoder.free();
  }
};

/**
 * Decodes an uploaded audio file (MP3 or WAV), detected by its header.
 */
export const decodeAudioFile = async (bytes: Uint8Array): Promise<PcmAudioBuffer> => {
  const isWav =
    bytes.byteLength >= 4 &&
    bytes[0] === 0x52 && bytes[1] === 0x49 && bytes[2] === 0x46 && bytes[3] === 0x46;
  return isWav ? decodeWav(bytes) : await decodeMp3(bytes);
};

const concatBytes = (chunks: Uint8Array[]): Uint8Array => {
  const total = chunks.reduce((sum, chunk) => sum + chunk.byteLength, 0);
  const output = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    output.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return output;
};

const asBytes = (chunk: ArrayBufferView): Uint8Array =>
  new Uint8Array(chunk.buffer, chunk.byteOffset, chunk.byteLength);

/**
 * Encodes a buffer as MP3 with lamejs. Only mono and stereo are
 * supported by the encoder; wider buffers keep their first two channels.
 */
export const audioBufferToMp3 = async (buffer: PcmAudioBuffer, kbps: number = 128): Promise<Uint8Array> => {
  const { Mp3Encoder } = await import('@breezystack/lamejs');

  const channels = Math.min(buffer.numberOfChannels, 2);
  const mp3encoder = new Mp3Encoder(channels, buffer.sampleRate, kbps);
  const mp3Data: Uint8Array[] = [];

  const rawLeft = buffer.getChannelData(0);
  const rawRight = channels > 1 ? buffer.getChannelData(1) : rawLeft;
  const length = rawLeft.length;

  const sampleBlockSize = 1152;
  const leftInt16 = new Int16Array(sampleBlockSize);
  const rightInt16 = new Int16Array(sampleBlockSize);

  for (let i = 0; i < length; i += sampleBlockSize) {
    const chunkLen = Math.min(sampleBlockSize, length - i);

    for (let j = 0; j < chunkLen; j++) {
      leftInt16[j] = toInt16(rawLeft[i + j]);
      rightInt16[j] = toInt16(rawRight[i + j]);
    }

    const leftChunk = chunkLen === sampleBlockSize ? leftInt16 : leftInt16.subarray(0, chunkLen);
    const rightChunk = chunkLen === sampleBlockSize ? rightInt16 : rightInt16.subarray(0, chunkLen);

    const mp3buf = channels === 1
      ? mp3encoder.encodeBuffer(leftChunk)
      : mp3encoder.encodeBuffer(leftChunk, rightChunk);

    if (mp3buf.length > 0) {
      mp3Data.push(Uint8Array.from(asBytes(mp3buf)));
    }
  }

  const tail = mp3encoder.flush();
  if (tail.length > 0) {
    mp3Data.push(Uint8Array.from(asBytes(tail)));
  }

  return concatBytes(mp3Data);
};

export const encodeAudio = async (buffer: PcmAudioBuffer, format: OutputFormat): Promise<Uint8Array> =>
  format === 'wav' ? audioBufferToWav(buffer) : await audioBufferToMp3(buffer);

/**
 * Picks the output encoding from a file name; anything but `.wav` is MP3.
 */
export const outputFormatForPath = (path: string): OutputFormat =>
  path.toLowerCase().endsWith('.wav') ? 'wav' : 'mp3';
