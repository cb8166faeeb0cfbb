/**
 * Decoded, planar PCM audio held in memory.
 *
 * Mirrors the read side of the Web Audio `AudioBuffer` (numberOfChannels,
 * length, sampleRate, duration, getChannelData) so the helpers in
 * audioUtils.ts work on samples the same way they would in a browser.
 * Samples are floats in [-1, 1].
 */
export class PcmAudioBuffer {
  readonly sampleRate: number;
  readonly length: number;
  private readonly channels: Float32Array[];

  constructor(channels: Float32Array[], sampleRate: number) {
    if (channels.length === 0) {
      throw new RangeError('An audio buffer needs at least one channel.');
    }
    if (!Number.isFinite(sampleRate) || sampleRate <= 0) {
      throw new RangeError(`Invalid sample rate: ${sampleRate}`);
    }
    const length = channels[0].length;
    if (channels.some((channel) => channel.length !== length)) {
      throw new RangeError('All channels of an audio buffer must have the same length.');
    }
    this.channels = channels;
    this.sampleRate = sampleRate;
    this.length = length;
  }

  get numberOfChannels(): number {
    return this.channels.length;
  }

  /** Duration in seconds. */
  get duration(): number {
    return this.length / this.sampleRate;
  }

  getChannelData(channel: number): Float32Array {
    const data = this.channels[channel];
    if (!data) {
      throw new RangeError(`Channel ${channel} does not exist (buffer has ${this.channels.length}).`);
    }
    return data;
  }
}

export const createBuffer = (
  numberOfChannels: number,
  length: number,
  sampleRate: number
): PcmAudioBuffer => {
  const channels: Float32Array[] = [];
  for (let i = 0; i < numberOfChannels; i++) {
    channels.push(new Float32Array(length));
  }
  return new PcmAudioBuffer(channels, sampleRate);
};
