import type { PcmAudioBuffer } from './utils/audioBuffer.ts';

export enum WizardStep {
  Instructions = 0,
  ApiKey = 1,
  InputScript = 2,
  EditScript = 3,
  Configuration = 4,
  GenerateAudio = 5,
  Finalize = 6,
  PlayAndDownload = 7,
}

export interface DialogueLine {
  speaker: string;
  text: string;
}

export interface SampleRef {
  sampleId: string;
  fileName?: string;
  mimeType?: string;
}

export interface VoiceProfile {
  name: string;
  voiceId: string;
  samples: SampleRef[];
}

// Keyed by display name, in the order the service listed them
export type VoiceCatalog = Map<string, VoiceProfile>;

export interface VoiceSample {
  data: Uint8Array;
  mimeType: string;
}

export interface VoiceSettings {
  stability: number;
  similarityBoost: number;
  style: number;
}

// speaker name -> voice name
export type SpeakerVoiceMap = Record<string, string>;

export interface PodcastConfig {
  introText: string;
  introVoice: string;
  outroText: string;
  outroVoice: string;
  speakerVoices: SpeakerVoiceMap;
  voiceSettings: VoiceSettings;
  introMusic: PcmAudioBuffer | null;
}

export type SegmentRole = 'intro' | 'line' | 'outro';

export interface AudioSegment {
  label: string;
  role: SegmentRole;
  lineIndex?: number; // set for role 'line'
  // What the audio was synthesized from
  sourceText: string;
  voiceId: string;
  audio: PcmAudioBuffer;
}

export type OutputFormat = 'mp3' | 'wav';

export interface FinalPodcast {
  audio: PcmAudioBuffer;
  outputPath: string;
  format: OutputFormat;
  durationSeconds: number;
}
