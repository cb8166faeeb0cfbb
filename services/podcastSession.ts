import { z } from 'zod';
import { DEFAULT_VOICE_SETTINGS, maskApiKey } from '../config.ts';
import { StateError, ValidationError, type DirectoryError } from '../utils/errors.ts';
import {
  exportScript,
  getSpeakers,
  importScriptFile,
  parseScript,
  updateLine,
} from '../utils/scriptUtils.ts';
import {
  WizardStep,
  type AudioSegment,
  type DialogueLine,
  type FinalPodcast,
  type PodcastConfig,
  type VoiceSample,
  type VoiceSettings,
} from '../types.ts';
import type { ElevenLabsClient } from './elevenLabsService.ts';
import {
  finalize,
  generateAll,
  loadIntroMusic,
  regenerate,
  segmentSourceText,
  type GenerateOptions,
  type PipelineContext,
} from './podcastPipeline.ts';

export const WIZARD_STEPS: Record<WizardStep, string> = {
  [WizardStep.Instructions]: 'Instructions',
  [WizardStep.ApiKey]: 'API Key Input',
  [WizardStep.InputScript]: 'Input Script',
  [WizardStep.EditScript]: 'Edit Script',
  [WizardStep.Configuration]: 'Configuration',
  [WizardStep.GenerateAudio]: 'Generate Audio',
  [WizardStep.Finalize]: 'Finalize',
  [WizardStep.PlayAndDownload]: 'Play and Download',
};

const unitInterval = z.number().min(0).max(1);
const voiceSettingsPatchSchema = z
  .object({ stability: unitInterval, similarityBoost: unitInterval, style: unitInterval })
  .partial();

export type ConfigPatch = Partial<Pick<PodcastConfig, 'introText' | 'introVoice' | 'outroText' | 'outroVoice'>> & {
  voiceSettings?: Partial<VoiceSettings>;
};

export interface PodcastSessionOptions {
  createClient: (apiKey: string) => ElevenLabsClient;
  outputPath: string;
}

export const createDefaultConfig = (): PodcastConfig => ({
  introText: '',
  introVoice: '',
  outroText: '',
  outroVoice: '',
  speakerVoices: {},
  voiceSettings: { ...DEFAULT_VOICE_SETTINGS },
  introMusic: null,
});

/**
 * One user's walk through the wizard. Holds the API key, voice catalog,
 * script, configuration and generated segments; nothing is shared between
 * sessions.
 */
export class PodcastSession {
  step: WizardStep = WizardStep.Instructions;
  finalPodcast: FinalPodcast | null = null;
  readonly context: PipelineContext = {
    script: [],
    config: createDefaultConfig(),
    voices: new Map(),
    segments: [],
  };

  private apiKey = '';
  private client: ElevenLabsClient | null = null;
  private readonly options: PodcastSessionOptions;

  constructor(options: PodcastSessionOptions) {
    this.options = options;
  }

  get maskedApiKey(): string {
    return maskApiKey(this.apiKey);
  }

  get script(): DialogueLine[] {
    return this.context.script;
  }

  get config(): PodcastConfig {
    return this.context.config;
  }

  get segments(): AudioSegment[] {
    return this.context.segments;
  }

  get voiceNames(): string[] {
    return [...this.context.voices.keys()];
  }

  get speakers(): string[] {
    return getSpeakers(this.context.script);
  }

  goTo(step: WizardStep): void {
    this.step = step;
  }

  /**
   * Stores the key and loads the voice list. A directory failure leaves an
   * empty catalog and is returned so it can be shown; the wizard moves on.
   */
  async submitApiKey(apiKey: string): Promise<DirectoryError | null> {
    const trimmed = apiKey.trim();
    if (!trimmed) {
      throw new ValidationError('API key must not be empty.');
    }
    this.apiKey = trimmed;
    this.client = this.options.createClient(trimmed);

    const { voices, error } = await this.client.listVoices();
    this.context.voices = voices;
    this.step = WizardStep.InputScript;
    return error;
  }

  loadScript(json: string): DialogueLine[] {
    return this.replaceScript(parseScript(json));
  }

  async importScript(path: string): Promise<DialogueLine[]> {
    return this.replaceScript(await importScriptFile(path));
  }

  exportScript(): string {
    return exportScript(this.context.script);
  }

  editLine(index: number, patch: Partial<DialogueLine>): DialogueLine {
    return updateLine(this.context.script, index, patch);
  }

  /**
   * Applies a partial configuration. The whole patch is validated before
   * anything changes.
   */
  configure(patch: ConfigPatch): PodcastConfig {
    const config = this.context.config;
    let voiceSettings = config.voiceSettings;
    if (patch.voiceSettings) {
      const parsed = voiceSettingsPatchSchema.safeParse(patch.voiceSettings);
      if (!parsed.success) {
        throw new ValidationError(
          'Voice settings must be numbers between 0 and 1.',
          parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        );
      }
      voiceSettings = {
        stability: parsed.data.stability ?? config.voiceSettings.stability,
        similarityBoost: parsed.data.similarityBoost ?? config.voiceSettings.similarityBoost,
        style: parsed.data.style ?? config.voiceSettings.style,
      };
    }
    if (patch.introVoice !== undefined) this.requireVoice(patch.introVoice);
    if (patch.outroVoice !== undefined) this.requireVoice(patch.outroVoice);

    config.voiceSettings = voiceSettings;
    config.introText = patch.introText ?? config.introText;
    config.introVoice = patch.introVoice ?? config.introVoice;
    config.outroText = patch.outroText ?? config.outroText;
    config.outroVoice = patch.outroVoice ?? config.outroVoice;
    return config;
  }

  assignVoice(speaker: string, voiceName: string): void {
    if (!this.speakers.includes(speaker)) {
      throw new ValidationError(`"${speaker}" does not speak in the script.`);
    }
    this.requireVoice(voiceName);
    this.context.config.speakerVoices[speaker] = voiceName;
  }

  async setIntroMusic(path: string | null): Promise<void> {
    this.context.config.introMusic = path ? await loadIntroMusic(path) : null;
  }

  async previewVoice(voiceName: string): Promise<VoiceSample | null> {
    const profile = this.context.voices.get(voiceName);
    if (!profile) {
      throw new ValidationError(`Voice "${voiceName}" is not available.`);
    }
    return this.requireClient().previewVoice(profile);
  }

  async generateAll(options: GenerateOptions = {}): Promise<AudioSegment[]> {
    this.step = WizardStep.GenerateAudio;
    return generateAll(this.context, this.requireClient(), options);
  }

  /** Current intro, outro or line text behind segment `index`. */
  segmentText(index: number): string {
    return segmentSourceText(this.context, index);
  }

  async regenerate(index: number, newText: string): Promise<AudioSegment> {
    return regenerate(this.context, index, newText, this.requireClient());
  }

  async finalize(): Promise<FinalPodcast> {
    this.finalPodcast = await finalize(this.context.segments, this.context.config.introMusic, {
      outputPath: this.options.outputPath,
    });
    this.step = WizardStep.PlayAndDownload;
    return this.finalPodcast;
  }

  private replaceScript(script: DialogueLine[]): DialogueLine[] {
    this.context.script = script;
    // Segment labels point at line indices of the previous script
    this.context.segments = [];
    this.step = WizardStep.EditScript;
    return script;
  }

  private requireVoice(voiceName: string): void {
    if (!this.context.voices.has(voiceName)) {
      throw new ValidationError(`Voice "${voiceName}" is not available.`);
    }
  }

  private requireClient(): ElevenLabsClient {
    if (!this.client) {
      throw new StateError('Enter your ElevenLabs API key first.');
    }
    return this.client;
  }
}
