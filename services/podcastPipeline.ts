import { readFile, writeFile } from 'node:fs/promises';
import { SEGMENT_GAP_MS } from '../config.ts';
import type { PcmAudioBuffer } from '../utils/audioBuffer.ts';
import {
  concatAudioBuffers,
  createSilence,
  decodeAudioFile,
  encodeAudio,
  outputFormatForPath,
} from '../utils/audioUtils.ts';
import { StateError, SynthesisError, ValidationError } from '../utils/errors.ts';
import { getSpeakers } from '../utils/scriptUtils.ts';
import type {
  AudioSegment,
  DialogueLine,
  FinalPodcast,
  OutputFormat,
  PodcastConfig,
  SegmentRole,
  VoiceCatalog,
} from '../types.ts';
import type { SpeechSynthesizer } from './elevenLabsService.ts';

/**
 * Everything one assembly pass reads and writes. The context owns the
 * segment list; callers hand the same object to every operation.
 */
export interface PipelineContext {
  script: DialogueLine[];
  config: PodcastConfig;
  voices: VoiceCatalog;
  segments: AudioSegment[];
}

export interface SegmentPlan {
  label: string;
  role: SegmentRole;
  lineIndex?: number;
  text: string;
  voiceName: string;
}

export interface GenerateOptions {
  /** Keep already generated segments that still match the plan and only synthesize the rest. */
  resume?: boolean;
  onProgress?: (label: string, completed: number, total: number) => void;
}

export interface FinalizeOptions {
  outputPath: string;
  format?: OutputFormat;
  gapMs?: number;
}

export const segmentLabel = (role: SegmentRole, lineIndex: number = 0): string => {
  switch (role) {
    case 'intro':
      return 'Intro';
    case 'outro':
      return 'Outro';
    case 'line':
      return `Line ${lineIndex + 1}`;
  }
};

/**
 * The segments a full pass produces, in playback order: intro (when it
 * has text), every script line, outro (when it has text).
 */
export const planSegments = ({ script, config }: Pick<PipelineContext, 'script' | 'config'>): SegmentPlan[] => {
  const plan: SegmentPlan[] = [];

  if (config.introText.trim()) {
    plan.push({ label: segmentLabel('intro'), role: 'intro', text: config.introText, voiceName: config.introVoice });
  }

  script.forEach((line, index) => {
    plan.push({
      label: segmentLabel('line', index),
      role: 'line',
      lineIndex: index,
      text: line.text,
      voiceName: config.speakerVoices[line.speaker] ?? '',
    });
  });

  if (config.outroText.trim()) {
    plan.push({ label: segmentLabel('outro'), role: 'outro', text: config.outroText, voiceName: config.outroVoice });
  }

  return plan;
};

/**
 * Checks everything a pass needs before the first request goes out.
 * Reports every problem at once.
 */
export const validateGeneration = (context: PipelineContext): SegmentPlan[] => {
  const { script, config, voices } = context;
  const issues: string[] = [];

  if (script.length === 0) {
    issues.push('The script has no lines.');
  }

  for (const speaker of getSpeakers(script)) {
    const voiceName = config.speakerVoices[speaker];
    if (!voiceName) {
      issues.push(`Speaker "${speaker}" has no voice assigned.`);
    } else if (!voices.has(voiceName)) {
      issues.push(`Voice "${voiceName}" assigned to "${speaker}" is not available.`);
    }
  }

  if (config.introText.trim() && !voices.has(config.introVoice)) {
    issues.push(config.introVoice ? `Intro voice "${config.introVoice}" is not available.` : 'No intro voice selected.');
  }
  if (config.outroText.trim() && !voices.has(config.outroVoice)) {
    issues.push(config.outroVoice ? `Outro voice "${config.outroVoice}" is not available.` : 'No outro voice selected.');
  }

  const plan = planSegments(context);
  for (const entry of plan) {
    if (!entry.text.trim()) {
      issues.push(`${entry.label} has no text.`);
    }
  }

  if (issues.length > 0) {
    throw new ValidationError('Cannot generate audio until the configuration is complete.', issues);
  }
  return plan;
};

const resolveVoiceId = (voices: VoiceCatalog, voiceName: string, label: string): string => {
  const voice = voices.get(voiceName);
  if (!voice) {
    throw new ValidationError(`No voice available for ${label}.`, [`Unknown voice "${voiceName}".`]);
  }
  return voice.voiceId;
};

const asSynthesisError = (error: unknown, label: string, completed?: number): SynthesisError => {
  if (error instanceof SynthesisError) return error.withLabel(label, completed);
  const detail = error instanceof Error ? error.message : String(error);
  return new SynthesisError(detail, { label, completedSegments: completed, cause: error });
};

/**
 * Synthesizes every planned segment in order into `context.segments`.
 *
 * A failed segment stops the pass: segments built before it stay in the
 * context and a SynthesisError naming the failed label is thrown. Calling
 * again with `resume` picks up from there.
 */
export const generateAll = async (
  context: PipelineContext,
  synthesizer: SpeechSynthesizer,
  options: GenerateOptions = {}
): Promise<AudioSegment[]> => {
  const plan = validateGeneration(context);
  const { voiceSettings } = context.config;

  // A kept segment must have been voiced from the planned text with the planned voice
  const stillMatches = (segment: AudioSegment, entry: SegmentPlan): boolean =>
    segment.label === entry.label &&
    segment.sourceText === entry.text &&
    segment.voiceId === resolveVoiceId(context.voices, entry.voiceName, entry.label);

  let kept = 0;
  if (options.resume) {
    while (kept < context.segments.length && kept < plan.length && stillMatches(context.segments[kept], plan[kept])) {
      kept++;
    }
  }
  context.segments = context.segments.slice(0, kept);

  for (const entry of plan.slice(kept)) {
    const voiceId = resolveVoiceId(context.voices, entry.voiceName, entry.label);
    let audio: PcmAudioBuffer;
    try {
      audio = await synthesizer.synthesize(entry.text, voiceId, voiceSettings);
    } catch (error) {
      const failure = asSynthesisError(error, entry.label, context.segments.length);
      console.error(`[pipeline] ${failure.message}`);
      throw failure;
    }

    const segment: AudioSegment = { label: entry.label, role: entry.role, sourceText: entry.text, voiceId, audio };
    if (entry.lineIndex !== undefined) segment.lineIndex = entry.lineIndex;
    context.segments.push(segment);
    options.onProgress?.(entry.label, context.segments.length, plan.length);
  }

  return context.segments;
};

const sourceVoiceName = (context: PipelineContext, segment: AudioSegment): string => {
  if (segment.role === 'intro') return context.config.introVoice;
  if (segment.role === 'outro') return context.config.outroVoice;

  const line = segment.lineIndex === undefined ? undefined : context.script[segment.lineIndex];
  if (!line) {
    throw new StateError(`${segment.label} no longer matches a script line; generate all audio again.`);
  }
  const voiceName = context.config.speakerVoices[line.speaker];
  if (!voiceName) {
    throw new ValidationError(`Cannot regenerate ${segment.label}.`, [`Speaker "${line.speaker}" has no voice assigned.`]);
  }
  return voiceName;
};

/**
 * The text segment `index` would be regenerated from if none is given:
 * the current intro, outro or script line text.
 */
export const segmentSourceText = (context: PipelineContext, index: number): string => {
  const segment = context.segments[index];
  if (!Number.isInteger(index) || !segment) {
    throw new StateError(`Segment ${index} does not exist (${context.segments.length} generated).`);
  }
  if (segment.role === 'intro') return context.config.introText;
  if (segment.role === 'outro') return context.config.outroText;

  const line = segment.lineIndex === undefined ? undefined : context.script[segment.lineIndex];
  if (!line) {
    throw new StateError(`${segment.label} no longer matches a script line; generate all audio again.`);
  }
  return line.text;
};

/**
 * Re-synthesizes one segment with new text. Label and position stay the
 * same; the script line (or intro/outro text) takes the new text. Nothing
 * changes when synthesis fails.
 */
export const regenerate = async (
  context: PipelineContext,
  index: number,
  newText: string,
  synthesizer: SpeechSynthesizer
): Promise<AudioSegment> => {
  const segment = context.segments[index];
  if (!Number.isInteger(index) || !segment) {
    throw new StateError(`Segment ${index} does not exist (${context.segments.length} generated).`);
  }
  if (!newText.trim()) {
    throw new ValidationError(`Cannot regenerate ${segment.label}.`, ['Text must not be empty.']);
  }

  const voiceId = resolveVoiceId(context.voices, sourceVoiceName(context, segment), segment.label);

  let audio: PcmAudioBuffer;
  try {
    audio = await synthesizer.synthesize(newText, voiceId, context.config.voiceSettings);
  } catch (error) {
    const failure = asSynthesisError(error, segment.label);
    console.error(`[pipeline] ${failure.message}`);
    throw failure;
  }

  const updated: AudioSegment = { ...segment, sourceText: newText, voiceId, audio };
  context.segments[index] = updated;

  if (segment.role === 'intro') {
    context.config.introText = newText;
  } else if (segment.role === 'outro') {
    context.config.outroText = newText;
  } else if (segment.lineIndex !== undefined) {
    context.script[segment.lineIndex].text = newText;
  }

  return updated;
};

/**
 * Intro music, then every segment followed by a pause (the last one
 * included).
 */
export const assemblePodcast = (
  segments: AudioSegment[],
  introMusic: PcmAudioBuffer | null,
  gapMs: number = SEGMENT_GAP_MS
): PcmAudioBuffer => {
  if (segments.length === 0) {
    throw new StateError('No audio has been generated yet.');
  }

  const parts: PcmAudioBuffer[] = [];
  if (introMusic) parts.push(introMusic);
  for (const { audio } of segments) {
    parts.push(audio, createSilence(gapMs, audio.sampleRate, audio.numberOfChannels));
  }
  return concatAudioBuffers(parts);
};

/**
 * Builds the final podcast from the current segments and writes it to
 * `outputPath`, replacing any previous file.
 */
export const finalize = async (
  segments: AudioSegment[],
  introMusic: PcmAudioBuffer | null,
  options: FinalizeOptions
): Promise<FinalPodcast> => {
  const audio = assemblePodcast(segments, introMusic, options.gapMs);
  const format = options.format ?? outputFormatForPath(options.outputPath);

  const encoded = await encodeAudio(audio, format);
  await writeFile(options.outputPath, encoded);
  console.info(`[pipeline] Wrote ${audio.duration.toFixed(1)}s podcast to ${options.outputPath}`);

  return { audio, outputPath: options.outputPath, format, durationSeconds: audio.duration };
};

/**
 * Reads and decodes an intro music file (MP3 or WAV) once.
 */
export const loadIntroMusic = async (path: string): Promise<PcmAudioBuffer> => {
  const bytes = await readFile(path);
  return decodeAudioFile(new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength));
};
