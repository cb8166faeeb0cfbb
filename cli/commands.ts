import { readFile, writeFile } from 'node:fs/promises';
import type { AppConfig } from '../config.ts';
import { createElevenLabsClient, type ElevenLabsClient } from '../services/elevenLabsService.ts';
import { createGeminiModels, draftScript } from '../services/geminiService.ts';
import { PodcastSession } from '../services/podcastSession.ts';
import { StateError } from '../utils/errors.ts';
import { exportScriptFile } from '../utils/scriptUtils.ts';
import type { FinalPodcast } from '../types.ts';
import { readProject } from './project.ts';

export const clientFactory = (config: AppConfig) => (apiKey: string): ElevenLabsClient =>
  createElevenLabsClient({
    apiKey,
    baseUrl: config.elevenLabsBaseUrl,
    modelId: config.modelId,
    outputFormat: config.outputFormat,
    timeoutMs: config.requestTimeoutMs,
  });

const requireApiKey = (config: AppConfig): string => {
  if (!config.elevenLabsApiKey) {
    throw new StateError('Set ELEVENLABS_API_KEY to use this command.');
  }
  return config.elevenLabsApiKey;
};

export const runVoices = async (config: AppConfig): Promise<void> => {
  const client = clientFactory(config)(requireApiKey(config));
  const { voices, error } = await client.listVoices();
  if (error) throw error;

  for (const voice of voices.values()) {
    const samples = voice.samples.length === 1 ? '1 sample' : `${voice.samples.length} samples`;
    console.info(`${voice.name.padEnd(28)} ${voice.voiceId}  (${samples})`);
  }
};

export interface DraftArgs {
  source: string;
  speakers: string[];
  out?: string;
}

export const runDraft = async (config: AppConfig, args: DraftArgs): Promise<void> => {
  const sourceText = await readFile(args.source, 'utf8');
  const script = await draftScript(
    createGeminiModels(config.geminiApiKey),
    { sourceText, speakers: args.speakers },
    config.geminiModel
  );

  if (args.out) {
    await exportScriptFile(args.out, script);
    console.info(`Drafted ${script.length} lines into ${args.out}`);
  } else {
    process.stdout.write(`${JSON.stringify(script, null, 2)}\n`);
  }
};

/**
 * Runs every wizard step unattended from a project file.
 */
export const runProduce = async (
  config: AppConfig,
  projectPath: string,
  createClient: (apiKey: string) => ElevenLabsClient = clientFactory(config)
): Promise<FinalPodcast> => {
  const project = await readProject(projectPath);
  const session = new PodcastSession({
    createClient,
    outputPath: project.output ?? config.outputPath,
  });

  const directoryError = await session.submitApiKey(requireApiKey(config));
  if (directoryError) throw directoryError;

  if (typeof project.script === 'string') {
    await session.importScript(project.script);
  } else {
    session.loadScript(JSON.stringify(project.script));
  }

  session.configure({
    introText: project.intro?.text,
    introVoice: project.intro?.voice,
    outroText: project.outro?.text,
    outroVoice: project.outro?.voice,
    voiceSettings: project.voiceSettings,
  });
  for (const [speaker, voiceName] of Object.entries(project.speakers)) {
    session.assignVoice(speaker, voiceName);
  }
  await session.setIntroMusic(project.introMusic ?? null);

  await session.generateAll({
    onProgress: (label, completed, total) => console.info(`[${completed}/${total}] ${label}`),
  });
  return session.finalize();
};

export const saveSample = async (path: string, data: Uint8Array): Promise<void> => {
  await writeFile(path, data);
  console.info(`Saved voice sample to ${path}`);
};
