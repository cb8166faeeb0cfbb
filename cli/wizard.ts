import { createInterface, type Interface } from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import type { AppConfig } from '../config.ts';
import { PodcastSession, WIZARD_STEPS } from '../services/podcastSession.ts';
import { describeError } from '../utils/errors.ts';
import { exportScriptFile, summarizeLine } from '../utils/scriptUtils.ts';
import { WizardStep } from '../types.ts';
import { clientFactory, saveSample } from './commands.ts';

const INSTRUCTIONS = `This wizard builds a podcast from a dialogue script using ElevenLabs voices.

1. Get an ElevenLabs API key from your profile settings at https://elevenlabs.io/.
2. Ask an AI assistant to write your script, for example with this prompt:

   Extract the key points, definitions and interesting facts from the text below and
   turn them into a lively, informative podcast dialogue between two alternating speakers.
   Define all terms for a broad audience, add human touches such as casual banter, and use
   ellipsis (...) for pauses instead of markup. Answer with a JSON array of entries shaped
   as {"speaker": "Name", "text": "Dialog"}.

3. Save the answer as a JSON file. It should look like this:

   [
     {"speaker": "Alex", "text": "Welcome to this week's update..."},
     {"speaker": "Sarah", "text": "Thanks, Alex. Let's dive into the numbers..."}
   ]

4. Work through the steps: API key, script, editing, configuration, audio
   generation and finalization. Between steps you can jump to any step by number.`;

const pickFromList = async (rl: Interface, prompt: string, options: string[], current: string): Promise<string> => {
  if (options.length === 0) {
    console.info('No voices available. Check the API key step.');
    return current;
  }
  options.forEach((option, i) => console.info(`  ${i + 1}. ${option}`));
  const answer = (await rl.question(`${prompt}${current ? ` [${current}]` : ''}: `)).trim();
  if (!answer) return current;
  const choice = options[Number(answer) - 1];
  return choice ?? (options.includes(answer) ? answer : current);
};

// "-" clears the value, Enter keeps it
const askText = async (rl: Interface, prompt: string, current: string): Promise<string> => {
  const answer = (await rl.question(`${prompt} [${current}]: `)).trim();
  if (answer === '-') return '';
  return answer || current;
};

const askNumber = async (rl: Interface, prompt: string, current: number): Promise<number> => {
  const answer = (await rl.question(`${prompt} [${current}]: `)).trim();
  return answer ? Number(answer) : current;
};

const offerSample = async (rl: Interface, session: PodcastSession, voiceName: string): Promise<void> => {
  if (!voiceName) return;
  const answer = (await rl.question(`Save a sample of "${voiceName}"? (y/N) `)).trim().toLowerCase();
  if (answer !== 'y') return;
  const sample = await session.previewVoice(voiceName);
  if (!sample) {
    console.info('No sample available for this voice.');
    return;
  }
  const extension = sample.mimeType.includes('wav') ? 'wav' : 'mp3';
  await saveSample(`voice-sample-${voiceName.replace(/[^\w-]+/g, '_')}.${extension}`, sample.data);
};

type StepHandler = (rl: Interface, session: PodcastSession) => Promise<void>;

const steps: Record<WizardStep, StepHandler> = {
  [WizardStep.Instructions]: async () => {
    console.info(INSTRUCTIONS);
  },

  [WizardStep.ApiKey]: async (rl, session) => {
    const apiKey = await rl.question('ElevenLabs API key: ');
    const error = await session.submitApiKey(apiKey);
    console.info(`API key: ${session.maskedApiKey}`);
    if (error) {
      console.error(error.message);
    } else {
      console.info(`Loaded ${session.voiceNames.length} voices.`);
    }
  },

  [WizardStep.InputScript]: async (rl, session) => {
    const path = (await rl.question('Path of the JSON script to import (or "export <path>"): ')).trim();
    if (path.startsWith('export ')) {
      const target = path.slice('export '.length).trim();
      await exportScriptFile(target, session.script);
      console.info(`Exported ${session.script.length} lines to ${target}`);
      return;
    }
    if (!path) return;
    const script = await session.importScript(path);
    console.info(`Script loaded successfully! ${script.length} lines.`);
  },

  [WizardStep.EditScript]: async (rl, session) => {
    for (;;) {
      session.script.forEach((line, i) => console.info(`${String(i + 1).padStart(3)}. ${summarizeLine(line)}`));
      const answer = (await rl.question('Line to edit (Enter when done): ')).trim();
      if (!answer) return;
      const index = Number(answer) - 1;
      const line = session.script[index];
      if (!line) {
        console.info(`There is no line ${answer}.`);
        continue;
      }
      const speaker = (await rl.question(`Speaker [${line.speaker}]: `)).trim();
      const text = (await rl.question('Dialog (Enter keeps the current text): ')).trim();
      session.editLine(index, { speaker: speaker || undefined, text: text || undefined });
    }
  },

  [WizardStep.Configuration]: async (rl, session) => {
    const { config } = session;
    const voices = session.voiceNames;

    const introText = await askText(rl, 'Intro text ("-" for none)', config.introText);
    const introVoice = await pickFromList(rl, 'Intro voice', voices, config.introVoice);
    session.configure({ introText, introVoice: introVoice || undefined });
    await offerSample(rl, session, introVoice);

    const outroText = await askText(rl, 'Outro text ("-" for none)', config.outroText);
    const outroVoice = await pickFromList(rl, 'Outro voice', voices, config.outroVoice);
    session.configure({ outroText, outroVoice: outroVoice || undefined });
    await offerSample(rl, session, outroVoice);

    for (const speaker of session.speakers) {
      const voice = await pickFromList(rl, `Voice for ${speaker}`, voices, config.speakerVoices[speaker] ?? '');
      if (voice) {
        session.assignVoice(speaker, voice);
        await offerSample(rl, session, voice);
      }
    }

    session.configure({
      voiceSettings: {
        stability: await askNumber(rl, 'Stability (0-1)', config.voiceSettings.stability),
        similarityBoost: await askNumber(rl, 'Similarity boost (0-1)', config.voiceSettings.similarityBoost),
        style: await askNumber(rl, 'Style (0-1)', config.voiceSettings.style),
      },
    });

    const music = (await rl.question('Intro music file, MP3 or WAV (Enter for none): ')).trim();
    await session.setIntroMusic(music || null);
  },

  [WizardStep.GenerateAudio]: async (rl, session) => {
    if (session.segments.length === 0 || (await rl.question('Generate all audio again? (y/N) ')).trim().toLowerCase() === 'y') {
      await session.generateAll({
        onProgress: (label, completed, total) => console.info(`[${completed}/${total}] ${label}`),
      });
      console.info('Audio generated successfully!');
    }

    for (;;) {
      session.segments.forEach((segment, i) =>
        console.info(`${String(i + 1).padStart(3)}. ${segment.label} (${segment.audio.duration.toFixed(1)}s)`)
      );
      const answer = (await rl.question('Segment to regenerate (Enter when done, "resume" to continue a failed pass): ')).trim();
      if (!answer) return;
      try {
        if (answer === 'resume') {
          await session.generateAll({ resume: true });
          continue;
        }
        const index = Number(answer) - 1;
        const currentText = session.segmentText(index);
        // Enter re-voices the current text
        const newText = (await rl.question(`New text [${currentText}]: `)).trim() || currentText;
        const segment = await session.regenerate(index, newText);
        console.info(`Regenerated ${segment.label}.`);
      } catch (error) {
        console.error(describeError(error));
      }
    }
  },

  [WizardStep.Finalize]: async (_rl, session) => {
    const podcast = await session.finalize();
    console.info(`Podcast finalized successfully! ${podcast.durationSeconds.toFixed(1)}s`);
  },

  [WizardStep.PlayAndDownload]: async (_rl, session) => {
    if (!session.finalPodcast) {
      console.info('Finalize the podcast first.');
      return;
    }
    console.info(`Your podcast is ready: ${session.finalPodcast.outputPath}`);
  },
};

const LAST_STEP = WizardStep.PlayAndDownload;

/**
 * Interactive walk through the steps. Errors are shown and the current
 * step can be retried; nothing ends the session except quitting.
 */
export const runWizard = async (config: AppConfig): Promise<void> => {
  const session = new PodcastSession({ createClient: clientFactory(config), outputPath: config.outputPath });
  const rl = createInterface({ input, output });

  try {
    for (;;) {
      const step = session.step;
      console.info(`\n=== Step ${step}: ${WIZARD_STEPS[step]} ===`);
      try {
        await steps[step](rl, session);
      } catch (error) {
        console.error(describeError(error));
      }

      // Handlers may move the session on by themselves (API key, script import)
      const next = session.step === step ? Math.min(step + 1, LAST_STEP) : session.step;
      const answer = (
        await rl.question(`Continue to step ${next} [Enter], jump to a step (0-${LAST_STEP}), retry (r) or quit (q): `)
      ).trim().toLowerCase();

      if (answer === 'q') return;
      if (answer === 'r') continue;
      const target = answer === '' ? next : Number(answer);
      if (Number.isInteger(target) && target >= 0 && target <= LAST_STEP) {
        session.goTo(target);
      }
    }
  } finally {
    rl.close();
  }
};
