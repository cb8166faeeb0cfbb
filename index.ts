import { parseArgs } from 'node:util';
import { loadConfig } from './config.ts';
import { runDraft, runProduce, runVoices } from './cli/commands.ts';
import { runWizard } from './cli/wizard.ts';
import { describeError } from './utils/errors.ts';

const USAGE = `Usage: podcast-studio <command> [options]

Commands:
  wizard                                  Walk through every step interactively
  voices                                  List the voices of your ElevenLabs account
  draft --source <file> --speakers A,B    Draft a dialogue script with Gemini [--out script.json]
  produce --project <file>                Generate and finalize a podcast from a project file

Environment:
  ELEVENLABS_API_KEY, ELEVENLABS_MODEL_ID, ELEVENLABS_OUTPUT_FORMAT, REQUEST_TIMEOUT_MS,
  PODCAST_OUTPUT_PATH, GEMINI_API_KEY, GEMINI_MODEL`;

const main = async (argv: string[]): Promise<void> => {
  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      source: { type: 'string' },
      speakers: { type: 'string' },
      out: { type: 'string' },
      project: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  const [command] = positionals;
  if (!command || values.help) {
    console.info(USAGE);
    return;
  }

  const config = loadConfig();
  switch (command) {
    case 'wizard':
      await runWizard(config);
      return;
    case 'voices':
      await runVoices(config);
      return;
    case 'draft':
      if (!values.source || !values.speakers) {
        throw new Error('draft needs --source and --speakers.');
      }
      await runDraft(config, { source: values.source, speakers: values.speakers.split(','), out: values.out });
      return;
    case 'produce': {
      if (!values.project) {
        throw new Error('produce needs --project.');
      }
      const podcast = await runProduce(config, values.project);
      console.info(`Podcast finalized successfully! ${podcast.outputPath} (${podcast.durationSeconds.toFixed(1)}s)`);
      return;
    }
    default:
      throw new Error(`Unknown command "${command}".\n\n${USAGE}`);
  }
};

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error(describeError(error));
  process.exitCode = 1;
});
