import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import { ValidationError } from '../utils/errors.ts';
import { dialogueLineSchema } from '../utils/scriptUtils.ts';
import type { DialogueLine, VoiceSettings } from '../types.ts';

const unitInterval = z.number().min(0).max(1);

const bookendSchema = z.object({
  text: z.string(),
  voice: z.string(),
});

export const projectSchema = z.object({
  // Inline lines, or a path to a script JSON file
  script: z.union([z.string(), z.array(dialogueLineSchema)]),
  speakers: z.record(z.string(), z.string()),
  intro: bookendSchema.optional(),
  outro: bookendSchema.optional(),
  voiceSettings: z
    .object({ stability: unitInterval, similarityBoost: unitInterval, style: unitInterval })
    .partial()
    .optional(),
  introMusic: z.string().optional(),
  output: z.string().optional(),
});

export interface ProjectFile {
  script: string | DialogueLine[];
  speakers: Record<string, string>;
  intro?: { text: string; voice: string };
  outro?: { text: string; voice: string };
  voiceSettings?: Partial<VoiceSettings>;
  introMusic?: string;
  output?: string;
}

/**
 * Parses a project file. Relative paths inside it are resolved against
 * the file's own directory.
 */
export const parseProject = (json: string, baseDir: string): ProjectFile => {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    throw new ValidationError('Project file is not valid JSON.', [error instanceof Error ? error.message : String(error)]);
  }

  const result = projectSchema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(
      'Invalid project file.',
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const project = result.data;
  const at = (path: string) => resolve(baseDir, path);
  return {
    ...project,
    script: typeof project.script === 'string' ? at(project.script) : project.script,
    introMusic: project.introMusic ? at(project.introMusic) : undefined,
    output: project.output ? at(project.output) : undefined,
  };
};

export const readProject = async (path: string): Promise<ProjectFile> =>
  parseProject(await readFile(path, 'utf8'), dirname(resolve(path)));
