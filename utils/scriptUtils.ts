import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import { StateError, ValidationError } from './errors.ts';
import type { DialogueLine } from '../types.ts';

export const dialogueLineSchema = z
  .object({
    speaker: z.string(),
    text: z.string(),
  })
  .strict();

export const scriptSchema = z.array(dialogueLineSchema);

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => {
    const path = issue.path
      .map((part) => (typeof part === 'number' ? `[${part}]` : `.${part}`))
      .join('');
    return `script${path}: ${issue.message}`;
  });

/**
 * Validates already-parsed JSON against the script exchange format: an
 * array of objects with exactly the string fields `speaker` and `text`.
 */
export const validateScript = (data: unknown): DialogueLine[] => {
  const result = scriptSchema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(
      "Invalid script format. Please ensure your JSON is a list of objects with 'speaker' and 'text' keys.",
      formatIssues(result.error)
    );
  }
  return result.data;
};

export const parseScript = (json: string): DialogueLine[] => {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError('Invalid JSON. Please check your input.', [reason]);
  }
  return validateScript(data);
};

export const exportScript = (script: DialogueLine[]): string =>
  JSON.stringify(
    script.map(({ speaker, text }) => ({ speaker, text })),
    null,
    2
  );

export const importScriptFile = async (path: string): Promise<DialogueLine[]> => {
  const contents = await readFile(path, 'utf8');
  return parseScript(contents);
};

export const exportScriptFile = async (path: string, script: DialogueLine[]): Promise<void> => {
  await writeFile(path, exportScript(script) + '\n', 'utf8');
};

/**
 * Replaces the speaker and/or text of one line in place.
 */
export const updateLine = (
  script: DialogueLine[],
  index: number,
  patch: Partial<DialogueLine>
): DialogueLine => {
  const line = script[index];
  if (!Number.isInteger(index) || !line) {
    throw new StateError(`Line ${index + 1} does not exist (script has ${script.length} lines).`);
  }
  if (patch.speaker !== undefined) line.speaker = patch.speaker;
  if (patch.text !== undefined) line.text = patch.text;
  return line;
};

/**
 * Distinct speakers in order of first appearance.
 */
export const getSpeakers = (script: DialogueLine[]): string[] => [
  ...new Set(script.map((line) => line.speaker)),
];

// Remove **word** or *word*, which the voices would read out literally
export const stripMarkdown = (text: string): string =>
  text.replace(/\*\*(.*?)\*\*/g, '$1').replace(/\*(.*?)\*/g, '$1');

export const summarizeLine = (line: DialogueLine, maxLength: number = 50): string => {
  const text = line.text.length > maxLength ? `${line.text.substring(0, maxLength)}...` : line.text;
  return `${line.speaker}: ${text}`;
};
