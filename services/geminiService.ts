import { GoogleGenAI, Type, type GenerateContentParameters } from '@google/genai';
import { ValidationError } from '../utils/errors.ts';
import { stripMarkdown, validateScript } from '../utils/scriptUtils.ts';
import type { DialogueLine } from '../types.ts';

/**
 * The part of the Gemini SDK the drafting helper calls; `GoogleGenAI#models`
 * satisfies it.
 */
export interface ContentGenerator {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
}

export interface ScriptDraftRequest {
  sourceText: string;
  speakers: string[];
  customSystemInstruction?: string;
}

export const createGeminiModels = (apiKey: string): ContentGenerator => {
  if (!apiKey) {
    console.error('GEMINI_API_KEY is missing from environment variables.');
  }
  return new GoogleGenAI({ apiKey }).models;
};

export const DEFAULT_SYSTEM_INSTRUCTION = `You are a professional podcast producer.
Turn the source material you are given into a lively, engaging and informative podcast dialogue.

Content rules:
1. Extract the key points, definitions and interesting facts from the source.
2. Define every term carefully for a broad audience of listeners.
3. Add human touches such as casual banter, and use ellipsis (...) to indicate pauses instead of markup or break tags.
4. Stay informative while remaining accessible; use simple analogies for complex concepts.
5. Do not invent facts that are not in the source.

Format:
1. The speakers alternate and use exactly the speaker names you are given.
2. Answer with a JSON array only, each entry shaped as {"speaker": "Name", "text": "Dialog"}.`;

/**
 * Asks Gemini for a dialogue in the script exchange format and validates
 * the answer like any imported script.
 */
export const draftScript = async (
  models: ContentGenerator,
  request: ScriptDraftRequest,
  model: string = 'gemini-2.5-flash'
): Promise<DialogueLine[]> => {
  const speakers = request.speakers.map((s) => s.trim()).filter((s) => s.length > 0);
  if (speakers.length === 0) {
    throw new ValidationError('At least one speaker name is required to draft a script.');
  }
  if (!request.sourceText.trim()) {
    throw new ValidationError('Source material for the script is empty.');
  }

  const userPrompt = `Speakers: ${speakers.map((s) => `"${s}"`).join(', ')}\n\nSource material:\n${request.sourceText}`;

  let text: string;
  try {
    const response = await models.generateContent({
      model,
      contents: userPrompt,
      config: {
        temperature: 0.3,
        systemInstruction: request.customSystemInstruction || DEFAULT_SYSTEM_INSTRUCTION,
        responseMimeType: 'application/json',
        responseSchema: {
          type: Type.ARRAY,
          items: {
            type: Type.OBJECT,
            properties: {
              speaker: { type: Type.STRING },
              text: { type: Type.STRING },
            },
            required: ['speaker', 'text'],
          },
        },
      },
    });
    text = response.text ?? '';
  } catch (error) {
    console.error('Error drafting script:', error);
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    throw new ValidationError('The model did not answer with JSON.', [text.slice(0, 200)]);
  }

  const lines = validateScript(data).map((line) => ({
    speaker: line.speaker.trim(),
    text: stripMarkdown(line.text).trim(),
  }));

  const unknown = [...new Set(lines.map((line) => line.speaker))].filter((s) => !speakers.includes(s));
  if (unknown.length > 0) {
    console.warn(`[draft] Script uses speakers that were not requested: ${unknown.join(', ')}`);
  }
  return lines;
};
