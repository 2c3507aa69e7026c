import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import type { Note } from '../types.js';
import type { BatchRecord } from './types.js';
import { logDebug } from './logger.js';

/**
 * The bundled style guide. Resolves to <package>/prompts from both src/ and
 * dist/.
 */
export const DEFAULT_PROMPT_PATH = fileURLToPath(
  new URL('../../prompts/swedish-style.md', import.meta.url),
);

export const RESPONSE_INSTRUCTION =
  'Process the following cards and return only the results strictly in the JSON format specified in your instructions, with no further comments.';

export async function loadStyleGuide(
  promptPath: string = DEFAULT_PROMPT_PATH,
): Promise<string> {
  const styleGuide = await readFile(promptPath, 'utf-8');
  if (!styleGuide.trim()) {
    throw new Error(`Style guide ${promptPath} is empty`);
  }
  await logDebug(
    `Style guide loaded from ${promptPath} (${styleGuide.length} chars)`,
  );
  return styleGuide;
}

export function toBatchRecord(note: Note): BatchRecord {
  return {
    note_id: note.noteId,
    model_name: note.modelName,
    fields: note.fields,
    tags: note.tags,
  };
}

/**
 * The user turn of a batch request: the output instruction, the notes as
 * JSON and any extra instructions given on the command line.
 */
export function buildUserPrompt(notes: Note[], instructions?: string): string {
  const records = notes.map(toBatchRecord);
  let prompt = `${RESPONSE_INSTRUCTION}\nCards to process:\n${JSON.stringify(records, null, 2)}\n`;

  const extra = instructions?.trim();
  if (extra) {
    prompt += `\nAdditional instructions from the user:\n${extra}\n`;
  }
  return prompt;
}
