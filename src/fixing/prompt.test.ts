import { describe, it, expect } from 'vitest';
import { mkdtemp, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import {
  buildUserPrompt,
  loadStyleGuide,
  RESPONSE_INSTRUCTION,
} from './prompt.js';
import type { Note } from '../types.js';

const NOTE: Note = {
  noteId: 3,
  modelName: 'Basic',
  fields: { Front: 'älg', Back: 'moose', Audio: '' },
  tags: ['djur'],
};

describe('buildUserPrompt', () => {
  it('lists the notes as JSON after the output instruction', () => {
    const prompt = buildUserPrompt([NOTE]);
    expect(prompt).toBe(
      `${RESPONSE_INSTRUCTION}\nCards to process:\n` +
        [
          '[',
          '  {',
          '    "note_id": 3,',
          '    "model_name": "Basic",',
          '    "fields": {',
          '      "Front": "älg",',
          '      "Back": "moose",',
          '      "Audio": ""',
          '    },',
          '    "tags": [',
          '      "djur"',
          '    ]',
          '  }',
          ']',
        ].join('\n') +
        '\n',
    );
  });

  it('appends extra instructions', () => {
    const prompt = buildUserPrompt([NOTE], '  Keep it short.  ');
    expect(prompt.endsWith(
      '\nAdditional instructions from the user:\nKeep it short.\n',
    )).toBe(true);
  });

  it('ignores blank instructions', () => {
    expect(buildUserPrompt([NOTE], '   ')).toBe(buildUserPrompt([NOTE]));
  });
});

describe('loadStyleGuide', () => {
  it('loads the bundled style guide by default', async () => {
    const styleGuide = await loadStyleGuide();
    expect(styleGuide).toContain('processed_cards');
  });

  it('rejects an empty file', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'prompt-test-'));
    const filePath = path.join(dir, 'empty.md');
    await writeFile(filePath, '\n', 'utf-8');
    await expect(loadStyleGuide(filePath)).rejects.toThrow(
      `Style guide ${filePath} is empty`,
    );
  });
});
