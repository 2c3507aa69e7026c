import { describe, it, expect } from 'vitest';
import { mkdtemp, readFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import {
  fromChangeRow,
  parseChanges,
  readChangesFile,
  serializeChanges,
  toChangeRow,
  writeChangesFile,
} from './changes-file.js';
import type { CardChange } from './types.js';

const CHANGE: CardChange = {
  noteId: 5,
  original: { Front: 'hund', Back: 'dog', Audio: '' },
  updated: { Front: 'en hund' },
};

describe('toChangeRow / fromChangeRow', () => {
  it('stores full values and restores only the differing fields', () => {
    const row = toChangeRow(CHANGE);
    expect(row).toEqual({
      noteId: 5,
      Front: 'en hund',
      Back: 'dog',
      originalFront: 'hund',
      originalBack: 'dog',
    });
    expect(fromChangeRow(row)).toEqual({
      noteId: 5,
      original: { Front: 'hund', Back: 'dog' },
      updated: { Front: 'en hund' },
    });
  });

  it('returns null for a row without changes', () => {
    expect(
      fromChangeRow({
        noteId: 1,
        Front: 'a',
        Back: 'b',
        originalFront: 'a',
        originalBack: 'b',
      }),
    ).toBeNull();
  });
});

describe('serializeChanges', () => {
  it('writes quoted CSV with a fixed column order', () => {
    expect(serializeChanges([CHANGE], 'out.csv')).toBe(
      '"noteId","Front","Back","originalFront","originalBack"\n' +
        '"5","en hund","dog","hund","dog"',
    );
  });

  it('rejects unknown extensions', () => {
    expect(() => serializeChanges([CHANGE], 'out.txt')).toThrow(
      'Unsupported file extension: .txt. Use .csv, .yaml, or .yml',
    );
  });
});

describe('parseChanges', () => {
  it('reads rows from YAML', () => {
    const yamlText = [
      '- noteId: 5',
      '  Front: en hund',
      '  Back: |-',
      '    1. dog',
      '    2. hound',
      '  originalFront: hund',
      '  originalBack: dog',
    ].join('\n');
    expect(parseChanges(yamlText, 'changes.yaml')).toEqual([
      {
        noteId: 5,
        Front: 'en hund',
        Back: '1. dog\n2. hound',
        originalFront: 'hund',
        originalBack: 'dog',
      },
    ]);
  });

  it('names the invalid row', () => {
    const csv =
      'noteId,Front,Back,originalFront,originalBack\n5,en hund,,hund,dog\n';
    expect(() => parseChanges(csv, 'changes.csv')).toThrow(
      /^Invalid row 1 in changes\.csv:/,
    );
  });
});

describe('writeChangesFile / readChangesFile', () => {
  it('reads back what it wrote', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'changes-test-'));
    const filePath = path.join(dir, 'changes.csv');
    const change: CardChange = {
      noteId: 9,
      original: { Front: 'en älg', Back: 'moose' },
      updated: { Back: '1. moose, "elk"\n2. big' },
    };

    await writeChangesFile([change], filePath);

    expect(await readFile(filePath, 'utf-8')).toContain('"en älg"');
    expect(await readChangesFile(filePath)).toEqual([toChangeRow(change)]);
  });
});
