import { readFile, writeFile, rename } from 'fs/promises';
import Papa from 'papaparse';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import type { CardChange, FieldUpdates } from './types.js';

/**
 * One proposal as saved by `fix --output`. Front and Back hold the full
 * proposed values; the original columns record what the card held when
 * the proposal was made.
 */
const ChangeRow = z.object({
  noteId: z.coerce.number().int().positive(),
  Front: z.string().min(1, 'Front must not be empty'),
  Back: z.string().min(1, 'Back must not be empty'),
  originalFront: z.string(),
  originalBack: z.string(),
});

export type ChangeRow = z.infer<typeof ChangeRow>;

type Format = 'csv' | 'yaml';

function formatFor(filePath: string): Format {
  const extension = path.extname(filePath).toLowerCase();
  if (extension === '.csv') return 'csv';
  if (extension === '.yml' || extension === '.yaml') return 'yaml';
  throw new Error(
    `Unsupported file extension: ${extension}. Use .csv, .yaml, or .yml`,
  );
}

/**
 * Writes to a temp file next to the target, then renames it into place.
 * The rename stays on one file system.
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
): Promise<void> {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  await writeFile(tmpPath, data, 'utf-8');
  await rename(tmpPath, filePath);
}

export function toChangeRow(change: CardChange): ChangeRow {
  const originalFront = change.original.Front ?? '';
  const originalBack = change.original.Back ?? '';
  return {
    noteId: change.noteId,
    Front: change.updated.Front ?? originalFront,
    Back: change.updated.Back ?? originalBack,
    originalFront,
    originalBack,
  };
}

/**
 * Turns a saved row back into a change carrying only the fields that differ
 * from the recorded originals. Returns null for rows with nothing to do.
 */
export function fromChangeRow(row: ChangeRow): CardChange | null {
  const updated: FieldUpdates = {};
  if (row.Front !== row.originalFront) updated.Front = row.Front;
  if (row.Back !== row.originalBack) updated.Back = row.Back;
  if (updated.Front === undefined && updated.Back === undefined) {
    return null;
  }
  return {
    noteId: row.noteId,
    original: { Front: row.originalFront, Back: row.originalBack },
    updated,
  };
}

export function serializeChanges(
  changes: CardChange[],
  filePath: string,
): string {
  const rows = changes.map(toChangeRow);
  if (formatFor(filePath) === 'csv') {
    return Papa.unparse(rows, {
      quotes: true,
      newline: '\n',
      header: true,
      columns: ['noteId', 'Front', 'Back', 'originalFront', 'originalBack'],
    });
  }
  return yaml.dump(rows, { lineWidth: -1 });
}

export async function writeChangesFile(
  changes: CardChange[],
  filePath: string,
): Promise<void> {
  await atomicWriteFile(filePath, serializeChanges(changes, filePath));
}

/**
 * Parses a changes file (CSV or YAML). Every row is validated; the first
 * invalid row aborts with its row number.
 */
export function parseChanges(content: string, filePath: string): ChangeRow[] {
  let data: unknown;
  if (formatFor(filePath) === 'csv') {
    const parseResult = Papa.parse<Record<string, string>>(content, {
      header: true,
      skipEmptyLines: true,
    });
    if (parseResult.errors.length > 0) {
      throw new Error(
        `CSV parsing errors: ${JSON.stringify(parseResult.errors)}`,
      );
    }
    data = parseResult.data;
  } else {
    data = yaml.load(content) ?? [];
  }

  if (!Array.isArray(data)) {
    throw new Error(`${filePath} does not contain a list of changes`);
  }

  return data.map((item: unknown, index) => {
    const result = ChangeRow.safeParse(item);
    if (!result.success) {
      throw new Error(
        `Invalid row ${index + 1} in ${filePath}:\n${z.prettifyError(result.error)}`,
      );
    }
    return result.data;
  });
}

export async function readChangesFile(filePath: string): Promise<ChangeRow[]> {
  return parseChanges(await readFile(filePath, 'utf-8'), filePath);
}
