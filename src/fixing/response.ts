import { z } from 'zod';
import { parseLlmJson } from '../utils/parse-llm-json.js';
import {
  EDITABLE_FIELDS,
  type EditableField,
  type FieldUpdates,
  type RejectedRecord,
} from './types.js';

/**
 * The model's reply could not be read at all. Nothing from the batch is
 * applied.
 */
export class ResponseFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResponseFormatError';
  }
}

const FixResponse = z.object({
  processed_cards: z.array(z.unknown()),
});

const ProcessedCard = z.object({
  note_id: z.union([
    z.number().int().positive(),
    z.string().regex(/^\d+$/, 'note_id must be numeric'),
  ]),
  updated_fields: z.record(z.string(), z.string()),
});

export type AcceptedUpdate = {
  noteId: number;
  updated: FieldUpdates;
};

export type ParsedFixResponse = {
  accepted: AcceptedUpdate[];
  rejected: RejectedRecord[];
};

/**
 * Normalises line endings and drops NUL characters.
 */
export function normalizeText(value: string): string {
  return value.replace(/\r\n?/g, '\n').replace(/\0/g, '');
}

function isEditableField(name: string): name is EditableField {
  return (EDITABLE_FIELDS as readonly string[]).includes(name);
}

function describeRecord(record: unknown): string {
  if (typeof record === 'object' && record !== null && 'note_id' in record) {
    return String(record.note_id);
  }
  return 'unknown';
}

/**
 * Reads a batch reply of the form
 * `{ "processed_cards": [{ "note_id": 1, "updated_fields": { ... } }] }`.
 *
 * Records are checked one by one against the notes that were sent; a bad
 * record is rejected without affecting the rest of the batch.
 *
 * @param batchNoteIds - the note ids that were part of the request
 * @throws ResponseFormatError when the reply has no usable JSON object
 */
export function parseFixResponse(
  responseText: string,
  batchNoteIds: readonly number[],
): ParsedFixResponse {
  let parsed: unknown;
  try {
    parsed = parseLlmJson(responseText);
  } catch (error) {
    throw new ResponseFormatError(
      error instanceof Error ? error.message : String(error),
    );
  }

  const envelope = FixResponse.safeParse(parsed);
  if (!envelope.success) {
    throw new ResponseFormatError(
      `Response does not match the expected shape:\n${z.prettifyError(envelope.error)}`,
    );
  }

  const inBatch = new Set(batchNoteIds);
  const seen = new Set<number>();
  const accepted: AcceptedUpdate[] = [];
  const rejected: RejectedRecord[] = [];

  for (const record of envelope.data.processed_cards) {
    const result = ProcessedCard.safeParse(record);
    if (!result.success) {
      rejected.push({
        noteId: describeRecord(record),
        reason: `invalid record: ${z.prettifyError(result.error)}`,
      });
      continue;
    }

    const noteId = Number(result.data.note_id);
    const label = String(noteId);

    if (!inBatch.has(noteId)) {
      rejected.push({ noteId: label, reason: 'note is not part of this batch' });
      continue;
    }
    if (seen.has(noteId)) {
      rejected.push({ noteId: label, reason: 'duplicate entry for note' });
      continue;
    }
    seen.add(noteId);

    const fieldNames = Object.keys(result.data.updated_fields);
    if (fieldNames.includes('Audio')) {
      rejected.push({ noteId: label, reason: 'Audio field must not be changed' });
      continue;
    }
    const unexpected = fieldNames.filter((name) => !isEditableField(name));
    if (unexpected.length > 0) {
      rejected.push({
        noteId: label,
        reason: `unexpected field(s): ${unexpected.join(', ')}`,
      });
      continue;
    }
    if (fieldNames.length === 0) {
      rejected.push({ noteId: label, reason: 'no fields to update' });
      continue;
    }

    const updated: FieldUpdates = {};
    for (const [name, value] of Object.entries(result.data.updated_fields)) {
      if (isEditableField(name)) {
        updated[name] = normalizeText(value);
      }
    }
    accepted.push({ noteId, updated });
  }

  return { accepted, rejected };
}
