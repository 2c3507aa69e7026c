import chalk from 'chalk';
import type { CardStore } from '../types.js';
import { toCardHtml } from '../utils/sanitize-html.js';
import {
  EDITABLE_FIELDS,
  type ApplyResult,
  type CardChange,
  type FieldUpdates,
} from './types.js';
import { logDebug } from './logger.js';
import { errorMessage } from './util.js';

export const REVIEWED_TAG = 'reviewed';

export function withReviewedTag(tags: readonly string[]): string[] {
  return tags.includes(REVIEWED_TAG) ? [...tags] : [...tags, REVIEWED_TAG];
}

/**
 * The updated fields as they will be stored: newlines become <br> and the
 * HTML is sanitized.
 */
export function toStoredFields(updated: FieldUpdates): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const [name, value] of Object.entries(updated)) {
    if (value !== undefined) {
      fields[name] = toCardHtml(value);
    }
  }
  return fields;
}

/**
 * Drops fields whose stored form would equal the current value. Returns
 * null when nothing is left to write.
 */
export function effectiveUpdates(change: CardChange): FieldUpdates | null {
  const stored = toStoredFields(change.updated);
  const remaining: FieldUpdates = {};
  let count = 0;
  for (const name of EDITABLE_FIELDS) {
    const value = change.updated[name];
    if (value !== undefined && stored[name] !== change.original[name]) {
      remaining[name] = value;
      count++;
    }
  }
  return count > 0 ? remaining : null;
}

/**
 * Writes changes to the store one note at a time. Only the returned fields
 * are sent, and the note is tagged as reviewed. A failing note is recorded
 * and the rest of the changes still go through.
 */
export async function applyChanges(
  store: CardStore,
  changes: CardChange[],
): Promise<ApplyResult> {
  const result: ApplyResult = { applied: 0, failures: [] };

  for (const change of changes) {
    try {
      const fields = toStoredFields(change.updated);
      const tags = withReviewedTag(await store.getNoteTags(change.noteId));
      await store.updateNote({ id: change.noteId, fields, tags });
      result.applied++;
      await logDebug(
        `Note ${change.noteId}: updated ${Object.keys(fields).join(', ')}`,
      );
    } catch (error) {
      const message = errorMessage(error);
      result.failures.push({ noteId: change.noteId, error: message });
      console.log(
        chalk.red(`✗ Failed to update note ${change.noteId}: ${message}`),
      );
      await logDebug(`ERROR: Note ${change.noteId}: ${message}`);
    }
  }

  return result;
}
