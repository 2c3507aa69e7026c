import type { CardStore } from '../types.js';
import { fromChangeRow, type ChangeRow } from './changes-file.js';
import type { CardChange } from './types.js';
import { logDebug } from './logger.js';

export interface ApplyPlan {
  changes: CardChange[];
  // Rows whose proposal equals the recorded original
  unchanged: number;
  missing: number[];
  // Notes edited in Anki since the proposal was saved
  stale: number[];
}

/**
 * Matches saved proposals against the notes currently in Anki. A proposal
 * only goes ahead when the note still holds the Front and Back it was made
 * from.
 */
export async function planFileChanges(
  store: CardStore,
  rows: ChangeRow[],
): Promise<ApplyPlan> {
  const plan: ApplyPlan = { changes: [], unchanged: 0, missing: [], stale: [] };

  const proposed: CardChange[] = [];
  for (const row of rows) {
    const change = fromChangeRow(row);
    if (change) {
      proposed.push(change);
    } else {
      plan.unchanged++;
    }
  }
  if (proposed.length === 0) return plan;

  const ids = proposed.map((change) => change.noteId);
  const existing = new Set(await store.findNotes(`nid:${ids.join(',')}`));
  const notes = await store.notesInfo(ids.filter((id) => existing.has(id)));
  const notesById = new Map(notes.map((note) => [note.noteId, note]));

  for (const change of proposed) {
    const note = notesById.get(change.noteId);
    if (!note) {
      plan.missing.push(change.noteId);
      continue;
    }
    if (
      note.fields.Front !== change.original.Front ||
      note.fields.Back !== change.original.Back
    ) {
      plan.stale.push(change.noteId);
      await logDebug(`Note ${change.noteId} changed since the proposal`);
      continue;
    }
    plan.changes.push({ ...change, original: note.fields });
  }

  return plan;
}
