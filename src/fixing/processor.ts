import chalk from 'chalk';
import type { CardStore, Note } from '../types.js';
import { batchCount, chunk } from './batcher.js';
import { buildUserPrompt } from './prompt.js';
import {
  parseFixResponse,
  type AcceptedUpdate,
  type ParsedFixResponse,
} from './response.js';
import type {
  ApplyResult,
  BatchInfo,
  CardChange,
  FixSummary,
  ReviewDecision,
  SkippedItem,
} from './types.js';
import { effectiveUpdates } from './write-back.js';
import { logBatch, logError, logInfoTee, logWarn } from './logger.js';

/**
 * Sends a system and user prompt to the model and resolves to its reply.
 */
export type CompleteFn = (
  systemPrompt: string,
  userPrompt: string,
  batch: BatchInfo,
) => Promise<string>;

/**
 * Hooks that decide what happens to a batch's proposals. This keeps the
 * batch loop independent of whether changes are reviewed interactively,
 * written to Anki or saved to a file.
 */
export interface FixHooks {
  /** Decides whether the batch's changes are committed. */
  review: (changes: CardChange[], batch: BatchInfo) => Promise<ReviewDecision>;
  /** Persists accepted changes. */
  commit: (changes: CardChange[]) => Promise<ApplyResult>;
}

export interface FixRunOptions {
  store: CardStore;
  cardIds: number[];
  batchSize: number;
  systemPrompt: string;
  instructions?: string;
  complete: CompleteFn;
  hooks: FixHooks;
}

/**
 * Loads the notes behind a batch of cards, skipping cards without a note
 * and notes already sent in an earlier batch.
 */
async function loadBatchNotes(
  store: CardStore,
  cardIds: number[],
  sentNoteIds: Set<number>,
  skipped: SkippedItem[],
): Promise<Note[]> {
  const cards = await store.cardsInfo(cardIds);
  const noteIds: number[] = [];

  for (const card of cards) {
    if (card.noteId === undefined) {
      skipped.push({
        target: String(card.cardId),
        reason: 'missing_note',
        details: `Card ${card.cardId} has no note, skipping.`,
      });
      continue;
    }
    if (sentNoteIds.has(card.noteId)) continue;
    sentNoteIds.add(card.noteId);
    noteIds.push(card.noteId);
  }

  return await store.notesInfo(noteIds);
}

function toChanges(
  notes: Note[],
  accepted: AcceptedUpdate[],
): { changes: CardChange[]; unchanged: number } {
  const notesById = new Map(notes.map((note) => [note.noteId, note]));
  const changes: CardChange[] = [];
  let unchanged = 0;

  for (const update of accepted) {
    const note = notesById.get(update.noteId);
    if (!note) continue;
    const change: CardChange = {
      noteId: note.noteId,
      original: note.fields,
      updated: update.updated,
    };
    const remaining = effectiveUpdates(change);
    if (remaining === null) {
      unchanged++;
      continue;
    }
    changes.push({ ...change, updated: remaining });
  }

  return { changes, unchanged };
}

/**
 * Runs the selected cards through the model batch by batch. Batches are
 * strictly sequential: request, parse, review, commit, then the next one.
 *
 * A reply that cannot be parsed fails its batch only. Store errors are not
 * caught here; without Anki nothing else can succeed.
 */
export async function runFix(options: FixRunOptions): Promise<FixSummary> {
  const {
    store,
    cardIds,
    batchSize,
    systemPrompt,
    instructions,
    complete,
    hooks,
  } = options;

  const batches = chunk(cardIds, batchSize);
  const summary: FixSummary = {
    totalBatches: batchCount(cardIds.length, batchSize),
    notesSent: 0,
    proposed: 0,
    unchanged: 0,
    applied: 0,
    writeFailures: [],
    rejected: [],
    skipped: [],
    failedBatches: [],
    skippedBatches: 0,
    stoppedEarly: false,
  };
  const sentNoteIds = new Set<number>();

  for (const [index, batchCardIds] of batches.entries()) {
    const batch: BatchInfo = { number: index + 1, total: batches.length };
    await logInfoTee(
      chalk.bold(
        `\n--- Batch ${batch.number}/${batch.total} (${batchCardIds.length} cards) ---`,
      ),
    );

    const notes = await loadBatchNotes(
      store,
      batchCardIds,
      sentNoteIds,
      summary.skipped,
    );
    if (notes.length === 0) {
      await logInfoTee(chalk.gray('No new notes in this batch'));
      continue;
    }
    summary.notesSent += notes.length;

    const userPrompt = buildUserPrompt(notes, instructions);
    await logBatch(
      batch,
      `prompt built, system ${systemPrompt.length} chars, user ${userPrompt.length} chars, ${notes.length} notes`,
    );

    let parsed: ParsedFixResponse;
    try {
      const reply = await complete(systemPrompt, userPrompt, batch);
      parsed = parseFixResponse(
        reply,
        notes.map((note) => note.noteId),
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      summary.failedBatches.push({ batch: batch.number, error: message });
      await logError(`Batch ${batch.number} failed, nothing applied`, error);
      continue;
    }

    for (const rejected of parsed.rejected) {
      summary.rejected.push(rejected);
      await logWarn(`Rejected note ${rejected.noteId}: ${rejected.reason}`);
    }

    const { changes, unchanged } = toChanges(notes, parsed.accepted);
    summary.unchanged += unchanged;
    summary.proposed += changes.length;

    if (changes.length === 0) {
      await logInfoTee(chalk.gray('No changes suggested for this batch'));
      continue;
    }

    const decision = await hooks.review(changes, batch);
    await logBatch(batch, `review decision '${decision}'`);
    if (decision === 'quit') {
      summary.stoppedEarly = true;
      await logInfoTee(chalk.yellow('Stopping processing.'));
      break;
    }
    if (decision === 'skip') {
      summary.skippedBatches++;
      await logInfoTee(chalk.yellow('Skipping this batch.'));
      continue;
    }

    const result = await hooks.commit(changes);
    summary.applied += result.applied;
    summary.writeFailures.push(...result.failures);
    await logInfoTee(
      chalk.green(
        `✓ Applied ${result.applied} change${result.applied === 1 ? '' : 's'} in batch ${batch.number}`,
      ),
    );
  }

  return summary;
}
