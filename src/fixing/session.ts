import chalk from 'chalk';
import type { CardStore } from '../types.js';
import { createBackup } from './backup.js';
import { writeChangesFile } from './changes-file.js';
import { logDebug, logInfo, logInfoTee, logWarn } from './logger.js';
import { runFix, type CompleteFn, type FixHooks } from './processor.js';
import { buildUserPrompt } from './prompt.js';
import { autoApprove, reviewInteractively } from './review.js';
import { selectCards, type Selection } from './selector.js';
import type { CardChange, FixSummary } from './types.js';
import { applyChanges } from './write-back.js';

export interface FixSessionOptions {
  store: CardStore;
  deckName: string;
  wordList?: string;
  flaggedOnly: boolean;
  startFrom: number;
  batchSize: number;
  systemPrompt: string;
  instructions?: string;
  dryRun: boolean;
  backup: boolean;
  // Where backups go; the working directory when unset
  backupDir?: string;
  // Apply every batch without asking (--yes)
  yes: boolean;
  // Save proposals to this CSV/YAML file instead of writing to Anki
  outputPath?: string;
  complete: CompleteFn;
}

export type FixSessionResult =
  | { status: 'nothing_selected'; selection: Selection }
  | { status: 'dry_run'; selection: Selection }
  | {
      status: 'finished';
      selection: Selection;
      summary: FixSummary;
      backupPath?: string;
    };

function describeSelection(selection: Selection): string {
  switch (selection.mode) {
    case 'words':
      return 'cards matching the word list';
    case 'flagged':
      return 'flagged cards';
    case 'new':
      return 'new cards not yet reviewed';
  }
}

async function printDryRun(
  store: CardStore,
  cardIds: number[],
  options: FixSessionOptions,
): Promise<void> {
  const { batchSize, systemPrompt, instructions } = options;
  logInfo(chalk.yellow('\n⚠️  DRY RUN MODE - No API calls, no changes'));
  logInfo(
    `Would send ${cardIds.length} cards in ${Math.ceil(cardIds.length / batchSize)} batches`,
  );
  logInfo(`System prompt:     ${systemPrompt.length} chars`);

  const cards = await store.cardsInfo(cardIds.slice(0, batchSize));
  const noteIds = cards.flatMap((card) =>
    card.noteId === undefined ? [] : [card.noteId],
  );
  const notes = await store.notesInfo([...new Set(noteIds)]);
  if (notes.length > 0) {
    logInfo(`\n${chalk.bold('First batch payload:')}`);
    logInfo(buildUserPrompt(notes, instructions));
  }
  await logDebug('Dry run complete. Exiting.');
}

/**
 * Review and commit hooks for a run. With an output file nothing is
 * written to Anki: every batch is auto-approved and the file is rewritten
 * with all proposals collected so far.
 */
export function createFixHooks(
  store: CardStore,
  options: { yes: boolean; outputPath?: string },
): FixHooks {
  const { outputPath } = options;
  if (outputPath) {
    const collected: CardChange[] = [];
    return {
      review: autoApprove,
      commit: async (changes) => {
        collected.push(...changes);
        await writeChangesFile(collected, outputPath);
        return { applied: changes.length, failures: [] };
      },
    };
  }
  return {
    review: options.yes ? autoApprove : reviewInteractively,
    commit: (changes) => applyChanges(store, changes),
  };
}

/**
 * One fix run over a deck: selection, optional dry run, backup, then the
 * batch loop. Store errors propagate to the caller.
 */
export async function fixDeck(
  options: FixSessionOptions,
): Promise<FixSessionResult> {
  const { store, deckName, outputPath } = options;

  if (options.wordList !== undefined && options.flaggedOnly) {
    await logWarn('--flagged-only is ignored when --word-list is given');
  }

  await logInfoTee(`\n${chalk.cyan('Selecting')} cards...`);
  const selection = await selectCards(store, {
    deckName,
    wordList: options.wordList,
    flaggedOnly: options.flaggedOnly,
    startFrom: options.startFrom,
  });

  if (selection.cardIds.length === 0) {
    await logInfoTee(
      chalk.yellow(
        `No ${describeSelection(selection)} found in '${deckName}'. Nothing to do.`,
      ),
    );
    return { status: 'nothing_selected', selection };
  }
  await logInfoTee(
    chalk.green(
      `✓ Found ${selection.cardIds.length} ${describeSelection(selection)}`,
    ),
  );

  if (options.dryRun) {
    await printDryRun(store, selection.cardIds, options);
    return { status: 'dry_run', selection };
  }

  const backupPath =
    options.backup && !outputPath
      ? await createBackup(store, deckName, options.backupDir)
      : undefined;

  const summary = await runFix({
    store,
    cardIds: selection.cardIds,
    batchSize: options.batchSize,
    systemPrompt: options.systemPrompt,
    instructions: options.instructions,
    complete: options.complete,
    hooks: createFixHooks(store, { yes: options.yes, outputPath }),
  });
  summary.skipped.unshift(...selection.skipped);

  return { status: 'finished', selection, summary, backupPath };
}
