import { select } from '@inquirer/prompts';
import chalk from 'chalk';
import { formatFieldDiff } from '../utils/field-diff.js';
import type { BatchInfo, CardChange, ReviewDecision } from './types.js';
import { toStoredFields } from './write-back.js';

/**
 * Renders one proposed change: a header with the card's current front and
 * a diff per changed field.
 */
export function formatChange(change: CardChange): string[] {
  const front = change.original.Front ?? 'Unknown';
  const lines = [chalk.cyan(`--- Card: ${front} (note ${change.noteId}) ---`)];

  const stored = toStoredFields(change.updated);
  for (const [fieldName, newValue] of Object.entries(stored)) {
    const oldValue = change.original[fieldName] ?? '';
    if (oldValue === newValue) continue;
    lines.push(`  ${chalk.bold(fieldName + ':')}`);
    for (const diffLine of formatFieldDiff(oldValue, newValue)) {
      lines.push(`    ${diffLine}`);
    }
  }
  return lines;
}

export function printChanges(changes: CardChange[]): void {
  console.log(
    chalk.bold(
      `\n${changes.length} change${changes.length === 1 ? '' : 's'} suggested:`,
    ),
  );
  for (const change of changes) {
    console.log('');
    for (const line of formatChange(change)) {
      console.log(line);
    }
  }
}

/**
 * Shows the batch's changes and asks whether to apply them.
 */
export async function reviewInteractively(
  changes: CardChange[],
  batch: BatchInfo,
): Promise<ReviewDecision> {
  printChanges(changes);
  return await select<ReviewDecision>({
    message: `Apply these changes (batch ${batch.number}/${batch.total})?`,
    choices: [
      { name: 'Apply', value: 'apply' },
      { name: 'Skip this batch', value: 'skip' },
      { name: 'Quit', value: 'quit' },
    ],
  });
}

/**
 * Non-interactive review for --yes: print and apply.
 */
export function autoApprove(changes: CardChange[]): Promise<ReviewDecision> {
  printChanges(changes);
  return Promise.resolve('apply');
}
