import chalk from 'chalk';
import type { Config } from '../config.js';
import { MODEL_PRICING } from '../config.js';
import { calculateSessionCost, formatCost } from '../utils/llm-cost.js';
import type { FixSummary, SkippedItem, TokenStats } from './types.js';

const SKIP_LABELS: Record<SkippedItem['reason'], string> = {
  no_match: 'no matching card',
  multiple_matches: 'several matching cards',
  no_words: 'empty word list',
  missing_note: 'card without note',
};

export function printSkipped(skipped: SkippedItem[]): void {
  if (skipped.length === 0) return;
  console.log(chalk.yellow(`\nSkipped ${skipped.length}:`));
  for (const item of skipped) {
    console.log(
      chalk.yellow(`  - ${item.target} (${SKIP_LABELS[item.reason]}): `) +
        chalk.gray(item.details),
    );
  }
}

/**
 * Exit code for a finished run: 1 when a batch or a note write failed.
 */
export function exitCodeFor(summary: FixSummary): number {
  return summary.failedBatches.length > 0 || summary.writeFailures.length > 0
    ? 1
    : 0;
}

/**
 * Print summary statistics
 */
export function printSummary(
  summary: FixSummary,
  tokenStats: TokenStats,
  config: Config,
  elapsedMs: number,
  options?: { outputPath?: string },
): void {
  console.log('\n' + '='.repeat(60));
  console.log(chalk.bold('Summary'));
  console.log('='.repeat(60));
  console.log(`Notes sent:        ${summary.notesSent}`);
  console.log(`Changes proposed:  ${summary.proposed}`);
  if (summary.unchanged > 0) {
    console.log(chalk.gray(`Already formatted: ${summary.unchanged}`));
  }
  if (options?.outputPath) {
    console.log(
      chalk.green(`✓ Saved: ${summary.applied} to ${options.outputPath}`),
    );
  } else {
    console.log(chalk.green(`✓ Applied: ${summary.applied}`));
  }
  if (summary.skippedBatches > 0) {
    console.log(chalk.yellow(`Skipped batches:   ${summary.skippedBatches}`));
  }
  if (summary.stoppedEarly) {
    console.log(chalk.yellow('Stopped before the last batch'));
  }
  if (summary.rejected.length > 0) {
    console.log(chalk.yellow(`\nRejected records: ${summary.rejected.length}`));
    for (const rejected of summary.rejected) {
      console.log(chalk.yellow(`  - Note ${rejected.noteId}: ${rejected.reason}`));
    }
  }
  if (summary.failedBatches.length > 0) {
    console.log(chalk.red(`\n✗ Failed batches: ${summary.failedBatches.length}`));
    for (const failed of summary.failedBatches) {
      console.log(chalk.red(`  - Batch ${failed.batch}: ${failed.error}`));
    }
  }
  if (summary.writeFailures.length > 0) {
    console.log(chalk.red(`\n✗ Failed writes: ${summary.writeFailures.length}`));
    for (const failure of summary.writeFailures) {
      console.log(chalk.red(`  - Note ${failure.noteId}: ${failure.error}`));
    }
  }
  printSkipped(summary.skipped);

  const pricing = MODEL_PRICING[config.model];
  console.log(`\n${chalk.bold('Token Usage:')}`);
  console.log(`  Input tokens:  ${tokenStats.input.toLocaleString()}`);
  console.log(`  Output tokens: ${tokenStats.output.toLocaleString()}`);
  console.log(`\n${chalk.bold('Cost:')}`);
  console.log(`  Model: ${config.model}`);
  console.log(
    `  Pricing: $${pricing.inputCostPerMillion.toFixed(2)}/M input, $${pricing.outputCostPerMillion.toFixed(2)}/M output`,
  );
  console.log(
    chalk.bold(
      `  Total cost:  ${formatCost(calculateSessionCost(config.model, tokenStats))}`,
    ),
  );
  console.log(`\nTotal time: ${(elapsedMs / 1000).toFixed(2)}s`);
}
