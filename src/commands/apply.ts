import chalk from 'chalk';
import { AnkiConnectStore } from '../anki-store.js';
import { readChangesFile } from '../fixing/changes-file.js';
import { logInfoTee, logWarn } from '../fixing/logger.js';
import { planFileChanges } from '../fixing/offline-apply.js';
import { autoApprove, reviewInteractively } from '../fixing/review.js';
import { applyChanges } from '../fixing/write-back.js';
import type { Command } from './types.js';
import { exitWithAnkiError, loadUserConfig } from './shared.js';

interface ApplyArgs {
  file: string;
  yes: boolean;
}

const command: Command<ApplyArgs> = {
  command: 'apply <file>',
  describe: 'Write proposals saved by "fix --output" to Anki',

  builder: (yargs) => {
    return yargs
      .positional('file', {
        describe: 'Changes file (.csv, .yaml or .yml)',
        type: 'string',
        demandOption: true,
      })
      .option('yes', {
        alias: 'y',
        describe: 'Apply without asking',
        type: 'boolean',
        default: false,
      })
      .example('$0 apply changes.yaml', 'Review and apply saved proposals');
  },

  handler: async (argv) => {
    await loadUserConfig();
    const store = new AnkiConnectStore();

    try {
      const rows = await readChangesFile(argv.file);
      await logInfoTee(`Loaded ${rows.length} rows from ${argv.file}`);

      const plan = await planFileChanges(store, rows);
      for (const noteId of plan.missing) {
        await logWarn(`Note ${noteId} no longer exists, skipping`);
      }
      for (const noteId of plan.stale) {
        await logWarn(
          `Note ${noteId} was edited after the proposal was saved, skipping`,
        );
      }
      if (plan.unchanged > 0) {
        await logInfoTee(chalk.gray(`${plan.unchanged} rows without changes`));
      }
      if (plan.changes.length === 0) {
        await logInfoTee(chalk.yellow('Nothing to apply.'));
        return;
      }

      const review = argv.yes ? autoApprove : reviewInteractively;
      const decision = await review(plan.changes, { number: 1, total: 1 });
      if (decision !== 'apply') {
        await logInfoTee(chalk.yellow('No changes applied.'));
        return;
      }

      const result = await applyChanges(store, plan.changes);
      console.log(chalk.green(`\n✓ Applied: ${result.applied}`));
      if (result.failures.length > 0) {
        console.log(chalk.red(`✗ Failed writes: ${result.failures.length}`));
        process.exit(1);
      }
    } catch (error) {
      exitWithAnkiError(error);
    }
  },
};

export default command;
