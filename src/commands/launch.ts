import chalk from 'chalk';
import { AnkiConnectStore } from '../anki-store.js';
import { logWarn } from '../fixing/logger.js';
import {
  LauncherError,
  launchFixer,
  planLaunch,
  resolveLauncherPaths,
  type LaunchPlan,
} from '../launcher/launch.js';
import type { CurrentCardInfo } from '../types.js';
import type { Command } from './types.js';
import { exitWithAnkiError, loadUserConfig } from './shared.js';

interface LaunchArgs {
  'dry-run': boolean;
}

const command: Command<LaunchArgs> = {
  command: 'launch',
  describe: 'Fix the card currently shown in the Anki reviewer',

  builder: (yargs) => {
    return yargs
      .option('dry-run', {
        alias: 'd',
        describe: 'Print the fixer command instead of running it',
        type: 'boolean',
        default: false,
      })
      .example('$0 launch', 'Run the fixer for the card on screen');
  },

  handler: async (argv) => {
    await loadUserConfig();
    const store = new AnkiConnectStore();

    let card: CurrentCardInfo | null;
    try {
      card = await store.currentCard();
    } catch (error) {
      exitWithAnkiError(error);
    }
    if (!card) {
      await logWarn('No active card. Open a card in the Anki reviewer first.');
      process.exit(1);
    }

    let plan: LaunchPlan;
    try {
      plan = planLaunch(card, resolveLauncherPaths());
    } catch (error) {
      if (error instanceof LauncherError) {
        await logWarn(error.message);
        process.exit(1);
      }
      throw error;
    }
    const { frontText, wordList, launch } = plan;

    console.log(chalk.cyan(`Card:      ${frontText}`));
    console.log(chalk.cyan(`Deck:      ${card.deckName}`));
    console.log(chalk.cyan(`Word list: ${wordList}`));

    if (argv['dry-run']) {
      console.log(
        [launch.command, ...launch.args]
          .map((part) => JSON.stringify(part))
          .join(' '),
      );
      console.log(chalk.dim(`  cwd: ${launch.cwd}`));
      return;
    }

    try {
      const exitCode = await launchFixer(launch);
      process.exit(exitCode);
    } catch (error) {
      if (error instanceof LauncherError) {
        console.log(chalk.red(`✗ Error: ${error.message}`));
        process.exit(1);
      }
      throw error;
    }
  },
};

export default command;
