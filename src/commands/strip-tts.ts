import chalk from 'chalk';
import { AnkiConnectStore } from '../anki-store.js';
import { assertDeckExists } from '../fixing/selector.js';
import { stripTtsFromDeck } from '../fixing/strip-tts.js';
import type { Command } from './types.js';
import { exitWithAnkiError, loadUserConfig } from './shared.js';

interface StripTtsArgs {
  deck: string;
  'dry-run': boolean;
}

const command: Command<StripTtsArgs> = {
  command: 'strip-tts <deck>',
  describe: 'Remove generated TTS sound tags from Front and Back',

  builder: (yargs) => {
    return yargs
      .positional('deck', {
        describe: 'Name of the Anki deck',
        type: 'string',
        demandOption: true,
      })
      .option('dry-run', {
        alias: 'd',
        describe: 'Only count the notes that would change',
        type: 'boolean',
        default: false,
      })
      .example('$0 strip-tts Svenska --dry-run', 'Preview the cleanup');
  },

  handler: async (argv) => {
    await loadUserConfig();
    const store = new AnkiConnectStore();

    try {
      await assertDeckExists(store, argv.deck);
      const result = await stripTtsFromDeck(store, argv.deck, {
        dryRun: argv['dry-run'],
      });
      const verb = argv['dry-run'] ? 'Would update' : 'Updated';
      console.log(
        chalk.green(
          `✓ ${verb} ${result.changedNoteIds.length} of ${result.scanned} notes`,
        ),
      );
    } catch (error) {
      exitWithAnkiError(error, argv.deck);
    }
  },
};

export default command;
