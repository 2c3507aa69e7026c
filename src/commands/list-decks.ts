import chalk from 'chalk';
import { AnkiConnectStore } from '../anki-store.js';
import type { Command } from './types.js';
import { exitWithAnkiError, loadUserConfig } from './shared.js';

const command: Command = {
  command: 'list-decks',
  describe: 'List the decks in Anki',

  handler: async () => {
    await loadUserConfig();
    try {
      const deckNames = await new AnkiConnectStore().deckNames();
      if (deckNames.length === 0) {
        console.log(chalk.yellow('No decks found.'));
        return;
      }
      console.log(chalk.bold('Available decks:'));
      deckNames.forEach((name, index) => {
        console.log(`  ${index + 1}. ${name}`);
      });
    } catch (error) {
      exitWithAnkiError(error);
    }
  },
};

export default command;
