#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import fixCmd from './commands/fix.js';
import applyCmd from './commands/apply.js';
import launchCmd from './commands/launch.js';
import listDecksCmd from './commands/list-decks.js';
import stripTtsCmd from './commands/strip-tts.js';
import configCmd from './commands/config.js';

void yargs(hideBin(process.argv))
  .command(fixCmd)
  .command(applyCmd)
  .command(launchCmd)
  .command(listDecksCmd)
  .command(stripTtsCmd)
  .command(configCmd)
  .scriptName('card-fixer')
  .demandCommand(1, 'You must provide a valid command.')
  .strict()
  .help()
  .alias('h', 'help')
  .version()
  .alias('v', 'version')
  .parse();
