import { select } from '@inquirer/prompts';
import { parseConfig } from '../config.js';
import { AnkiConnectStore } from '../anki-store.js';
import type { CardStore } from '../types.js';
import { createOpenAIClient, requestFixes } from '../fixing/llm.js';
import { logDebug } from '../fixing/logger.js';
import { loadStyleGuide } from '../fixing/prompt.js';
import {
  exitCodeFor,
  printSkipped,
  printSummary,
} from '../fixing/reporting.js';
import { fixDeck } from '../fixing/session.js';
import type { TokenStats } from '../fixing/types.js';
import { slugifyDeckName } from '../fixing/util.js';
import { calculateSessionCost, formatCostDisplay } from '../utils/llm-cost.js';
import { withSpinner } from '../utils/spinner.js';
import type { Command } from './types.js';
import {
  exitWithAnkiError,
  loadUserConfig,
  modelOptionDescription,
  printHeader,
  resolveModel,
  setupLogger,
} from './shared.js';

interface FixArgs {
  deck?: string;
  'word-list'?: string;
  'batch-size': number;
  'start-from': number;
  'flagged-only': boolean;
  backup: boolean;
  yes: boolean;
  'dry-run': boolean;
  output?: string;
  instructions?: string;
  prompt?: string;
  model?: string;
  'max-tokens': number;
  temperature: number;
  retries: number;
  log: boolean;
  'very-verbose': boolean;
}

async function promptForDeck(store: CardStore): Promise<string> {
  const deckNames = await store.deckNames();
  if (deckNames.length === 0) {
    throw new Error('No decks found in Anki');
  }
  return await select({
    message: 'Select a deck to fix:',
    choices: deckNames.map((name) => ({ name, value: name })),
  });
}

async function resolveDeck(
  store: CardStore,
  deckName: string | undefined,
): Promise<string> {
  if (deckName) return deckName;
  try {
    return await promptForDeck(store);
  } catch (error) {
    exitWithAnkiError(error);
  }
}

const command: Command<FixArgs> = {
  command: 'fix',
  describe: 'Reformat cards in a deck with an LLM and write them back',

  builder: (yargs) => {
    return yargs
      .option('deck', {
        describe: 'Deck to process (asks when omitted)',
        type: 'string',
      })
      .option('word-list', {
        alias: 'word_list',
        describe: 'Comma-separated words; only the card matching each is fixed',
        type: 'string',
      })
      .option('batch-size', {
        alias: 'b',
        describe: 'Number of cards sent to the model per request',
        type: 'number',
        default: 10,
      })
      .option('start-from', {
        describe: 'Position (1-based) of the first selected card to process',
        type: 'number',
        default: 1,
      })
      .option('flagged-only', {
        describe: 'Process cards with the red flag instead of new cards',
        type: 'boolean',
        default: false,
      })
      .option('backup', {
        describe: 'Export the deck before writing (disable with --no-backup)',
        type: 'boolean',
        default: true,
      })
      .option('yes', {
        alias: 'y',
        describe: 'Apply every batch without asking',
        type: 'boolean',
        default: false,
      })
      .option('dry-run', {
        alias: 'd',
        describe: 'Show what would be sent without calling the API',
        type: 'boolean',
        default: false,
      })
      .option('output', {
        alias: 'o',
        describe: 'Save proposals to a .csv or .yaml file instead of Anki',
        type: 'string',
      })
      .option('instructions', {
        alias: 'i',
        describe: 'Extra instructions appended to every request',
        type: 'string',
      })
      .option('prompt', {
        alias: 'p',
        describe: 'Path to a style guide used as the system prompt',
        type: 'string',
      })
      .option('model', {
        alias: 'm',
        describe: modelOptionDescription(),
        type: 'string',
      })
      .option('max-tokens', {
        describe: 'Maximum tokens for completion',
        type: 'number',
        default: 4000,
      })
      .option('temperature', {
        alias: 't',
        describe: 'Temperature for model sampling',
        type: 'number',
        default: 0,
      })
      .option('retries', {
        alias: 'r',
        describe: 'Number of retries for failed requests',
        type: 'number',
        default: 2,
      })
      .option('log', {
        describe: 'Generate a log file',
        type: 'boolean',
        default: false,
      })
      .option('very-verbose', {
        describe: 'Log LLM responses to log file (automatically enables --log)',
        type: 'boolean',
        default: false,
      })
      .check((argv) => {
        if (!Number.isInteger(argv['batch-size']) || argv['batch-size'] <= 0) {
          throw new Error('Error: --batch-size must be a positive integer.');
        }
        if (!Number.isInteger(argv['start-from']) || argv['start-from'] <= 0) {
          throw new Error('Error: --start-from must be a positive integer.');
        }
        return true;
      })
      .example('$0 fix --deck Svenska', 'Fix new cards, asking per batch')
      .example(
        '$0 fix --deck Svenska --word-list "hund, katt"',
        'Fix the cards for two words',
      )
      .example(
        '$0 fix --deck Svenska --flagged-only --output changes.yaml',
        'Save proposals for flagged cards to review later',
      );
  },

  handler: async (argv) => {
    const startTime = Date.now();
    const userConfig = await loadUserConfig();

    // Checked before the deck prompt so a missing API key fails first
    const config = parseConfig({
      model: resolveModel(argv.model, userConfig),
      batchSize: argv['batch-size'],
      maxTokens: argv['max-tokens'],
      temperature: argv.temperature,
      retries: argv.retries,
      dryRun: argv['dry-run'],
    });

    const store = new AnkiConnectStore();
    const deckName = await resolveDeck(store, argv.deck);

    const logFilePath = await setupLogger({
      enabled: argv.log || argv['very-verbose'],
      getLogFilePath: () => `${slugifyDeckName(deckName)}-fix.log`,
      sessionName: 'Card Fixing',
      veryVerbose: argv['very-verbose'],
    });

    const systemPrompt = await loadStyleGuide(argv.prompt ?? userConfig.prompt);

    printHeader({
      title: 'Card Fixer',
      extraLines: [
        `Deck:              ${deckName}`,
        ...(argv['word-list'] !== undefined
          ? [`Word list:         ${argv['word-list']}`]
          : []),
        ...(argv.output ? [`Output file:       ${argv.output}`] : []),
      ],
      logFilePath,
      config,
    });

    try {
      const client = createOpenAIClient(config);
      const tokenStats: TokenStats = { input: 0, output: 0 };

      const result = await fixDeck({
        store,
        deckName,
        wordList: argv['word-list'],
        flaggedOnly: argv['flagged-only'],
        startFrom: argv['start-from'],
        batchSize: config.batchSize,
        systemPrompt,
        instructions: argv.instructions,
        dryRun: config.dryRun,
        backup: argv.backup,
        yes: argv.yes,
        outputPath: argv.output,
        complete: async (system, user, batch) => {
          const label = `batch ${batch.number}/${batch.total}`;
          const reply = await withSpinner(
            `Waiting for ${config.model} (${label})`,
            () =>
              requestFixes({
                client,
                config,
                systemPrompt: system,
                userPrompt: user,
                tokenStats,
                label,
              }),
          );
          console.log(
            formatCostDisplay({
              totalCost: calculateSessionCost(config.model, tokenStats),
              inputTokens: tokenStats.input,
              outputTokens: tokenStats.output,
            }),
          );
          return reply;
        },
      });

      if (result.status !== 'finished') {
        printSkipped(result.selection.skipped);
        return;
      }

      const { summary } = result;
      const elapsedMs = Date.now() - startTime;
      printSummary(summary, tokenStats, config, elapsedMs, {
        outputPath: argv.output,
      });
      await logDebug(
        `Summary: ${summary.applied} applied, ${summary.failedBatches.length} failed batches, ${summary.writeFailures.length} failed writes`,
      );
      await logDebug(`Total time: ${(elapsedMs / 1000).toFixed(2)}s`);
      process.exit(exitCodeFor(summary));
    } catch (error) {
      exitWithAnkiError(error, deckName);
    }
  },
};

export default command;
