import chalk from 'chalk';
import type { ArgumentsCamelCase } from 'yargs';
import { DEFAULT_ANKI_CONNECT_URL } from '../anki-connect.js';
import { DEFAULT_MODEL } from '../config.js';
import {
  CONFIG_KEYS,
  getConfigPath,
  isConfigKey,
  readConfigFile,
  writeConfigFile,
  type ConfigKey,
} from '../config-manager.js';
import { DEFAULT_PROMPT_PATH } from '../fixing/prompt.js';
import type { Command } from './types.js';

const ACTION_CHOICES = ['get', 'set', 'unset', 'list', 'path'] as const;
export type ConfigAction = (typeof ACTION_CHOICES)[number];

// What applies when a key is not set
const DEFAULTS: Record<ConfigKey, string> = {
  model: DEFAULT_MODEL,
  ankiConnectUrl: DEFAULT_ANKI_CONNECT_URL,
  prompt: DEFAULT_PROMPT_PATH,
};

type ConfigArgs = ArgumentsCamelCase<{
  action: ConfigAction;
  key?: string;
  value?: string;
}>;

function parseKey(key: string | undefined): ConfigKey | undefined {
  if (key === undefined) return undefined;
  if (!isConfigKey(key)) {
    throw new Error(
      `Unknown key "${key}". Valid keys: ${CONFIG_KEYS.join(', ')}`,
    );
  }
  return key;
}

function requireKey(action: ConfigAction, key: ConfigKey | undefined): ConfigKey {
  if (key === undefined) {
    throw new Error(`The "${action}" action requires a key.`);
  }
  return key;
}

/**
 * Carries out one config action and returns the lines to print.
 */
export async function runConfigAction(
  action: ConfigAction,
  rawKey?: string,
  value?: string,
): Promise<string[]> {
  const key = parseKey(rawKey);

  switch (action) {
    case 'set': {
      const name = requireKey('set', key);
      if (value === undefined) {
        throw new Error('The "set" action requires a value.');
      }
      const config = await readConfigFile();
      config[name] = value;
      await writeConfigFile(config);
      return [
        chalk.green(`✓ Set "${name}" to "${value}"`),
        chalk.dim(`  Config file: ${getConfigPath()}`),
      ];
    }

    case 'unset': {
      const name = requireKey('unset', key);
      const config = await readConfigFile();
      delete config[name];
      await writeConfigFile(config);
      return [chalk.green(`✓ Removed "${name}"`)];
    }

    case 'get': {
      const name = requireKey('get', key);
      const config = await readConfigFile();
      return [config[name] ?? chalk.dim(`${DEFAULTS[name]} (default)`)];
    }

    case 'list': {
      const config = await readConfigFile();
      const lines = CONFIG_KEYS.map((name) => {
        const current = config[name];
        return current !== undefined
          ? `${name}: ${current}`
          : chalk.dim(`${name}: ${DEFAULTS[name]} (default)`);
      });
      return [...lines, chalk.dim(`\nConfig file: ${getConfigPath()}`)];
    }

    case 'path':
      return [getConfigPath()];
  }
}

const command: Command<ConfigArgs> = {
  command: 'config <action> [key] [value]',
  describe: 'Manage persistent settings (model, ankiConnectUrl, prompt)',

  builder: (yargs) => {
    return yargs
      .positional('action', {
        describe: 'The configuration action',
        type: 'string',
        choices: ACTION_CHOICES,
        demandOption: true,
      })
      .positional('key', {
        describe: `One of: ${CONFIG_KEYS.join(', ')}`,
        type: 'string',
      })
      .positional('value', {
        describe: 'The value to store (for "set")',
        type: 'string',
      })
      .check((argv) => {
        parseKey(argv.key);
        if (argv.action === 'set' && argv.value === undefined) {
          throw new Error('The "set" action requires a key and a value.');
        }
        return true;
      })
      .example('$0 config set model gpt-4o-mini', 'Set the default model')
      .example(
        '$0 config set ankiConnectUrl http://localhost:8765',
        'Use another AnkiConnect address',
      )
      .example('$0 config unset prompt', 'Go back to the bundled style guide')
      .example('$0 config list', 'Show every setting and its default');
  },

  handler: async (argv) => {
    try {
      const lines = await runConfigAction(argv.action, argv.key, argv.value);
      for (const line of lines) {
        console.log(line);
      }
    } catch (error) {
      if (error instanceof Error) {
        console.log(chalk.red(`✗ Error: ${error.message}`));
      } else {
        console.log(chalk.red('✗ Unknown error:'), error);
      }
      process.exit(1);
    }
  },
};

export default command;
