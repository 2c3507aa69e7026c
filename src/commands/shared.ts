import chalk from 'chalk';
import { DEFAULT_MODEL, SupportedModel, type Config } from '../config.js';
import {
  applyAnkiConnectUrl,
  readConfigFile,
  type PersistentConfig,
} from '../config-manager.js';
import { getAnkiConnectUrl } from '../anki-connect.js';
import { initLogger, logInfo } from '../fixing/logger.js';
import { errorMessage } from '../fixing/util.js';

/**
 * Reads the persistent configuration and points AnkiConnect at the
 * configured URL.
 */
export async function loadUserConfig(): Promise<PersistentConfig> {
  const userConfig = await readConfigFile();
  applyAnkiConnectUrl(userConfig);
  return userConfig;
}

/**
 * --model wins over the configured model, which wins over the default.
 */
export function resolveModel(
  argvModel: string | undefined,
  userConfig: PersistentConfig,
): string {
  return argvModel ?? userConfig.model ?? DEFAULT_MODEL;
}

export function modelOptionDescription(): string {
  return `Model to use (default: ${DEFAULT_MODEL}). Available: ${SupportedModel.options.join(', ')}`;
}

export async function setupLogger(options: {
  enabled: boolean;
  getLogFilePath: () => string;
  sessionName: string;
  veryVerbose: boolean;
}): Promise<string | null> {
  if (!options.enabled) {
    return null;
  }

  const logFilePath = options.getLogFilePath();
  await initLogger({
    path: logFilePath,
    session: options.sessionName,
    veryVerbose: options.veryVerbose,
  });
  return logFilePath;
}

export function printHeader(options: {
  title: string;
  extraLines: string[];
  logFilePath: string | null;
  config: Config;
}): void {
  const { title, extraLines, logFilePath, config } = options;

  logInfo(chalk.bold('='.repeat(60)));
  logInfo(chalk.bold(title));
  logInfo(chalk.bold('='.repeat(60)));
  for (const line of extraLines) {
    logInfo(line);
  }
  if (logFilePath) {
    logInfo(`Log file:          ${logFilePath}`);
  }
  logInfo(`Model:             ${config.model}`);
  logInfo(`Batch size:        ${config.batchSize}`);
  logInfo(`Retries:           ${config.retries}`);
  logInfo(`Temperature:       ${config.temperature}`);
  logInfo(`Max tokens:        ${config.maxTokens}`);
  logInfo(`Dry run:           ${config.dryRun}`);
  logInfo(chalk.bold('='.repeat(60)));
}

/**
 * Prints the error with a checklist for the usual AnkiConnect problems and
 * exits with code 1.
 */
export function exitWithAnkiError(error: unknown, deckName?: string): never {
  if (error instanceof Error) {
    console.log(`\n${chalk.red('✗ Error:')} ${error.message}`);
  } else {
    console.log(`\n${chalk.red('✗ Unknown error:')}`, errorMessage(error));
  }
  console.log('\nMake sure:');
  console.log('  1. Anki Desktop is running');
  console.log('  2. AnkiConnect add-on is installed (code: 2055492159)');
  console.log(`  3. AnkiConnect is reachable at ${getAnkiConnectUrl()}`);
  if (deckName) {
    console.log(`  4. Deck '${deckName}' exists`);
  }
  process.exit(1);
}
