import { writeFile, appendFile } from 'fs/promises';
import chalk from 'chalk';
import type { BatchInfo } from './types.js';
import { stripAnsi } from './util.js';

interface LogSink {
  path: string;
  // Also record raw model replies
  veryVerbose: boolean;
}

let sink: LogSink | null = null;

/**
 * Starts a fresh log file for a run and writes its banner. Until this is
 * called, file logging is a no-op.
 */
export async function initLogger(options: {
  path: string;
  session: string;
  veryVerbose: boolean;
}): Promise<void> {
  sink = { path: options.path, veryVerbose: options.veryVerbose };
  await writeFile(sink.path, '', 'utf-8');

  const rule = '='.repeat(60);
  await logDebug(rule);
  await logDebug(`${options.session} - Session Started`);
  await logDebug(rule);
  if (options.veryVerbose) {
    await logDebug('Very verbose mode enabled - model replies are logged');
  }
}

/**
 * File only, timestamped, without color codes.
 */
export async function logDebug(message: string): Promise<void> {
  if (!sink) return;

  const entry = `[${new Date().toISOString()}] ${stripAnsi(message)}\n`;
  try {
    await appendFile(sink.path, entry, 'utf-8');
  } catch (error) {
    // A broken log file must not abort a run that is writing to Anki
    const reason = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`Failed to write to log file: ${reason}`));
  }
}

export function logInfo(message: string): void {
  console.log(message);
}

/**
 * Console and log file. Surrounding newlines only reach the console.
 */
export async function logInfoTee(message: string): Promise<void> {
  logInfo(message);
  const trimmed = message.trim();
  if (trimmed) {
    await logDebug(trimmed);
  }
}

export async function logBatch(
  batch: BatchInfo,
  message: string,
): Promise<void> {
  await logDebug(`[batch ${batch.number}/${batch.total}] ${message}`);
}

export async function logWarn(message: string): Promise<void> {
  console.log(chalk.yellow(`⚠️  ${message}`));
  await logDebug(`WARN: ${message}`);
}

export async function logError(
  message: string,
  error?: unknown,
): Promise<void> {
  console.error(chalk.red(`\n✗ Error: ${message}`));
  if (error === undefined) {
    await logDebug(`ERROR: ${message}`);
    return;
  }
  const details = error instanceof Error ? error.message : String(error);
  console.error(chalk.gray(`  ${details}`));
  await logDebug(`ERROR: ${message}. Details: ${details}`);
}

/**
 * Raw model traffic, written only with --very-verbose.
 */
export async function logVerbose(message: string): Promise<void> {
  if (!sink?.veryVerbose) return;
  await logDebug(`[VERBOSE] ${message}`);
}
