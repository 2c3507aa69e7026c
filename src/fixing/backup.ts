import * as path from 'path';
import chalk from 'chalk';
import type { CardStore } from '../types.js';
import { logDebug, logInfoTee } from './logger.js';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as YYYYMMDD_HHMMSS.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * "Svenska::Ord" at 2025-03-04 05:06:07 -> "Svenska_Ord_backup_20250304_050607.apkg"
 */
export function backupFileName(deckName: string, date: Date): string {
  const safeName = deckName.replace(/::|[\\/:*?"<>|]/g, '_');
  return `${safeName}_backup_${formatTimestamp(date)}.apkg`;
}

/**
 * Exports the deck to an .apkg in `directory` before any note is touched.
 * Errors propagate: a run without its requested backup must not continue.
 *
 * @returns the absolute path of the backup
 */
export async function createBackup(
  store: CardStore,
  deckName: string,
  directory: string = process.cwd(),
  now: Date = new Date(),
): Promise<string> {
  const backupPath = path.resolve(directory, backupFileName(deckName, now));
  await logInfoTee(
    `${chalk.cyan('Creating backup')} of '${deckName}' at ${backupPath}...`,
  );
  const startTime = Date.now();
  await store.exportDeck(deckName, backupPath);
  const seconds = ((Date.now() - startTime) / 1000).toFixed(2);
  await logInfoTee(chalk.green(`✓ Backup created in ${seconds}s`));
  await logDebug(`Backup path: ${backupPath}`);
  return backupPath;
}
