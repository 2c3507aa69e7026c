import { spawn, type ChildProcess, type SpawnOptions } from 'child_process';
import { access } from 'fs/promises';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { parseWordList } from '../fixing/selector.js';
import type { CurrentCardInfo } from '../types.js';
import { deriveWordList, extractFrontText } from './front-text.js';

export class LauncherError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LauncherError';
  }
}

export interface LauncherPaths {
  interpreter: string;
  script: string;
}

export type Spawner = (
  command: string,
  args: string[],
  options: SpawnOptions,
) => ChildProcess;

export interface LaunchCommand {
  command: string;
  args: string[];
  cwd: string;
}

/**
 * Interpreter and CLI script used to start the fixer. Both can be pointed
 * elsewhere through CARD_FIXER_INTERPRETER and CARD_FIXER_SCRIPT.
 */
export function resolveLauncherPaths(
  env: NodeJS.ProcessEnv = process.env,
): LauncherPaths {
  return {
    interpreter: env.CARD_FIXER_INTERPRETER || process.execPath,
    script: path.resolve(
      env.CARD_FIXER_SCRIPT ||
        fileURLToPath(new URL('../cli.js', import.meta.url)),
    ),
  };
}

export function buildLaunchCommand(
  paths: LauncherPaths,
  deckName: string,
  wordList: string,
): LaunchCommand {
  return {
    command: paths.interpreter,
    args: [
      paths.script,
      'fix',
      '--deck',
      deckName,
      '--no-backup',
      '--word-list',
      wordList,
    ],
    cwd: path.dirname(paths.script),
  };
}

export interface LaunchPlan {
  frontText: string;
  wordList: string;
  launch: LaunchCommand;
}

/**
 * Works out the fixer command for the card on screen. A front without
 * searchable text (an image-only card, say) is refused, since an empty
 * word list would select nothing useful.
 */
export function planLaunch(
  card: CurrentCardInfo,
  paths: LauncherPaths,
): LaunchPlan {
  const frontText = extractFrontText(card);
  const wordList = deriveWordList(frontText);
  if (parseWordList(wordList).length === 0) {
    throw new LauncherError(
      `Could not extract front text from card ${card.cardId}`,
    );
  }
  return {
    frontText,
    wordList,
    launch: buildLaunchCommand(paths, card.deckName, wordList),
  };
}

/**
 * Runs the fixer in a child process attached to this terminal and resolves
 * to its exit code.
 */
export async function launchFixer(
  launch: LaunchCommand,
  spawnProcess: Spawner = spawn,
): Promise<number> {
  const [script] = launch.args;
  if (script) {
    try {
      await access(script);
    } catch {
      throw new LauncherError(`Fixer script not found: ${script}`);
    }
  }

  return await new Promise<number>((resolve, reject) => {
    const child = spawnProcess(launch.command, launch.args, {
      cwd: launch.cwd,
      env: process.env,
      stdio: 'inherit',
    });

    child.on('error', (error) => {
      reject(
        new LauncherError(
          `Could not start ${launch.command}: ${error.message}`,
        ),
      );
    });
    child.on('close', (code) => {
      resolve(code ?? 1);
    });
  });
}
