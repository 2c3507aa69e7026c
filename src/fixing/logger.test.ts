import { describe, it, expect, vi } from 'vitest';
import { mkdtemp, readFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import chalk from 'chalk';
import { initLogger, logBatch, logInfoTee, logVerbose } from './logger.js';

describe('logger', () => {
  it('writes a banner and uncolored, timestamped entries', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const dir = await mkdtemp(path.join(tmpdir(), 'logger-test-'));
    const logPath = path.join(dir, 'svenska-fix.log');

    await initLogger({ path: logPath, session: 'Card Fixing', veryVerbose: false });
    await logInfoTee(`\n${chalk.green('✓ Found 3 cards')}\n`);
    await logBatch({ number: 2, total: 5 }, 'review decision skip');
    await logVerbose('raw reply');

    const lines = (await readFile(logPath, 'utf-8'))
      .trimEnd()
      .split('\n')
      .map((line) => line.replace(/^\[[^\]]+\] /, ''));
    expect(lines).toEqual([
      '='.repeat(60),
      'Card Fixing - Session Started',
      '='.repeat(60),
      '✓ Found 3 cards',
      '[batch 2/5] review decision skip',
    ]);
  });
});
