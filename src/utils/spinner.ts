import chalk from 'chalk';
import readline from 'node:readline';

const frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

/**
 * Terminal spinner with an elapsed-seconds counter. Falls back to plain
 * lines when stdout is not a TTY.
 */
export class Spinner {
  private frameIndex = 0;
  private intervalId?: NodeJS.Timeout;
  private text = '';
  private startedAt = 0;
  private isActive = false;
  private readonly isEnabled = Boolean(process.stdout.isTTY);

  start(text: string): void {
    if (this.isActive) {
      this.stop();
    }
    this.text = text;
    this.startedAt = Date.now();
    this.isActive = true;

    if (!this.isEnabled) {
      console.log(chalk.cyan(`… ${text}`));
      return;
    }

    this.intervalId = setInterval(() => this.renderFrame(), 80);
    this.renderFrame(true);
  }

  succeed(message?: string): void {
    this.stopWith(chalk.green('✓'), message);
  }

  fail(message?: string): void {
    this.stopWith(chalk.red('✗'), message);
  }

  stop(message?: string): void {
    this.stopWith(' ', message);
  }

  private elapsed(): string {
    return `${Math.floor((Date.now() - this.startedAt) / 1000)}s`;
  }

  private renderFrame(force = false): void {
    if (!this.isEnabled || !this.isActive) {
      return;
    }

    if (!force) {
      this.frameIndex = (this.frameIndex + 1) % frames.length;
    }

    let output = `${frames[this.frameIndex]} ${this.text} ${chalk.gray(this.elapsed())}`;
    const columns = process.stdout.columns;
    if (columns && columns > 1 && output.length >= columns) {
      output = output.slice(0, columns - 1);
    }

    this.clearLine();
    process.stdout.write(chalk.cyan(output));
  }

  private stopWith(symbol: string, message?: string): void {
    if (!this.isActive) {
      return;
    }

    this.isActive = false;
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
    }

    this.clearLine();
    console.log(`${symbol} ${message ?? this.text} ${chalk.gray(`(${this.elapsed()})`)}`);
  }

  private clearLine(): void {
    if (!this.isEnabled) {
      return;
    }
    readline.cursorTo(process.stdout, 0);
    readline.clearLine(process.stdout, 1);
  }
}

/**
 * Runs `task` behind a spinner, marking it failed if the task throws.
 */
export async function withSpinner<T>(
  text: string,
  task: () => Promise<T>,
): Promise<T> {
  const spinner = new Spinner();
  spinner.start(text);
  try {
    const result = await task();
    spinner.succeed();
    return result;
  } catch (error) {
    spinner.fail();
    throw error;
  }
}
