import chalk from 'chalk';
import { diffArrays } from 'diff';

export type DiffLine = {
  kind: 'same' | 'removed' | 'added';
  text: string;
};

/**
 * Splits a field value into display lines on <br> tags and newlines.
 */
export function splitFieldLines(value: string): string[] {
  return value.split(/<br\s*\/?>|\n/i);
}

/**
 * Line diff of two field values. Removed lines are listed before the added
 * lines that replace them.
 */
export function diffLines(oldLines: string[], newLines: string[]): DiffLine[] {
  return diffArrays(oldLines, newLines).flatMap((part) => {
    const kind = part.added ? 'added' : part.removed ? 'removed' : 'same';
    return part.value.map((text): DiffLine => ({ kind, text }));
  });
}

/**
 * Colored diff of one field: removed lines red, added lines green.
 */
export function formatFieldDiff(oldValue: string, newValue: string): string[] {
  return diffLines(splitFieldLines(oldValue), splitFieldLines(newValue)).map(
    (line) => {
      switch (line.kind) {
        case 'removed':
          return chalk.red(`- ${line.text}`);
        case 'added':
          return chalk.green(`+ ${line.text}`);
        case 'same':
          return chalk.gray(`  ${line.text}`);
      }
    },
  );
}
