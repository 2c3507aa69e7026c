/**
 * Removes ANSI escape codes (used for colors) from a string.
 */
export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}

/**
 * Rejects with `errorMessage` when `promise` has not settled after
 * `timeoutMs`. The timer is cleared either way so it never keeps the
 * process alive.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  errorMessage: string,
  onTimeout?: () => void,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      onTimeout?.();
      reject(new Error(errorMessage));
    }, timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Slugifies a deck name for use in filenames ("Svenska::Ord" -> "ord").
 */
export function slugifyDeckName(deckName: string): string {
  const parts = deckName.split('::');
  const lastPart = parts[parts.length - 1] ?? deckName;
  const slug = lastPart
    .toLowerCase()
    .trim()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^a-z0-9\s-]/g, '')
    .replace(/[\s-]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'deck';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
