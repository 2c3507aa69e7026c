import type { CommandModule } from 'yargs';

/**
 * A card-fixer subcommand. Each file under commands/ default-exports one,
 * typed with the arguments its builder declares.
 */
export type Command<T = object> = CommandModule<object, T>;
