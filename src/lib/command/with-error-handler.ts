import chalk from 'chalk';
import { SequencerError, isConfigError } from '../errors.js';
import { debug } from '../utils/debug.js';

/**
 * Wrap a CLI command handler with centralized error handling.
 * Catches all errors and prints user-friendly output.
 */
export function withErrorHandler<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (err) {
      if (err instanceof SequencerError) {
        // Formatted validation messages already carry their own markers
        const text = err.message.startsWith('✗') ? err.message : `✗ ${err.message}`;
        console.error(chalk.red(text));
        if (err.hint) {
          console.error(chalk.dim(`  ${err.hint}`));
        }
        debug('cli', `${err.code}${isConfigError(err) ? ' (configuration)' : ''}`);
      } else if (err instanceof Error) {
        console.error(chalk.red(`✗ ${err.message}`));
        debug('cli', err.stack);
      } else {
        console.error(chalk.red('✗ An unexpected error occurred'));
      }
      process.exit(1);
    }
  };
}
