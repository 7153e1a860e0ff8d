import chalk from 'chalk';
import { SequenceError } from '../errors.js';

/**
 * Wrap a CLI command handler with centralized error handling.
 * Anything that escapes the handler is printed to stderr and ends the process with status 1.
 */
export function withErrorHandler<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (err) {
      if (err instanceof SequenceError) {
        console.error(chalk.red(`✗ ${err.message}`));
        if (err.hint) {
          console.error(chalk.dim(`  ${err.hint}`));
        }
      } else if (err instanceof Error) {
        console.error(chalk.red(`✗ ${err.message}`));
      } else {
        console.error(chalk.red('✗ An unexpected error occurred'));
      }
      process.exit(1);
    }
  };
}
