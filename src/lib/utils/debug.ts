import chalk from 'chalk';

/** Debug logger gated by SEQPRINT_DEBUG env var */
export function debug(namespace: string, ...args: unknown[]): void {
  const filter = process.env.SEQPRINT_DEBUG ?? '';
  if (!filter) return;
  if (filter === '*' || namespace.startsWith(filter.replace('*', ''))) {
    console.error(chalk.dim(`[DEBUG] [${namespace}]`), ...args);
  }
}
