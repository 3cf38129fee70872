import chalk from 'chalk';

/** Print `Error: <message>` to stderr and exit with status 1. */
export function exitWithError(err: unknown): never {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(`${chalk.red('Error:')} ${msg}\n`);
  process.exit(1);
}
