import chalk from 'chalk';
import { RulesetError } from '../core/errors.js';

export function reportError(err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  console.error(chalk.red(`✗ ${message}`));

  // Input errors are expected; anything else gets a stack on request
  if (err instanceof Error && !(err instanceof RulesetError) && process.env.RULETREE_DEBUG) {
    console.error(err.stack);
  }
  process.exitCode = 1;
}
