import { Command } from 'commander';
import chalk from 'chalk';
import { DatasetDescriptor } from '../../core/dataset.js';
import { termUsage } from '../../core/hierarchy/term-frequency.js';
import { loadDataset, loadRuleset } from '../../core/loader.js';
import { expandRuleset } from '../../core/rules/ruleset.js';
import { RulesetError } from '../../core/errors.js';
import { termToString } from '../../core/rules/term.js';
import { reportError } from '../report.js';

interface TermsOptions {
  limit: string;
  dataset?: string;
}

export function termsCommand(): Command {
  return new Command('terms')
    .description('List the terms of a ruleset ranked by how many rules use them')
    .argument('<file>', 'Ruleset JSON file')
    .option('-l, --limit <number>', 'Show at most this many terms', '20')
    .option('-d, --dataset <file>', 'Dataset description used to name categorical terms')
    .action(async (file: string, options: TermsOptions) => {
      try {
        const ruleset = expandRuleset(loadRuleset(file));
        const dataset = options.dataset
          ? new DatasetDescriptor(loadDataset(options.dataset))
          : undefined;
        const limit = parseLimit(options.limit);
        const usage = termUsage(ruleset);

        if (usage.length === 0) {
          console.log(chalk.yellow('No terms found in ruleset.'));
          return;
        }

        console.log(chalk.bold(`${usage.length} distinct terms across ${ruleset.rules.length} rules:\n`));

        for (const { term, count } of usage.slice(0, limit)) {
          const label = dataset ? dataset.formatTerm(term) : termToString(term);
          const share = Math.round((count / ruleset.rules.length) * 100);
          console.log(`  ${chalk.cyan(String(count).padStart(4))}  ${label} ${chalk.dim(`(${share}%)`)}`);
        }
      } catch (err) {
        reportError(err);
      }
    });
}

/**
 * `--limit` must be a whole number of zero or more.
 */
export function parseLimit(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new RulesetError('INVALID_CONFIG', `--limit must be a non-negative integer, got "${value}"`);
  }
  return Number(trimmed);
}
