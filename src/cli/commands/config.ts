import { Command } from 'commander';
import chalk from 'chalk';
import { getConfigPath, parseSetting, resolveConfig, saveConfig } from '../../core/config.js';
import type { RuletreeConfig } from '../../core/types.js';
import { reportError } from '../report.js';

interface ConfigOptions {
  set: string[];
}

export function configCommand(): Command {
  return new Command('config')
    .description('Show or change the saved defaults')
    .option('-s, --set <key=value...>', 'Save a setting (merge, expandClauses, rootName, format, indent)', [])
    .action(async (options: ConfigOptions) => {
      try {
        if (options.set.length > 0) {
          const update: Partial<RuletreeConfig> = {};
          for (const pair of options.set) {
            Object.assign(update, parseSetting(pair));
          }
          saveConfig(update);
          console.log(chalk.green('✓') + ` Saved ${getConfigPath()}`);
        }

        const config = resolveConfig();
        console.log(chalk.bold('Current configuration:\n'));
        for (const [key, value] of Object.entries(config)) {
          console.log(`  ${key.padEnd(14)} ${chalk.cyan(String(value))}`);
        }
      } catch (err) {
        reportError(err);
      }
    });
}
