import { Command } from 'commander';
import { treeCommand } from './commands/tree.js';
import { termsCommand } from './commands/terms.js';
import { configCommand } from './commands/config.js';
import { serveCommand } from './commands/serve.js';

const program = new Command();

program
  .name('ruletree')
  .description('Turn rule-based classifiers into hierarchical trees for visualization')
  .version('0.1.0');

program.addCommand(treeCommand());
program.addCommand(termsCommand());
program.addCommand(configCommand());
program.addCommand(serveCommand());

program.parse();
