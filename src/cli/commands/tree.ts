import { Command } from 'commander';
import { writeFileSync } from 'node:fs';
import chalk from 'chalk';
import { resolveConfig } from '../../core/config.js';
import { DatasetDescriptor } from '../../core/dataset.js';
import { rulesetHierarchyTree } from '../../core/hierarchy/index.js';
import { loadDataset, loadRuleset } from '../../core/loader.js';
import { renderTextTree, treeStats } from '../../core/render.js';
import { reportError } from '../report.js';

interface TreeOptions {
  merge?: boolean;
  expand?: boolean;
  dataset?: string;
  root?: string;
  format?: string;
  out?: string;
}

export function treeCommand(): Command {
  return new Command('tree')
    .description('Build the hierarchical tree for a ruleset')
    .argument('<file>', 'Ruleset JSON file')
    .option('-m, --merge', 'Collapse single-child chains into AND nodes')
    .option('-e, --expand', 'Split multi-clause rules into one rule per clause')
    .option('-d, --dataset <file>', 'Dataset description used to name categorical terms')
    .option('-r, --root <name>', 'Name of the root node')
    .option('-f, --format <format>', 'Output format (json|text)')
    .option('-o, --out <file>', 'Write the tree to a file instead of stdout')
    .action(async (file: string, options: TreeOptions) => {
      try {
        const config = resolveConfig();
        const format = options.format ?? config.format;
        if (format !== 'json' && format !== 'text') {
          throw new Error(`Unknown format "${format}" (expected json or text)`);
        }

        const ruleset = loadRuleset(file);
        const dataset = options.dataset
          ? new DatasetDescriptor(loadDataset(options.dataset))
          : undefined;

        const tree = rulesetHierarchyTree(ruleset, {
          dataset,
          merge: options.merge ?? config.merge,
          expandClauses: options.expand ?? config.expandClauses,
          rootName: options.root ?? config.rootName,
        });

        const output = format === 'json'
          ? JSON.stringify(tree, null, config.indent)
          : renderTextTree(tree);

        if (!options.out) {
          console.log(output);
          return;
        }

        writeFileSync(options.out, output + '\n', 'utf-8');

        const stats = treeStats(tree);
        console.log(chalk.green('✓') + ` Wrote ${options.out}`);
        console.log(`  Rules:     ${ruleset.rules.length}`);
        console.log(`  Nodes:     ${stats.nodes}`);
        console.log(`  Leaves:    ${stats.leaves}`);
        console.log(`  Splits:    ${stats.splits}`);
        console.log(`  Max depth: ${stats.maxDepth}`);
      } catch (err) {
        reportError(err);
      }
    });
}
