import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { resolveConfig } from '../core/config.js';
import { DatasetDescriptor } from '../core/dataset.js';
import { RulesetError } from '../core/errors.js';
import { rulesetHierarchyTree } from '../core/hierarchy/index.js';
import { termUsage } from '../core/hierarchy/term-frequency.js';
import { datasetSchema, parseDataset, parseRuleset, rulesetSchema } from '../core/loader.js';
import { expandRuleset } from '../core/rules/ruleset.js';
import { termToString } from '../core/rules/term.js';

interface ToolResult {
  [key: string]: unknown;
  content: { type: 'text'; text: string }[];
  isError?: boolean;
}

export function createServer(): McpServer {
  const config = resolveConfig();

  const server = new McpServer({
    name: 'ruletree',
    version: '0.1.0',
  });

  // Tool: ruleset_tree
  server.tool(
    'ruleset_tree',
    'Build an annotated hierarchical tree (D3 hierarchy JSON) from a ruleset',
    {
      ruleset: rulesetSchema.describe('Ruleset document: { rules: [{ premise: [{ terms, score }], conclusion }] }'),
      merge: z.boolean().optional().describe('Collapse single-child chains into AND nodes'),
      expand: z.boolean().optional().describe('Split multi-clause rules into one rule per clause'),
      dataset: datasetSchema.optional().describe('Dataset description used to name categorical terms'),
    },
    async ({ ruleset, merge, expand, dataset }) => toolCall(() => {
      const tree = rulesetHierarchyTree(parseRuleset(ruleset), {
        dataset: dataset ? new DatasetDescriptor(parseDataset(dataset)) : undefined,
        merge: merge ?? config.merge,
        expandClauses: expand ?? config.expandClauses,
        rootName: config.rootName,
      });
      return JSON.stringify(tree, null, config.indent);
    }),
  );

  // Tool: term_frequencies
  server.tool(
    'term_frequencies',
    'Rank the terms of a ruleset by how many rules use them',
    {
      ruleset: rulesetSchema.describe('Ruleset document'),
      limit: z.number().int().min(0).optional().default(20).describe('Max terms'),
    },
    async ({ ruleset, limit }) => toolCall(() => {
      const usage = termUsage(expandRuleset(parseRuleset(ruleset)));
      return JSON.stringify(
        usage.slice(0, limit).map(u => ({ term: termToString(u.term), count: u.count })),
        null,
        config.indent,
      );
    }),
  );

  return server;
}

export async function startServer(): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

function toolCall(run: () => string): ToolResult {
  try {
    return { content: [{ type: 'text', text: run() }] };
  } catch (err) {
    if (err instanceof RulesetError) {
      return { content: [{ type: 'text', text: err.message }], isError: true };
    }
    throw err;
  }
}
