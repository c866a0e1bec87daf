import { Command } from 'commander';
import chalk from 'chalk';

export function serveCommand(): Command {
  return new Command('serve')
    .description('Start the MCP server')
    .action(async () => {
      // stdout belongs to the protocol once the server is up
      console.error(chalk.bold('Starting MCP server...'));
      console.error(`  Transport: stdio\n`);

      // Dynamic import to avoid loading MCP deps when not needed
      const { startServer } = await import('../../mcp/server.js');
      await startServer();
    });
}
