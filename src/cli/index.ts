/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { createInitCommand } from './commands/init.js';
import { createServeCommand } from './commands/serve.js';
import { createRunCommand } from './commands/run.js';
import { createAgentsCommand } from './commands/agents.js';
import { createApprovalsCommand } from './commands/approvals.js';
import { createMemoryCommand } from './commands/memory.js';
import { createKillCommand } from './commands/kill.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('UPLIFT: runtime for permissioned, long-lived agents');

  program.addCommand(createInitCommand());
  program.addCommand(createServeCommand());
  program.addCommand(createRunCommand());
  program.addCommand(createAgentsCommand());
  program.addCommand(createApprovalsCommand());
  program.addCommand(createMemoryCommand());
  program.addCommand(createKillCommand());

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`\n❌ ${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exit(1);
  }
}
