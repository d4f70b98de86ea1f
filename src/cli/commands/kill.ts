/**
 * `uplift kill`: the kill switch, through the operator API.
 */

import { Command } from 'commander';
import { createInterface } from 'readline/promises';
import { loadConfig, operatorClient, type ProjectOptions } from '../context.js';

interface KillOptions extends ProjectOptions {
  emergency?: boolean;
  graceful?: boolean;
  yes?: boolean;
  reason?: string;
}

export function createKillCommand(): Command {
  const cmd = new Command('kill');

  cmd
    .description('Stop every agent: --graceful (SIGTERM, then SIGKILL) or --emergency (SIGKILL now)')
    .option('--emergency', 'Kill all agents immediately')
    .option('--graceful', 'Ask agents to stop, kill the ones that do not')
    .option('-y, --yes', 'Skip the emergency confirmation')
    .option('--reason <text>', 'Recorded in the emergency log')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .action(async (options: KillOptions) => {
      await kill(options);
    });

  return cmd;
}

async function kill(options: KillOptions): Promise<void> {
  if (options.emergency === options.graceful) {
    throw new Error('Pass exactly one of --emergency or --graceful');
  }
  const client = operatorClient(loadConfig(options));

  if (options.emergency) {
    if (!options.yes && !(await confirm('⚠️  EMERGENCY STOP kills every agent immediately. Continue? [y/N] '))) {
      console.log('Aborted.');
      return;
    }
    const result = await client.kill('emergency', options.reason);
    if (result.mode === 'emergency') {
      console.log(`\n🛑 Killed ${result.killed.length} agent(s). Log: ${result.log_file}\n`);
    }
    return;
  }

  const result = await client.kill('graceful', options.reason);
  if (result.mode === 'graceful') {
    console.log(`\n⏹  Stopped ${result.stopped.length} agent(s)\n`);
  }
}

async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(question);
    return answer.trim().toLowerCase() === 'y' || answer.trim().toLowerCase() === 'yes';
  } finally {
    rl.close();
  }
}
