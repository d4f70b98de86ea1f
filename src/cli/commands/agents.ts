/**
 * `uplift agents`: agent supervision through the operator API.
 * `agents list`           registered agents and their status
 * `agents start <name>`   launch an agent
 * `agents stop <name>`    stop an agent
 */

import { Command } from 'commander';
import type { AgentInfo } from '../../client/schemas.js';
import { discoverManifests } from '../../manifest/loader.js';
import { formatTimestamp, loadConfig, operatorClient, type ProjectOptions } from '../context.js';

export function createAgentsCommand(): Command {
  const cmd = new Command('agents');

  cmd.description('List, start and stop agents');

  cmd
    .command('list')
    .description('List agents (from the runtime, or the agents directory when it is not running)')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--json', 'Output as JSON')
    .action(async (options: ProjectOptions & { json?: boolean }) => {
      await listAgents(options);
    });

  cmd
    .command('start <name>')
    .description('Start an agent')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .action(async (name: string, options: ProjectOptions) => {
      const result = await operatorClient(loadConfig(options)).startAgent(name);
      const ok = result.started === true;
      console.log(`${ok ? '✅' : '❌'} ${name}: ${result.agent.status}${ok ? '' : ` (${result.agent.last_error ?? 'unknown error'})`}`);
    });

  cmd
    .command('stop <name>')
    .description('Stop an agent')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .action(async (name: string, options: ProjectOptions) => {
      const result = await operatorClient(loadConfig(options)).stopAgent(name);
      console.log(result.stopped ? `⏹  ${name} stopped` : `ℹ️  ${name} was not running`);
    });

  return cmd;
}

async function listAgents(options: ProjectOptions & { json?: boolean }): Promise<void> {
  const config = loadConfig(options);
  const client = operatorClient(config);

  if (await client.isReachable()) {
    const agents = await client.listAgents();
    if (options.json) {
      console.log(JSON.stringify(agents, null, 2));
      return;
    }
    printAgents(agents);
    return;
  }

  const { agents, issues } = discoverManifests(config.agents.directory);
  if (options.json) {
    console.log(JSON.stringify({ agents: agents.map(a => a.manifest), issues }, null, 2));
    return;
  }

  console.log();
  console.log(`🤖 Agents in ${config.agents.directory} (runtime not running)`);
  console.log('─'.repeat(60));
  for (const { manifest } of agents) {
    console.log(`  ${manifest.id.padEnd(24)} v${manifest.version.padEnd(8)} priority ${manifest.priority}`);
    if (manifest.description) console.log(`     ${manifest.description}`);
  }
  for (const issue of issues) {
    console.log(`  ⚠️  ${issue.path}: ${issue.message}`);
  }
  console.log();
  console.log(`Total: ${agents.length} agents`);
  console.log();
}

function printAgents(agents: AgentInfo[]): void {
  const icons: Record<string, string> = {
    running: '🟢',
    starting: '🟡',
    stopping: '🟡',
    stopped: '⚪',
    failed: '🔴',
  };

  console.log();
  console.log('🤖 Agents');
  console.log('─'.repeat(60));
  for (const agent of agents) {
    const icon = icons[agent.status] ?? '❓';
    console.log(`  ${icon} ${agent.name.padEnd(24)} ${agent.status.padEnd(9)} pid ${agent.pid ?? '-'}`);
    console.log(`     started ${formatTimestamp(agent.started_at)} | restarts ${agent.restart_count}`);
    if (agent.last_error) console.log(`     last error: ${agent.last_error}`);
  }
  console.log();
  console.log(`Total: ${agents.length} agents`);
  console.log();
}
