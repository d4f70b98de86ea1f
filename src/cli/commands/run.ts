/**
 * `uplift run <agentDir>`: start a runtime, launch one agent and exit with it.
 * Other agents in the agents directory stay registered so delegation works.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { AgentProcessError } from '../../core/errors.js';
import { findManifestFile, loadManifest } from '../../manifest/loader.js';
import { Runtime } from '../../runtime/runtime.js';
import { formatDuration } from '../../utils/timer.js';
import { configureLogging, loadConfig } from '../context.js';
import { parsePort } from './serve.js';

interface RunOptions {
  dir: string;
  port?: number;
  verbose?: boolean;
}

export function createRunCommand(): Command {
  const cmd = new Command('run');

  cmd
    .description('Run a single agent under a temporary runtime')
    .argument('<agentDir>', 'Directory containing manifest.yaml or agent.yaml')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('-p, --port <port>', 'Gateway port (0 picks a free one)', parsePort)
    .option('-v, --verbose', 'Pretty logs on the terminal')
    .action(async (agentDir: string, options: RunOptions) => {
      process.exitCode = await runAgent(agentDir, options);
    });

  return cmd;
}

async function runAgent(agentDir: string, options: RunOptions): Promise<number> {
  const manifestPath = findManifestFile(resolve(agentDir));
  if (!manifestPath) {
    throw new Error(`No manifest.yaml or agent.yaml in ${resolve(agentDir)}`);
  }
  const { manifest } = loadManifest(manifestPath);

  const config = loadConfig(options, {
    runtime: options.port !== undefined ? { port: options.port } : {},
    agents: { autoStart: false, restartOnFailure: false },
  });
  configureLogging(config, options.verbose);

  const runtime = new Runtime({ config });
  const started = Date.now();
  try {
    await runtime.start();
    runtime.controller.registerAgent(manifest, manifestPath);

    console.log(`\n▶️  Running ${manifest.name} (${manifest.id})`);
    const exited = waitForAgentExit(runtime, manifest.id);
    if (!runtime.controller.startAgent(manifest.id)) {
      const record = runtime.controller.getAgent(manifest.id);
      throw new AgentProcessError(record?.lastError ?? 'Agent failed to start', manifest.id);
    }

    const exitCode = await exited;
    const icon = exitCode === 0 ? '✅' : '❌';
    console.log(`${icon} ${manifest.id} exited with code ${exitCode} after ${formatDuration(Date.now() - started)}\n`);
    return exitCode;
  } finally {
    await runtime.stop();
  }
}

function waitForAgentExit(runtime: Runtime, agentId: string): Promise<number> {
  return new Promise(resolve => {
    const onStatus = (event: { agent: string; status: string }) => {
      if (event.agent !== agentId || (event.status !== 'stopped' && event.status !== 'failed')) return;
      runtime.controller.off('agent:status', onStatus);
      const record = runtime.controller.getAgent(agentId);
      resolve(record?.exitCode ?? (event.status === 'failed' ? 1 : 0));
    };
    runtime.controller.on('agent:status', onStatus);
  });
}
