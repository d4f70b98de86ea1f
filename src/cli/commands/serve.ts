/**
 * `uplift serve`: run the runtime until interrupted.
 */

import { Command } from 'commander';
import { adminKeyPath } from '../../runtime/admin-key.js';
import { Runtime } from '../../runtime/runtime.js';
import { VERSION } from '../../version.js';
import { configureLogging, loadConfig } from '../context.js';

interface ServeOptions {
  dir: string;
  host?: string;
  port?: number;
  autoStart?: boolean;
  foreground?: boolean;
  verbose?: boolean;
}

export function createServeCommand(): Command {
  const cmd = new Command('serve');

  cmd
    .description('Start the runtime: gateway API, agent supervision and approvals')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--host <host>', 'Bind address')
    .option('-p, --port <port>', 'Port', parsePort)
    .option('--auto-start', 'Start every discovered agent')
    .option('--foreground', 'Stay attached to the terminal (serve always runs in the foreground)')
    .option('-v, --verbose', 'Pretty logs on the terminal')
    .action(async (options: ServeOptions) => {
      await serve(options);
    });

  return cmd;
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port: ${value}`);
  }
  return port;
}

async function serve(options: ServeOptions): Promise<void> {
  const config = loadConfig(options, {
    runtime: {
      ...(options.host ? { host: options.host } : {}),
      ...(options.port !== undefined ? { port: options.port } : {}),
    },
    agents: options.autoStart ? { autoStart: true } : {},
  });
  configureLogging(config, options.verbose);

  const runtime = new Runtime({ config });
  const url = await runtime.start();

  console.log();
  console.log(`🚀 UPLIFT runtime v${VERSION} listening on ${url}`);
  console.log(`   Agents: ${runtime.controller.listAgentRecords().length} registered from ${config.agents.directory}`);
  if (!config.runtime.adminKey) {
    console.log(`   Operator key: ${adminKeyPath(config.runtime.dataDir)}`);
  }
  console.log('   Press Ctrl+C to stop');
  console.log();

  await waitForSignal();
  console.log('\n⏹  Shutting down...');
  await runtime.stop();
}

function waitForSignal(): Promise<NodeJS.Signals> {
  return new Promise(resolve => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}
