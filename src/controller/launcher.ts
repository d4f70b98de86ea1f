/**
 * Spawns agent entrypoints as child processes. Agent stdout/stderr lines are
 * forwarded to the controller log.
 */

import { spawn, type ChildProcess } from 'child_process';
import { createInterface } from 'readline';
import type { Readable } from 'stream';
import { AgentProcessError } from '../core/errors.js';
import { getSubsystemLogger } from '../core/logger.js';
import type { AgentProcess, ExitListener, LaunchSpec, ProcessLauncher } from './types.js';

export class ChildProcessLauncher implements ProcessLauncher {
  launch(spec: LaunchSpec): AgentProcess {
    const child = spawn(spec.command, spec.args, {
      cwd: spec.cwd,
      env: { ...process.env, ...spec.env },
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    if (child.pid === undefined) {
      // Spawn failures surface asynchronously as 'error'; absorb it here
      child.once('error', () => undefined);
      throw new AgentProcessError(
        `Failed to start "${spec.command}" for agent ${spec.agentId}`,
        spec.agentId,
      );
    }

    return new ChildAgentProcess(spec.agentId, child);
  }
}

class ChildAgentProcess implements AgentProcess {
  private exited = false;
  private listeners: ExitListener[] = [];

  constructor(agentId: string, private readonly child: ChildProcess) {
    const logger = getSubsystemLogger('controller').child({ agent: agentId, pid: child.pid });
    forwardLines(child.stdout, line => logger.info({ stream: 'stdout' }, line));
    forwardLines(child.stderr, line => logger.warn({ stream: 'stderr' }, line));

    child.on('error', err => {
      logger.error({ err }, 'Agent process error');
    });
    child.once('exit', (code, signal) => {
      this.exited = true;
      for (const listener of this.listeners) listener(code, signal);
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  isAlive(): boolean {
    return !this.exited && this.child.exitCode === null && this.child.signalCode === null;
  }

  kill(signal: NodeJS.Signals): boolean {
    if (!this.isAlive()) return false;
    return this.child.kill(signal);
  }

  onExit(listener: ExitListener): void {
    this.listeners.push(listener);
  }
}

function forwardLines(stream: Readable | null, write: (line: string) => void): void {
  if (!stream) return;
  const lines = createInterface({ input: stream });
  lines.on('line', line => {
    if (line.trim()) write(line);
  });
}
