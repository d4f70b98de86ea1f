/**
 * Kill switch: emergency stop and graceful shutdown of every managed agent.
 */

import { join } from 'node:path';
import { getSubsystemLogger } from '../core/logger.js';
import { writeFileSafe } from '../utils/fs.js';
import type { MasterController } from './controller.js';
import type { MessageBus } from './message-bus.js';
import type { KilledAgent } from './types.js';

export interface KillSwitchOptions {
  /** Directory emergency-stop logs are written to */
  logDir: string;
  bus?: MessageBus;
  now?: () => number;
}

export interface EmergencyStopResult {
  killed: KilledAgent[];
  logFile: string;
}

export interface GracefulShutdownResult {
  stopped: string[];
}

export class KillSwitch {
  private readonly now: () => number;

  constructor(private readonly controller: MasterController, private readonly options: KillSwitchOptions) {
    this.now = options.now ?? Date.now;
  }

  /** SIGKILL every managed agent at once and record what was killed. */
  emergencyStop(reason = 'operator request'): EmergencyStopResult {
    const at = new Date(this.now());
    const logger = getSubsystemLogger('controller');
    logger.warn({ reason }, 'EMERGENCY STOP initiated');

    const killed = this.controller.killAll();

    const lines = [
      `Emergency stop at ${at.toISOString()}`,
      `Reason: ${reason}`,
      `Killed ${killed.length} agent(s):`,
      ...killed.map(agent => `  ${agent.name} (pid ${agent.pid ?? 'unknown'})`),
      '',
    ];
    const logFile = join(this.options.logDir, `emergency-stop-${stamp(at)}.log`);
    writeFileSafe(logFile, lines.join('\n'));

    this.options.bus?.send({
      from: 'kill-switch',
      to: '*',
      type: 'system.kill',
      payload: { mode: 'emergency', reason, killed: killed.map(agent => agent.name) },
    });
    logger.warn({ killed: killed.length, logFile }, 'Emergency stop complete');
    return { killed, logFile };
  }

  /** SIGTERM every agent, SIGKILL whatever is still alive after `timeoutMs`. */
  async gracefulShutdown(timeoutMs?: number): Promise<GracefulShutdownResult> {
    const logger = getSubsystemLogger('controller');
    logger.info({ timeoutMs }, 'Graceful shutdown initiated');

    const stopped = await this.controller.stopAll(timeoutMs);

    this.options.bus?.send({
      from: 'kill-switch',
      to: '*',
      type: 'system.kill',
      payload: { mode: 'graceful', stopped },
    });
    logger.info({ stopped: stopped.length }, 'Graceful shutdown complete');
    return { stopped };
  }
}

/** `YYYYMMDD-HHMMSS` in UTC */
function stamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}-${iso.slice(11, 19).replace(/:/g, '')}`;
}
