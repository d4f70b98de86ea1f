import type { UpliftConfig } from '../core/types.js';
import type { AgentManifest } from '../manifest/types.js';

export type AgentStatus = 'stopped' | 'starting' | 'running' | 'stopping' | 'failed' | 'unknown';

export interface AgentRecord {
  /** Manifest id */
  name: string;
  manifest: AgentManifest;
  manifestPath: string;
  directory: string;
  status: AgentStatus;
  pid: number | null;
  restartCount: number;
  lastHealthCheck: number | null;
  startedAt: number | null;
  exitCode: number | null;
  lastError: string | null;
}

export interface LaunchSpec {
  agentId: string;
  command: string;
  args: string[];
  cwd: string;
  env: Record<string, string>;
}

export type ExitListener = (code: number | null, signal: NodeJS.Signals | null) => void;

/** Handle on a launched agent process. */
export interface AgentProcess {
  readonly pid: number | undefined;
  isAlive(): boolean;
  kill(signal: NodeJS.Signals): boolean;
  onExit(listener: ExitListener): void;
}

export interface ProcessLauncher {
  launch(spec: LaunchSpec): AgentProcess;
}

export type ControllerConfig = UpliftConfig['agents'];

export interface HealthReport {
  checked: number;
  failed: string[];
  restarted: string[];
}

export interface KilledAgent {
  name: string;
  pid: number | null;
}
