/**
 * MasterController: agent process supervision.
 *
 * Keeps the registry of known agents (discovered from manifests), launches
 * their entrypoints with a fresh session token, watches for exits, restarts
 * failed agents from the periodic health check, and submits tasks on the
 * operator's behalf through the orchestration gateway.
 */

import { EventEmitter } from 'node:events';
import { dirname } from 'node:path';
import { InvalidStateError, NotFoundError, toError } from '../core/errors.js';
import { getSubsystemLogger } from '../core/logger.js';
import { discoverManifests } from '../manifest/loader.js';
import type { AgentManifest, DiscoveryResult } from '../manifest/types.js';
import { operatorPrincipal } from '../memory/access.js';
import type { OrchestrationGateway } from '../orchestration/gateway.js';
import type { AgentDirectory, DirectoryEntry, Task, TaskPriority } from '../orchestration/types.js';
import type { SessionRegistry } from '../sessions/session-registry.js';
import { ChildProcessLauncher } from './launcher.js';
import type { MessageBus } from './message-bus.js';
import type {
  AgentProcess,
  AgentRecord,
  AgentStatus,
  ControllerConfig,
  HealthReport,
  KilledAgent,
  ProcessLauncher,
} from './types.js';

// ═══════════════════════════════════════════════════════════════
// DEFAULTS
// ═══════════════════════════════════════════════════════════════

/** Wait after SIGKILL before the process is written off */
const KILL_GRACE_MS = 2_000;

export interface MasterControllerDeps {
  config: ControllerConfig;
  sessions: SessionRegistry;
  /** Base URL agents use to reach the gateway (UPLIFT_API_URL) */
  apiUrl?: string;
  launcher?: ProcessLauncher;
  bus?: MessageBus;
  now?: () => number;
}

// ═══════════════════════════════════════════════════════════════
// MASTER CONTROLLER
// ═══════════════════════════════════════════════════════════════

export class MasterController extends EventEmitter implements AgentDirectory {
  private readonly config: ControllerConfig;
  private readonly sessions: SessionRegistry;
  private readonly launcher: ProcessLauncher;
  private readonly bus?: MessageBus;
  private readonly now: () => number;

  /** Agent records keyed by manifest id */
  private agents: Map<string, AgentRecord> = new Map();

  /** Live processes keyed by manifest id */
  private processes: Map<string, AgentProcess> = new Map();

  private healthTimer: ReturnType<typeof setInterval> | null = null;
  private gateway: OrchestrationGateway | null = null;
  private running = false;
  private apiUrl: string;

  constructor(deps: MasterControllerDeps) {
    super();
    this.config = deps.config;
    this.apiUrl = deps.apiUrl ?? '';
    this.sessions = deps.sessions;
    this.launcher = deps.launcher ?? new ChildProcessLauncher();
    this.bus = deps.bus;
    this.now = deps.now ?? Date.now;
  }

  attachGateway(gateway: OrchestrationGateway): void {
    this.gateway = gateway;
  }

  /** Set once the gateway is listening and its port is known. */
  setApiUrl(url: string): void {
    this.apiUrl = url;
  }

  // ─────────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────────

  start(): void {
    if (this.running) return;
    this.running = true;

    if (this.config.autoDiscover) {
      this.discoverAgents();
    }

    if (this.config.autoStart) {
      const byPriority = Array.from(this.agents.values())
        .sort((a, b) => b.manifest.priority - a.manifest.priority || a.name.localeCompare(b.name));
      for (const record of byPriority) {
        this.startAgent(record.name);
      }
    }

    if (this.config.healthCheckIntervalMs > 0) {
      this.healthTimer = setInterval(() => this.healthCheck(), this.config.healthCheckIntervalMs);
      this.healthTimer.unref();
    }

    getSubsystemLogger('controller').info({ agents: this.agents.size }, 'Controller started');
    this.emit('controller:started', { timestamp: this.now() });
  }

  async stop(): Promise<void> {
    if (this.healthTimer) {
      clearInterval(this.healthTimer);
      this.healthTimer = null;
    }
    await this.stopAll();
    this.running = false;
    getSubsystemLogger('controller').info('Controller stopped');
    this.emit('controller:stopped', { timestamp: this.now() });
  }

  isRunning(): boolean {
    return this.running;
  }

  // ─────────────────────────────────────────────────────────────
  // REGISTRY
  // ─────────────────────────────────────────────────────────────

  /** Register every manifest found under the agents directory. */
  discoverAgents(): DiscoveryResult {
    const result = discoverManifests(this.config.directory);
    for (const { manifest, path } of result.agents) {
      if (this.processes.get(manifest.id)?.isAlive()) continue;
      this.registerAgent(manifest, path);
    }
    return result;
  }

  registerAgent(manifest: AgentManifest, manifestPath: string): AgentRecord {
    const existing = this.agents.get(manifest.id);
    if (existing && this.processes.get(manifest.id)?.isAlive()) {
      throw new InvalidStateError(`Agent ${manifest.id} is running and cannot be re-registered`, existing.status);
    }

    const record: AgentRecord = {
      name: manifest.id,
      manifest,
      manifestPath,
      directory: dirname(manifestPath),
      status: 'stopped',
      pid: null,
      restartCount: existing?.restartCount ?? 0,
      lastHealthCheck: null,
      startedAt: null,
      exitCode: null,
      lastError: null,
    };
    this.agents.set(manifest.id, record);
    getSubsystemLogger('controller').debug({ agent: manifest.id, path: manifestPath }, 'Agent registered');
    return { ...record };
  }

  getAgent(name: string): AgentRecord | undefined {
    const record = this.agents.get(name);
    return record ? { ...record } : undefined;
  }

  listAgentRecords(): AgentRecord[] {
    return Array.from(this.agents.values())
      .sort((a, b) => a.name.localeCompare(b.name))
      .map(record => ({ ...record }));
  }

  getManifest(agentId: string): AgentManifest | undefined {
    return this.agents.get(agentId)?.manifest;
  }

  listAgents(): DirectoryEntry[] {
    return this.listAgentRecords().map(record => ({
      id: record.name,
      name: record.manifest.name,
      description: record.manifest.description,
      version: record.manifest.version,
      capabilities: [...record.manifest.capabilities],
      status: record.status,
    }));
  }

  // ─────────────────────────────────────────────────────────────
  // PROCESS CONTROL
  // ─────────────────────────────────────────────────────────────

  /**
   * Launch an agent. Returns true when it is running afterwards, false when
   * the launch failed (the agent is then marked failed).
   */
  startAgent(name: string): boolean {
    const record = this.requireRecord(name);
    if (this.processes.get(name)?.isAlive()) return true;

    this.setStatus(record, 'starting');
    const token = this.sessions.issue(name);
    const logger = getSubsystemLogger('controller');

    let proc: AgentProcess;
    try {
      proc = this.launcher.launch({
        agentId: name,
        command: record.manifest.entrypoint.command,
        args: [...record.manifest.entrypoint.args],
        cwd: record.directory,
        env: {
          UPLIFT_API_URL: this.apiUrl,
          UPLIFT_SESSION_TOKEN: token,
          UPLIFT_AGENT_ID: name,
        },
      });
    } catch (err) {
      this.sessions.revoke(name);
      record.lastError = toError(err).message;
      this.setStatus(record, 'failed');
      logger.error({ agent: name, err }, 'Agent failed to start');
      return false;
    }

    this.processes.set(name, proc);
    record.pid = proc.pid ?? null;
    record.startedAt = this.now();
    record.exitCode = null;
    record.lastError = null;
    proc.onExit((code, signal) => this.handleExit(name, proc, code, signal));

    this.setStatus(record, 'running');
    logger.info({ agent: name, pid: record.pid }, 'Agent started');
    return true;
  }

  /**
   * SIGTERM the agent, escalating to SIGKILL after `timeoutMs`. Resolves
   * false when it was not running.
   */
  async stopAgent(name: string, timeoutMs: number = this.config.stopTimeoutMs): Promise<boolean> {
    const record = this.requireRecord(name);
    const proc = this.processes.get(name);
    if (!proc || !proc.isAlive()) {
      if (proc) {
        // Exit went unreported; a requested stop still ends as stopped
        this.setStatus(record, 'stopping');
        this.handleExit(name, proc, record.exitCode, null);
      }
      return false;
    }

    this.setStatus(record, 'stopping');
    const exited = waitForExit(proc, timeoutMs);
    proc.kill('SIGTERM');

    if (!(await exited)) {
      getSubsystemLogger('controller').warn({ agent: name, timeoutMs }, 'Agent ignored SIGTERM, sending SIGKILL');
      const killed = waitForExit(proc, KILL_GRACE_MS);
      proc.kill('SIGKILL');
      await killed;
    }

    // Exit never reported: write the process off
    if (this.processes.get(name) === proc) {
      this.handleExit(name, proc, null, 'SIGKILL');
    }
    getSubsystemLogger('controller').info({ agent: name }, 'Agent stopped');
    return true;
  }

  /** Stop every live agent concurrently; resolves with the stopped names. */
  async stopAll(timeoutMs: number = this.config.stopTimeoutMs): Promise<string[]> {
    const live = Array.from(this.processes.entries())
      .filter(([, proc]) => proc.isAlive())
      .map(([name]) => name);
    const results = await Promise.all(live.map(name => this.stopAgent(name, timeoutMs)));
    return live.filter((_, i) => results[i]);
  }

  /** SIGKILL every live agent immediately. */
  killAll(): KilledAgent[] {
    const killed: KilledAgent[] = [];
    for (const [name, proc] of this.processes) {
      if (!proc.isAlive()) continue;
      const record = this.requireRecord(name);
      this.setStatus(record, 'stopping');
      proc.kill('SIGKILL');
      killed.push({ name, pid: proc.pid ?? null });
    }
    return killed;
  }

  /**
   * Mark agents whose process vanished as failed and restart failed agents
   * that still have restart attempts left.
   */
  healthCheck(): HealthReport {
    const report: HealthReport = { checked: 0, failed: [], restarted: [] };
    const now = this.now();
    const logger = getSubsystemLogger('controller');

    for (const record of this.agents.values()) {
      if (record.status === 'running' || record.status === 'starting') {
        report.checked++;
        record.lastHealthCheck = now;

        const proc = this.processes.get(record.name);
        if (!proc || !proc.isAlive()) {
          this.processes.delete(record.name);
          this.sessions.revoke(record.name);
          record.pid = null;
          record.lastError = 'Process not running';
          this.setStatus(record, 'failed');
          report.failed.push(record.name);
          logger.warn({ agent: record.name }, 'Agent process not running');
        }
      }

      if (record.status === 'failed'
        && this.config.restartOnFailure
        && record.restartCount < this.config.maxRestartAttempts) {
        record.restartCount++;
        logger.info({ agent: record.name, attempt: record.restartCount }, 'Restarting agent');
        if (this.startAgent(record.name)) {
          report.restarted.push(record.name);
        }
      }
    }

    return report;
  }

  // ─────────────────────────────────────────────────────────────
  // TASKS
  // ─────────────────────────────────────────────────────────────

  /** Delegate a task to `agent` on behalf of the controller. */
  submitTask(
    agent: string,
    action: string,
    params: Record<string, unknown> = {},
    priority: TaskPriority = 'normal',
  ): Task {
    if (!this.gateway) {
      throw new InvalidStateError('Controller has no orchestration gateway attached', 'detached');
    }
    const task = this.gateway.delegate(operatorPrincipal('controller'), {
      targetAgentId: agent,
      objective: action,
      inputData: params,
      priority,
    });
    getSubsystemLogger('controller').info({ taskId: task.id, agent, priority }, 'Task submitted');
    return task;
  }

  // ─────────────────────────────────────────────────────────────
  // INTERNAL
  // ─────────────────────────────────────────────────────────────

  private handleExit(name: string, proc: AgentProcess, code: number | null, signal: NodeJS.Signals | null): void {
    if (this.processes.get(name) !== proc) return;
    this.processes.delete(name);
    this.sessions.revoke(name);

    const record = this.agents.get(name);
    if (!record) return;

    const expected = record.status === 'stopping';
    record.pid = null;
    record.exitCode = code;

    if (expected || code === 0) {
      this.setStatus(record, 'stopped');
    } else {
      record.lastError = signal ? `Terminated by ${signal}` : `Exited with code ${String(code)}`;
      this.setStatus(record, 'failed');
      getSubsystemLogger('controller').warn({ agent: name, code, signal }, 'Agent exited unexpectedly');
    }
  }

  private setStatus(record: AgentRecord, status: AgentStatus): void {
    const previous = record.status;
    record.status = status;
    this.bus?.send({
      from: 'controller',
      to: record.name,
      type: 'agent.status',
      payload: { agent: record.name, status, previous, pid: record.pid },
    });
    this.emit('agent:status', { agent: record.name, status, previous });
  }

  private requireRecord(name: string): AgentRecord {
    const record = this.agents.get(name);
    if (!record) throw new NotFoundError('Agent', name);
    return record;
  }
}

function waitForExit(proc: AgentProcess, timeoutMs: number): Promise<boolean> {
  if (!proc.isAlive()) return Promise.resolve(true);
  return new Promise(resolve => {
    const timer = setTimeout(() => resolve(false), timeoutMs);
    proc.onExit(() => {
      clearTimeout(timer);
      resolve(true);
    });
  });
}
