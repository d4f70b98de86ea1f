import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { ApprovalService } from '../../../src/approvals/service.js';
import { MasterController } from '../../../src/controller/controller.js';
import { MessageBus } from '../../../src/controller/message-bus.js';
import type { ControllerConfig } from '../../../src/controller/types.js';
import { openDatabase, type SqliteDatabase } from '../../../src/core/database.js';
import { InvalidStateError, NotFoundError } from '../../../src/core/errors.js';
import { ScopeAccessPolicy } from '../../../src/memory/access.js';
import { OrchestrationGateway } from '../../../src/orchestration/gateway.js';
import { SessionRegistry } from '../../../src/sessions/session-registry.js';
import { FakeLauncher, makeManifest, makeTempDir, removeDir, testConfig } from '../../helpers/fixtures.js';

interface StatusChange {
  agent: string;
  status: string;
  previous: string;
}

describe('MasterController', () => {
  let dir: string;
  let config: ControllerConfig;
  let launcher: FakeLauncher;
  let sessions: SessionRegistry;
  let bus: MessageBus;
  let controller: MasterController;
  let clock: number;

  function writeAgent(name: string, manifest: string): void {
    mkdirSync(join(config.directory, name), { recursive: true });
    writeFileSync(join(config.directory, name, 'manifest.yaml'), manifest);
  }

  function createController(overrides: Partial<ControllerConfig> = {}): MasterController {
    return new MasterController({
      config: { ...config, ...overrides },
      sessions,
      apiUrl: 'http://127.0.0.1:7420',
      launcher,
      bus,
      now: () => clock,
    });
  }

  beforeEach(() => {
    clock = 5_000;
    dir = makeTempDir();
    config = testConfig(dir).agents;
    launcher = new FakeLauncher();
    sessions = new SessionRegistry();
    bus = new MessageBus();
    controller = createController();
    controller.registerAgent(makeManifest('researcher', { priority: 8 }), join(dir, 'agents', 'researcher', 'manifest.yaml'));
    controller.registerAgent(makeManifest('writer', { priority: 3 }), join(dir, 'agents', 'writer', 'manifest.yaml'));
  });

  afterEach(async () => {
    await controller.stop();
    bus.destroy();
    removeDir(dir);
  });

  describe('registry', () => {
    it('should list registered agents by name', () => {
      expect(controller.listAgentRecords().map(a => [a.name, a.status])).toEqual([
        ['researcher', 'stopped'],
        ['writer', 'stopped'],
      ]);
      expect(controller.getAgent('writer')?.directory).toBe(join(dir, 'agents', 'writer'));
      expect(controller.getAgent('ghost')).toBeUndefined();
    });

    it('should describe agents for the directory', () => {
      expect(controller.listAgents()[0]).toEqual({
        id: 'researcher',
        name: 'researcher',
        description: 'researcher test agent',
        version: '1.0.0',
        capabilities: [],
        status: 'stopped',
      });
      expect(controller.getManifest('writer')?.priority).toBe(3);
    });

    it('should discover agents from the agents directory', () => {
      writeAgent('editor', 'id: editor\npriority: 4\n');
      writeAgent('broken', 'id: Not Valid\n');

      const result = controller.discoverAgents();

      expect(result.agents.map(a => a.manifest.id)).toEqual(['editor']);
      expect(result.issues).toHaveLength(1);
      expect(controller.getAgent('editor')?.status).toBe('stopped');
    });

    it('should not re-register a running agent', () => {
      controller.startAgent('writer');

      expect(() => controller.registerAgent(makeManifest('writer'), join(dir, 'writer.yaml')))
        .toThrow(InvalidStateError);
    });
  });

  describe('process control', () => {
    it('should launch an agent with its session and API URL', () => {
      expect(controller.startAgent('writer')).toBe(true);

      const [spec] = launcher.launches;
      expect(spec).toMatchObject({
        agentId: 'writer',
        command: 'node',
        args: ['main.js'],
        cwd: join(dir, 'agents', 'writer'),
      });
      expect(spec.env.UPLIFT_API_URL).toBe('http://127.0.0.1:7420');
      expect(spec.env.UPLIFT_AGENT_ID).toBe('writer');
      expect(sessions.resolve(spec.env.UPLIFT_SESSION_TOKEN)).toBe('writer');

      expect(controller.getAgent('writer')).toMatchObject({
        status: 'running',
        pid: 4000,
        startedAt: 5_000,
        exitCode: null,
      });
    });

    it('should not launch twice', () => {
      controller.startAgent('writer');
      controller.startAgent('writer');

      expect(launcher.launches).toHaveLength(1);
    });

    it('should pass the API URL set after construction', () => {
      controller.setApiUrl('http://127.0.0.1:9999');
      controller.startAgent('writer');

      expect(launcher.launches[0].env.UPLIFT_API_URL).toBe('http://127.0.0.1:9999');
    });

    it('should mark a failed launch and revoke its session', () => {
      launcher.failWith = new Error('spawn node ENOENT');

      expect(controller.startAgent('writer')).toBe(false);
      expect(controller.getAgent('writer')).toMatchObject({ status: 'failed', lastError: 'spawn node ENOENT' });
      expect(sessions.has('writer')).toBe(false);
    });

    it('should fail for unknown agents', () => {
      expect(() => controller.startAgent('ghost')).toThrow(NotFoundError);
    });

    it('should stop an agent with SIGTERM', async () => {
      controller.startAgent('writer');
      const proc = launcher.process('writer');

      expect(await controller.stopAgent('writer')).toBe(true);

      expect(proc.signals).toEqual(['SIGTERM']);
      expect(controller.getAgent('writer')).toMatchObject({ status: 'stopped', pid: null });
      expect(sessions.has('writer')).toBe(false);
    });

    it('should escalate to SIGKILL when SIGTERM is ignored', async () => {
      launcher.ignoreSigterm = true;
      controller.startAgent('writer');
      const proc = launcher.process('writer');

      expect(await controller.stopAgent('writer', 20)).toBe(true);

      expect(proc.signals).toEqual(['SIGTERM', 'SIGKILL']);
      expect(controller.getAgent('writer')?.status).toBe('stopped');
    });

    it('should report false when stopping an agent that is not running', async () => {
      expect(await controller.stopAgent('writer')).toBe(false);
    });

    it('should record a stop as stopped when the process already vanished', async () => {
      controller.startAgent('writer');
      launcher.process('writer').vanish();

      expect(await controller.stopAgent('writer')).toBe(false);

      expect(controller.getAgent('writer')).toMatchObject({ status: 'stopped', pid: null, lastError: null });
      expect(sessions.has('writer')).toBe(false);
    });

    it('should mark unexpected exits as failures', () => {
      controller.startAgent('writer');

      launcher.process('writer').exit(1);

      expect(controller.getAgent('writer')).toMatchObject({
        status: 'failed',
        exitCode: 1,
        lastError: 'Exited with code 1',
      });
      expect(sessions.has('writer')).toBe(false);
    });

    it('should treat a clean exit as stopped', () => {
      controller.startAgent('writer');

      launcher.process('writer').exit(0);

      expect(controller.getAgent('writer')?.status).toBe('stopped');
    });

    it('should stop all running agents', async () => {
      controller.startAgent('writer');
      controller.startAgent('researcher');

      const stopped = await controller.stopAll();

      expect(stopped.sort()).toEqual(['researcher', 'writer']);
    });

    it('should kill all running agents at once', () => {
      controller.startAgent('writer');
      controller.startAgent('researcher');

      const killed = controller.killAll();

      expect(killed).toEqual([{ name: 'writer', pid: 4000 }, { name: 'researcher', pid: 4001 }]);
      expect(launcher.process('writer').signals).toEqual(['SIGKILL']);
      expect(controller.listAgentRecords().map(a => a.status)).toEqual(['stopped', 'stopped']);
    });

    it('should publish status changes', () => {
      const changes: StatusChange[] = [];
      controller.on('agent:status', (change: StatusChange) => changes.push(change));

      controller.startAgent('writer');

      expect(changes).toEqual([
        { agent: 'writer', status: 'starting', previous: 'stopped' },
        { agent: 'writer', status: 'running', previous: 'starting' },
      ]);
      expect(bus.getHistory({ type: 'agent.status', to: 'writer' })).toHaveLength(2);
    });
  });

  describe('lifecycle', () => {
    it('should auto-start discovered agents in priority order', () => {
      const auto = createController({ autoDiscover: true, autoStart: true });
      writeAgent('low', 'id: low\npriority: 2\n');
      writeAgent('high', 'id: high\npriority: 9\n');

      auto.start();

      expect(launcher.launches.map(l => l.agentId)).toEqual(['high', 'low']);
      expect(auto.isRunning()).toBe(true);
      auto.killAll();
    });
  });

  describe('health checks', () => {
    it('should mark vanished processes as failed and restart them', () => {
      controller.startAgent('writer');
      launcher.process('writer').vanish();
      clock = 6_000;

      const report = controller.healthCheck();

      expect(report).toEqual({ checked: 1, failed: ['writer'], restarted: ['writer'] });
      expect(controller.getAgent('writer')).toMatchObject({
        status: 'running',
        restartCount: 1,
        lastHealthCheck: 6_000,
        pid: 4001,
      });
    });

    it('should stop restarting after the maximum attempts', () => {
      const limited = createController({ maxRestartAttempts: 1 });
      limited.registerAgent(makeManifest('flaky'), join(dir, 'agents', 'flaky', 'manifest.yaml'));

      limited.startAgent('flaky');
      launcher.process('flaky').exit(1);
      expect(limited.healthCheck().restarted).toEqual(['flaky']);

      launcher.process('flaky').exit(1);
      expect(limited.healthCheck().restarted).toEqual([]);
      expect(limited.getAgent('flaky')?.status).toBe('failed');
    });

    it('should leave failed agents alone when restarts are disabled', () => {
      const manual = createController({ restartOnFailure: false });
      manual.registerAgent(makeManifest('flaky'), join(dir, 'agents', 'flaky', 'manifest.yaml'));
      manual.startAgent('flaky');
      launcher.process('flaky').exit(2);

      expect(manual.healthCheck()).toEqual({ checked: 0, failed: [], restarted: [] });
    });
  });

  describe('tasks', () => {
    let db: SqliteDatabase;

    afterEach(() => {
      db.close();
    });

    it('should submit tasks through the gateway', () => {
      db = openDatabase(':memory:');
      const approvals = new ApprovalService(db, {
        settings: {
          riskLevels: {
            low: { timeout: 60 }, medium: { timeout: 60 }, high: { timeout: 60 }, critical: { timeout: 60 },
          },
          checkIntervalMs: 0,
          pollIntervalMs: 10,
        },
      });
      const gateway = new OrchestrationGateway(controller, new ScopeAccessPolicy(controller), { approvals });
      controller.attachGateway(gateway);

      const task = controller.submitTask('writer', 'Draft the summary', { words: 300 }, 'high');

      expect(task).toMatchObject({
        from: 'controller',
        target: 'writer',
        objective: 'Draft the summary',
        inputData: { words: 300 },
        priority: 'high',
        status: 'pending',
      });
      gateway.destroy();
    });

    it('should refuse tasks without a gateway', () => {
      db = openDatabase(':memory:');
      expect(() => controller.submitTask('writer', 'x')).toThrow(InvalidStateError);
    });
  });
});
