import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import { MasterController } from '../../../src/controller/controller.js';
import { KillSwitch } from '../../../src/controller/kill-switch.js';
import { MessageBus } from '../../../src/controller/message-bus.js';
import { SessionRegistry } from '../../../src/sessions/session-registry.js';
import { FakeLauncher, makeManifest, makeTempDir, removeDir, testConfig } from '../../helpers/fixtures.js';

// 2024-03-05T14:07:09.000Z
const STOP_TIME = Date.UTC(2024, 2, 5, 14, 7, 9);

describe('KillSwitch', () => {
  let dir: string;
  let launcher: FakeLauncher;
  let bus: MessageBus;
  let controller: MasterController;
  let killSwitch: KillSwitch;

  beforeEach(() => {
    dir = makeTempDir();
    launcher = new FakeLauncher();
    bus = new MessageBus();
    controller = new MasterController({
      config: testConfig(dir).agents,
      sessions: new SessionRegistry(),
      launcher,
      bus,
    });
    controller.registerAgent(makeManifest('researcher'), join(dir, 'agents', 'researcher', 'manifest.yaml'));
    controller.registerAgent(makeManifest('writer'), join(dir, 'agents', 'writer', 'manifest.yaml'));
    killSwitch = new KillSwitch(controller, { logDir: join(dir, 'logs'), bus, now: () => STOP_TIME });
  });

  afterEach(async () => {
    await controller.stop();
    bus.destroy();
    removeDir(dir);
  });

  it('should kill every agent and write an emergency log', () => {
    controller.startAgent('researcher');
    controller.startAgent('writer');

    const result = killSwitch.emergencyStop('runaway spending');

    expect(result.killed).toEqual([{ name: 'researcher', pid: 4000 }, { name: 'writer', pid: 4001 }]);
    expect(result.logFile).toBe(join(dir, 'logs', 'emergency-stop-20240305-140709.log'));
    expect(readFileSync(result.logFile, 'utf-8')).toBe([
      'Emergency stop at 2024-03-05T14:07:09.000Z',
      'Reason: runaway spending',
      'Killed 2 agent(s):',
      '  researcher (pid 4000)',
      '  writer (pid 4001)',
      '',
    ].join('\n'));
    expect(controller.listAgentRecords().map(a => a.status)).toEqual(['stopped', 'stopped']);
  });

  it('should broadcast the emergency stop', () => {
    controller.startAgent('writer');

    killSwitch.emergencyStop();

    const [message] = bus.getHistory({ type: 'system.kill' });
    expect(message.to).toBe('*');
    expect(message.payload).toEqual({ mode: 'emergency', reason: 'operator request', killed: ['writer'] });
  });

  it('should log an emergency stop with nothing running', () => {
    const result = killSwitch.emergencyStop();

    expect(result.killed).toEqual([]);
    expect(readFileSync(result.logFile, 'utf-8')).toContain('Killed 0 agent(s):\n');
  });

  it('should shut down gracefully', async () => {
    controller.startAgent('researcher');
    controller.startAgent('writer');

    const result = await killSwitch.gracefulShutdown(50);

    expect(result.stopped).toEqual(['researcher', 'writer']);
    expect(launcher.process('writer').signals).toEqual(['SIGTERM']);
    expect(bus.getHistory({ type: 'system.kill' })[0].payload).toEqual({
      mode: 'graceful',
      stopped: ['researcher', 'writer'],
    });
  });
});
