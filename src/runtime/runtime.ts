/**
 * Runtime: composition root.
 *
 * Opens the database and wires memory, approvals, sessions, orchestration,
 * the controller and the gateway server together.
 */

import { GatewayServer } from '../api/server.js';
import { ApprovalService } from '../approvals/service.js';
import { MasterController } from '../controller/controller.js';
import { EventLog } from '../controller/event-log.js';
import { KillSwitch } from '../controller/kill-switch.js';
import { MessageBus } from '../controller/message-bus.js';
import type { ProcessLauncher } from '../controller/types.js';
import { databasePath, openDatabase, type SqliteDatabase } from '../core/database.js';
import { getLogDir, getSubsystemLogger } from '../core/logger.js';
import type { UpliftConfig } from '../core/types.js';
import { ScopeAccessPolicy } from '../memory/access.js';
import { MemoryStore } from '../memory/store.js';
import { OrchestrationGateway } from '../orchestration/gateway.js';
import { SessionRegistry } from '../sessions/session-registry.js';
import { resolveAdminKey } from './admin-key.js';

export interface RuntimeOptions {
  config: UpliftConfig;
  launcher?: ProcessLauncher;
  /** Defaults to `<dataDir>/uplift.db`; ':memory:' for a throwaway runtime */
  databasePath?: string;
  /** Where emergency-stop logs go; defaults to the log directory */
  logDir?: string;
  now?: () => number;
}

export class Runtime {
  readonly config: UpliftConfig;
  readonly adminKey: string;
  readonly db: SqliteDatabase;
  readonly bus: MessageBus;
  readonly eventLog: EventLog;
  readonly sessions: SessionRegistry;
  readonly controller: MasterController;
  readonly policy: ScopeAccessPolicy;
  readonly memory: MemoryStore;
  readonly approvals: ApprovalService;
  readonly gateway: OrchestrationGateway;
  readonly killSwitch: KillSwitch;
  readonly server: GatewayServer;

  private started = false;

  constructor(options: RuntimeOptions) {
    const { config } = options;
    const now = options.now ?? Date.now;
    this.config = config;
    this.adminKey = resolveAdminKey(config.runtime.dataDir, config.runtime.adminKey);

    this.db = openDatabase(options.databasePath ?? databasePath(config.runtime.dataDir));
    this.bus = new MessageBus();
    this.eventLog = new EventLog(this.db);
    this.eventLog.attach(this.bus);

    this.sessions = new SessionRegistry(now);
    this.controller = new MasterController({
      config: config.agents,
      sessions: this.sessions,
      launcher: options.launcher,
      bus: this.bus,
      now,
    });

    this.policy = new ScopeAccessPolicy(this.controller);
    this.memory = new MemoryStore(this.db, this.policy, { ...config.memory, now });
    this.approvals = new ApprovalService(this.db, { settings: config.approvals, now });
    this.gateway = new OrchestrationGateway(this.controller, this.policy, {
      approvals: this.approvals,
      bus: this.bus,
      now,
    });
    this.controller.attachGateway(this.gateway);

    this.approvals.events.on('approval:requested', ({ request }) => {
      this.bus.send({
        from: 'approvals',
        to: request.agent,
        type: 'approval.requested',
        payload: { request_id: request.id, action: request.action, risk_level: request.riskLevel },
      });
    });
    this.approvals.events.on('approval:decided', ({ request }) => {
      this.bus.send({
        from: 'approvals',
        to: request.agent,
        type: 'approval.decided',
        payload: { request_id: request.id, action: request.action, status: request.status },
      });
    });

    this.killSwitch = new KillSwitch(this.controller, {
      logDir: options.logDir ?? getLogDir(),
      bus: this.bus,
      now,
    });

    this.server = new GatewayServer(
      {
        host: config.runtime.host,
        port: config.runtime.port,
        adminKey: this.adminKey,
        corsOrigins: config.runtime.corsOrigins,
        maxRequestBytes: config.runtime.maxRequestBytes,
      },
      {
        memory: this.memory,
        gateway: this.gateway,
        approvals: this.approvals,
        controller: this.controller,
        sessions: this.sessions,
        killSwitch: this.killSwitch,
        events: this.eventLog,
      },
    );
  }

  /** Start serving and supervising; resolves with the gateway URL. */
  async start(): Promise<string> {
    if (this.started) return this.server.url();

    const url = await this.server.start();
    this.controller.setApiUrl(url);
    this.approvals.startTimeoutMonitor();
    this.controller.start();
    this.started = true;

    getSubsystemLogger('runtime').info({ url, dataDir: this.config.runtime.dataDir }, 'Runtime started');
    return url;
  }

  async stop(): Promise<void> {
    if (this.started) {
      await this.controller.stop();
      this.approvals.stop();
      await this.server.stop();
      this.started = false;
    }
    this.eventLog.detach();
    this.gateway.destroy();
    this.bus.destroy();
    this.approvals.events.removeAllListeners();
    if (this.db.open) this.db.close();
    getSubsystemLogger('runtime').info('Runtime stopped');
  }
}
