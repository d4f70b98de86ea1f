/**
 * Shared test fixtures: manifests, a fake process launcher, temp dirs and a
 * small HTTP helper.
 */

import { mkdtempSync, rmSync } from 'fs';
import http from 'http';
import { tmpdir } from 'os';
import { join } from 'path';
import type {
  AgentProcess,
  ExitListener,
  LaunchSpec,
  ProcessLauncher,
} from '../../src/controller/types.js';
import { ConfigManager } from '../../src/core/config.js';
import type { ConfigOverrides, RiskLevel, UpliftConfig } from '../../src/core/types.js';
import type { AgentManifest } from '../../src/manifest/types.js';
import type { AgentDirectory, DirectoryEntry } from '../../src/orchestration/types.js';

// ─── Manifests ──────────────────────────────────────────────

export interface ManifestOptions {
  priority?: number;
  canDelegate?: boolean;
  read?: string[];
  write?: string[];
  capabilities?: string[];
  approvalRequired?: boolean;
  riskLevel?: RiskLevel;
}

export function makeManifest(id: string, options: ManifestOptions = {}): AgentManifest {
  return {
    id,
    name: id,
    version: '1.0.0',
    description: `${id} test agent`,
    entrypoint: { command: 'node', args: ['main.js'] },
    priority: options.priority ?? 5,
    capabilities: options.capabilities ?? [],
    permissions: {
      memory: {
        read: options.read ?? [],
        write: options.write ?? [],
      },
      canDelegate: options.canDelegate ?? true,
    },
    approval: {
      required: options.approvalRequired ?? false,
      riskLevel: options.riskLevel ?? 'medium',
    },
    settings: {},
  };
}

/** Fixed set of manifests standing in for the controller's registry. */
export class StaticDirectory implements AgentDirectory {
  private manifests: Map<string, AgentManifest>;

  constructor(manifests: AgentManifest[]) {
    this.manifests = new Map(manifests.map(m => [m.id, m]));
  }

  getManifest(agentId: string): AgentManifest | undefined {
    return this.manifests.get(agentId);
  }

  listAgents(): DirectoryEntry[] {
    return Array.from(this.manifests.values()).map(m => ({
      id: m.id,
      name: m.name,
      description: m.description,
      version: m.version,
      capabilities: m.capabilities,
      status: 'stopped',
    }));
  }
}

// ─── Fake Processes ─────────────────────────────────────────

export class FakeProcess implements AgentProcess {
  readonly signals: NodeJS.Signals[] = [];
  private alive = true;
  private listeners: ExitListener[] = [];

  constructor(readonly pid: number, private readonly ignoreSigterm = false) {}

  isAlive(): boolean {
    return this.alive;
  }

  kill(signal: NodeJS.Signals): boolean {
    this.signals.push(signal);
    if (!this.alive) return false;
    if (signal === 'SIGTERM' && this.ignoreSigterm) return true;
    this.exit(null, signal);
    return true;
  }

  onExit(listener: ExitListener): void {
    this.listeners.push(listener);
  }

  /** Simulate the process ending on its own. */
  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (!this.alive) return;
    this.alive = false;
    for (const listener of this.listeners) listener(code, signal);
  }

  /** Simulate the process vanishing without an exit notification. */
  vanish(): void {
    this.alive = false;
  }
}

export class FakeLauncher implements ProcessLauncher {
  readonly launches: LaunchSpec[] = [];
  readonly processes: Map<string, FakeProcess> = new Map();
  failWith: Error | null = null;
  ignoreSigterm = false;
  private nextPid = 4000;

  launch(spec: LaunchSpec): AgentProcess {
    if (this.failWith) throw this.failWith;
    this.launches.push(spec);
    const proc = new FakeProcess(this.nextPid++, this.ignoreSigterm);
    this.processes.set(spec.agentId, proc);
    return proc;
  }

  process(agentId: string): FakeProcess {
    const proc = this.processes.get(agentId);
    if (!proc) throw new Error(`No process launched for ${agentId}`);
    return proc;
  }
}

// ─── Files & Config ─────────────────────────────────────────

export function makeTempDir(prefix = 'uplift-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Configuration rooted in `dir`, ignoring the environment and ~/.uplift. */
export function testConfig(dir: string, overrides: ConfigOverrides = {}): UpliftConfig {
  return new ConfigManager(dir, join(dir, 'global')).load({
    ...overrides,
    runtime: { port: 0, dataDir: join(dir, 'data'), adminKey: 'test-admin-key', ...overrides.runtime },
    agents: { autoDiscover: false, healthCheckIntervalMs: 0, ...overrides.agents },
    approvals: { checkIntervalMs: 0, ...overrides.approvals },
  }, {});
}

// ─── HTTP ───────────────────────────────────────────────────

export interface TestResponse {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: unknown;
}

export interface RequestOptions {
  token?: string;
  body?: unknown;
  /** Sent verbatim instead of JSON-encoding `body` */
  rawBody?: string;
}

export function request(baseUrl: string, method: string, path: string, options: RequestOptions = {}): Promise<TestResponse> {
  const url = new URL(path, baseUrl);
  return new Promise((resolve, reject) => {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (options.token) headers.Authorization = `Bearer ${options.token}`;

    const req = http.request({
      hostname: url.hostname,
      port: url.port,
      path: `${url.pathname}${url.search}`,
      method,
      headers,
    }, (res) => {
      let data = '';
      res.on('data', (chunk: Buffer) => { data += chunk.toString(); });
      res.on('end', () => {
        let body: unknown = null;
        if (data.length > 0) {
          try {
            body = JSON.parse(data);
          } catch {
            body = data;
          }
        }
        resolve({ status: res.statusCode ?? 0, headers: res.headers, body });
      });
    });
    req.on('error', reject);
    if (options.rawBody !== undefined) {
      req.write(options.rawBody);
    } else if (options.body !== undefined) {
      req.write(JSON.stringify(options.body));
    }
    req.end();
  });
}

/** Narrow a JSON body to an object for field access. */
export function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`Expected a JSON object, got ${JSON.stringify(value)}`);
  }
  return Object.fromEntries(Object.entries(value));
}

export function asString(value: unknown): string {
  if (typeof value !== 'string') throw new Error(`Expected a string, got ${JSON.stringify(value)}`);
  return value;
}
