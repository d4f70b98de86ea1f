import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'fs';
import { join, resolve } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { UpliftConfigSchema, type UpliftConfig, type ConfigOverrides } from './types.js';
import { ConfigError, toError } from './errors.js';

export const PROJECT_CONFIG_FILE = 'uplift.yaml';

export class ConfigManager {
  private config: UpliftConfig | null = null;
  private globalDir: string;
  private projectDir: string;

  constructor(projectDir?: string, globalDir?: string) {
    this.globalDir = globalDir ?? join(homedir(), '.uplift');
    this.projectDir = projectDir || process.cwd();
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: ConfigOverrides, env: NodeJS.ProcessEnv = process.env): UpliftConfig {
    let raw: Record<string, unknown> = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, PROJECT_CONFIG_FILE), 'project'));
    raw = this.applyEnvVars(raw, env);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    const parsed = UpliftConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new ConfigError(`Invalid configuration: ${issues}`, parsed.error);
    }

    const { runtime, agents } = parsed.data;
    const config: UpliftConfig = {
      ...parsed.data,
      runtime: {
        ...runtime,
        dataDir: resolve(this.projectDir, runtime.dataDir ?? join(this.globalDir, 'data')),
      },
      agents: {
        ...agents,
        directory: resolve(this.projectDir, agents.directory),
      },
    };

    this.config = config;
    return config;
  }

  get(): UpliftConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  ensureDirectories(): void {
    const dirs = [
      this.globalDir,
      join(this.globalDir, 'data'),
      join(this.globalDir, 'logs'),
    ];
    for (const dir of dirs) {
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }
  }

  /**
   * Create default global config if it doesn't exist.
   * Returns the path and whether it was written.
   */
  createDefaultConfig(): { path: string; created: boolean } {
    this.ensureDirectories();
    const configPath = join(this.globalDir, 'config.yaml');
    if (existsSync(configPath)) {
      return { path: configPath, created: false };
    }

    const defaultConfig = `# UPLIFT Runtime Configuration

runtime:
  host: 127.0.0.1
  port: 7420
  # adminKey: change-me-operator-key

agents:
  directory: ./agents
  autoDiscover: true
  autoStart: false
  restartOnFailure: true
  maxRestartAttempts: 3

approvals:
  riskLevels:
    low:
      timeout: 1800
    medium:
      timeout: 1800
    high:
      timeout: 1800
    critical:
      timeout: 1800

logging:
  level: info
`;
    writeFileSync(configPath, defaultConfig, 'utf-8');
    return { path: configPath, created: true };
  }

  private readYaml(filePath: string, label: string): Record<string, unknown> {
    if (!existsSync(filePath)) return {};

    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(filePath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${filePath}`, toError(err));
    }

    if (parsed === null || parsed === undefined) return {};
    if (!isRecord(parsed)) {
      throw new ConfigError(`Expected a mapping in ${label} config at ${filePath}`);
    }
    return parsed;
  }

  private applyEnvVars(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
    const runtime = isRecord(raw.runtime) ? { ...raw.runtime } : {};
    const agents = isRecord(raw.agents) ? { ...raw.agents } : {};
    const logging = isRecord(raw.logging) ? { ...raw.logging } : {};

    if (env.UPLIFT_HOST) {
      runtime.host = env.UPLIFT_HOST;
    }
    if (env.UPLIFT_PORT) {
      const port = Number(env.UPLIFT_PORT);
      if (!Number.isInteger(port)) {
        throw new ConfigError(`UPLIFT_PORT must be an integer, got "${env.UPLIFT_PORT}"`);
      }
      runtime.port = port;
    }
    if (env.UPLIFT_DATA_DIR) {
      runtime.dataDir = env.UPLIFT_DATA_DIR;
    }
    if (env.UPLIFT_ADMIN_KEY) {
      runtime.adminKey = env.UPLIFT_ADMIN_KEY;
    }
    if (env.UPLIFT_AGENTS_DIR) {
      agents.directory = env.UPLIFT_AGENTS_DIR;
    }
    if (env.UPLIFT_LOG_LEVEL) {
      logging.level = env.UPLIFT_LOG_LEVEL;
    }

    return { ...raw, runtime, agents, logging };
  }

  private deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const sourceValue = source[key];
      const targetValue = target[key];
      if (isRecord(sourceValue) && isRecord(targetValue)) {
        result[key] = this.deepMerge(targetValue, sourceValue);
      } else if (sourceValue !== undefined) {
        result[key] = sourceValue;
      }
    }
    return result;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
