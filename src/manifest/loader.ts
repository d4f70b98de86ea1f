import { existsSync, readFileSync, readdirSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { ManifestError, toError } from '../core/errors.js';
import { getSubsystemLogger } from '../core/logger.js';
import { parseScopeUri } from '../memory/scope.js';
import {
  ManifestFileSchema,
  type AgentManifest,
  type DiscoveredManifest,
  type DiscoveryIssue,
  type DiscoveryResult,
  type ManifestFile,
} from './types.js';

/** File names probed in each agent directory, in order. */
export const MANIFEST_FILE_NAMES = ['manifest.yaml', 'agent.yaml'];

export function parseManifest(text: string, source: string): AgentManifest {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    throw new ManifestError(`Invalid YAML in manifest ${source}`, source, toError(err));
  }

  const parsed = ManifestFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`)
      .join('; ');
    throw new ManifestError(`Invalid manifest ${source}: ${issues}`, source, parsed.error);
  }

  const manifest = toAgentManifest(parsed.data);
  for (const uri of [...manifest.permissions.memory.read, ...manifest.permissions.memory.write]) {
    try {
      parseScopeUri(uri);
    } catch (err) {
      throw new ManifestError(`Invalid manifest ${source}: ${toError(err).message}`, source, toError(err));
    }
  }
  return manifest;
}

export function loadManifest(path: string): DiscoveredManifest {
  const absolute = resolve(path);
  let text: string;
  try {
    text = readFileSync(absolute, 'utf-8');
  } catch (err) {
    throw new ManifestError(`Cannot read manifest ${absolute}`, absolute, toError(err));
  }
  return {
    manifest: parseManifest(text, absolute),
    path: absolute,
    directory: dirname(absolute),
  };
}

/** Find the manifest file inside an agent directory, if any. */
export function findManifestFile(agentDir: string): string | null {
  for (const name of MANIFEST_FILE_NAMES) {
    const candidate = join(agentDir, name);
    if (existsSync(candidate)) return candidate;
  }
  return null;
}

/**
 * Scan `dir` for agent sub-directories. Invalid manifests and duplicate ids
 * are reported as issues; the first manifest (by directory name) wins.
 */
export function discoverManifests(dir: string): DiscoveryResult {
  const logger = getSubsystemLogger('manifest');
  const root = resolve(dir);
  const agents: DiscoveredManifest[] = [];
  const issues: DiscoveryIssue[] = [];

  if (!existsSync(root)) {
    logger.warn({ dir: root }, 'Agent directory not found');
    return { agents, issues };
  }

  const entries = readdirSync(root, { withFileTypes: true })
    .filter(e => e.isDirectory())
    .map(e => e.name)
    .sort();

  const seen = new Map<string, string>();

  for (const name of entries) {
    const manifestPath = findManifestFile(join(root, name));
    if (!manifestPath) continue;

    try {
      const discovered = loadManifest(manifestPath);
      const previous = seen.get(discovered.manifest.id);
      if (previous) {
        issues.push({
          path: manifestPath,
          message: `Duplicate agent id "${discovered.manifest.id}" (already defined in ${previous})`,
        });
        continue;
      }
      seen.set(discovered.manifest.id, manifestPath);
      agents.push(discovered);
    } catch (err) {
      issues.push({ path: manifestPath, message: toError(err).message });
    }
  }

  for (const issue of issues) {
    logger.warn(issue, 'Skipping agent manifest');
  }
  logger.info({ dir: root, count: agents.length }, 'Discovered agents');

  return { agents, issues };
}

function toAgentManifest(file: ManifestFile): AgentManifest {
  return {
    id: file.id,
    name: file.name ?? file.id,
    version: file.version,
    description: file.description,
    entrypoint: {
      command: file.entrypoint.command,
      args: file.entrypoint.args,
    },
    priority: file.priority,
    capabilities: file.capabilities,
    permissions: {
      memory: {
        read: file.permissions.memory.read,
        write: file.permissions.memory.write,
      },
      canDelegate: file.permissions.can_delegate,
    },
    approval: {
      required: file.approval.required,
      riskLevel: file.approval.risk_level,
    },
    settings: file.settings,
  };
}
