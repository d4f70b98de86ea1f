/**
 * Agent Manifest Types
 *
 * Manifests are written in snake_case YAML (`manifest.yaml` or `agent.yaml`)
 * and exposed to the rest of the runtime in camelCase.
 */

import { z } from 'zod';
import { RiskLevelSchema, type RiskLevel } from '../core/types.js';

export const AGENT_ID_PATTERN = /^[a-z0-9][a-z0-9._-]*$/;

/** `uplift://agent/private` is the relative scope, so no agent may own that segment. */
export const RESERVED_AGENT_IDS: ReadonlySet<string> = new Set(['private']);

export const ManifestFileSchema = z.object({
  id: z.string()
    .regex(AGENT_ID_PATTERN, 'must be lower-case letters, digits, ".", "_" or "-"')
    .refine(id => !RESERVED_AGENT_IDS.has(id), id => ({ message: `"${id}" is reserved` })),
  name: z.string().optional(),
  version: z.string().default('0.1.0'),
  description: z.string().default(''),
  entrypoint: z.object({
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
  }).default({ command: 'node', args: ['main.js'] }),
  priority: z.number().int().min(1).max(10).default(5),
  capabilities: z.array(z.string()).default([]),
  permissions: z.object({
    memory: z.object({
      read: z.array(z.string()).default([]),
      write: z.array(z.string()).default([]),
    }).default({}),
    can_delegate: z.boolean().default(true),
  }).default({}),
  approval: z.object({
    required: z.boolean().default(false),
    risk_level: RiskLevelSchema.default('medium'),
  }).default({}),
  settings: z.record(z.unknown()).default({}),
});

export type ManifestFile = z.infer<typeof ManifestFileSchema>;

export interface AgentManifest {
  id: string;
  name: string;
  version: string;
  description: string;
  entrypoint: {
    command: string;
    args: string[];
  };
  /** 1 (lowest) to 10 (highest) */
  priority: number;
  capabilities: string[];
  permissions: {
    memory: {
      read: string[];
      write: string[];
    };
    canDelegate: boolean;
  };
  approval: {
    required: boolean;
    riskLevel: RiskLevel;
  };
  settings: Record<string, unknown>;
}

export interface DiscoveredManifest {
  manifest: AgentManifest;
  /** Absolute path of the manifest file */
  path: string;
  /** Directory the agent process runs in */
  directory: string;
}

export interface DiscoveryIssue {
  path: string;
  message: string;
}

export interface DiscoveryResult {
  agents: DiscoveredManifest[];
  issues: DiscoveryIssue[];
}
