export {
  parseManifest,
  loadManifest,
  findManifestFile,
  discoverManifests,
  MANIFEST_FILE_NAMES,
} from './loader.js';
export {
  ManifestFileSchema,
  AGENT_ID_PATTERN,
  type AgentManifest,
  type ManifestFile,
  type DiscoveredManifest,
  type DiscoveryIssue,
  type DiscoveryResult,
} from './types.js';
