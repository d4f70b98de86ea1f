/**
 * `uplift memory`: operator inspection of scoped memory.
 * `memory scopes`               every scope with entry counts
 * `memory list <scope>`         entries in a scope
 * `memory get <scope> <key>`    one entry's value
 */

import { Command } from 'commander';
import type { UpliftConfig } from '../../core/types.js';
import { ScopeAccessPolicy, operatorPrincipal } from '../../memory/access.js';
import { MemoryStore } from '../../memory/store.js';
import { formatTimestamp, loadConfig, withDatabase, type ProjectOptions } from '../context.js';

export function createMemoryCommand(): Command {
  const cmd = new Command('memory');

  cmd.description('Inspect scoped memory');

  cmd
    .command('scopes')
    .description('List memory scopes')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--json', 'Output as JSON')
    .action((options: ProjectOptions & { json?: boolean }) => {
      const scopes = withStore(loadConfig(options), store => store.listScopes());
      if (options.json) {
        console.log(JSON.stringify(scopes, null, 2));
        return;
      }
      console.log();
      console.log('🗂  Memory scopes');
      console.log('─'.repeat(60));
      for (const scope of scopes) {
        console.log(`  ${scope.scope.padEnd(44)} ${String(scope.entries).padStart(5)}  ${formatTimestamp(scope.updatedAt)}`);
      }
      console.log();
      console.log(`Total: ${scopes.length} scopes`);
      console.log();
    });

  cmd
    .command('list <scope>')
    .description('List entries in a scope')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--json', 'Output as JSON')
    .action((scope: string, options: ProjectOptions & { json?: boolean }) => {
      const entries = withStore(loadConfig(options), store => store.list(scope));
      if (options.json) {
        console.log(JSON.stringify(entries, null, 2));
        return;
      }
      console.log();
      console.log(`📄 ${scope}`);
      console.log('─'.repeat(60));
      for (const entry of entries) {
        console.log(`  ${entry.key.padEnd(32)} ${formatTimestamp(entry.updatedAt)}  by ${entry.writtenBy}`);
      }
      console.log();
      console.log(`Total: ${entries.length} entries`);
      console.log();
    });

  cmd
    .command('get <scope> <key>')
    .description('Print one entry')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .action((scope: string, key: string, options: ProjectOptions) => {
      const entry = withStore(loadConfig(options), store => store.get(operatorPrincipal(), scope, key));
      console.log(typeof entry.value === 'string' ? entry.value : JSON.stringify(entry.value, null, 2));
    });

  return cmd;
}

function withStore<T>(config: UpliftConfig, fn: (store: MemoryStore) => T): T {
  return withDatabase(config, db => {
    // Operators bypass scope checks, so no manifests are needed
    const policy = new ScopeAccessPolicy({ getManifest: () => undefined });
    return fn(new MemoryStore(db, policy, config.memory));
  });
}
