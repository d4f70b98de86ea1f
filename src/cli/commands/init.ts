/**
 * `uplift init`: write the default global config and create runtime directories.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { ConfigManager } from '../../core/config.js';
import { ensureDirSync } from '../../utils/fs.js';

export function createInitCommand(): Command {
  const cmd = new Command('init');

  cmd
    .description('Create the default configuration and runtime directories')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .action((options: { dir: string }) => {
      const manager = new ConfigManager(resolve(options.dir));
      const { path, created } = manager.createDefaultConfig();
      const config = manager.load();
      ensureDirSync(config.runtime.dataDir);
      ensureDirSync(config.agents.directory);

      console.log();
      console.log(created ? `✅ Wrote default config: ${path}` : `ℹ️  Config already exists: ${path}`);
      console.log(`   Data directory:   ${config.runtime.dataDir}`);
      console.log(`   Agents directory: ${config.agents.directory}`);
      console.log();
    });

  return cmd;
}
