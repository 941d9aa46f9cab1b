/**
 * `lanrelay init` — write the default global config file.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { ConfigManager } from '../../core/config.js';
import { formatEndpointUrl } from '../../sync/endpoint-resolver.js';

interface InitOptions {
  dir: string;
}

export function createInitCommand(): Command {
  const cmd = new Command('init');

  cmd
    .description('Create ~/.lanrelay/config.yaml (or $LANRELAY_HOME/config.yaml) with defaults')
    .option('-d, --dir <directory>', 'Directory holding .lanrelay.yaml', '.')
    .action((options: InitOptions) => {
      runInit(options);
    });

  return cmd;
}

function runInit(options: InitOptions): void {
  const manager = new ConfigManager({ projectDir: resolve(options.dir) });
  const { path, created } = manager.createDefaultConfig();
  // Validates the file just written, or the one already there
  const config = manager.get();

  console.log(created ? `✓ Created ${path}` : `Config already exists at ${path}`);
  console.log(`  Receiver  ${formatEndpointUrl(config.endpoint)}`);
  console.log(`  Discovery ${config.discovery.enabled ? config.discovery.serviceType : 'off'}`);
}
