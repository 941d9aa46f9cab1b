/**
 * `lanrelay status` — show the resolved configuration.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { ConfigManager } from '../../core/config.js';
import { formatEndpointUrl } from '../../sync/endpoint-resolver.js';
import { VERSION } from '../../version.js';

interface StatusOptions {
  dir: string;
  json?: boolean;
}

export function createStatusCommand(): Command {
  const cmd = new Command('status');

  cmd
    .description('Show lanrelay configuration and the default receiver')
    .option('-d, --dir <directory>', 'Directory holding .lanrelay.yaml', '.')
    .option('--json', 'Output as JSON')
    .action((options: StatusOptions) => {
      showStatus(options);
    });

  return cmd;
}

function showStatus(options: StatusOptions): void {
  const manager = new ConfigManager({ projectDir: resolve(options.dir) });
  const config = manager.load();
  const defaultUrl = formatEndpointUrl(config.endpoint);

  if (options.json) {
    console.log(
      JSON.stringify(
        { version: VERSION, globalDir: manager.getGlobalDir(), projectDir: manager.getProjectDir(), defaultUrl, config },
        null,
        2,
      ),
    );
    return;
  }

  console.log();
  console.log(`lanrelay v${VERSION}`);
  console.log('─'.repeat(48));
  console.log(`  Config dir    ${manager.getGlobalDir()}`);
  console.log(`  Project dir   ${manager.getProjectDir()}`);
  console.log(`  Receiver      ${defaultUrl}`);
  console.log(`  Discovery     ${config.discovery.enabled ? config.discovery.serviceType : 'off'}`);
  console.log(`  Debounce      ${config.pipeline.debounceMs}ms`);
  console.log(`  Dedup window  ${config.pipeline.dedupWindowMs}ms`);
  console.log(`  Photos        ${config.photos.watchDir ?? '(not watching)'}`);
  console.log();
}
