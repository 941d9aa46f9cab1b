/**
 * `lanrelay start` — run the relay agent until interrupted.
 */

import { Command } from 'commander';
import { createInterface } from 'readline';
import { DirectoryPhotoLibrary } from '../../adapters/directory-photo-library.js';
import { PushSource } from '../../adapters/push-source.js';
import { RelayAgent } from '../../daemon/agent.js';
import type { AgentAdapters } from '../../daemon/types.js';
import { BonjourDiscoveryBackend } from '../../discovery/bonjour-backend.js';
import { loadRuntime, parseAddress, type CommonOptions } from './shared.js';

interface StartOptions extends CommonOptions {
  watch?: string;
  server?: string;
  discovery: boolean;
  clipboardStdin?: boolean;
}

export function createStartCommand(): Command {
  const cmd = new Command('start');

  cmd
    .description('Watch local sources and relay changes to the receiver')
    .option('-d, --dir <directory>', 'Directory holding .lanrelay.yaml', '.')
    .option('-w, --watch <directory>', 'Folder of photos to relay')
    .option('-s, --server <address>', 'Initial receiver as ip[:port]; discovery may replace it unless --no-discovery')
    .option('--no-discovery', 'Do not browse for the receiver on the local network')
    .option('--clipboard-stdin', 'Relay each line read from stdin as clipboard text')
    .option('-v, --verbose', 'Pretty logs on the terminal')
    .action(async (options: StartOptions) => {
      await runStart(options);
    });

  return cmd;
}

async function runStart(options: StartOptions): Promise<void> {
  const manual = options.server ? parseAddress(options.server) : undefined;
  const { config, logger } = loadRuntime(options, {
    photos: options.watch ? { watchDir: options.watch } : {},
    discovery: options.discovery ? {} : { enabled: false },
  });

  const adapters: AgentAdapters = {};
  const library = config.photos.watchDir
    ? new DirectoryPhotoLibrary({ dir: config.photos.watchDir, logger })
    : null;
  if (library) adapters.photos = library;

  const clipboard = options.clipboardStdin ? new PushSource() : null;
  if (clipboard) adapters.clipboard = clipboard;

  if (!library && !clipboard) {
    console.error('Nothing to watch: pass --watch <directory> or --clipboard-stdin, or set photos.watchDir');
    process.exitCode = 1;
    return;
  }

  const backend = config.discovery.enabled ? new BonjourDiscoveryBackend({ logger }) : undefined;
  const agent = new RelayAgent({ config, adapters, discovery: backend, logger });

  agent.getEvents().on('endpoint:changed', ({ url, origin }) => {
    console.log(`→ receiver ${url} (${origin})`);
  });
  agent.getEvents().on('dispatch:completed', (outcome) => {
    const detail = outcome.httpStatus !== undefined ? ` ${outcome.httpStatus}` : '';
    console.log(`${outcome.status === 'delivered' ? '✓' : '✗'} ${outcome.source} ${outcome.status}${detail}`);
  });

  agent.start();
  if (manual) {
    agent.updateEndpoint(manual);
  }

  const lines = clipboard ? createInterface({ input: process.stdin }) : null;
  if (lines && clipboard) {
    lines.on('line', (line) => clipboard.pushClipboard(line));
  }

  console.log(`lanrelay running: ${agent.getSources().join(', ')} → ${agent.currentEndpoint() ?? 'no receiver yet'}`);

  const shutdown = async (): Promise<void> => {
    lines?.close();
    await agent.stop();
    backend?.destroy();
    library?.close();
  };

  await new Promise<void>((resolveStop) => {
    const onSignal = (): void => {
      shutdown().then(resolveStop, (err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        resolveStop();
      });
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  });
}
