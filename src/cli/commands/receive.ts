/**
 * `lanrelay receive` — accept relayed items and advertise on the LAN.
 */

import { Command } from 'commander';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigError } from '../../core/errors.js';
import { EventBus } from '../../core/events.js';
import { ServiceAdvertiser } from '../../receiver/advertiser.js';
import { ItemStore, describeItem } from '../../receiver/item-store.js';
import { ReceiverServer } from '../../receiver/server.js';
import { loadRuntime, type CommonOptions } from './shared.js';

interface ReceiveOptions extends CommonOptions {
  port?: string;
  host?: string;
  out?: string;
  advertise: boolean;
  name?: string;
}

export function createReceiveCommand(): Command {
  const cmd = new Command('receive');

  cmd
    .description('Receive photos, SMS and clipboard text from lanrelay agents')
    .option('-d, --dir <directory>', 'Directory holding .lanrelay.yaml', '.')
    .option('-p, --port <port>', 'Port to listen on (default 3000)')
    .option('--host <address>', 'Address to bind (default 0.0.0.0)')
    .option('-o, --out <directory>', 'Where to write received items (default <tmpdir>/lanrelay)')
    .option('--name <instance>', 'mDNS instance name (default <hostname>_lanrelay)')
    .option('--no-advertise', 'Do not advertise the receiver over mDNS')
    .option('-v, --verbose', 'Pretty logs on the terminal')
    .action(async (options: ReceiveOptions) => {
      await runReceive(options);
    });

  return cmd;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port > 65535) {
    throw new ConfigError(`Invalid port "${value}"`);
  }
  return port;
}

async function runReceive(options: ReceiveOptions): Promise<void> {
  const { config, logger } = loadRuntime(options, {
    receiver: {
      ...(options.port !== undefined ? { port: parsePort(options.port) } : {}),
      ...(options.host !== undefined ? { host: options.host } : {}),
      ...(options.out !== undefined ? { outDir: options.out } : {}),
      ...(options.name !== undefined ? { instanceName: options.name } : {}),
      ...(options.advertise ? {} : { advertise: false }),
    },
  });
  const settings = config.receiver;

  const events = new EventBus();
  const store = new ItemStore({ dir: settings.outDir ?? join(tmpdir(), 'lanrelay'), logger });
  const server = new ReceiverServer({
    port: settings.port,
    host: settings.host,
    maxBodyBytes: settings.maxBodyBytes,
    events,
    logger,
  });
  server.onItem(async (item) => {
    const target = await store.save(item);
    console.log(`✓ ${describeItem(item)} → ${target}`);
  });
  events.on('receiver:rejected', ({ path, status, reason }) => {
    console.log(`✗ ${path} ${status} ${reason}`);
  });
  events.on('advertiser:failed', ({ error }) => {
    console.error(`mDNS advertising failed: ${error.message}`);
  });

  const url = await server.start();
  const port = server.getPort() ?? settings.port;

  const advertiser = settings.advertise
    ? new ServiceAdvertiser({
        serviceType: config.discovery.serviceType,
        port,
        name: settings.instanceName,
        events,
        logger,
      })
    : null;
  advertiser?.start();

  console.log(`lanrelay receiving on ${url}, writing to ${store.getDir()}`);
  if (advertiser) {
    console.log(`Advertising ${advertiser.getName()} as ${config.discovery.serviceType}`);
  }

  const shutdown = async (): Promise<void> => {
    await advertiser?.stop();
    await server.stop();
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
