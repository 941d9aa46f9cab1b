/**
 * `lanrelay send-sms` / `lanrelay send-clip` — relay a single item through
 * the full pipeline and exit once the upload has completed.
 */

import { Command } from 'commander';
import { PushSource } from '../../adapters/push-source.js';
import { RelayAgent } from '../../daemon/agent.js';
import type { AgentAdapters } from '../../daemon/types.js';
import type { DispatchOutcome } from '../../sync/types.js';
import { loadRuntime, parseAddress, type CommonOptions } from './shared.js';

interface SendOptions extends CommonOptions {
  server?: string;
}

export function createSendSmsCommand(): Command {
  const cmd = new Command('send-sms');

  cmd
    .description('Relay one SMS to the receiver')
    .argument('<sender>', 'Originating number or name')
    .argument('<content...>', 'Message text')
    .option('-d, --dir <directory>', 'Directory holding .lanrelay.yaml', '.')
    .option('-s, --server <address>', 'Receiver as ip[:port]')
    .option('-v, --verbose', 'Pretty logs on the terminal')
    .action(async (sender: string, content: string[], options: SendOptions) => {
      const source = new PushSource();
      await relayOnce(options, { sms: source }, () => source.pushSms(sender, content.join(' ')));
    });

  return cmd;
}

export function createSendClipCommand(): Command {
  const cmd = new Command('send-clip');

  cmd
    .description('Relay clipboard text to the receiver')
    .argument('<text...>', 'Text to relay')
    .option('-d, --dir <directory>', 'Directory holding .lanrelay.yaml', '.')
    .option('-s, --server <address>', 'Receiver as ip[:port]')
    .option('-v, --verbose', 'Pretty logs on the terminal')
    .action(async (text: string[], options: SendOptions) => {
      const source = new PushSource();
      await relayOnce(options, { clipboard: source }, () => source.pushClipboard(text.join(' ')));
    });

  return cmd;
}

async function relayOnce(options: SendOptions, adapters: AgentAdapters, push: () => void): Promise<void> {
  const manual = options.server ? parseAddress(options.server) : undefined;
  const { config, logger } = loadRuntime(options, { discovery: { enabled: false } });

  const agent = new RelayAgent({ config, adapters, logger });
  const outcomes: DispatchOutcome[] = [];
  agent.getEvents().on('dispatch:completed', (outcome) => outcomes.push(outcome));

  agent.start();
  if (manual) {
    agent.updateEndpoint(manual);
  }

  push();
  await agent.flush();
  await agent.stop();

  const outcome = outcomes[0];
  if (!outcome) {
    console.log('Nothing relayed');
    return;
  }
  if (outcome.status === 'delivered') {
    console.log(`✓ delivered to ${outcome.url} (${outcome.httpStatus})`);
    return;
  }
  console.error(`✗ ${outcome.status}: ${outcome.error?.message ?? 'unknown error'}`);
  process.exitCode = 1;
}
