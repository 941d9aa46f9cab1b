/**
 * Helpers shared by the CLI commands: config loading with CLI overrides and
 * receiver address parsing.
 */

import { resolve } from 'path';
import type pino from 'pino';
import { ConfigManager } from '../../core/config.js';
import { ConfigError } from '../../core/errors.js';
import { createLogger, setLogger } from '../../core/logger.js';
import type { LanRelayConfig, LanRelayConfigInput } from '../../core/types.js';
import type { ManualEndpointUpdate } from '../../sync/types.js';

export interface CommonOptions {
  dir: string;
  verbose?: boolean;
}

/**
 * Parse `ip`, `ip:port`, `[v6]` or `[v6]:port`. A bare IPv6 literal has no
 * port. The port defaults to 3000 downstream.
 */
export function parseAddress(value: string): ManualEndpointUpdate {
  const trimmed = value.trim();

  const bracketed = /^\[([^\]]+)\](?::(\d+))?$/.exec(trimmed);
  if (bracketed) {
    return toUpdate(bracketed[1], bracketed[2], value);
  }

  const colons = trimmed.split(':').length - 1;
  if (colons === 1) {
    const [ip, port] = trimmed.split(':');
    return toUpdate(ip, port, value);
  }
  return toUpdate(trimmed, undefined, value);
}

function toUpdate(ip: string, port: string | undefined, original: string): ManualEndpointUpdate {
  if (!ip) {
    throw new ConfigError(`Invalid receiver address "${original}"`);
  }
  if (port === undefined) {
    return { ip };
  }
  const parsed = Number(port);
  if (!/^\d+$/.test(port) || parsed < 1 || parsed > 65535) {
    throw new ConfigError(`Invalid port in receiver address "${original}"`);
  }
  return { ip, port: parsed };
}

export function loadRuntime(
  options: CommonOptions,
  overrides: LanRelayConfigInput = {},
): { config: LanRelayConfig; logger: pino.Logger } {
  const manager = new ConfigManager({ projectDir: resolve(options.dir) });
  const logging = options.verbose ? { ...overrides.logging, verbose: true } : overrides.logging;
  const config = manager.load({ ...overrides, logging });

  const logger = createLogger('lanrelay', config.logging.verbose, config.logging.level);
  setLogger(logger);
  return { config, logger };
}
