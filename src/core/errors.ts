export class LanRelayError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'LanRelayError';
  }
}

export class ConfigError extends LanRelayError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

export class DiscoveryError extends LanRelayError {
  constructor(
    message: string,
    public readonly serviceType: string,
    public readonly errorCode?: number,
    cause?: Error,
  ) {
    super(message, 'DISCOVERY_ERROR', 'discover', cause);
    this.name = 'DiscoveryError';
  }
}

export class QueryError extends LanRelayError {
  constructor(message: string, public readonly source: string, cause?: Error) {
    super(message, 'QUERY_ERROR', 'resolve', cause);
    this.name = 'QueryError';
  }
}

export class ReadError extends LanRelayError {
  constructor(message: string, public readonly itemId: string | number | undefined, cause?: Error) {
    super(message, 'READ_ERROR', 'load', cause);
    this.name = 'ReadError';
  }
}

export class DispatchError extends LanRelayError {
  constructor(message: string, public readonly url: string | null, cause?: Error) {
    super(message, 'DISPATCH_ERROR', 'dispatch', cause);
    this.name = 'DispatchError';
  }
}

export class ReceiveError extends LanRelayError {
  constructor(message: string, public readonly status: number, cause?: Error) {
    super(message, 'RECEIVE_ERROR', 'receive', cause);
    this.name = 'ReceiveError';
  }
}

/**
 * Normalize anything thrown into an Error so it can be chained as a cause.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
