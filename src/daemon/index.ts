/**
 * Daemon — long-running relay agent
 *
 * @example
 * ```typescript
 * import { RelayAgent } from 'lanrelay';
 *
 * const agent = new RelayAgent({ config, adapters: { photos: library } });
 * agent.start();
 * // ...
 * await agent.stop();
 * ```
 */

export { RelayAgent } from './agent.js';
export type { RelayAgentOptions } from './agent.js';
export type { AgentAdapters, AgentStatus } from './types.js';
