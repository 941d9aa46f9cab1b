/**
 * lanrelay — relay new photos, SMS and clipboard text to a LAN receiver
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { ConfigManager, RelayAgent, DirectoryPhotoLibrary } from 'lanrelay';
 *
 * const config = new ConfigManager().load();
 * const agent = new RelayAgent({
 *   config,
 *   adapters: { photos: new DirectoryPhotoLibrary({ dir: '/media/camera' }) },
 * });
 * agent.start();
 * ```
 */

// Core
export { EventBus } from './core/events.js';
export { ConfigManager, type ConfigManagerOptions } from './core/config.js';
export { createLogger, getLogger, setLogger } from './core/logger.js';
export { AsyncMutex, KeyedMutex } from './core/mutex.js';
export {
  LanRelayError,
  ConfigError,
  DiscoveryError,
  QueryError,
  ReadError,
  DispatchError,
  ReceiveError,
  toError,
} from './core/errors.js';
export { LanRelayConfigSchema } from './core/types.js';
export type { LanRelayConfig, LanRelayConfigInput, AgentState, LanRelayEvents } from './core/types.js';

// Sync pipeline
export * from './sync/index.js';

// Discovery
export type { DiscoveryBackend, DiscoveryListener, ResolveListener } from './discovery/backend.js';
export { BonjourDiscoveryBackend, toBonjourQuery, pickAddress } from './discovery/bonjour-backend.js';
export type {
  BonjourBrowser,
  BonjourClient,
  BonjourDiscoveryBackendOptions,
  BonjourFactory,
  BonjourRecord,
} from './discovery/bonjour-backend.js';
export { openBonjour } from './discovery/mdns.js';

// Adapters
export { DirectoryPhotoLibrary, type DirectoryPhotoLibraryOptions } from './adapters/directory-photo-library.js';
export { PushSource } from './adapters/push-source.js';
export type {
  PhotoLibrary,
  PhotoRecord,
  SmsInbox,
  ClipboardMonitor,
  Unsubscribe,
} from './adapters/types.js';

// Daemon
export * from './daemon/index.js';

// Receiver
export * from './receiver/index.js';

// Version
export { VERSION, NAME } from './version.js';
