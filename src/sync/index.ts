/**
 * Sync Module — change signal to upload pipeline
 *
 * @example
 * ```typescript
 * import { DedupCache, UploadDispatcher, createSmsPipeline } from 'lanrelay';
 *
 * const dedup = new DedupCache();
 * const dispatcher = new UploadDispatcher({ endpoint: () => resolver.getEndpoint() });
 * const sms = createSmsPipeline(inbox, { dedup, dispatcher });
 * sms.start();
 * ```
 */

export { Debouncer, DEFAULT_DEBOUNCE_MS } from './debouncer.js';
export type { DebouncerOptions, SettleHandler } from './debouncer.js';
export {
  DedupCache,
  DEFAULT_DEDUP_WINDOW_MS,
  DEFAULT_DEDUP_HIGH_WATER_MARK,
} from './dedup-cache.js';
export type { DedupCacheOptions } from './dedup-cache.js';
export {
  reduce,
  normalizeServiceType,
  isValidPort,
  INITIAL_SNAPSHOT,
  DEFAULT_PATH_TEMPLATE,
} from './discovery-machine.js';
export type { ResolverSnapshot, DiscoveryEvent, DiscoveryEffect, Transition } from './discovery-machine.js';
export {
  EndpointResolver,
  formatEndpointUrl,
  DEFAULT_SERVICE_TYPE,
  DEFAULT_MANUAL_PORT,
} from './endpoint-resolver.js';
export type { EndpointResolverOptions } from './endpoint-resolver.js';
export { UploadDispatcher, buildTargetUrl, DEFAULT_DISPATCH_TIMEOUT_MS } from './upload-dispatcher.js';
export type { UploadDispatcherOptions, FetchLike } from './upload-dispatcher.js';
export { SyncOrchestrator } from './orchestrator.js';
export type {
  Candidate,
  SignalResolver,
  SignalSubscription,
  JobSender,
  SyncOrchestratorOptions,
  OrchestratorStats,
  Pipeline,
} from './orchestrator.js';
export { createPhotoPipeline, createSmsPipeline, createClipboardPipeline } from './pipelines.js';
export type { SharedPipelineParts } from './pipelines.js';
export { PhotoResolver, selectLatestPhoto, FALLBACK_FILE_NAME } from './sources/photo.js';
export { SmsResolver, extractVerificationCode, toSmsRecord } from './sources/sms.js';
export { ClipboardResolver } from './sources/clipboard.js';
export type * from './types.js';
