/**
 * Receiver — accepts relayed photos, SMS and clipboard text
 *
 * @example
 * ```typescript
 * import { ReceiverServer, ItemStore, ServiceAdvertiser } from 'lanrelay';
 *
 * const store = new ItemStore({ dir: './received' });
 * const server = new ReceiverServer({ port: 3000 });
 * server.onItem((item) => store.save(item));
 * await server.start();
 * new ServiceAdvertiser({ serviceType: '_photosync._tcp', port: 3000 }).start();
 * ```
 */

export { ReceiverServer, DEFAULT_RECEIVER_PORT, DEFAULT_MAX_BODY_BYTES, DEFAULT_PHOTO_NAME } from './server.js';
export type { ReceiverServerOptions } from './server.js';
export { ItemStore, describeItem, safeFileName, CLIPBOARD_PREVIEW_CHARS } from './item-store.js';
export type { ItemStoreOptions } from './item-store.js';
export { ServiceAdvertiser, defaultInstanceName } from './advertiser.js';
export type {
  AdvertiserState,
  BonjourPublisher,
  PublishedService,
  PublisherFactory,
  ServiceAdvertiserOptions,
} from './advertiser.js';
export { SmsPayloadSchema, ClipboardPayloadSchema } from './types.js';
export type { ItemHandler, ReceivedClipboard, ReceivedItem, ReceivedPhoto, ReceivedSms } from './types.js';
