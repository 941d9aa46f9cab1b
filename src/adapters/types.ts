/**
 * Event-source adapter contracts.
 *
 * Adapters push change notifications and, for content-backed sources, answer
 * queries about the items behind them. Query methods may answer
 * synchronously or with a promise.
 */

import type { ItemId, SmsMessage } from '../sync/types.js';

export type Unsubscribe = () => void;

export type MaybePromise<T> = T | Promise<T>;

export interface PhotoRecord {
  id: ItemId;
  /** Reference the library understands in queryByRef() */
  ref: string;
  displayName: string | null;
  /** Still being written; must not be uploaded yet */
  isPendingWrite: boolean;
  /** Creation time in epoch ms */
  createdAt: number;
}

export interface PhotoLibrary {
  onChange(listener: (itemRef?: string) => void): Unsubscribe;
  queryByRef(ref: string): MaybePromise<PhotoRecord | null>;
  /** Candidate items for "most recent" resolution, in any order */
  queryRecent(): MaybePromise<PhotoRecord[]>;
  readBytes(record: PhotoRecord): MaybePromise<Uint8Array>;
}

export interface SmsInbox {
  onMessage(listener: (message: SmsMessage) => void): Unsubscribe;
}

export interface ClipboardMonitor {
  onChange(listener: (text: string) => void): Unsubscribe;
}
