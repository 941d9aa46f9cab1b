/**
 * Factories wiring each adapter kind to its resolver and orchestrator.
 */

import type pino from 'pino';
import type { ClipboardMonitor, PhotoLibrary, SmsInbox } from '../adapters/types.js';
import type { DedupCache } from './dedup-cache.js';
import { SyncOrchestrator, type JobSender } from './orchestrator.js';
import { ClipboardResolver } from './sources/clipboard.js';
import { PhotoResolver } from './sources/photo.js';
import { SmsResolver } from './sources/sms.js';
import type { ClipboardSignal, PhotoSignal, SmsSignal } from './types.js';

export interface SharedPipelineParts {
  dedup: DedupCache;
  dispatcher: JobSender;
  debounceMs?: number;
  logger?: pino.Logger;
  now?: () => number;
}

export function createPhotoPipeline(library: PhotoLibrary, parts: SharedPipelineParts): SyncOrchestrator<PhotoSignal> {
  const now = parts.now ?? Date.now;
  return new SyncOrchestrator<PhotoSignal>({
    ...parts,
    resolver: new PhotoResolver(library),
    subscribe: (emit) => library.onChange((itemRef) => emit({ source: 'photo', itemRef, arrivalTime: now() })),
  });
}

export function createSmsPipeline(inbox: SmsInbox, parts: SharedPipelineParts): SyncOrchestrator<SmsSignal> {
  const now = parts.now ?? Date.now;
  return new SyncOrchestrator<SmsSignal>({
    ...parts,
    resolver: new SmsResolver(),
    subscribe: (emit) => inbox.onMessage((message) => emit({ source: 'sms', message, arrivalTime: now() })),
  });
}

export function createClipboardPipeline(
  monitor: ClipboardMonitor,
  parts: SharedPipelineParts,
): SyncOrchestrator<ClipboardSignal> {
  const now = parts.now ?? Date.now;
  return new SyncOrchestrator<ClipboardSignal>({
    ...parts,
    resolver: new ClipboardResolver(now),
    subscribe: (emit) => monitor.onChange((text) => emit({ source: 'clipboard', text, arrivalTime: now() })),
  });
}
