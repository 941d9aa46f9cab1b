import { z } from 'zod';
import type { ClipboardRecord, SmsRecord } from '../sync/types.js';

// ===== Request bodies =====

export const SmsPayloadSchema = z.object({
  sender: z.string(),
  content: z.string(),
  code: z.string().default(''),
});

export const ClipboardPayloadSchema = z.object({
  text: z.string(),
  timestamp: z.number().int(),
});

// ===== Received items =====

export interface ReceivedPhoto {
  kind: 'photo';
  fileName: string;
  bytes: Uint8Array;
  receivedAt: number;
}

export interface ReceivedSms extends SmsRecord {
  kind: 'sms';
  receivedAt: number;
}

export interface ReceivedClipboard extends ClipboardRecord {
  kind: 'clipboard';
  receivedAt: number;
}

export type ReceivedItem = ReceivedPhoto | ReceivedSms | ReceivedClipboard;

export type ItemHandler = (item: ReceivedItem) => void | Promise<void>;
