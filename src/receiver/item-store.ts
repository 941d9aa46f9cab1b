/**
 * ItemStore — writes received items under one directory.
 *
 * Photos become files named `<receivedAt>-<name>`; SMS and clipboard items
 * are appended as JSON lines to `sms.jsonl` and `clipboard.jsonl`.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type pino from 'pino';
import { getLogger } from '../core/logger.js';
import type { ReceivedItem } from './types.js';

export const CLIPBOARD_PREVIEW_CHARS = 100;

export interface ItemStoreOptions {
  dir: string;
  logger?: pino.Logger;
}

/**
 * Reduce an uploaded name to a plain file name inside the store.
 */
export function safeFileName(name: string): string {
  const base = path.basename(name.replace(/\\/g, '/'));
  const cleaned = base.replace(/[^\w.-]/g, '_').replace(/^\.+/, '');
  return cleaned || 'photo';
}

/**
 * One-line summary for the terminal.
 */
export function describeItem(item: ReceivedItem): string {
  switch (item.kind) {
    case 'photo':
      return `photo ${item.fileName} (${item.bytes.length} bytes)`;
    case 'sms': {
      const code = item.code ? ` [code ${item.code}]` : '';
      return `sms from ${item.sender}: ${item.content}${code}`;
    }
    case 'clipboard': {
      const chars = [...item.text];
      const preview =
        chars.length > CLIPBOARD_PREVIEW_CHARS ? `${chars.slice(0, CLIPBOARD_PREVIEW_CHARS).join('')}...` : item.text;
      return `clipboard: ${preview}`;
    }
  }
}

export class ItemStore {
  private readonly dir: string;
  private readonly logger: pino.Logger;

  constructor(options: ItemStoreOptions) {
    this.dir = path.resolve(options.dir);
    this.logger = (options.logger ?? getLogger()).child({ component: 'item-store', dir: this.dir });
  }

  getDir(): string {
    return this.dir;
  }

  /** Persist one item; resolves with the file written */
  async save(item: ReceivedItem): Promise<string> {
    await fs.promises.mkdir(this.dir, { recursive: true });

    if (item.kind === 'photo') {
      const target = path.join(this.dir, `${item.receivedAt}-${safeFileName(item.fileName)}`);
      await fs.promises.writeFile(target, item.bytes);
      this.logger.debug({ target, bytes: item.bytes.length }, 'Photo saved');
      return target;
    }

    const target = path.join(this.dir, item.kind === 'sms' ? 'sms.jsonl' : 'clipboard.jsonl');
    await fs.promises.appendFile(target, `${JSON.stringify(item)}\n`, 'utf-8');
    this.logger.debug({ target, kind: item.kind }, 'Message appended');
    return target;
  }
}
