/**
 * DirectoryPhotoLibrary — a folder of images as a photo source.
 *
 * Watches one directory (non-recursive) with fs.watch and answers the
 * PhotoLibrary queries from the file system. Item ids are inode numbers
 * as decimal strings, so a renamed file keeps its identity. Files whose names look like partial
 * writes, or that are still empty, count as pending.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type pino from 'pino';
import { getLogger } from '../core/logger.js';
import { matchAny } from '../utils/glob.js';
import type { PhotoLibrary, PhotoRecord, Unsubscribe } from './types.js';

export interface DirectoryPhotoLibraryOptions {
  /** Directory holding the photos */
  dir: string;
  /** File name globs that count as photos */
  patterns?: string[];
  /** File name globs for files still being written */
  pendingPatterns?: string[];
  logger?: pino.Logger;
}

export const DEFAULT_PHOTO_PATTERNS = ['*.{jpg,jpeg,png,heic,heif,webp,gif}'];
export const DEFAULT_PENDING_PATTERNS = ['*.part', '*.tmp', '*.crdownload', '.*'];

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

export class DirectoryPhotoLibrary implements PhotoLibrary {
  private readonly dir: string;
  private readonly patterns: string[];
  private readonly pendingPatterns: string[];
  private readonly logger: pino.Logger;
  private listeners: Set<(itemRef?: string) => void> = new Set();
  private watcher: fs.FSWatcher | null = null;

  constructor(options: DirectoryPhotoLibraryOptions) {
    this.dir = path.resolve(options.dir);
    this.patterns = options.patterns ?? DEFAULT_PHOTO_PATTERNS;
    this.pendingPatterns = options.pendingPatterns ?? DEFAULT_PENDING_PATTERNS;
    this.logger = (options.logger ?? getLogger()).child({ component: 'photo-library', dir: this.dir });
  }

  // ─────────────────────────────────────────────────────────
  // CHANGE NOTIFICATIONS
  // ─────────────────────────────────────────────────────────

  onChange(listener: (itemRef?: string) => void): Unsubscribe {
    this.listeners.add(listener);
    this.ensureWatching();
    return () => {
      this.listeners.delete(listener);
      if (this.listeners.size === 0) {
        this.close();
      }
    };
  }

  close(): void {
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
  }

  isWatching(): boolean {
    return this.watcher !== null;
  }

  // ─────────────────────────────────────────────────────────
  // QUERIES
  // ─────────────────────────────────────────────────────────

  async queryByRef(ref: string): Promise<PhotoRecord | null> {
    const filePath = path.resolve(this.dir, ref);
    if (!this.isPhoto(filePath) && !this.isPendingName(filePath)) {
      return null;
    }
    return this.statRecord(filePath);
  }

  async queryRecent(): Promise<PhotoRecord[]> {
    const entries = await fs.promises.readdir(this.dir, { withFileTypes: true });
    const records: PhotoRecord[] = [];

    for (const entry of entries) {
      if (!entry.isFile()) continue;
      const filePath = path.join(this.dir, entry.name);
      if (!this.isPhoto(filePath) && !this.isPendingName(filePath)) continue;

      const record = await this.statRecord(filePath);
      if (record) records.push(record);
    }
    return records;
  }

  async readBytes(record: PhotoRecord): Promise<Uint8Array> {
    return fs.promises.readFile(record.ref);
  }

  // ─────────────────────────────────────────────────────────
  // INTERNAL
  // ─────────────────────────────────────────────────────────

  private ensureWatching(): void {
    if (this.watcher) return;

    this.watcher = fs.watch(this.dir, (_eventType, filename) => {
      const itemRef = filename ? path.join(this.dir, filename) : undefined;
      if (itemRef && !this.isPhoto(itemRef)) return;
      for (const listener of this.listeners) {
        listener(itemRef);
      }
    });

    this.watcher.on('error', (err) => {
      this.logger.error({ err }, 'Directory watcher failed');
    });
  }

  private async statRecord(filePath: string): Promise<PhotoRecord | null> {
    let stat: fs.BigIntStats;
    try {
      stat = await fs.promises.stat(filePath, { bigint: true });
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
    if (!stat.isFile()) return null;

    const displayName = path.basename(filePath);
    return {
      id: stat.ino > 0n ? stat.ino.toString() : filePath,
      ref: filePath,
      displayName,
      isPendingWrite: this.isPendingName(filePath) || stat.size === 0n,
      createdAt: Number(stat.birthtimeMs > 0n ? stat.birthtimeMs : stat.mtimeMs),
    };
  }

  private isPhoto(filePath: string): boolean {
    return matchAny(this.patterns, path.basename(filePath), true);
  }

  private isPendingName(filePath: string): boolean {
    return matchAny(this.pendingPatterns, path.basename(filePath));
  }
}
