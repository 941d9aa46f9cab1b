/**
 * PhotoLibrary backed by a plain array. Tests add records, fire change
 * notifications by hand and count the queries and reads made against it.
 */

import type { PhotoLibrary, PhotoRecord, Unsubscribe } from '../../src/adapters/types.js';

export class MemoryPhotoLibrary implements PhotoLibrary {
  readonly records: PhotoRecord[] = [];
  readonly bytes = new Map<PhotoRecord['id'], Uint8Array>();
  private listeners = new Set<(itemRef?: string) => void>();
  queries = 0;
  reads = 0;
  failReads = false;
  failQueries = false;

  add(record: Partial<PhotoRecord> & Pick<PhotoRecord, 'id'>, data = new Uint8Array([1, 2, 3])): PhotoRecord {
    const full: PhotoRecord = {
      ref: `photo-${record.id}`,
      displayName: `IMG_${record.id}.jpg`,
      isPendingWrite: false,
      createdAt: 0,
      ...record,
    };
    this.records.push(full);
    this.bytes.set(full.id, data);
    return full;
  }

  fire(itemRef?: string): void {
    for (const listener of this.listeners) listener(itemRef);
  }

  onChange(listener: (itemRef?: string) => void): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  queryByRef(ref: string): PhotoRecord | null {
    this.queries++;
    if (this.failQueries) throw new Error('content provider unavailable');
    return this.records.find((record) => record.ref === ref) ?? null;
  }

  queryRecent(): PhotoRecord[] {
    this.queries++;
    if (this.failQueries) throw new Error('content provider unavailable');
    return [...this.records];
  }

  async readBytes(record: PhotoRecord): Promise<Uint8Array> {
    this.reads++;
    if (this.failReads) throw new Error('EACCES');
    const data = this.bytes.get(record.id);
    if (!data) throw new Error(`missing bytes for ${record.id}`);
    return data;
  }
}
