/**
 * Photo resolution strategies.
 *
 * With a reference, the referenced item is looked up and skipped while it is
 * still being written. Without one, the newest finished item by creation
 * time is taken. Either way the orchestrator applies the same admission step.
 */

import { QueryError, ReadError, toError } from '../../core/errors.js';
import type { PhotoLibrary, PhotoRecord } from '../../adapters/types.js';
import type { Candidate, SignalResolver } from '../orchestrator.js';
import type { PhotoSignal } from '../types.js';

export const FALLBACK_FILE_NAME = 'unknown.jpg';

/**
 * Newest record not in a pending-write state, or null.
 */
export function selectLatestPhoto(records: readonly PhotoRecord[]): PhotoRecord | null {
  let latest: PhotoRecord | null = null;
  for (const record of records) {
    if (record.isPendingWrite) continue;
    if (!latest || record.createdAt > latest.createdAt) {
      latest = record;
    }
  }
  return latest;
}

export class PhotoResolver implements SignalResolver<PhotoSignal> {
  readonly kind = 'photo' as const;

  constructor(private readonly library: PhotoLibrary) {}

  async locate(signal: PhotoSignal): Promise<Candidate | null> {
    const record = signal.itemRef !== undefined
      ? await this.resolveByReference(signal.itemRef)
      : await this.resolveLatest();

    if (!record) return null;
    return this.toCandidate(record);
  }

  private async resolveByReference(ref: string): Promise<PhotoRecord | null> {
    let record: PhotoRecord | null;
    try {
      record = await this.library.queryByRef(ref);
    } catch (err) {
      throw new QueryError(`Query for ${ref} failed`, this.kind, toError(err));
    }
    if (!record) {
      throw new QueryError(`No photo found for ${ref}`, this.kind);
    }
    // Still being written; the library fires again once it is finished
    if (record.isPendingWrite) return null;
    return record;
  }

  private async resolveLatest(): Promise<PhotoRecord> {
    let records: PhotoRecord[];
    try {
      records = await this.library.queryRecent();
    } catch (err) {
      throw new QueryError('Query for latest photo failed', this.kind, toError(err));
    }
    const latest = selectLatestPhoto(records);
    if (!latest) {
      throw new QueryError('No finished photo available', this.kind);
    }
    return latest;
  }

  private toCandidate(record: PhotoRecord): Candidate {
    const fileName = record.displayName || FALLBACK_FILE_NAME;
    return {
      itemId: record.id,
      label: fileName,
      load: async () => {
        let payload: Uint8Array;
        try {
          payload = await this.library.readBytes(record);
        } catch (err) {
          throw new ReadError(`Failed to read ${fileName}`, record.id, toError(err));
        }
        return { contentKind: 'raw-binary', payload, fileName, pathSuffix: '/upload' };
      },
    };
  }
}
