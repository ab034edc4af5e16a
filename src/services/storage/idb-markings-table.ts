import { createStore, get, update, type UseStore } from 'idb-keyval';
import type { IndexRange, MarkingRecord, Metadata } from '../../types/marking';
import { metadataKey } from '../../utils/metadata';
import {
  MarkingRecordListSchema,
  mergeRecords,
  removeRanges,
  type MarkingsTable,
} from './markings-table';

export const DEFAULT_DB_NAME = 'series-inspector';
export const DEFAULT_STORE_NAME = 'markings';

function parseRows(raw: unknown, key: string): MarkingRecord[] {
  if (raw === undefined) return [];
  const parsed = MarkingRecordListSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Stored markings for ${key} are malformed: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }
  return parsed.data;
}

/** Markings kept in IndexedDB, one entry per metadata key */
export class IdbMarkingsTable implements MarkingsTable {
  private readonly store: UseStore;

  constructor(dbName = DEFAULT_DB_NAME, storeName = DEFAULT_STORE_NAME) {
    this.store = createStore(dbName, storeName);
  }

  async upsertMarkings(metadata: Metadata, markings: MarkingRecord[]): Promise<number> {
    const key = metadataKey(metadata);
    await update<MarkingRecord[]>(key, (old) => mergeRecords(parseRows(old, key), markings), this.store);
    return markings.length;
  }

  async deleteMarkings(metadata: Metadata, ranges: IndexRange[]): Promise<number> {
    const key = metadataKey(metadata);
    let removed = 0;
    await update<MarkingRecord[]>(
      key,
      (old) => {
        const existing = parseRows(old, key);
        const remaining = removeRanges(existing, ranges);
        removed = existing.length - remaining.length;
        return remaining;
      },
      this.store
    );
    return removed;
  }

  async getMarkings(metadata: Metadata): Promise<MarkingRecord[]> {
    const key = metadataKey(metadata);
    const raw: unknown = await get(key, this.store);
    return parseRows(raw, key);
  }
}
