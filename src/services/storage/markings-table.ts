import { z } from 'zod';
import { LABEL_IDS } from '../../constants/labels';
import type { IndexRange, Marking, MarkingRecord, Metadata } from '../../types/marking';
import { metadataKey } from '../../utils/metadata';

export const MarkingRecordSchema = z.object({
  start: z.number().finite(),
  end: z.number().finite(),
  label: z.enum(LABEL_IDS),
  note: z.string().nullable(),
});

export const MarkingRecordListSchema = z.array(MarkingRecordSchema);

/**
 * Persistent marking storage keyed by item metadata. A record is identified
 * by its (start, end) pair within one metadata key.
 */
export interface MarkingsTable {
  /** Insert or replace records; returns how many were written */
  upsertMarkings(metadata: Metadata, markings: MarkingRecord[]): Promise<number>;
  /** Delete records with exactly these bounds; returns how many were removed */
  deleteMarkings(metadata: Metadata, ranges: IndexRange[]): Promise<number>;
  getMarkings(metadata: Metadata): Promise<MarkingRecord[]>;
}

export function toRecord({ start, end, label, note }: Marking): MarkingRecord {
  return { start, end, label, note };
}

function sameBounds(a: IndexRange, b: IndexRange): boolean {
  return a.start === b.start && a.end === b.end;
}

export function mergeRecords(existing: MarkingRecord[], upserts: MarkingRecord[]): MarkingRecord[] {
  const merged = existing.filter((row) => !upserts.some((u) => sameBounds(row, u)));
  // later duplicates in one batch win
  const batch = upserts.filter((u, idx) => !upserts.slice(idx + 1).some((later) => sameBounds(u, later)));
  return [...merged, ...batch].sort((a, b) => a.start - b.start || a.end - b.end);
}

export function removeRanges(existing: MarkingRecord[], ranges: IndexRange[]): MarkingRecord[] {
  return existing.filter((row) => !ranges.some((r) => sameBounds(row, r)));
}

/** In-process table, also the stand-in for tests */
export class MemoryMarkingsTable implements MarkingsTable {
  private readonly rows = new Map<string, MarkingRecord[]>();

  async upsertMarkings(metadata: Metadata, markings: MarkingRecord[]): Promise<number> {
    const key = metadataKey(metadata);
    this.rows.set(key, mergeRecords(this.rows.get(key) ?? [], markings));
    return markings.length;
  }

  async deleteMarkings(metadata: Metadata, ranges: IndexRange[]): Promise<number> {
    const key = metadataKey(metadata);
    const existing = this.rows.get(key) ?? [];
    const remaining = removeRanges(existing, ranges);
    this.rows.set(key, remaining);
    return existing.length - remaining.length;
  }

  async getMarkings(metadata: Metadata): Promise<MarkingRecord[]> {
    return (this.rows.get(metadataKey(metadata)) ?? []).map((row) => ({ ...row }));
  }

  get size(): number {
    let n = 0;
    for (const rows of this.rows.values()) n += rows.length;
    return n;
  }
}
